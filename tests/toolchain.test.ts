import test from 'node:test'
import assert from 'node:assert/strict'
import {
  ensureVercelAuth,
  ensureVercelCli,
  probePythonDependencies,
} from '../preflight/toolchain.js'
import { DeployError } from '../shared/errors.js'
import { createMemoryReporter } from '../shared/reporter.js'
import { createFakeRunner, failed, testConfig } from './helpers.js'

const config = testConfig('/work/service')

test('ensureVercelCli does nothing when the CLI answers', async () => {
  const runner = createFakeRunner()
  await ensureVercelCli(runner, config, createMemoryReporter())

  assert.deepEqual(
    runner.calls.map((call) => call.line),
    ['vercel --version'],
  )
})

test('ensureVercelCli installs the CLI globally when it is missing', async () => {
  const runner = createFakeRunner({ 'vercel --version': failed(null) })
  const reporter = createMemoryReporter()
  await ensureVercelCli(runner, config, reporter)

  assert.deepEqual(
    runner.calls.map((call) => call.line),
    ['vercel --version', 'npm install -g vercel'],
  )
  assert.deepEqual(runner.calls[1]?.options, { interactive: true })
  assert.deepEqual(reporter.messages('error'), ['Vercel CLI not found. Installing...'])
  assert.deepEqual(reporter.messages('success'), ['Vercel CLI installed'])
})

test('ensureVercelCli fails the cli step when the install fails', async () => {
  const runner = createFakeRunner({
    'vercel --version': failed(null),
    'npm install -g vercel': failed(1),
  })

  await assert.rejects(
    ensureVercelCli(runner, config, createMemoryReporter()),
    (error: unknown) => error instanceof DeployError && error.step === 'cli',
  )
})

test('ensureVercelAuth returns the logged-in account', async () => {
  const runner = createFakeRunner({
    'vercel whoami': { exitCode: 0, stdout: 'team-alpha\n', stderr: '' },
  })

  assert.equal(await ensureVercelAuth(runner, config, createMemoryReporter()), 'team-alpha')
  assert.equal(runner.calls.length, 1)
})

test('ensureVercelAuth prompts a login when there is no session', async () => {
  const runner = createFakeRunner({ 'vercel whoami': failed(1) })
  const reporter = createMemoryReporter()

  assert.equal(await ensureVercelAuth(runner, config, reporter), undefined)
  assert.equal(runner.calls[1]?.line, 'vercel login')
  assert.deepEqual(runner.calls[1]?.options, { interactive: true })
  assert.ok(reporter.messages('info').includes('Please log in to Vercel...'))
})

test('ensureVercelAuth fails the auth step when login is abandoned', async () => {
  const runner = createFakeRunner({ 'vercel whoami': failed(1), 'vercel login': failed(1) })

  await assert.rejects(
    ensureVercelAuth(runner, config, createMemoryReporter()),
    (error: unknown) => error instanceof DeployError && error.step === 'auth',
  )
})

test('probePythonDependencies imports each module separately', async () => {
  const runner = createFakeRunner({ 'python -c import pandas': failed(1, 'ModuleNotFoundError') })
  const probe = await probePythonDependencies(runner, config, ['fastapi', 'pandas', 'requests'])

  assert.deepEqual(probe, { available: ['fastapi', 'requests'], missing: ['pandas'] })
  assert.deepEqual(runner.calls[0]?.options, { cwd: '/work/service' })
})

test('probePythonDependencies marks everything missing without an interpreter', async () => {
  const runner = createFakeRunner({ 'python -c import fastapi': failed(null, 'spawn python ENOENT') })
  const probe = await probePythonDependencies(runner, config, ['fastapi', 'pandas'])

  assert.deepEqual(probe, { available: [], missing: ['fastapi', 'pandas'] })
  assert.equal(runner.calls.length, 1)
})
