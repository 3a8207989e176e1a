import test from 'node:test'
import assert from 'node:assert/strict'
import fs from 'node:fs'
import { runDeploy } from '../deploy/pipeline.js'
import type { CommandResult } from '../shared/commandRunner.js'
import { createMemoryReporter } from '../shared/reporter.js'
import {
  completeProject,
  createFakeRunner,
  failed,
  makeTempDir,
  testConfig,
  writeFiles,
} from './helpers.js'

async function deployIn(
  files: Record<string, string>,
  script: Record<string, CommandResult>,
  options: Parameters<typeof runDeploy>[0] = {},
) {
  const dir = makeTempDir()
  try {
    writeFiles(dir, files)
    const runner = createFakeRunner(script)
    const reporter = createMemoryReporter()
    const outcome = await runDeploy(options, { config: testConfig(dir), runner, reporter })
    return { dir, outcome, runner, reporter }
  } finally {
    fs.rmSync(dir, { recursive: true, force: true })
  }
}

test('runDeploy runs every step in order and deploys to production', async () => {
  const { dir, outcome, runner, reporter } = await deployIn(completeProject(), {
    'vercel whoami': { exitCode: 0, stdout: 'team-alpha\n', stderr: '' },
  })

  assert.deepEqual(outcome, { ok: true, account: 'team-alpha' })
  assert.deepEqual(
    runner.calls.map((call) => call.line),
    [
      'vercel --version',
      'vercel whoami',
      'python -c import fastapi',
      'python -c import pandas',
      'python -c import requests',
      'vercel --prod',
    ],
  )
  assert.deepEqual(runner.calls[5]?.options, { cwd: dir, interactive: true })
  assert.ok(reporter.messages('success').includes('Logged in as team-alpha'))
  assert.ok(reporter.messages('info').includes('🎉 Deployment completed successfully!'))
})

test('runDeploy deploys a preview without --prod', async () => {
  const { outcome, runner } = await deployIn(completeProject(), {}, { preview: true })

  assert.deepEqual(outcome, { ok: true })
  assert.equal(runner.calls.at(-1)?.line, 'vercel')
})

test('runDeploy aborts on the first missing required file', async () => {
  const files = completeProject()
  delete files['requirements-vercel.txt']
  delete files['README-vercel.md']

  const { outcome, runner, reporter } = await deployIn(files, {})

  assert.deepEqual(outcome, {
    ok: false,
    step: 'files',
    message: 'Missing required file: requirements-vercel.txt',
  })
  assert.equal(runner.calls.some((call) => call.line === 'vercel --prod'), false)
  assert.deepEqual(reporter.messages('error'), ['Missing required file: requirements-vercel.txt'])
})

test('runDeploy aborts when a Python dependency is missing', async () => {
  const { outcome, runner } = await deployIn(completeProject(), {
    'python -c import pandas': failed(1, 'ModuleNotFoundError'),
  })

  assert.deepEqual(outcome, {
    ok: false,
    step: 'dependencies',
    message: 'Missing dependency: pandas. Please run: pip install -r requirements-vercel.txt',
  })
  assert.equal(runner.calls.some((call) => call.line === 'vercel --prod'), false)
})

test('runDeploy can skip the dependency probe', async () => {
  const { outcome, runner, reporter } = await deployIn(
    completeProject(),
    { 'python -c import pandas': failed(1) },
    { skipDependencyCheck: true },
  )

  assert.deepEqual(outcome, { ok: true })
  assert.equal(runner.calls.some((call) => call.line.startsWith('python')), false)
  assert.deepEqual(reporter.messages('warn'), [
    'No .env file found. Make sure to set environment variables in Vercel dashboard:',
    'Skipping local dependency check',
  ])
})

test('runDeploy prints remediation hints when the deploy command fails', async () => {
  const { outcome, reporter } = await deployIn(completeProject(), { 'vercel --prod': failed(1) })

  assert.deepEqual(outcome, { ok: false, step: 'deploy', message: 'vercel exited with code 1' })
  assert.deepEqual(reporter.messages('error'), ['Deployment failed. Check the error messages above.'])
  assert.ok(reporter.messages('info').includes('   - Check vercel.json syntax'))
})

test('runDeploy lists provider keys from the env file without their values', async () => {
  const { reporter } = await deployIn(
    { ...completeProject(), '.env': 'AIPIPE_API_KEY=test-secret-value\n' },
    {},
  )

  const info = reporter.messages('info')
  assert.ok(info.includes('   AIPIPE_API_KEY=test****'))
  assert.equal(info.some((line) => line.includes('test-secret-value')), false)
  assert.ok(reporter.messages('success').includes('.env file found'))
})

test('runDeploy says so when the env file has no provider keys', async () => {
  const { reporter } = await deployIn({ ...completeProject(), '.env': 'DEBUG=1\n' }, {})

  assert.ok(reporter.messages('info').includes('   No API keys found in .env'))
})

test('runDeploy lists every provider key when there is no env file', async () => {
  const { reporter } = await deployIn(completeProject(), {})

  const info = reporter.messages('info')
  assert.ok(info.includes('   - AIPIPE_API_KEY (recommended)'))
  assert.ok(info.includes('   - OPENAI_API_KEY (alternative)'))
  assert.ok(info.includes('   - GEMINI_API_KEY (alternative)'))
})
