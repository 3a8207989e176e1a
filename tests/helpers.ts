import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { CommandResult, CommandRunner, RunOptions } from '../shared/commandRunner.js'
import type { ShipcheckConfig } from '../shared/config.js'

export type RecordedCall = {
  line: string
  options: RunOptions | undefined
}

export type FakeRunner = CommandRunner & {
  calls: RecordedCall[]
}

const ok = (stdout = ''): CommandResult => ({ exitCode: 0, stdout, stderr: '' })

/**
 * Answers commands from a script keyed by "<command> <args...>".
 * Unscripted commands succeed with empty output.
 */
export function createFakeRunner(script: Record<string, CommandResult> = {}): FakeRunner {
  const calls: RecordedCall[] = []
  return {
    calls,
    async run(command, args, options) {
      const line = [command, ...args].join(' ')
      calls.push({ line, options })
      return script[line] ?? ok()
    },
  }
}

export function failed(exitCode: number | null, stderr = 'failed'): CommandResult {
  return { exitCode, stdout: '', stderr }
}

export function makeTempDir(prefix = 'shipcheck-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

export function writeFiles(root: string, files: Record<string, string>) {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative)
    fs.mkdirSync(path.dirname(target), { recursive: true })
    fs.writeFileSync(target, content, 'utf8')
  }
}

export const VALID_VERCEL_JSON = JSON.stringify({
  builds: [{ src: 'api/index.py', use: '@vercel/python' }],
  routes: [{ src: '/(.*)', dest: 'api/index.py' }],
})

export const VALID_ENTRY_POINT = [
  'from fastapi import FastAPI, UploadFile, File, HTTPException',
  '',
  'app = FastAPI()',
].join('\n')

export function completeProject(): Record<string, string> {
  return {
    'vercel.json': VALID_VERCEL_JSON,
    'api/index.py': VALID_ENTRY_POINT,
    'requirements-vercel.txt': 'fastapi\npandas\nrequests\n',
    'README-vercel.md': '# Deploying\n',
    'test-vercel.html': '<html></html>\n',
    'example-questions.txt': '1. How many rows are there?\n',
  }
}

export function testConfig(projectDir: string, overrides: Partial<ShipcheckConfig> = {}): ShipcheckConfig {
  return {
    projectDir,
    envFile: path.join(projectDir, '.env'),
    localUrl: 'http://127.0.0.1:8000',
    exampleDeploymentUrl: 'https://example-deployment.test',
    healthTimeoutMs: 2_000,
    analyzeTimeoutMs: 2_000,
    coldStartThresholdMs: 10_000,
    localReadyTimeoutMs: 200,
    vercelBin: 'vercel',
    npmBin: 'npm',
    pythonBin: 'python',
    ...overrides,
  }
}
