import fs from 'fs'
import path from 'path'
import { fileURLToPath } from 'url'
import type {
  AnalysisApiClient,
  AnalyzeResponse,
  CapabilitiesResponse,
  HealthResponse,
} from '../sdk/analysisApi.js'
import type { ShipcheckConfig } from '../shared/config.js'
import { errorMessage } from '../shared/errors.js'
import type { Reporter } from '../shared/reporter.js'

const FIXTURES_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../fixtures')
export const SAMPLE_QUESTIONS_PATH = path.join(FIXTURES_DIR, 'questions.txt')

export type SmokeTargetKind = 'local' | 'deployment'

export type SmokeTarget = {
  label: string
  kind: SmokeTargetKind
  baseUrl: string
}

export type CheckOutcome<T> = { status: 'success'; data: T } | { status: 'error'; error: string }

export type SmokeRun = {
  target: SmokeTarget
  health: CheckOutcome<HealthResponse>
  capabilities: CheckOutcome<CapabilitiesResponse>
  mainApi: CheckOutcome<AnalyzeResponse>
  durationMs: number
}

export type SmokeOptions = {
  questions: string
  now?: () => number
}

export function loadSampleQuestions(filePath = SAMPLE_QUESTIONS_PATH): string {
  return fs.readFileSync(filePath, 'utf8')
}

export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`
}

async function attempt<T>(
  reporter: Reporter,
  name: string,
  call: () => Promise<T>,
): Promise<CheckOutcome<T>> {
  try {
    const data = await call()
    reporter.success(`${name} passed`)
    return { status: 'success', data }
  } catch (error) {
    const message = errorMessage(error)
    reporter.error(`${name} failed: ${message}`)
    return { status: 'error', error: message }
  }
}

function printHealth(reporter: Reporter, target: SmokeTarget, outcome: CheckOutcome<HealthResponse>) {
  reporter.info(`Health: ${outcome.status}`)
  if (outcome.status !== 'success') return
  if (target.kind === 'deployment') {
    reporter.info(`  Platform: ${outcome.data.platform ?? 'unknown'}`)
  }
  reporter.info(`  Orchestrator: ${outcome.data.orchestrator ?? 'unknown'}`)
  reporter.info(`  Workflows: ${outcome.data.workflows_available ?? 0}`)
}

function printCapabilities(
  reporter: Reporter,
  target: SmokeTarget,
  outcome: CheckOutcome<CapabilitiesResponse>,
) {
  reporter.info(`Capabilities: ${outcome.status}`)
  if (outcome.status !== 'success') return
  const workflows = outcome.data.available_workflows ?? []
  reporter.info(`  Available workflows: ${workflows.length}`)
  if (target.kind === 'local') {
    for (const workflow of workflows) reporter.info(`    - ${workflow}`)
  } else {
    reporter.info(`  Platform: ${outcome.data.platform ?? 'unknown'}`)
  }
}

function printMainApi(
  reporter: Reporter,
  target: SmokeTarget,
  outcome: CheckOutcome<AnalyzeResponse>,
  durationMs: number,
) {
  const took = target.kind === 'deployment' ? ` (took ${formatSeconds(durationMs)})` : ''
  reporter.info(`Main API: ${outcome.status}${took}`)
  if (outcome.status !== 'success') return

  const data = outcome.data
  reporter.info(`  Task ID: ${data.task_id ?? 'unknown'}`)
  reporter.info(`  Workflow: ${data.workflow_type ?? 'unknown'}`)
  reporter.info(`  Status: ${data.status ?? 'unknown'}`)

  if (target.kind === 'local') {
    const result = data.result
    if (result && Object.keys(result).length > 0) {
      reporter.info(`  Result keys: ${Object.keys(result).join(', ')}`)
      if ('results' in result) {
        reporter.info(`  Analysis results available: ${Boolean(result.results)}`)
      }
      if ('plot_base64' in result) {
        reporter.info(`  Visualization generated: ${Boolean(result.plot_base64)}`)
      }
    }
    return
  }

  const info = data.processing_info
  if (info && Object.keys(info).length > 0) {
    reporter.info(`  Platform: ${info.platform ?? 'unknown'}`)
    reporter.info(`  Features: ${(info.enhanced_features ?? []).join(', ')}`)
  }
}

export async function runSmokeSuite(
  target: SmokeTarget,
  client: AnalysisApiClient,
  reporter: Reporter,
  options: SmokeOptions,
): Promise<SmokeRun> {
  const now = options.now ?? Date.now
  const isLocal = target.kind === 'local'

  reporter.step(isLocal ? '🧪' : '🚀', `Testing ${isLocal ? 'local server' : 'deployment'} at ${target.baseUrl}`)
  reporter.banner(isLocal ? 'LOCAL SERVER TESTS' : 'VERCEL DEPLOYMENT TESTS')

  reporter.step('🏥', 'Testing health endpoint...')
  const health = await attempt(reporter, 'Health check', () => client.health())
  printHealth(reporter, target, health)

  reporter.step('⚙️', 'Testing capabilities endpoint...')
  const capabilities = await attempt(reporter, 'Capabilities check', () => client.capabilities())
  printCapabilities(reporter, target, capabilities)

  if (!isLocal) reporter.info('⏳ Testing main API (may take longer on cold start)...')
  reporter.step('🔍', 'Testing main API endpoint...')
  reporter.step('📤', 'Uploading test data...')
  const startedAt = now()
  const mainApi = await attempt(reporter, 'Main API test', () =>
    client.analyze({
      questions: options.questions,
      enableIterativeReasoning: false,
      enableLogging: true,
    }),
  )
  const durationMs = now() - startedAt
  printMainApi(reporter, target, mainApi, durationMs)

  return { target, health, capabilities, mainApi, durationMs }
}

/** Polls the health endpoint until it answers, instead of asking the user to press Enter. */
export async function waitForReady(
  client: AnalysisApiClient,
  timeoutMs: number,
  intervalMs = 500,
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs

  for (let remaining = timeoutMs; remaining > 0; remaining = deadline - Date.now()) {
    try {
      // A server that accepts the connection but hangs must not outlast the deadline.
      await client.health({ timeoutMs: Math.min(client.healthTimeoutMs, remaining) })
      return true
    } catch {
      // not up yet
    }
    const pause = Math.min(intervalMs, deadline - Date.now())
    if (pause > 0) await new Promise((resolve) => setTimeout(resolve, pause))
  }

  return false
}

const CHECK_NAMES = {
  health: 'health',
  capabilities: 'capabilities',
  mainApi: 'main_api',
} as const

export function runPassed(run: SmokeRun): boolean {
  return (
    run.health.status === 'success' &&
    run.capabilities.status === 'success' &&
    run.mainApi.status === 'success'
  )
}

/** Prints the closing summary and next steps; true when every check of every run passed. */
export function summarizeSmokeRuns(
  runs: readonly SmokeRun[],
  config: Pick<ShipcheckConfig, 'coldStartThresholdMs'>,
  reporter: Reporter,
): boolean {
  reporter.banner('TEST SUMMARY')

  for (const run of runs) {
    reporter.blank()
    reporter.info(`${run.target.label.toUpperCase()} Environment:`)
    for (const key of ['health', 'capabilities', 'mainApi'] as const) {
      const outcome = run[key]
      const icon = outcome.status === 'success' ? '✅' : '❌'
      reporter.info(`  ${icon} ${CHECK_NAMES[key]}: ${outcome.status}`)
      if (outcome.status === 'error') reporter.info(`    Error: ${outcome.error}`)
    }
  }

  reporter.blank()
  reporter.info('📋 Next steps:')

  for (const run of runs) {
    const passed = runPassed(run)

    if (run.target.kind === 'local') {
      if (passed) {
        reporter.success('Local tests passed - ready for Vercel deployment')
        reporter.info('   Run: shipcheck deploy')
      } else {
        reporter.error('Local tests failed - fix issues before deploying')
        reporter.info('   Check dependencies: pip install -r requirements-vercel.txt')
        reporter.info('   Check server: uvicorn api.index:app --reload')
      }
      continue
    }

    if (passed) {
      reporter.success(`Vercel deployment working correctly (${run.target.baseUrl})`)
      if (run.durationMs > config.coldStartThresholdMs) {
        reporter.info(`⏳ Cold start took ${formatSeconds(run.durationMs)} - this is normal for first request`)
      }
    } else {
      reporter.error(`Vercel deployment has issues (${run.target.baseUrl})`)
      reporter.info('   Check environment variables in Vercel dashboard')
      reporter.info('   Check deployment logs in Vercel')
    }
  }

  return runs.length > 0 && runs.every(runPassed)
}
