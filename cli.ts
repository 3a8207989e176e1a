#!/usr/bin/env node
import fs from 'fs'
import { parseArgs } from 'node:util'
import { pathToFileURL } from 'url'
import { runDeploy } from './deploy/pipeline.js'
import { validateProject } from './preflight/validate.js'
import { AnalysisApiClient, type FetchLike } from './sdk/analysisApi.js'
import { createProcessRunner, type CommandRunner } from './shared/commandRunner.js'
import { loadConfig, withProjectDir, type ShipcheckConfig } from './shared/config.js'
import { errorMessage } from './shared/errors.js'
import { createConsoleReporter, type Reporter } from './shared/reporter.js'
import { buildSmokeReport, saveSmokeReport } from './smoke/reportStore.js'
import {
  formatSeconds,
  loadSampleQuestions,
  runSmokeSuite,
  summarizeSmokeRuns,
  waitForReady,
  type SmokeRun,
  type SmokeTarget,
} from './smoke/suite.js'
import { startStubServer } from './stub/server.js'
import 'dotenv/config'

export const USAGE = [
  'Usage: shipcheck <command> [options]',
  '',
  'Commands:',
  '  validate [--dir <path>]                        Check project files, vercel.json and the entry point',
  '  deploy [--dir <path>] [--preview] [--skip-deps] Run pre-flight checks, then vercel --prod',
  '  smoke [--local] [--url <url>] [--both] [--report <file>]',
  '                                                 Smoke-test a local server and/or a deployment',
  '  stub [--port <port>] [--platform <name>]       Serve a stand-in analysis API for rehearsal',
].join('\n')

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

export type SmokeCommand = {
  command: 'smoke'
  local: boolean
  url?: string
  both: boolean
  report?: string
}

export type ParsedCommand =
  | { command: 'help' }
  | { command: 'validate'; dir?: string }
  | { command: 'deploy'; dir?: string; preview: boolean; skipDeps: boolean }
  | SmokeCommand
  | { command: 'stub'; port: number; platform?: string }

const DEFAULT_STUB_PORT = 8000

function parsePort(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_STUB_PORT
  const port = Number(raw)
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new CliUsageError(`Invalid --port value: ${raw}`)
  }
  return port
}

function parseCommand(command: string, args: string[]): ParsedCommand {
  switch (command) {
    case 'validate': {
      const { values } = parseArgs({ args, options: { dir: { type: 'string' } } })
      return { command, ...(values.dir ? { dir: values.dir } : {}) }
    }
    case 'deploy': {
      const { values } = parseArgs({
        args,
        options: {
          dir: { type: 'string' },
          preview: { type: 'boolean' },
          'skip-deps': { type: 'boolean' },
        },
      })
      return {
        command,
        ...(values.dir ? { dir: values.dir } : {}),
        preview: values.preview ?? false,
        skipDeps: values['skip-deps'] ?? false,
      }
    }
    case 'smoke': {
      const { values } = parseArgs({
        args,
        options: {
          local: { type: 'boolean' },
          url: { type: 'string' },
          both: { type: 'boolean' },
          report: { type: 'string' },
        },
      })
      const parsed: SmokeCommand = {
        command,
        local: values.local ?? false,
        both: values.both ?? false,
        ...(values.url ? { url: values.url } : {}),
        ...(values.report ? { report: values.report } : {}),
      }
      if (!parsed.local && !parsed.both && !parsed.url) {
        throw new CliUsageError('smoke needs at least one of --local, --url <url> or --both')
      }
      return parsed
    }
    case 'stub': {
      const { values } = parseArgs({
        args,
        options: { port: { type: 'string' }, platform: { type: 'string' } },
      })
      return {
        command,
        port: parsePort(values.port),
        ...(values.platform ? { platform: values.platform } : {}),
      }
    }
    default:
      throw new CliUsageError(`Unknown command: ${command}`)
  }
}

export function parseCliArgs(argv: readonly string[]): ParsedCommand {
  const [command, ...rest] = argv

  if (!command || command === 'help' || command === '--help' || command === '-h') {
    return { command: 'help' }
  }

  try {
    return parseCommand(command, rest)
  } catch (error) {
    // node:util rejects unknown options and missing values with a plain TypeError.
    if (error instanceof CliUsageError) throw error
    throw new CliUsageError(errorMessage(error))
  }
}

export function resolveSmokeTargets(
  options: SmokeCommand,
  config: Pick<ShipcheckConfig, 'localUrl' | 'exampleDeploymentUrl'>,
): SmokeTarget[] {
  const targets: SmokeTarget[] = []

  if (options.local || options.both) {
    targets.push({ label: 'local', kind: 'local', baseUrl: config.localUrl })
  }

  // An explicit --url wins over the placeholder deployment --both would otherwise try.
  const deploymentUrl = options.url ?? (options.both ? config.exampleDeploymentUrl : undefined)
  if (deploymentUrl) {
    targets.push({ label: 'vercel', kind: 'deployment', baseUrl: deploymentUrl })
  }

  return targets
}

export type CliDeps = {
  config: ShipcheckConfig
  reporter: Reporter
  runner: CommandRunner
  fetch?: FetchLike
  /** Resolves when the stand-in server should shut down. */
  waitForShutdown?: () => Promise<void>
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve())
    process.once('SIGTERM', () => resolve())
  })
}

async function runSmoke(options: SmokeCommand, deps: CliDeps): Promise<number> {
  const { config, reporter } = deps
  reporter.step('🧪', 'API Testing Suite')

  const questions = loadSampleQuestions()
  const runs: SmokeRun[] = []

  for (const target of resolveSmokeTargets(options, config)) {
    const client = new AnalysisApiClient({
      baseUrl: target.baseUrl,
      healthTimeoutMs: config.healthTimeoutMs,
      analyzeTimeoutMs: config.analyzeTimeoutMs,
      ...(deps.fetch ? { fetch: deps.fetch } : {}),
    })

    if (target.kind === 'local') {
      reporter.blank()
      reporter.step('🏠', 'Starting local server tests...')
      reporter.info('Make sure your local server is running with:')
      reporter.info('  uvicorn api.index:app --reload')
      const ready = await waitForReady(client, config.localReadyTimeoutMs)
      if (!ready) {
        reporter.warn(
          `Local server did not answer within ${formatSeconds(config.localReadyTimeoutMs)}; running checks anyway`,
        )
      }
    } else {
      reporter.blank()
      reporter.step('🚀', 'Starting Vercel deployment tests...')
      if (!options.url) {
        reporter.info(`Testing example URL: ${target.baseUrl}`)
        reporter.info('(This will fail unless you set SHIPCHECK_EXAMPLE_URL or pass --url)')
      }
    }

    runs.push(await runSmokeSuite(target, client, reporter, { questions }))
  }

  const passed = summarizeSmokeRuns(runs, config, reporter)

  const reportPath = options.report ?? config.reportPath
  if (reportPath) {
    saveSmokeReport(reportPath, buildSmokeReport(runs, passed))
    reporter.info(`📝 Report written to ${reportPath}`)
  }

  return passed ? 0 : 1
}

export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const { reporter } = deps

  let parsed: ParsedCommand
  try {
    parsed = parseCliArgs(argv)
  } catch (error) {
    if (!(error instanceof CliUsageError)) throw error
    reporter.error(error.message)
    reporter.info(USAGE)
    return 1
  }

  switch (parsed.command) {
    case 'help':
      reporter.info(USAGE)
      return 0
    case 'validate': {
      const config = parsed.dir ? withProjectDir(deps.config, parsed.dir) : deps.config
      return validateProject(config.projectDir, reporter).ok ? 0 : 1
    }
    case 'deploy': {
      const config = parsed.dir ? withProjectDir(deps.config, parsed.dir) : deps.config
      const outcome = await runDeploy(
        { preview: parsed.preview, skipDependencyCheck: parsed.skipDeps },
        { config, runner: deps.runner, reporter },
      )
      return outcome.ok ? 0 : 1
    }
    case 'smoke':
      return runSmoke(parsed, deps)
    case 'stub': {
      const stub = await startStubServer(parsed.port, parsed.platform ? { platform: parsed.platform } : {})
      reporter.info(`Stand-in analysis API listening on ${stub.url}`)
      reporter.info('Press Ctrl+C to stop.')
      await (deps.waitForShutdown ?? waitForSignal)()
      await stub.close()
      return 0
    }
  }
}

async function main() {
  const code = await runCli(process.argv.slice(2), {
    config: loadConfig(),
    reporter: createConsoleReporter(),
    runner: createProcessRunner(),
  })
  process.exitCode = code
}

function isEntryPoint(): boolean {
  const entry = process.argv[1]
  if (!entry) return false
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href
  } catch {
    return false
  }
}

if (isEntryPoint()) {
  main().catch((error) => {
    console.error('shipcheck failed unexpectedly:', error)
    process.exit(2)
  })
}
