import path from 'path'

export type ShipcheckConfig = {
  projectDir: string
  envFile: string
  localUrl: string
  exampleDeploymentUrl: string
  healthTimeoutMs: number
  analyzeTimeoutMs: number
  coldStartThresholdMs: number
  localReadyTimeoutMs: number
  vercelBin: string
  npmBin: string
  pythonBin: string
  reportPath?: string
}

type Env = Record<string, string | undefined>

const IS_WINDOWS = process.platform === 'win32'

export const DEFAULT_LOCAL_URL = 'http://localhost:8000'
export const DEFAULT_EXAMPLE_URL = 'https://your-project-name.vercel.app'

export function parsePositiveIntegerEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name]
  if (!raw) return fallback
  const parsed = Number(raw)
  if (!Number.isInteger(parsed) || parsed <= 0) return fallback
  return parsed
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

// npm-installed binaries are .cmd shims on Windows; spawn without a shell needs the suffix.
export function platformBin(name: string, windows = IS_WINDOWS): string {
  return windows ? `${name}.cmd` : name
}

export function loadConfig(env: Env = process.env, cwd = process.cwd()): ShipcheckConfig {
  const projectDir = path.resolve(cwd, nonEmpty(env.SHIPCHECK_PROJECT_DIR) ?? '.')
  const reportPath = nonEmpty(env.SHIPCHECK_REPORT_PATH)

  return {
    projectDir,
    envFile: path.resolve(projectDir, nonEmpty(env.SHIPCHECK_ENV_FILE) ?? '.env'),
    localUrl: nonEmpty(env.SHIPCHECK_LOCAL_URL) ?? DEFAULT_LOCAL_URL,
    exampleDeploymentUrl: nonEmpty(env.SHIPCHECK_EXAMPLE_URL) ?? DEFAULT_EXAMPLE_URL,
    healthTimeoutMs: parsePositiveIntegerEnv(env, 'SHIPCHECK_HEALTH_TIMEOUT_MS', 30_000),
    analyzeTimeoutMs: parsePositiveIntegerEnv(env, 'SHIPCHECK_ANALYZE_TIMEOUT_MS', 300_000),
    coldStartThresholdMs: parsePositiveIntegerEnv(env, 'SHIPCHECK_COLD_START_MS', 10_000),
    localReadyTimeoutMs: parsePositiveIntegerEnv(env, 'SHIPCHECK_LOCAL_READY_TIMEOUT_MS', 60_000),
    vercelBin: nonEmpty(env.SHIPCHECK_VERCEL_BIN) ?? platformBin('vercel'),
    npmBin: platformBin('npm'),
    pythonBin: nonEmpty(env.SHIPCHECK_PYTHON_BIN) ?? 'python',
    ...(reportPath ? { reportPath: path.resolve(cwd, reportPath) } : {}),
  }
}

/** Re-roots the project-relative paths when `--dir` is given on the command line. */
export function withProjectDir(config: ShipcheckConfig, dir: string, cwd = process.cwd()): ShipcheckConfig {
  const projectDir = path.resolve(cwd, dir)
  const envFileName = path.relative(config.projectDir, config.envFile)
  return {
    ...config,
    projectDir,
    envFile: path.resolve(projectDir, envFileName),
  }
}
