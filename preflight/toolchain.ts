import type { CommandRunner } from '../shared/commandRunner.js'
import type { ShipcheckConfig } from '../shared/config.js'
import { DeployError } from '../shared/errors.js'
import type { Reporter } from '../shared/reporter.js'

type ToolchainConfig = Pick<ShipcheckConfig, 'vercelBin' | 'npmBin' | 'pythonBin' | 'projectDir'>

export async function ensureVercelCli(
  runner: CommandRunner,
  config: ToolchainConfig,
  reporter: Reporter,
): Promise<void> {
  const probe = await runner.run(config.vercelBin, ['--version'])
  if (probe.exitCode === 0) return

  reporter.error('Vercel CLI not found. Installing...')
  const install = await runner.run(config.npmBin, ['install', '-g', 'vercel'], { interactive: true })
  if (install.exitCode !== 0) {
    throw new DeployError('cli', 'Could not install the Vercel CLI (npm install -g vercel failed)')
  }
  reporter.success('Vercel CLI installed')
}

/** Resolves the logged-in account name, prompting a login when there is no session. */
export async function ensureVercelAuth(
  runner: CommandRunner,
  config: ToolchainConfig,
  reporter: Reporter,
): Promise<string | undefined> {
  reporter.step('🔐', 'Checking Vercel authentication...')

  const whoami = await runner.run(config.vercelBin, ['whoami'])
  if (whoami.exitCode === 0) {
    const account = whoami.stdout.trim()
    return account.length > 0 ? account : undefined
  }

  reporter.info('Please log in to Vercel...')
  const login = await runner.run(config.vercelBin, ['login'], { interactive: true })
  if (login.exitCode !== 0) {
    throw new DeployError('auth', 'Vercel login did not complete')
  }
  return undefined
}

export type DependencyProbe = {
  available: string[]
  missing: string[]
}

export async function probePythonDependencies(
  runner: CommandRunner,
  config: ToolchainConfig,
  modules: readonly string[],
): Promise<DependencyProbe> {
  const available: string[] = []
  const missing: string[] = []

  for (const moduleName of modules) {
    const result = await runner.run(config.pythonBin, ['-c', `import ${moduleName}`], {
      cwd: config.projectDir,
    })

    if (result.exitCode === null) {
      // No interpreter at all: nothing can be imported.
      return { available: [], missing: [...modules] }
    }

    if (result.exitCode === 0) available.push(moduleName)
    else missing.push(moduleName)
  }

  return { available, missing }
}
