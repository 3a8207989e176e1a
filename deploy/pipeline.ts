import path from 'path'
import {
  API_KEY_VARIABLES,
  BASE_URL_VARIABLE,
  DEPLOY_REQUIRED_FILES,
  PYTHON_DEPENDENCIES,
  REQUIREMENTS_FILE,
} from '../shared/constants.js'
import type { CommandRunner } from '../shared/commandRunner.js'
import type { ShipcheckConfig } from '../shared/config.js'
import { inspectEnvFile } from '../shared/envFile.js'
import { DeployError, type DeployStep } from '../shared/errors.js'
import type { Reporter } from '../shared/reporter.js'
import { findMissingFiles } from '../preflight/validate.js'
import {
  ensureVercelAuth,
  ensureVercelCli,
  probePythonDependencies,
} from '../preflight/toolchain.js'

export type DeployOptions = {
  /** Deploy a preview build instead of production. */
  preview?: boolean
  skipDependencyCheck?: boolean
}

export type DeployDeps = {
  config: ShipcheckConfig
  runner: CommandRunner
  reporter: Reporter
}

export type DeployOutcome =
  | { ok: true; account?: string }
  | { ok: false; step: DeployStep; message: string }

function checkRequiredFiles({ config, reporter }: DeployDeps) {
  reporter.step('📋', 'Validating project structure...')
  const [missing] = findMissingFiles(config.projectDir, DEPLOY_REQUIRED_FILES)
  if (missing) {
    throw new DeployError('files', `Missing required file: ${missing}`)
  }
  reporter.success('All required files present')
}

function reportEnvironment({ config, reporter }: DeployDeps) {
  reporter.step('🔧', 'Checking environment variables...')
  const envFileName = path.basename(config.envFile)
  const inspection = inspectEnvFile(config.envFile)

  if (!inspection.found) {
    reporter.warn(`No ${envFileName} file found. Make sure to set environment variables in Vercel dashboard:`)
    for (const variable of API_KEY_VARIABLES) {
      reporter.info(`   - ${variable.name} (${variable.role})`)
    }
    return
  }

  reporter.success(`${envFileName} file found`)
  reporter.info('📝 Make sure to set these environment variables in Vercel dashboard:')
  if (inspection.apiKeys.length === 0) {
    reporter.info(`   No API keys found in ${envFileName}`)
  }
  for (const key of inspection.apiKeys) {
    reporter.info(`   ${key.name}=${key.preview}`)
  }
  if (inspection.baseUrlOverride) {
    reporter.info(`   ${BASE_URL_VARIABLE} is set and must be copied as well`)
  }
}

async function checkDependencies({ config, runner, reporter }: DeployDeps) {
  reporter.step('🧪', 'Testing local dependencies...')
  const probe = await probePythonDependencies(runner, config, PYTHON_DEPENDENCIES)
  if (probe.missing.length > 0) {
    throw new DeployError(
      'dependencies',
      `Missing dependency: ${probe.missing.join(', ')}. Please run: pip install -r ${REQUIREMENTS_FILE}`,
    )
  }
  reporter.success('Core dependencies available')
}

function printSuccess(reporter: Reporter) {
  reporter.blank()
  reporter.info('🎉 Deployment completed successfully!')
  reporter.blank()
  reporter.info('📋 Next steps:')
  reporter.info('1. Set environment variables in Vercel dashboard if not already done')
  reporter.info('2. Test your deployment with the health endpoint: /health')
  reporter.info('3. Try the main API endpoint: /api/ with a questions.txt file')
  reporter.info('   (or run: shipcheck smoke --url <deployment-url>)')
  reporter.blank()
  reporter.info('📚 Documentation: See README-vercel.md for usage examples')
  reporter.blank()
}

function printFailureHints(reporter: Reporter) {
  reporter.info('💡 Common solutions:')
  reporter.info('   - Check vercel.json syntax')
  reporter.info(`   - Verify all dependencies in ${REQUIREMENTS_FILE}`)
  reporter.info('   - Ensure proper file structure with api/index.py')
}

async function deploy({ config, runner, reporter }: DeployDeps, options: DeployOptions) {
  reporter.step('🚀', 'Deploying to Vercel...')
  const args = options.preview ? [] : ['--prod']
  const result = await runner.run(config.vercelBin, args, {
    cwd: config.projectDir,
    interactive: true,
  })

  if (result.exitCode !== 0) {
    reporter.error('Deployment failed. Check the error messages above.')
    printFailureHints(reporter)
    throw new DeployError('deploy', `vercel exited with code ${result.exitCode ?? 'unknown'}`)
  }

  printSuccess(reporter)
}

export async function runDeploy(options: DeployOptions, deps: DeployDeps): Promise<DeployOutcome> {
  const { reporter } = deps
  reporter.step('🚀', 'Starting Vercel deployment process...')

  try {
    await ensureVercelCli(deps.runner, deps.config, reporter)
    const account = await ensureVercelAuth(deps.runner, deps.config, reporter)
    if (account) reporter.success(`Logged in as ${account}`)

    checkRequiredFiles(deps)
    reportEnvironment(deps)

    if (options.skipDependencyCheck) {
      reporter.warn('Skipping local dependency check')
    } else {
      await checkDependencies(deps)
    }

    await deploy(deps, options)
    return account ? { ok: true, account } : { ok: true }
  } catch (error) {
    if (error instanceof DeployError) {
      // The deploy step already printed its own failure block.
      if (error.step !== 'deploy') reporter.error(error.message)
      return { ok: false, step: error.step, message: error.message }
    }
    throw error
  }
}
