import fs from 'fs'
import path from 'path'
import {
  ENTRY_POINT,
  ENTRY_POINT_MARKERS,
  PROJECT_FILES,
  VERCEL_CONFIG_FILE,
  VERCEL_CONFIG_KEYS,
  API_KEY_VARIABLES,
} from '../shared/constants.js'
import { errorMessage } from '../shared/errors.js'
import type { Reporter } from '../shared/reporter.js'

export type CheckStatus = 'pass' | 'fail'

export type Check = {
  subject: string
  status: CheckStatus
  message: string
}

export type ValidationReport = {
  checks: Check[]
  missingFiles: string[]
  ok: boolean
}

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile()
  } catch {
    return false
  }
}

export function findMissingFiles(projectDir: string, files: readonly string[]): string[] {
  return files.filter((file) => !isFile(path.join(projectDir, file)))
}

function readIfPresent(filePath: string): string | undefined {
  try {
    return fs.readFileSync(filePath, 'utf8')
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return undefined
    throw error
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function checkVercelConfig(projectDir: string): Check[] {
  const raw = readIfPresent(path.join(projectDir, VERCEL_CONFIG_FILE))
  if (raw === undefined) {
    return [{ subject: VERCEL_CONFIG_FILE, status: 'fail', message: 'File not found' }]
  }

  let config: unknown
  try {
    config = JSON.parse(raw)
  } catch (error) {
    return [
      { subject: VERCEL_CONFIG_FILE, status: 'fail', message: `Invalid JSON: ${errorMessage(error)}` },
    ]
  }

  const checks: Check[] = [{ subject: VERCEL_CONFIG_FILE, status: 'pass', message: 'Valid JSON syntax' }]

  if (!isRecord(config)) {
    checks.push({
      subject: VERCEL_CONFIG_FILE,
      status: 'fail',
      message: 'Top-level value must be an object',
    })
    return checks
  }

  const root = config
  const missingKeys = VERCEL_CONFIG_KEYS.filter((key) => !(key in root))
  checks.push(
    missingKeys.length === 0
      ? { subject: VERCEL_CONFIG_FILE, status: 'pass', message: 'Has required builds and routes' }
      : {
          subject: VERCEL_CONFIG_FILE,
          status: 'fail',
          message: `Missing ${missingKeys.join(' and ')} configuration`,
        },
  )
  return checks
}

export function checkEntryPoint(projectDir: string): Check[] {
  const content = readIfPresent(path.join(projectDir, ENTRY_POINT))
  if (content === undefined) {
    return [{ subject: ENTRY_POINT, status: 'fail', message: 'File not found' }]
  }

  // Substring match: `File` is satisfied by `UploadFile` as well.
  return ENTRY_POINT_MARKERS.map((marker): Check =>
    content.includes(marker)
      ? { subject: ENTRY_POINT, status: 'pass', message: `Has ${marker} import` }
      : { subject: ENTRY_POINT, status: 'fail', message: `Missing ${marker} import` },
  )
}

function printCheck(reporter: Reporter, check: Check) {
  const line = `${check.subject} - ${check.message}`
  if (check.status === 'pass') reporter.success(line)
  else reporter.error(line)
}

export function validateProject(projectDir: string, reporter: Reporter): ValidationReport {
  reporter.step('🔍', 'Validating Vercel deployment files...')

  const checks: Check[] = []
  const missingFiles: string[] = []

  for (const file of PROJECT_FILES) {
    if (isFile(path.join(projectDir, file.path))) {
      checks.push({ subject: file.path, status: 'pass', message: file.description })
    } else {
      checks.push({ subject: file.path, status: 'fail', message: `${file.description} (MISSING)` })
      missingFiles.push(file.path)
    }
  }

  checks.push(...checkVercelConfig(projectDir))
  checks.push(...checkEntryPoint(projectDir))

  for (const check of checks) printCheck(reporter, check)

  const ok = checks.every((check) => check.status === 'pass')

  reporter.banner('VALIDATION SUMMARY')

  if (missingFiles.length > 0) {
    reporter.error(`Missing files: ${missingFiles.join(', ')}`)
  } else {
    reporter.success('All required files present')
  }

  const failedChecks = checks.filter(
    (check) => check.status === 'fail' && !missingFiles.includes(check.subject),
  )
  if (failedChecks.length > 0) {
    reporter.error(`${failedChecks.length} configuration check(s) failed`)
  }

  if (ok) {
    reporter.blank()
    reporter.info('📋 Ready for Vercel deployment!')
    reporter.blank()
    reporter.info('Next steps:')
    reporter.info('1. Install Vercel CLI: npm install -g vercel')
    reporter.info('2. Login to Vercel: vercel login')
    reporter.info('3. Deploy: shipcheck deploy (runs vercel --prod)')
    reporter.info('4. Set environment variables in Vercel dashboard:')
    for (const variable of API_KEY_VARIABLES) {
      reporter.info(`   - ${variable.name} (${variable.role})`)
    }
    reporter.info('5. Test deployment with test-vercel.html or shipcheck smoke --url <deployment>')
  }

  return { checks, missingFiles, ok }
}
