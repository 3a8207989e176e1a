import fs from 'fs'
import dotenv from 'dotenv'
import { API_KEY_VARIABLES, BASE_URL_VARIABLE } from './constants.js'

export type EnvKeyEntry = {
  name: string
  /** First characters of the value only; the full secret is never printed. */
  preview: string
}

export type EnvFileInspection =
  | { found: false }
  | {
      found: true
      apiKeys: EnvKeyEntry[]
      baseUrlOverride: boolean
    }

export function inspectEnvFile(filePath: string): EnvFileInspection {
  let raw: string
  try {
    raw = fs.readFileSync(filePath, 'utf8')
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return { found: false }
    }
    throw error
  }

  const parsed = dotenv.parse(raw)
  const valueOf = (name: string) => (parsed[name] ?? '').trim()

  return {
    found: true,
    apiKeys: API_KEY_VARIABLES.filter((variable) => valueOf(variable.name).length > 0).map(
      (variable) => ({ name: variable.name, preview: maskSecret(valueOf(variable.name)) }),
    ),
    baseUrlOverride: valueOf(BASE_URL_VARIABLE).length > 0,
  }
}

export function maskSecret(value: string): string {
  if (value.length < 8) return '****'
  return `${value.slice(0, 4)}****`
}
