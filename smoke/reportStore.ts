import fs from 'fs'
import path from 'path'
import type { SmokeRun } from './suite.js'

export type SmokeReport = {
  generatedAt: string
  passed: boolean
  runs: SmokeRun[]
}

export function buildSmokeReport(runs: SmokeRun[], passed: boolean, now = new Date()): SmokeReport {
  return { generatedAt: now.toISOString(), passed, runs }
}

// Written through a temp file so a watcher never sees half a report.
export function saveSmokeReport(filePath: string, report: SmokeReport) {
  const directory = path.dirname(filePath)
  fs.mkdirSync(directory, { recursive: true })

  const tempPath = `${filePath}.tmp`
  fs.writeFileSync(tempPath, JSON.stringify(report, null, 2), 'utf8')
  fs.renameSync(tempPath, filePath)
}
