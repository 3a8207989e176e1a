export type ReportLevel = 'info' | 'success' | 'warn' | 'error' | 'step'

export type Reporter = {
  info(message: string): void
  success(message: string): void
  warn(message: string): void
  error(message: string): void
  /** Announces the start of a pipeline stage, e.g. "🔐 Checking Vercel authentication...". */
  step(icon: string, message: string): void
  banner(title: string): void
  blank(): void
}

export const RULE = '='.repeat(50)

export function createConsoleReporter(): Reporter {
  return {
    info: (message) => console.log(message),
    success: (message) => console.log(`✅ ${message}`),
    warn: (message) => console.warn(`⚠️  ${message}`),
    error: (message) => console.error(`❌ ${message}`),
    step: (icon, message) => console.log(`${icon} ${message}`),
    banner: (title) => {
      console.log(`\n${RULE}`)
      console.log(title)
      console.log(RULE)
    },
    blank: () => console.log(''),
  }
}

export type ReportEntry = {
  level: ReportLevel
  message: string
}

export type MemoryReporter = Reporter & {
  entries: ReportEntry[]
  messages(level?: ReportLevel): string[]
}

// Used by tests to assert on what a run printed.
export function createMemoryReporter(): MemoryReporter {
  const entries: ReportEntry[] = []
  const push = (level: ReportLevel) => (message: string) => {
    entries.push({ level, message })
  }

  return {
    entries,
    messages(level) {
      return entries.filter((entry) => !level || entry.level === level).map((entry) => entry.message)
    },
    info: push('info'),
    success: push('success'),
    warn: push('warn'),
    error: push('error'),
    step: (icon, message) => entries.push({ level: 'step', message: `${icon} ${message}` }),
    banner: (title) => entries.push({ level: 'info', message: title }),
    blank: () => undefined,
  }
}
