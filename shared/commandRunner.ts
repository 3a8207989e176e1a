import { spawn } from 'node:child_process'

export type CommandResult = {
  /** `null` when the process could not be started at all (e.g. binary not on PATH). */
  exitCode: number | null
  stdout: string
  stderr: string
}

export type RunOptions = {
  cwd?: string
  /** Inherit the terminal so the child can prompt (login, deploy progress). Output is not captured. */
  interactive?: boolean
}

export type CommandRunner = {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>
}

const MAX_CAPTURED_CHARS = 64_000

export type ProcessRunnerOptions = {
  platform?: NodeJS.Platform
}

// With `shell: true` spawn joins the arguments with bare spaces, so each one is quoted first.
export function quoteShellArg(arg: string): string {
  return `"${arg.replace(/"/g, '\\"')}"`
}

export function createProcessRunner(runnerOptions: ProcessRunnerOptions = {}): CommandRunner {
  // win32 needs the shell to resolve the .cmd shims of npm and vercel.
  const useShell = (runnerOptions.platform ?? process.platform) === 'win32'

  return {
    run(command, args, options = {}) {
      return new Promise((resolve) => {
        let stdout = ''
        let stderr = ''
        let settled = false

        const finish = (result: CommandResult) => {
          if (settled) return
          settled = true
          resolve(result)
        }

        const proc = spawn(command, useShell ? args.map(quoteShellArg) : [...args], {
          cwd: options.cwd,
          env: process.env,
          stdio: options.interactive ? 'inherit' : 'pipe',
          shell: useShell,
        })

        proc.stdout?.on('data', (chunk: Buffer) => {
          if (stdout.length < MAX_CAPTURED_CHARS) stdout += String(chunk)
        })
        proc.stderr?.on('data', (chunk: Buffer) => {
          if (stderr.length < MAX_CAPTURED_CHARS) stderr += String(chunk)
        })

        proc.on('error', (error) => {
          finish({ exitCode: null, stdout, stderr: stderr || error.message })
        })
        proc.on('close', (code) => {
          finish({ exitCode: code, stdout, stderr })
        })
      })
    },
  }
}
