export type DeployStep = 'cli' | 'auth' | 'files' | 'env' | 'dependencies' | 'deploy'

export class DeployError extends Error {
  readonly step: DeployStep

  constructor(step: DeployStep, message: string) {
    super(message)
    this.name = 'DeployError'
    this.step = step
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
