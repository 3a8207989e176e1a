import {
  ANALYZE_PATH,
  ATTACHMENTS_FIELD,
  CAPABILITIES_PATH,
  HEALTH_PATH,
  QUESTIONS_FIELD,
} from '../shared/constants.js'

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export type AnalysisApiConfig = {
  baseUrl: string
  healthTimeoutMs: number
  analyzeTimeoutMs: number
  fetch?: FetchLike
}

// Every field is optional: local builds and platform builds report different subsets.
export type HealthResponse = {
  status?: string
  timestamp?: string
  version?: string
  platform?: string
  orchestrator?: string
  workflows_available?: number
  [key: string]: unknown
}

export type CapabilitiesResponse = {
  available_workflows?: string[]
  platform?: string
  [key: string]: unknown
}

export type AnalysisResult = {
  results?: unknown
  plot_base64?: string
  [key: string]: unknown
}

export type ProcessingInfo = {
  platform?: string
  enhanced_features?: string[]
  [key: string]: unknown
}

export type AnalyzeResponse = {
  task_id?: string
  workflow_type?: string
  status?: string
  result?: AnalysisResult
  processing_info?: ProcessingInfo
  [key: string]: unknown
}

export type AnalysisAttachment = {
  fileName: string
  content: string | Uint8Array
  contentType?: string
}

export type AnalyzeInput = {
  questions: string
  fileName?: string
  attachments?: AnalysisAttachment[]
  enableIterativeReasoning?: boolean
  enableLogging?: boolean
}

const MAX_ERROR_BODY_CHARS = 200

export class ApiRequestError extends Error {
  readonly status: number | undefined
  readonly url: string

  constructor(message: string, url: string, status?: number) {
    super(message)
    this.name = 'ApiRequestError'
    this.url = url
    this.status = status
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined
  return value.filter((item): item is string => typeof item === 'string')
}

export function toHealthResponse(body: Record<string, unknown>): HealthResponse {
  return {
    ...body,
    status: optionalString(body.status),
    timestamp: optionalString(body.timestamp),
    version: optionalString(body.version),
    platform: optionalString(body.platform),
    orchestrator: optionalString(body.orchestrator),
    workflows_available:
      typeof body.workflows_available === 'number' ? body.workflows_available : undefined,
  }
}

export function toCapabilitiesResponse(body: Record<string, unknown>): CapabilitiesResponse {
  return {
    ...body,
    available_workflows: stringList(body.available_workflows),
    platform: optionalString(body.platform),
  }
}

function toAnalysisResult(raw: Record<string, unknown>): AnalysisResult {
  const result: AnalysisResult = {}
  for (const [key, value] of Object.entries(raw)) {
    if (key === 'plot_base64') {
      if (typeof value === 'string') result.plot_base64 = value
      continue
    }
    result[key] = value
  }
  return result
}

function toProcessingInfo(raw: Record<string, unknown>): ProcessingInfo {
  const info: ProcessingInfo = {}
  for (const [key, value] of Object.entries(raw)) {
    if (key === 'platform') {
      if (typeof value === 'string') info.platform = value
      continue
    }
    if (key === 'enhanced_features') {
      info.enhanced_features = stringList(value)
      continue
    }
    info[key] = value
  }
  return info
}

export function toAnalyzeResponse(body: Record<string, unknown>): AnalyzeResponse {
  return {
    ...body,
    task_id: optionalString(body.task_id),
    workflow_type: optionalString(body.workflow_type),
    status: optionalString(body.status),
    result: isRecord(body.result) ? toAnalysisResult(body.result) : undefined,
    processing_info: isRecord(body.processing_info) ? toProcessingInfo(body.processing_info) : undefined,
  }
}

/** Client for the analysis service's public HTTP surface. */
export class AnalysisApiClient {
  readonly baseUrl: string
  private readonly config: AnalysisApiConfig
  private readonly fetchImpl: FetchLike

  constructor(config: AnalysisApiConfig) {
    if (!/^https?:\/\//i.test(config.baseUrl)) {
      throw new Error(`Invalid baseUrl; must start with http:// or https:// (got ${config.baseUrl})`)
    }
    this.config = config
    this.baseUrl = config.baseUrl.replace(/\/+$/, '')
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init))
  }

  get healthTimeoutMs(): number {
    return this.config.healthTimeoutMs
  }

  /** `timeoutMs` overrides the configured health timeout for this call only. */
  async health(options: { timeoutMs?: number } = {}): Promise<HealthResponse> {
    const timeoutMs = options.timeoutMs ?? this.config.healthTimeoutMs
    const body = await this.request(HEALTH_PATH, { method: 'GET' }, timeoutMs)
    return toHealthResponse(body)
  }

  async capabilities(): Promise<CapabilitiesResponse> {
    const body = await this.request(CAPABILITIES_PATH, { method: 'GET' }, this.config.healthTimeoutMs)
    return toCapabilitiesResponse(body)
  }

  async analyze(input: AnalyzeInput): Promise<AnalyzeResponse> {
    const form = new FormData()
    form.append(
      QUESTIONS_FIELD,
      new Blob([input.questions], { type: 'text/plain' }),
      input.fileName ?? 'questions.txt',
    )

    for (const attachment of input.attachments ?? []) {
      form.append(
        ATTACHMENTS_FIELD,
        new Blob([attachment.content], {
          type: attachment.contentType ?? 'application/octet-stream',
        }),
        attachment.fileName,
      )
    }

    form.append('enable_iterative_reasoning', String(input.enableIterativeReasoning ?? false))
    form.append('enable_logging', String(input.enableLogging ?? true))

    const body = await this.request(
      ANALYZE_PATH,
      { method: 'POST', body: form },
      this.config.analyzeTimeoutMs,
    )
    return toAnalyzeResponse(body)
  }

  private async request(
    pathname: string,
    init: RequestInit,
    timeoutMs: number,
  ): Promise<Record<string, unknown>> {
    const url = `${this.baseUrl}${pathname}`

    let response: Response
    let text: string
    try {
      response = await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) })
      // The timeout also covers a body that is still streaming.
      text = await response.text()
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new ApiRequestError(`Request to ${url} timed out after ${timeoutMs}ms`, url)
      }
      const reason = error instanceof Error ? error.message : String(error)
      throw new ApiRequestError(`Request to ${url} failed: ${reason}`, url)
    }

    if (!response.ok) {
      const excerpt = text.slice(0, MAX_ERROR_BODY_CHARS)
      throw new ApiRequestError(
        `${response.status} ${response.statusText || 'Error'} for ${url}${excerpt ? `: ${excerpt}` : ''}`,
        url,
        response.status,
      )
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch {
      throw new ApiRequestError(`Response from ${url} is not valid JSON`, url, response.status)
    }

    if (!isRecord(parsed)) {
      throw new ApiRequestError(`Response from ${url} is not a JSON object`, url, response.status)
    }

    return parsed
  }
}
