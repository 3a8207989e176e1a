import { Hono, type Context } from 'hono'
import { serve } from '@hono/node-server'
import type { AddressInfo, Server } from 'node:net'
import {
  ANALYZE_PATH,
  CAPABILITIES_PATH,
  HEALTH_PATH,
  QUESTIONS_FIELD,
} from '../shared/constants.js'

export type StubOptions = {
  platform?: string
  version?: string
  now?: () => Date
}

export const STUB_WORKFLOWS = [
  'data_analysis',
  'web_scraping',
  'statistical_analysis',
  'visualization',
] as const

// 1x1 transparent PNG; enough for clients that only check a chart came back.
export const PLACEHOLDER_PLOT =
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg=='

function setCorsHeaders(c: Context) {
  c.header('Access-Control-Allow-Origin', '*')
  c.header('Access-Control-Allow-Headers', 'Content-Type')
  c.header('Access-Control-Allow-Methods', 'GET,POST,OPTIONS')
}

export function countQuestions(text: string): number {
  return text.split(/\r?\n/).filter((line) => /^\s*\d+[.)]\s+\S/.test(line)).length
}

/** Stand-in for the analysis service: same routes and response shapes, canned content. */
export function createStubApp(options: StubOptions = {}) {
  const platform = options.platform ?? 'local'
  const version = options.version ?? '0.0.0-stub'
  const now = options.now ?? (() => new Date())
  let taskCounter = 0

  const app = new Hono()

  app.use('*', async (c, next) => {
    setCorsHeaders(c)

    if (c.req.method === 'OPTIONS') {
      return c.body(null, 204)
    }

    await next()
    setCorsHeaders(c)
  })

  app.get(HEALTH_PATH, (c) =>
    c.json({
      status: 'healthy',
      timestamp: now().toISOString(),
      version,
      platform,
      orchestrator: 'stub',
      workflows_available: STUB_WORKFLOWS.length,
    }),
  )

  app.get(CAPABILITIES_PATH, (c) =>
    c.json({
      available_workflows: [...STUB_WORKFLOWS],
      platform,
    }),
  )

  app.post(ANALYZE_PATH, async (c) => {
    // Non-form bodies parse to an empty object and fall through to the 400 below.
    const body = await c.req.parseBody({ all: true })
    const questions = body[QUESTIONS_FIELD]
    if (!(questions instanceof File)) {
      return c.json({ detail: `${QUESTIONS_FIELD} file is required` }, 400)
    }

    const text = await questions.text()
    taskCounter += 1

    return c.json({
      task_id: `stub-${taskCounter}`,
      workflow_type: 'data_analysis',
      status: 'completed',
      result: {
        results: {
          question_count: countQuestions(text),
          iterative_reasoning: body.enable_iterative_reasoning === 'true',
        },
        plot_base64: PLACEHOLDER_PLOT,
      },
      processing_info: {
        platform,
        enhanced_features: ['stub_response'],
      },
    })
  })

  return app
}

export type RunningStub = {
  port: number
  url: string
  close(): Promise<void>
}

export type StubServerOptions = StubOptions & {
  /** Omit to listen on every interface, so both `localhost` and `127.0.0.1` reach it. */
  hostname?: string
}

export function startStubServer(port: number, options: StubServerOptions = {}): Promise<RunningStub> {
  const app = createStubApp(options)
  const urlHost = options.hostname ?? 'localhost'

  return new Promise((resolve, reject) => {
    const server: Server = serve(
      { fetch: app.fetch, port, ...(options.hostname ? { hostname: options.hostname } : {}) },
      (info: AddressInfo) => {
        resolve({
          port: info.port,
          url: `http://${urlHost}:${info.port}`,
          close: () =>
            new Promise<void>((done, fail) => {
              server.close((error) => (error ? fail(error) : done()))
            }),
        })
      },
    )
    server.once('error', reject)
  })
}
