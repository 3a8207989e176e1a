import test from 'node:test'
import assert from 'node:assert/strict'
import {
  PLACEHOLDER_PLOT,
  countQuestions,
  createStubApp,
  startStubServer,
} from '../stub/server.js'

const fixedNow = () => new Date('2026-01-15T10:00:00.000Z')

function questionsForm(text: string, iterative = 'false') {
  const form = new FormData()
  form.append('questions_txt', new Blob([text], { type: 'text/plain' }), 'questions.txt')
  form.append('enable_iterative_reasoning', iterative)
  return form
}

test('stub health reports platform and workflow count', async () => {
  const app = createStubApp({ platform: 'vercel', version: '1.2.3', now: fixedNow })
  const response = await app.request('/health')

  assert.equal(response.status, 200)
  assert.equal(response.headers.get('access-control-allow-origin'), '*')
  assert.deepEqual(await response.json(), {
    status: 'healthy',
    timestamp: '2026-01-15T10:00:00.000Z',
    version: '1.2.3',
    platform: 'vercel',
    orchestrator: 'stub',
    workflows_available: 4,
  })
})

test('stub capabilities lists workflows', async () => {
  const response = await createStubApp().request('/api/workflow-capabilities')

  assert.deepEqual(await response.json(), {
    available_workflows: ['data_analysis', 'web_scraping', 'statistical_analysis', 'visualization'],
    platform: 'local',
  })
})

test('stub analysis requires the questions file', async () => {
  const form = new FormData()
  form.append('questions_txt', 'not a file')

  const response = await createStubApp().request('/api/', { method: 'POST', body: form })

  assert.equal(response.status, 400)
  assert.deepEqual(await response.json(), { detail: 'questions_txt file is required' })
})

test('stub analysis counts numbered questions and numbers tasks', async () => {
  const app = createStubApp()
  const text = 'Intro line\n1. First?\n2) Second?\nnot numbered\n'

  const first = await app.request('/api/', { method: 'POST', body: questionsForm(text, 'true') })
  const second = await app.request('/api/', { method: 'POST', body: questionsForm(text) })

  assert.equal(first.status, 200)
  assert.deepEqual(await first.json(), {
    task_id: 'stub-1',
    workflow_type: 'data_analysis',
    status: 'completed',
    result: {
      results: { question_count: 2, iterative_reasoning: true },
      plot_base64: PLACEHOLDER_PLOT,
    },
    processing_info: { platform: 'local', enhanced_features: ['stub_response'] },
  })

  assert.deepEqual(await second.json(), {
    task_id: 'stub-2',
    workflow_type: 'data_analysis',
    status: 'completed',
    result: {
      results: { question_count: 2, iterative_reasoning: false },
      plot_base64: PLACEHOLDER_PLOT,
    },
    processing_info: { platform: 'local', enhanced_features: ['stub_response'] },
  })
})

test('stub answers CORS preflight', async () => {
  const response = await createStubApp().request('/api/', { method: 'OPTIONS' })

  assert.equal(response.status, 204)
  assert.equal(response.headers.get('access-control-allow-methods'), 'GET,POST,OPTIONS')
})

test('countQuestions only counts numbered lines', () => {
  assert.equal(countQuestions('1. a\n  2. b\n3.\nx. y\n10) z'), 3)
})

test('startStubServer serves over HTTP on an ephemeral port', async () => {
  const stub = await startStubServer(0, { hostname: '127.0.0.1' })
  try {
    assert.notEqual(stub.port, 0)
    assert.equal(stub.url, `http://127.0.0.1:${stub.port}`)
    const response = await fetch(`${stub.url}/health`)
    assert.equal(response.status, 200)
  } finally {
    await stub.close()
  }
})
