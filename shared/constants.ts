// Static description of the project layout the analysis service ships with.
// Kept free of runtime imports so the stand-in server can load it cheaply.

export type ProjectFile = {
  path: string
  description: string
}

export const PROJECT_FILES: readonly ProjectFile[] = [
  { path: 'vercel.json', description: 'Vercel configuration' },
  { path: 'api/index.py', description: 'Main FastAPI serverless function' },
  { path: 'requirements-vercel.txt', description: 'Python dependencies for Vercel' },
  { path: 'README-vercel.md', description: 'Deployment documentation' },
  { path: 'test-vercel.html', description: 'Web testing interface' },
  { path: 'example-questions.txt', description: 'Example questions file' },
]

// A deploy aborts on these; the rest only matter for the full validation.
export const DEPLOY_REQUIRED_FILES = ['vercel.json', 'api/index.py', 'requirements-vercel.txt'] as const

export const VERCEL_CONFIG_FILE = 'vercel.json'
export const VERCEL_CONFIG_KEYS = ['builds', 'routes'] as const

export const ENTRY_POINT = 'api/index.py'
export const ENTRY_POINT_MARKERS = ['FastAPI', 'UploadFile', 'File', 'HTTPException'] as const

export const REQUIREMENTS_FILE = 'requirements-vercel.txt'
export const PYTHON_DEPENDENCIES = ['fastapi', 'pandas', 'requests'] as const

export type ApiKeyVariable = {
  name: string
  role: 'recommended' | 'alternative'
}

export const API_KEY_VARIABLES: readonly ApiKeyVariable[] = [
  { name: 'AIPIPE_API_KEY', role: 'recommended' },
  { name: 'OPENAI_API_KEY', role: 'alternative' },
  { name: 'GEMINI_API_KEY', role: 'alternative' },
]

export const BASE_URL_VARIABLE = 'OPENAI_BASE_URL'

export const HEALTH_PATH = '/health'
export const ANALYZE_PATH = '/api/'
export const CAPABILITIES_PATH = '/api/workflow-capabilities'

export const QUESTIONS_FIELD = 'questions_txt'
export const ATTACHMENTS_FIELD = 'files'
