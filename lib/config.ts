import { z } from 'zod'
import { ConfigError } from './errors'
import { describeIssues } from './schemas'

// Model constants
export const DEFAULT_AGENT_MODEL = 'claude-sonnet-4-20250514'

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const envSchema = z.object({
  ANTHROPIC_API_KEY: z.string().trim().min(1).optional(),
  AGENT_MODEL: z.string().trim().min(1).default(DEFAULT_AGENT_MODEL),
  AGENT_MAX_ITERATIONS: positiveInt(10),
  AGENT_MAX_EXECUTION_MS: positiveInt(60000),
  AGENT_MAX_TOKENS: positiveInt(4096),
  AGENT_HISTORY_LIMIT: positiveInt(10),
  UPLOAD_DIR: z.string().trim().min(1).default('uploads'),
  MAX_UPLOAD_MB: positiveInt(50),
  FALLBACK_MAX_ROWS: positiveInt(50),
})

export interface AppConfig {
  anthropicApiKey?: string
  agentModel: string
  agentMaxIterations: number
  agentMaxExecutionMs: number
  agentMaxTokens: number
  agentHistoryLimit: number
  uploadDir: string
  maxUploadBytes: number
  fallbackMaxRows: number
}

/** 빈 문자열 환경 변수는 미설정으로 취급 */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') result[key] = value
  }
  return result
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env))
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`)
  }

  const e = parsed.data
  return {
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    agentModel: e.AGENT_MODEL,
    agentMaxIterations: e.AGENT_MAX_ITERATIONS,
    agentMaxExecutionMs: e.AGENT_MAX_EXECUTION_MS,
    agentMaxTokens: e.AGENT_MAX_TOKENS,
    agentHistoryLimit: e.AGENT_HISTORY_LIMIT,
    uploadDir: e.UPLOAD_DIR,
    maxUploadBytes: e.MAX_UPLOAD_MB * 1024 * 1024,
    fallbackMaxRows: e.FALLBACK_MAX_ROWS,
  }
}

let config: AppConfig | null = null

export function getConfig(): AppConfig {
  if (!config) {
    config = loadConfig()
  }
  return config
}

export function resetConfig(): void {
  config = null
}
