import { ProviderKind } from './domain/enums.js'
import { ConfigurationError } from './utils/errors.js'

export { DEFAULT_CONFIG, loadConfig, resolveProviderKind }
export type { AppConfig, ConfigEnv }

type AppConfig = {
  provider: ProviderKind
  apiBase: string
  apiKey: string
  model: string
  maxRepairs: number
  snippetLimit: number
  chatTimeoutMs: number
  generateTimeoutMs: number
  numCtx: number
  inputDir: string
  outputDir: string
  port: number
}

type ConfigEnv = Record<string, string | undefined>

const DEFAULT_CONFIG: Readonly<AppConfig> = Object.freeze({
  provider: ProviderKind.OLLAMA_GENERATE,
  apiBase: 'http://localhost:11434',
  apiKey: 'ignore-if-ollama',
  model: 'llama3.2',
  maxRepairs: 2,
  snippetLimit: 25,
  chatTimeoutMs: 120000,
  generateTimeoutMs: 600000,
  numCtx: 4096,
  inputDir: 'data/pdfs',
  outputDir: 'data/output',
  port: 8080
})

const PROVIDER_ALIASES: Record<string, ProviderKind> = {
  ollama: ProviderKind.OLLAMA_GENERATE,
  [ProviderKind.OLLAMA_GENERATE]: ProviderKind.OLLAMA_GENERATE,
  [ProviderKind.OLLAMA_CHAT]: ProviderKind.OLLAMA_CHAT,
  [ProviderKind.OPENAI_COMPATIBLE]: ProviderKind.OPENAI_COMPATIBLE
}

const resolveProviderKind = (raw: string): ProviderKind => {
  const kind = PROVIDER_ALIASES[raw.trim().toLowerCase()]
  if (!kind) {
    throw new ConfigurationError(`unknown provider: ${raw}`, {
      provider: raw,
      supported: Object.keys(PROVIDER_ALIASES)
    })
  }
  return kind
}

/**
 * Reads the process environment once and returns a frozen configuration.
 * Callers pass the result into constructors; nothing reads env afterwards.
 */
const loadConfig = (
  env: ConfigEnv = process.env,
  overrides: Partial<AppConfig> = {}
): Readonly<AppConfig> => {
  const config: AppConfig = {
    provider: resolveProviderKind(env.PROVIDER ?? DEFAULT_CONFIG.provider),
    apiBase: (env.API_BASE?.trim() || DEFAULT_CONFIG.apiBase).replace(/\/+$/, ''),
    apiKey: env.API_KEY ?? DEFAULT_CONFIG.apiKey,
    model: env.MODEL?.trim() || DEFAULT_CONFIG.model,
    maxRepairs: sanitizeInteger(env.MAX_REPAIRS, DEFAULT_CONFIG.maxRepairs),
    snippetLimit: sanitizeInteger(env.SNIPPET_LIMIT, DEFAULT_CONFIG.snippetLimit),
    chatTimeoutMs: sanitizeInteger(env.CHAT_TIMEOUT_MS, DEFAULT_CONFIG.chatTimeoutMs),
    generateTimeoutMs: sanitizeInteger(env.GENERATE_TIMEOUT_MS, DEFAULT_CONFIG.generateTimeoutMs),
    numCtx: sanitizeInteger(env.NUM_CTX, DEFAULT_CONFIG.numCtx),
    inputDir: env.INPUT_DIR?.trim() || DEFAULT_CONFIG.inputDir,
    outputDir: env.OUTPUT_DIR?.trim() || DEFAULT_CONFIG.outputDir,
    port: sanitizeInteger(env.PORT, DEFAULT_CONFIG.port),
    ...overrides
  }

  return Object.freeze(config)
}

const sanitizeInteger = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim().length === 0) return fallback
  const value = Number(raw)
  if (Number.isNaN(value)) return fallback
  const normalized = Math.floor(value)
  return normalized >= 0 ? normalized : fallback
}
