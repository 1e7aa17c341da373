export const MetricName = {
  SCOPE_1: 'Scope 1',
  SCOPE_2_LOCATION: 'Scope 2 (location)',
  SCOPE_2_MARKET: 'Scope 2 (market)',
  SCOPE_3: 'Scope 3'
} as const

export type MetricName = (typeof MetricName)[keyof typeof MetricName]

export const EmissionUnit = {
  TONNES: 'tCO2e',
  KILOTONNES: 'ktCO2e',
  MEGATONNES: 'MtCO2e'
} as const

export type EmissionUnit = (typeof EmissionUnit)[keyof typeof EmissionUnit]

export const ProviderKind = {
  OLLAMA_GENERATE: 'ollama-generate',
  OLLAMA_CHAT: 'ollama-chat',
  OPENAI_COMPATIBLE: 'openai-compatible'
} as const

export type ProviderKind = (typeof ProviderKind)[keyof typeof ProviderKind]

export const ExtractionStatus = {
  NO_SIGNAL: 'no_signal',
  VALID: 'valid',
  DEGRADED: 'degraded'
} as const

export type ExtractionStatus = (typeof ExtractionStatus)[keyof typeof ExtractionStatus]

export const RunEvent = {
  START: 'start',
  DONE: 'done',
  FAILED: 'failed'
} as const

export type RunEvent = (typeof RunEvent)[keyof typeof RunEvent]
