import type { EmissionUnit, ExtractionStatus, MetricName, RunEvent } from './enums.js'

export type TableRows = ReadonlyArray<ReadonlyArray<string>>

export type CorpusPage = {
  readonly page: number
  readonly lines: ReadonlyArray<string>
  readonly tables?: ReadonlyArray<TableRows>
}

export type PageCorpus = {
  readonly pages: ReadonlyArray<CorpusPage>
}

export type Metric = {
  name: MetricName
  value: number
  unit: EmissionUnit
  year: number
  page: number
  snippet?: string
  confidence?: number
}

export type ExtractionPayload = {
  metrics: Metric[]
}

export type ConversationRole = 'system' | 'user' | 'repair'

export type ConversationMessage = {
  role: ConversationRole
  content: string
}

export type ExtractionOutcome = {
  payload: ExtractionPayload
  status: ExtractionStatus
  attempts: number
  modelCalls: number
  snippetCount: number
  droppedCount: number
  conversation: ConversationMessage[]
}

export type RunLogEntry = {
  event: RunEvent
  runId: string
  doc: string
  ts: string
  provider: string
  model: string
  metricCount?: number
  droppedCount?: number
  status?: ExtractionStatus
  error?: string
}

export type BatchSummaryRow = {
  doc: string
  status: ExtractionStatus | 'failed'
  metrics: number
  dropped: number
  repairs: number
  error: string
}
