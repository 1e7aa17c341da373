import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { BatchSummaryRow, ExtractionPayload, PageCorpus } from '../domain/types.js'
import { AppError, ErrorCodes } from '../utils/errors.js'

export const METRICS_CSV_COLUMNS = [
  'doc',
  'name',
  'value',
  'unit',
  'year',
  'page',
  'snippet',
  'confidence'
] as const

export const SUMMARY_CSV_COLUMNS = ['doc', 'status', 'metrics', 'dropped', 'repairs', 'error'] as const

type CsvCell = string | number | undefined

const assertSafeObjectPath = (objectPath: string): string => {
  const normalized = objectPath.replace(/\\/g, '/').replace(/^\/+/, '')
  if (!normalized || normalized.includes('\0')) {
    throw new AppError(ErrorCodes.INVALID_INPUT, 'invalid storage path', 400, { objectPath })
  }

  const segments = normalized.split('/')
  if (segments.some((segment) => segment === '..')) {
    throw new AppError(ErrorCodes.INVALID_INPUT, 'unsafe storage path', 400, { objectPath })
  }

  return normalized
}

const escapeCsvCell = (cell: CsvCell): string => {
  if (cell === undefined) return ''
  const text = String(cell)
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

export const toCsvRow = (cells: ReadonlyArray<CsvCell>): string => cells.map(escapeCsvCell).join(',')

export const toMetricsCsv = (doc: string, payload: ExtractionPayload): string => {
  const rows = payload.metrics.map((metric) =>
    toCsvRow([
      doc,
      metric.name,
      metric.value,
      metric.unit,
      metric.year,
      metric.page,
      metric.snippet,
      metric.confidence
    ])
  )
  return [toCsvRow(METRICS_CSV_COLUMNS), ...rows].join('\n') + '\n'
}

export const toSummaryCsv = (rows: ReadonlyArray<BatchSummaryRow>): string => {
  const lines = rows.map((row) =>
    toCsvRow([row.doc, row.status, row.metrics, row.dropped, row.repairs, row.error])
  )
  return [toCsvRow(SUMMARY_CSV_COLUMNS), ...lines].join('\n') + '\n'
}

// 2025-11-11T15:22:07.123Z -> 2025-11-11_15-22-07
export const toFileTimestamp = (date: Date): string =>
  date.toISOString().slice(0, 19).replace('T', '_').replace(/:/g, '-')

type StorageServiceOptions = {
  rootDir: string
}

/** Writes per-document artifacts under a single output root, one file per document stem. */
export class StorageService {
  private readonly rootDir: string

  constructor(options: StorageServiceOptions) {
    this.rootDir = path.resolve(options.rootDir)
  }

  async saveCorpus(doc: string, corpus: PageCorpus): Promise<string> {
    return this.putText(`extracted/${doc}.json`, `${JSON.stringify(corpus, null, 2)}\n`)
  }

  async saveMetricsJson(doc: string, payload: ExtractionPayload): Promise<string> {
    const document = { doc, metrics: payload.metrics }
    return this.putText(`metrics/${doc}.json`, `${JSON.stringify(document, null, 2)}\n`)
  }

  async saveMetricsCsv(doc: string, payload: ExtractionPayload): Promise<string> {
    return this.putText(`metrics/${doc}.csv`, toMetricsCsv(doc, payload))
  }

  async saveBatchSummary(
    rows: ReadonlyArray<BatchSummaryRow>,
    now: Date = new Date()
  ): Promise<string> {
    return this.putText(`summary/run_summary_${toFileTimestamp(now)}.csv`, toSummaryCsv(rows))
  }

  resolvePath(objectPath: string): string {
    const normalizedPath = assertSafeObjectPath(objectPath)
    const fullPath = path.resolve(this.rootDir, normalizedPath)
    if (!fullPath.startsWith(`${this.rootDir}${path.sep}`)) {
      throw new AppError(ErrorCodes.INVALID_INPUT, 'unsafe storage path', 400, { objectPath })
    }
    return fullPath
  }

  private async putText(objectPath: string, content: string): Promise<string> {
    const targetPath = this.resolvePath(objectPath)
    await mkdir(path.dirname(targetPath), { recursive: true })
    await writeFile(targetPath, content, 'utf8')
    return targetPath
  }
}
