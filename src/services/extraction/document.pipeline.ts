import { readFile } from 'node:fs/promises'
import type { AppConfig } from '../../config.js'
import { RunEvent } from '../../domain/enums.js'
import type { ExtractionOutcome, PageCorpus, RunLogEntry } from '../../domain/types.js'
import { toErrorMessage } from '../../utils/errors.js'
import { makeId } from '../../utils/ids.js'
import { toDocumentStem } from '../extract/loader.js'
import { PdfExtractor } from '../extract/pdf.extractor.js'
import { createModelProvider } from '../llm/provider.client.js'
import type { ModelProvider } from '../llm/provider.client.js'
import { defaultRunLogPath, RunLog } from '../runLog.service.js'
import { StorageService } from '../storage.service.js'
import { ExtractionController } from './controller.js'

export type DocumentResult = {
  doc: string
  runId: string
  outcome: ExtractionOutcome
  files: {
    json: string
    csv: string
  }
}

type DocumentPipelineDependencies = {
  config: Readonly<AppConfig>
  provider?: ModelProvider
  storage?: StorageService
  runLog?: RunLog
  pdfExtractor?: PdfExtractor
}

/**
 * Runs one document through extraction and persistence, bracketing the run
 * with `start` and `done`/`failed` run-log events. For PDFs the bracket also
 * covers reading and text extraction.
 */
export class DocumentPipeline {
  private readonly config: Readonly<AppConfig>
  private readonly provider: ModelProvider
  private readonly controller: ExtractionController
  private readonly storage: StorageService
  private readonly runLog: RunLog
  private readonly pdfExtractor: PdfExtractor

  constructor(dependencies: DocumentPipelineDependencies) {
    this.config = dependencies.config
    this.provider = dependencies.provider ?? createModelProvider(dependencies.config)
    this.controller = new ExtractionController({
      provider: this.provider,
      config: dependencies.config
    })
    this.storage =
      dependencies.storage ?? new StorageService({ rootDir: dependencies.config.outputDir })
    this.runLog =
      dependencies.runLog ??
      new RunLog({ filePath: defaultRunLogPath(dependencies.config.outputDir) })
    this.pdfExtractor = dependencies.pdfExtractor ?? new PdfExtractor()
  }

  async processPdf(filePath: string): Promise<DocumentResult> {
    const doc = toDocumentStem(filePath)
    return this.track(doc, async () => {
      const buffer = await readFile(filePath)
      const { corpus } = await this.pdfExtractor.extract(buffer)
      await this.storage.saveCorpus(doc, corpus)
      return corpus
    })
  }

  async processCorpus(doc: string, corpus: PageCorpus): Promise<DocumentResult> {
    return this.track(doc, async () => corpus)
  }

  private async track(doc: string, load: () => Promise<PageCorpus>): Promise<DocumentResult> {
    const runId = makeId('run')
    const base = {
      runId,
      doc,
      provider: this.provider.kind,
      model: this.provider.model
    }

    await this.runLog.append({ ...base, event: RunEvent.START, ts: new Date().toISOString() })

    try {
      const corpus = await load()
      const outcome = await this.controller.run(corpus)
      const json = await this.storage.saveMetricsJson(doc, outcome.payload)
      const csv = await this.storage.saveMetricsCsv(doc, outcome.payload)

      await this.runLog.append({
        ...base,
        event: RunEvent.DONE,
        ts: new Date().toISOString(),
        metricCount: outcome.payload.metrics.length,
        droppedCount: outcome.droppedCount,
        status: outcome.status
      })

      return { doc, runId, outcome, files: { json, csv } }
    } catch (error) {
      await this.recordFailure({
        ...base,
        event: RunEvent.FAILED,
        ts: new Date().toISOString(),
        error: toErrorMessage(error)
      })
      throw error
    }
  }

  // The run's own error is the one callers see; a log write failure is only reported.
  private async recordFailure(entry: RunLogEntry): Promise<void> {
    try {
      await this.runLog.append(entry)
    } catch (logError) {
      console.error(
        JSON.stringify({
          event: 'run_log_append_failed',
          runId: entry.runId,
          doc: entry.doc,
          reason: toErrorMessage(logError)
        })
      )
    }
  }
}
