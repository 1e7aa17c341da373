import type { BatchSummaryRow } from '../../domain/types.js'
import { toErrorMessage } from '../../utils/errors.js'
import { makeId } from '../../utils/ids.js'
import { listPdfFiles, toDocumentStem } from '../extract/loader.js'
import type { DocumentPipeline } from '../extraction/document.pipeline.js'
import type { StorageService } from '../storage.service.js'

export type BatchRunInput = {
  inputDir: string
}

export type BatchRunResult = {
  batchId: string
  rows: BatchSummaryRow[]
  summaryPath: string | null
}

type BatchRunnerDeps = {
  pipeline: DocumentPipeline
  storage: StorageService
}

/**
 * Processes every PDF in `inputDir` one after another. A failure on one
 * document becomes a `failed` summary row; the batch always continues.
 */
export const runBatch = async (
  input: BatchRunInput,
  deps: BatchRunnerDeps
): Promise<BatchRunResult> => {
  const batchId = makeId('batch')
  const files = await listPdfFiles(input.inputDir)

  console.info(
    JSON.stringify({
      event: 'batch_started',
      batchId,
      inputDir: input.inputDir,
      documents: files.length
    })
  )

  if (files.length === 0) {
    console.warn(JSON.stringify({ event: 'batch_empty', batchId, inputDir: input.inputDir }))
    return { batchId, rows: [], summaryPath: null }
  }

  const rows: BatchSummaryRow[] = []
  for (const filePath of files) {
    const doc = toDocumentStem(filePath)
    try {
      const result = await deps.pipeline.processPdf(filePath)
      rows.push({
        doc,
        status: result.outcome.status,
        metrics: result.outcome.payload.metrics.length,
        dropped: result.outcome.droppedCount,
        repairs: result.outcome.attempts,
        error: ''
      })
    } catch (error) {
      console.error(
        JSON.stringify({
          event: 'batch_document_failed',
          batchId,
          doc,
          reason: toErrorMessage(error)
        })
      )
      rows.push({
        doc,
        status: 'failed',
        metrics: 0,
        dropped: 0,
        repairs: 0,
        error: toErrorMessage(error)
      })
    }
  }

  const summaryPath = await deps.storage.saveBatchSummary(rows)

  console.info(
    JSON.stringify({
      event: 'batch_finished',
      batchId,
      documents: rows.length,
      failed: rows.filter((row) => row.status === 'failed').length,
      summaryPath
    })
  )

  return { batchId, rows, summaryPath }
}
