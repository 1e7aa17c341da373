import { readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { loadConfig } from '../../../src/config.js'
import { runBatch } from '../../../src/services/batch/batch.runner.js'
import { DocumentPipeline } from '../../../src/services/extraction/document.pipeline.js'
import { hasPdfHeader } from '../../../src/services/extract/pdf.extractor.js'
import type { PdfExtractResult } from '../../../src/services/extract/pdf.extractor.js'
import { StorageService } from '../../../src/services/storage.service.js'
import { AppError, ErrorCodes } from '../../../src/utils/errors.js'
import {
  createScriptedProvider,
  createTempDir,
  removeTempDir,
  scopeCorpus,
  VALID_RESPONSE
} from '../helpers.js'

const headerCheckingExtractor = {
  extract: async (buffer: Buffer): Promise<PdfExtractResult> => {
    if (!hasPdfHeader(buffer)) {
      throw new AppError(ErrorCodes.INVALID_PDF, 'invalid pdf header', 400)
    }
    return { corpus: scopeCorpus(), stats: { pages: 1, textItems: 1, lines: 1 } }
  }
}

describe('runBatch', () => {
  let inputDir: string
  let outputDir: string

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    inputDir = await createTempDir()
    outputDir = await createTempDir()
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await removeTempDir(inputDir)
    await removeTempDir(outputDir)
  })

  const buildDeps = () => {
    const config = loadConfig({}, { outputDir })
    const storage = new StorageService({ rootDir: outputDir })
    const { provider } = createScriptedProvider([VALID_RESPONSE])
    const pipeline = new DocumentPipeline({
      config,
      provider,
      storage,
      pdfExtractor: headerCheckingExtractor
    })
    return { pipeline, storage }
  }

  it('continues past a failing document and records it in the summary', async () => {
    await writeFile(path.join(inputDir, 'a.pdf'), '%PDF-1.4 stub')
    await writeFile(path.join(inputDir, 'b.pdf'), 'not a pdf')
    await writeFile(path.join(inputDir, 'notes.txt'), 'ignored')

    const result = await runBatch({ inputDir }, buildDeps())

    expect(result.batchId).toMatch(/^batch_/)
    expect(result.rows.map((row) => [row.doc, row.status])).toEqual([
      ['a', 'valid'],
      ['b', 'failed']
    ])
    expect(result.summaryPath).toMatch(
      /run_summary_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}\.csv$/
    )
    if (result.summaryPath === null) return
    expect(await readFile(result.summaryPath, 'utf8')).toBe(
      'doc,status,metrics,dropped,repairs,error\na,valid,1,0,0,\nb,failed,0,0,0,invalid pdf header\n'
    )
  })

  it('writes no summary for an empty input directory', async () => {
    const result = await runBatch({ inputDir }, buildDeps())

    expect(result.rows).toEqual([])
    expect(result.summaryPath).toBeNull()
  })
})
