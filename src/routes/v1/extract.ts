import type { Hono } from 'hono'
import type { CorpusPage, ExtractionOutcome, PageCorpus } from '../../domain/types.js'
import type { ExtractionController } from '../../services/extraction/controller.js'
import type { DocumentPipeline } from '../../services/extraction/document.pipeline.js'
import { buildError, ErrorCodes, toErrorResponse } from '../../utils/errors.js'

type ExtractRequest = {
  doc?: string
  corpus: PageCorpus
}

type ExtractResponse = {
  doc?: string
  run_id?: string
  status: ExtractionOutcome['status']
  metrics: ExtractionOutcome['payload']['metrics']
  attempts: number
  model_calls: number
  snippet_count: number
  dropped_count: number
}

type ExtractRouteDeps = {
  controller: ExtractionController
  pipeline: DocumentPipeline
}

const DOC_PATTERN = /^[A-Za-z0-9._-]+$/

export const registerExtractRoutes = (app: Hono, deps: ExtractRouteDeps) => {
  app.post('/extract', async (c) => {
    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return c.json(buildError(ErrorCodes.INVALID_INPUT, 'request body must be JSON'), 400)
    }

    const parsed = parseExtractRequest(body)
    if (!parsed.ok) {
      return c.json(buildError(ErrorCodes.INVALID_INPUT, parsed.message), 400)
    }

    try {
      const { doc, corpus } = parsed.value
      if (doc) {
        const result = await deps.pipeline.processCorpus(doc, corpus)
        return c.json({ doc, run_id: result.runId, ...toResponse(result.outcome) }, 200)
      }

      const outcome = await deps.controller.run(corpus)
      return c.json(toResponse(outcome), 200)
    } catch (error) {
      const { status, payload } = toErrorResponse(error, 'extraction failed')
      return c.json(payload, status)
    }
  })
}

const toResponse = (outcome: ExtractionOutcome): ExtractResponse => ({
  status: outcome.status,
  metrics: outcome.payload.metrics,
  attempts: outcome.attempts,
  model_calls: outcome.modelCalls,
  snippet_count: outcome.snippetCount,
  dropped_count: outcome.droppedCount
})

type ParseResult<T> = { ok: true; value: T } | { ok: false; message: string }

export const parseExtractRequest = (value: unknown): ParseResult<ExtractRequest> => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return { ok: false, message: 'request body must be an object' }
  }

  const record = value as Record<string, unknown>
  const doc = record.doc
  if (doc !== undefined && (typeof doc !== 'string' || !DOC_PATTERN.test(doc))) {
    return { ok: false, message: 'doc must match [A-Za-z0-9._-]+' }
  }

  const corpus = parsePageCorpus(record.pages)
  if (!corpus.ok) {
    return corpus
  }

  return {
    ok: true,
    value: {
      ...(typeof doc === 'string' ? { doc } : {}),
      corpus: corpus.value
    }
  }
}

const parsePageCorpus = (value: unknown): ParseResult<PageCorpus> => {
  if (!Array.isArray(value)) {
    return { ok: false, message: 'pages must be an array' }
  }

  const pages: CorpusPage[] = []
  for (const [index, item] of value.entries()) {
    const page = parseCorpusPage(item, index)
    if (!page.ok) {
      return page
    }
    pages.push(page.value)
  }

  return { ok: true, value: { pages } }
}

const parseCorpusPage = (value: unknown, index: number): ParseResult<CorpusPage> => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return { ok: false, message: `pages[${index}] must be an object` }
  }

  const record = value as Record<string, unknown>
  const page = record.page
  if (typeof page !== 'number' || !Number.isInteger(page) || page < 1) {
    return { ok: false, message: `pages[${index}].page must be an integer >= 1` }
  }

  if (!isStringArray(record.lines)) {
    return { ok: false, message: `pages[${index}].lines must be string[]` }
  }

  const tables = record.tables
  if (tables === undefined) {
    return { ok: true, value: { page, lines: record.lines } }
  }

  if (!Array.isArray(tables) || !tables.every(isStringTable)) {
    return { ok: false, message: `pages[${index}].tables must be string[][][]` }
  }

  return { ok: true, value: { page, lines: record.lines, tables } }
}

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string')

const isStringTable = (value: unknown): value is string[][] =>
  Array.isArray(value) && value.every(isStringArray)
