import type { CorpusPage, PageCorpus } from '../../domain/types.js'
import { AppError, ErrorCodes, toErrorMessage } from '../../utils/errors.js'
import { cleanPageLines, normalizeWhitespace } from './normalize.js'

const PDF_HEADER_PREFIX = '%PDF-'
const LINE_MERGE_Y_TOLERANCE = 2.5

type PositionedText = {
  text: string
  x: number
  y: number
}

type TextLine = {
  y: number
  parts: PositionedText[]
}

type RawTextItem = {
  str: string
  transform?: number[]
}

export type PdfExtractResult = {
  corpus: PageCorpus
  stats: {
    pages: number
    textItems: number
    lines: number
  }
}

const toRawTextItem = (value: unknown): RawTextItem | null => {
  if (!value || typeof value !== 'object') return null
  const record = value as Record<string, unknown>
  if (typeof record.str !== 'string') return null
  const transform = Array.isArray(record.transform)
    ? record.transform.filter((entry): entry is number => typeof entry === 'number')
    : null

  return {
    str: record.str,
    ...(transform ? { transform } : {})
  }
}

const toPositionedText = (value: unknown): PositionedText | null => {
  const item = toRawTextItem(value)
  if (!item) return null
  const transform = item.transform ?? []
  return {
    text: normalizeWhitespace(item.str),
    x: Number(transform[4] ?? 0),
    y: Number(transform[5] ?? 0)
  }
}

const buildLinesFromItems = (items: ReadonlyArray<unknown>): TextLine[] => {
  const positioned = items
    .map(toPositionedText)
    .filter((item): item is PositionedText => item !== null && item.text.length > 0)
    .sort((left, right) => {
      if (Math.abs(left.y - right.y) > LINE_MERGE_Y_TOLERANCE) return right.y - left.y
      return left.x - right.x
    })

  const lines: TextLine[] = []
  for (const part of positioned) {
    const last = lines[lines.length - 1]
    if (last && Math.abs(last.y - part.y) <= LINE_MERGE_Y_TOLERANCE) {
      last.parts.push(part)
      continue
    }
    lines.push({ y: part.y, parts: [part] })
  }

  return lines
}

const composeLineText = (line: TextLine): string =>
  normalizeWhitespace(
    [...line.parts]
      .sort((left, right) => left.x - right.x)
      .map((part) => part.text)
      .join(' ')
  )

export const renderPageLines = (items: ReadonlyArray<unknown>): string[] =>
  cleanPageLines(buildLinesFromItems(items).map(composeLineText))

export const hasPdfHeader = (pdfBuffer: Buffer): boolean =>
  pdfBuffer.subarray(0, PDF_HEADER_PREFIX.length).toString('latin1') === PDF_HEADER_PREFIX

/**
 * Turns PDF bytes into a page corpus of reading-order text lines.
 * Table detection is not attempted; every page carries an empty `tables` list.
 */
export class PdfExtractor {
  async extract(pdfBuffer: Buffer): Promise<PdfExtractResult> {
    if (!hasPdfHeader(pdfBuffer)) {
      throw new AppError(ErrorCodes.INVALID_PDF, 'invalid pdf header', 400)
    }

    const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs')
    const task = getDocument({
      data: new Uint8Array(pdfBuffer),
      isEvalSupported: false
    })

    const pages: CorpusPage[] = []
    let textItems = 0

    try {
      const document = await task.promise
      for (let pageIndex = 1; pageIndex <= document.numPages; pageIndex += 1) {
        const page = await document.getPage(pageIndex)
        const textContent = await page.getTextContent({ includeMarkedContent: false })
        const items: unknown[] = textContent.items
        textItems += items.reduce<number>(
          (count, item) => (toRawTextItem(item) ? count + 1 : count),
          0
        )
        pages.push({ page: pageIndex, lines: renderPageLines(items), tables: [] })
      }
    } catch (error) {
      throw new AppError(ErrorCodes.INVALID_PDF, 'pdf text extraction failed', 400, {
        reason: toErrorMessage(error)
      })
    } finally {
      await task.destroy()
    }

    const lineCount = pages.reduce((count, page) => count + page.lines.length, 0)
    console.info(
      JSON.stringify({
        event: 'pdf_extracted',
        pages: pages.length,
        textItems,
        lines: lineCount
      })
    )

    return {
      corpus: { pages },
      stats: { pages: pages.length, textItems, lines: lineCount }
    }
  }
}
