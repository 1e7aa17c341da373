import type { CorpusPage, PageCorpus } from '../../domain/types.js'
import { normalizeWhitespace } from '../extract/normalize.js'

export { shortlistSnippets, isRelevantLine, flattenTableRow, toSnippet }

const WINDOW_RADIUS = 1

const KEYWORDS = [
  'scope 1',
  'scope 2',
  'scope 3',
  'tco2e',
  'ktco2e',
  'mtco2e',
  'emissions',
  'ghg',
  'tonnes'
] as const

const DIGIT_PATTERN = /\d/
const YEAR_PATTERN = /(?<!\d)(?:19|20)\d{2}(?!\d)/
const NUMBER_UNIT_PATTERN =
  /\d(?:[\d,]*\d)?(?:\.\d+)?\s*(?:[kKmM]?t\s*CO2e?|tonnes?\s*(?:of\s*)?CO2e?|tons?\s*CO2e?|metric\s+tons?\s*CO2e?)/i

const isRelevantLine = (line: string): boolean => {
  const lowered = line.toLowerCase()
  if (KEYWORDS.some((keyword) => lowered.includes(keyword)) && DIGIT_PATTERN.test(line)) {
    return true
  }
  return YEAR_PATTERN.test(line) || NUMBER_UNIT_PATTERN.test(line)
}

const flattenTableRow = (row: ReadonlyArray<string>): string =>
  row
    .map((cell) => normalizeWhitespace(cell))
    .filter((cell) => cell.length > 0)
    .join(' | ')

const toSnippet = (page: number, text: string): string => `[p${page}] ${normalizeWhitespace(text)}`

const windowAround = (lines: ReadonlyArray<string>, index: number): string => {
  const start = Math.max(0, index - WINDOW_RADIUS)
  const end = Math.min(lines.length, index + WINDOW_RADIUS + 1)
  return lines
    .slice(start, end)
    .map((entry) => normalizeWhitespace(entry))
    .filter((entry) => entry.length > 0)
    .join(' ')
}

// Calls `accept` for each hit in scan order; stops when it returns true.
const scanPage = (page: CorpusPage, accept: (snippet: string) => boolean): boolean => {
  const { lines } = page
  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index]
    if (line === undefined || !isRelevantLine(line)) continue
    if (accept(toSnippet(page.page, windowAround(lines, index)))) return true
  }

  for (const table of page.tables ?? []) {
    for (const row of table) {
      const flattened = flattenTableRow(row)
      if (flattened.length === 0 || !isRelevantLine(flattened)) continue
      if (accept(toSnippet(page.page, flattened))) return true
    }
  }

  return false
}

/**
 * Reduces a page corpus to at most `limit` unique, page-tagged context windows.
 *
 * Pages are scanned in corpus order, lines before table rows, and scanning stops
 * as soon as the cap is reached, so the first hits always win.
 */
const shortlistSnippets = (corpus: PageCorpus, limit: number): string[] => {
  const snippets: string[] = []
  if (limit <= 0) return snippets

  const seen = new Set<string>()
  const accept = (snippet: string): boolean => {
    if (!seen.has(snippet)) {
      seen.add(snippet)
      snippets.push(snippet)
    }
    return snippets.length >= limit
  }

  for (const page of corpus.pages) {
    if (scanPage(page, accept)) break
  }

  return snippets
}
