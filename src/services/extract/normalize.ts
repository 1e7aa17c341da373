export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim()

const PAGE_LABEL_PATTERN = /^-?\s*page\s+\d+\s*-?$/i

// Running headers such as "Page 12" or "- Page 12 -" carry no content.
export const isPageLabel = (line: string): boolean => PAGE_LABEL_PATTERN.test(line.trim())

export const cleanPageLines = (lines: ReadonlyArray<string>): string[] =>
  lines
    .map((line) => normalizeWhitespace(line))
    .filter((line) => line.length > 0 && !isPageLabel(line))
