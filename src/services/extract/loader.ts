import { readdir } from 'node:fs/promises'
import path from 'node:path'

export { listPdfFiles, toDocumentStem }

const listPdfFiles = async (directory: string): Promise<string[]> => {
  const entries = await readdir(directory, { withFileTypes: true })
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.pdf'))
    .map((entry) => path.join(directory, entry.name))
    .sort()
}

// "reports/Acme 2024: Sustainability.pdf" -> "Acme_2024__Sustainability"
const toDocumentStem = (filePath: string): string =>
  path.parse(filePath).name.replace(/[ :]/g, '_')
