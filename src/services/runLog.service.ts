import { appendFile, mkdir } from 'node:fs/promises'
import path from 'node:path'
import type { RunLogEntry } from '../domain/types.js'

type RunLogOptions = {
  filePath: string
}

/** Append-only newline-delimited JSON log, one line per lifecycle event. */
export class RunLog {
  readonly filePath: string

  constructor(options: RunLogOptions) {
    this.filePath = path.resolve(options.filePath)
  }

  async append(entry: RunLogEntry): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true })
    await appendFile(this.filePath, `${JSON.stringify(entry)}\n`, 'utf8')
  }
}

export const defaultRunLogPath = (outputDir: string): string =>
  path.join(outputDir, 'logs', 'run_log.ndjson')
