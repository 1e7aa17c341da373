import path from 'node:path'
import type { Hono } from 'hono'
import { runBatch } from '../../services/batch/batch.runner.js'
import type { DocumentPipeline } from '../../services/extraction/document.pipeline.js'
import type { StorageService } from '../../services/storage.service.js'
import { buildError, ErrorCodes, toErrorMessage } from '../../utils/errors.js'

export type BatchRouteDeps = {
  pipeline: DocumentPipeline
  storage: StorageService
  inputDir: string
}

type BatchTaskBody = {
  input_dir?: string
}

const parseBody = (value: unknown): BatchTaskBody => {
  if (value === null || value === undefined) {
    return {}
  }
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new Error('request body must be an object')
  }

  const inputDir = (value as Record<string, unknown>).input_dir
  if (inputDir === undefined) {
    return {}
  }
  if (typeof inputDir !== 'string' || inputDir.trim().length === 0) {
    throw new Error('input_dir must be a non-empty string')
  }
  return { input_dir: inputDir.trim() }
}

// Requested directories resolve against the configured one and may not leave it.
const resolveInputDir = (rootDir: string, requested: string | undefined): string | null => {
  const root = path.resolve(rootDir)
  if (requested === undefined) {
    return root
  }
  const resolved = path.resolve(root, requested)
  if (resolved !== root && !resolved.startsWith(`${root}${path.sep}`)) {
    return null
  }
  return resolved
}

export const registerBatchRoutes = (app: Hono, deps: BatchRouteDeps) => {
  app.post('/tasks/batch', async (c) => {
    const bodyPayload: unknown = await c.req.json().catch(() => null)
    let body: BatchTaskBody
    try {
      body = parseBody(bodyPayload)
    } catch (error) {
      return c.json(
        buildError(
          ErrorCodes.INVALID_INPUT,
          error instanceof Error ? error.message : 'invalid request body'
        ),
        400
      )
    }

    const inputDir = resolveInputDir(deps.inputDir, body.input_dir)
    if (!inputDir) {
      return c.json(
        buildError(ErrorCodes.INVALID_INPUT, 'input_dir must be inside the configured input directory'),
        400
      )
    }

    try {
      const result = await runBatch({ inputDir }, deps)
      return c.json(
        {
          batch_id: result.batchId,
          summary_path: result.summaryPath,
          documents: result.rows
        },
        200
      )
    } catch (error) {
      return c.json(
        buildError(ErrorCodes.INTERNAL_ERROR, 'batch run failed', {
          inputDir,
          message: toErrorMessage(error)
        }),
        500
      )
    }
  })
}
