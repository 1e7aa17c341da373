import type { AppConfig } from '../../config.js'
import { ExtractionStatus } from '../../domain/enums.js'
import type {
  ConversationMessage,
  ExtractionOutcome,
  Metric,
  PageCorpus
} from '../../domain/types.js'
import { DecodeError } from '../../utils/errors.js'
import {
  decodeModelOutput,
  toExtractionPayload,
  toMetric,
  validateExtractionPayload
} from '../llm/jsonSchemas.js'
import { buildRepairPrompt, buildSystemPrompt, buildUserPrompt } from '../llm/prompts.js'
import type { ModelProvider } from '../llm/provider.client.js'
import { shortlistSnippets } from '../llm/shortlist.js'

export { ExtractionController, salvageMetrics }
export type { ControllerState, ExtractionControllerOptions, RunProgress }

type ExtractionControllerOptions = {
  provider: ModelProvider
  config: Pick<AppConfig, 'maxRepairs' | 'snippetLimit'>
}

type RunProgress = {
  conversation: ConversationMessage[]
  attempts: number
  modelCalls: number
  snippetCount: number
}

type ControllerState =
  | { step: 'init'; corpus: PageCorpus }
  | { step: 'awaiting_model'; progress: RunProgress }
  | { step: 'validating'; progress: RunProgress; raw: string; value: unknown }
  | { step: 'repairing'; progress: RunProgress; raw: string; errors: string[] }
  | { step: 'done'; outcome: ExtractionOutcome }

/**
 * Drives shortlist → prompt → model call → validation → repair for one corpus.
 *
 * Decode and validation repairs draw on one shared budget (`maxRepairs`).
 * Once it is spent, an unparseable answer raises `DecodeError` while a
 * parseable but invalid one is reduced to its individually valid metrics.
 * `ProviderError` from the model call propagates untouched.
 */
class ExtractionController {
  private readonly provider: ModelProvider
  private readonly maxRepairs: number
  private readonly snippetLimit: number

  constructor(options: ExtractionControllerOptions) {
    this.provider = options.provider
    this.maxRepairs = options.config.maxRepairs
    this.snippetLimit = options.config.snippetLimit
  }

  async run(corpus: PageCorpus): Promise<ExtractionOutcome> {
    let state: ControllerState = { step: 'init', corpus }
    while (state.step !== 'done') {
      state = await this.advance(state)
    }
    return state.outcome
  }

  async advance(state: ControllerState): Promise<ControllerState> {
    switch (state.step) {
      case 'init':
        return this.start(state.corpus)
      case 'awaiting_model':
        return this.callModel(state.progress)
      case 'validating':
        return this.validate(state.progress, state.raw, state.value)
      case 'repairing':
        return this.repair(state.progress, state.raw, state.errors)
      case 'done':
        return state
    }
  }

  private start(corpus: PageCorpus): ControllerState {
    const snippets = shortlistSnippets(corpus, this.snippetLimit)
    if (snippets.length === 0) {
      console.info(JSON.stringify({ event: 'extraction_no_signal', pages: corpus.pages.length }))
      return {
        step: 'done',
        outcome: {
          payload: { metrics: [] },
          status: ExtractionStatus.NO_SIGNAL,
          attempts: 0,
          modelCalls: 0,
          snippetCount: 0,
          droppedCount: 0,
          conversation: []
        }
      }
    }

    return {
      step: 'awaiting_model',
      progress: {
        conversation: [
          { role: 'system', content: buildSystemPrompt() },
          { role: 'user', content: buildUserPrompt(snippets) }
        ],
        attempts: 0,
        modelCalls: 0,
        snippetCount: snippets.length
      }
    }
  }

  private async callModel(progress: RunProgress): Promise<ControllerState> {
    console.info(
      JSON.stringify({
        event: 'extraction_model_call',
        provider: this.provider.kind,
        model: this.provider.model,
        attempt: progress.attempts,
        snippetCount: progress.snippetCount
      })
    )

    const raw = await this.provider.complete(progress.conversation)
    const called: RunProgress = { ...progress, modelCalls: progress.modelCalls + 1 }
    const decoded = decodeModelOutput(raw)
    if (decoded.ok) {
      return { step: 'validating', progress: called, raw, value: decoded.value }
    }

    if (called.attempts >= this.maxRepairs) {
      throw new DecodeError(`model output is not valid JSON after ${called.attempts} repairs`, {
        reason: decoded.message,
        preview: raw.replace(/\s+/g, ' ').slice(0, 280)
      })
    }

    console.warn(
      JSON.stringify({
        event: 'extraction_decode_failed',
        attempt: called.attempts,
        reason: decoded.message
      })
    )
    return this.repair(called, raw, [`response is not valid JSON: ${decoded.message}`])
  }

  private validate(progress: RunProgress, raw: string, value: unknown): ControllerState {
    const payload = toExtractionPayload(value)
    if (payload) {
      return {
        step: 'done',
        outcome: {
          payload,
          status: ExtractionStatus.VALID,
          attempts: progress.attempts,
          modelCalls: progress.modelCalls,
          snippetCount: progress.snippetCount,
          droppedCount: 0,
          conversation: progress.conversation
        }
      }
    }

    const errors = validateExtractionPayload(value)
    if (progress.attempts < this.maxRepairs) {
      return { step: 'repairing', progress, raw, errors }
    }

    const { metrics, droppedCount } = salvageMetrics(value)
    console.warn(
      JSON.stringify({
        event: 'extraction_degraded',
        attempts: progress.attempts,
        kept: metrics.length,
        droppedCount,
        errors: errors.slice(0, 10)
      })
    )
    return {
      step: 'done',
      outcome: {
        payload: { metrics },
        status: ExtractionStatus.DEGRADED,
        attempts: progress.attempts,
        modelCalls: progress.modelCalls,
        snippetCount: progress.snippetCount,
        droppedCount,
        conversation: progress.conversation
      }
    }
  }

  private repair(progress: RunProgress, raw: string, errors: string[]): ControllerState {
    console.info(
      JSON.stringify({
        event: 'extraction_repair_turn',
        attempt: progress.attempts + 1,
        errorCount: errors.length
      })
    )

    return {
      step: 'awaiting_model',
      progress: {
        ...progress,
        conversation: [
          ...progress.conversation,
          { role: 'repair', content: buildRepairPrompt(errors, raw) }
        ],
        attempts: progress.attempts + 1
      }
    }
  }
}

// Keeps the metrics that pass on their own; anything without a metrics array keeps nothing.
const salvageMetrics = (value: unknown): { metrics: Metric[]; droppedCount: number } => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return { metrics: [], droppedCount: 0 }
  }
  const items: unknown = (value as Record<string, unknown>).metrics
  if (!Array.isArray(items)) {
    return { metrics: [], droppedCount: 0 }
  }

  const metrics = items
    .map((item) => toMetric(item))
    .filter((metric): metric is Metric => metric !== null)
  return { metrics, droppedCount: items.length - metrics.length }
}
