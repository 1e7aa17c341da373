import type { AppConfig } from '../../config.js'
import { resolveProviderKind } from '../../config.js'
import { ProviderKind } from '../../domain/enums.js'
import type { ConversationMessage } from '../../domain/types.js'
import { ProviderError, toErrorMessage } from '../../utils/errors.js'

export { createModelProvider, toWireMessages, flattenConversation }
export type {
  HttpTransport,
  ModelProvider,
  ProviderDependencies,
  ProviderSettings,
  WireMessage
}

type HttpTransport = (url: string, init: RequestInit) => Promise<Response>

type ProviderSettings = Pick<
  AppConfig,
  'apiBase' | 'apiKey' | 'model' | 'chatTimeoutMs' | 'generateTimeoutMs' | 'numCtx'
> & {
  provider: string
}

type ProviderDependencies = {
  transport?: HttpTransport
}

type ModelProvider = {
  readonly kind: ProviderKind
  readonly model: string
  complete: (conversation: ReadonlyArray<ConversationMessage>) => Promise<string>
}

type WireMessage = {
  role: 'system' | 'user'
  content: string
}

type ProviderRequest = {
  url: string
  headers: Record<string, string>
  body: Record<string, unknown>
  timeoutMs: number
}

type ProviderVariant = {
  buildRequest: (
    settings: ProviderSettings,
    conversation: ReadonlyArray<ConversationMessage>
  ) => ProviderRequest
  extractText: (payload: unknown) => string
}

const JSON_HEADERS = { 'Content-Type': 'application/json' } as const

const toWireMessages = (conversation: ReadonlyArray<ConversationMessage>): WireMessage[] =>
  conversation.map((message) => ({
    role: message.role === 'system' ? 'system' : 'user',
    content: message.content
  }))

// Generate endpoints take a single prompt, so the turns are laid out as a transcript.
const flattenConversation = (conversation: ReadonlyArray<ConversationMessage>): string =>
  toWireMessages(conversation)
    .map((message) => `${message.role.toUpperCase()}: ${message.content}\n`)
    .join('') + 'ASSISTANT: '

const PROVIDER_VARIANTS: Record<ProviderKind, ProviderVariant> = {
  [ProviderKind.OLLAMA_GENERATE]: {
    buildRequest: (settings, conversation) => ({
      url: `${settings.apiBase}/api/generate`,
      headers: { ...JSON_HEADERS },
      body: {
        model: settings.model,
        prompt: flattenConversation(conversation),
        stream: false,
        options: { temperature: 0, num_ctx: settings.numCtx },
        format: 'json'
      },
      timeoutMs: settings.generateTimeoutMs
    }),
    extractText: (payload) => readStringPath(payload, ['response'])
  },
  [ProviderKind.OLLAMA_CHAT]: {
    buildRequest: (settings, conversation) => ({
      url: `${settings.apiBase}/api/chat`,
      headers: { ...JSON_HEADERS },
      body: {
        model: settings.model,
        messages: toWireMessages(conversation),
        stream: false,
        options: { temperature: 0, num_ctx: settings.numCtx },
        format: 'json'
      },
      timeoutMs: settings.chatTimeoutMs
    }),
    extractText: (payload) => readStringPath(payload, ['message', 'content'])
  },
  [ProviderKind.OPENAI_COMPATIBLE]: {
    buildRequest: (settings, conversation) => ({
      url: `${settings.apiBase}/v1/chat/completions`,
      headers: { ...JSON_HEADERS, Authorization: `Bearer ${settings.apiKey}` },
      body: {
        model: settings.model,
        messages: toWireMessages(conversation),
        temperature: 0,
        response_format: { type: 'json_object' }
      },
      timeoutMs: settings.chatTimeoutMs
    }),
    extractText: (payload) => readStringPath(payload, ['choices', 0, 'message', 'content'])
  }
}

/**
 * Builds the model backend selected by `settings.provider`.
 *
 * Unknown provider ids raise `ConfigurationError` here, before any request is
 * made. Every transport, status or response-shape failure surfaces from
 * `complete` as `ProviderError`; nothing is retried at this layer.
 */
const createModelProvider = (
  settings: ProviderSettings,
  dependencies: ProviderDependencies = {}
): ModelProvider => {
  const kind = resolveProviderKind(settings.provider)
  const variant = PROVIDER_VARIANTS[kind]
  const transport: HttpTransport = dependencies.transport ?? fetch
  const apiBase = settings.apiBase.replace(/\/+$/, '')
  const resolved: ProviderSettings = { ...settings, apiBase }

  const complete = async (
    conversation: ReadonlyArray<ConversationMessage>
  ): Promise<string> => {
    if (conversation.length === 0) {
      throw new ProviderError('conversation must not be empty', { provider: kind })
    }

    const request = variant.buildRequest(resolved, conversation)
    const startedAt = Date.now()

    // Timed as a whole: headers, then body.
    const { response, payload } = await withTimeout(request.timeoutMs, kind, async (signal) => {
      const response = await transport(request.url, {
        method: 'POST',
        headers: request.headers,
        body: JSON.stringify(request.body),
        signal
      })
      return { response, payload: await readJson(response) }
    })

    if (!response.ok) {
      throw new ProviderError(`${kind} ${response.status}: ${extractErrorMessage(payload)}`, {
        provider: kind,
        status: response.status
      })
    }

    const text = variant.extractText(payload)
    if (text.trim().length === 0) {
      throw new ProviderError(`${kind} returned empty content`, { provider: kind })
    }

    console.info(
      JSON.stringify({
        event: 'llm_provider_response',
        provider: kind,
        model: settings.model,
        status: response.status,
        chars: text.length,
        elapsedMs: Date.now() - startedAt
      })
    )

    return text
  }

  return { kind, model: settings.model, complete }
}

const withTimeout = async <T>(
  timeoutMs: number,
  kind: ProviderKind,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> => {
  const controller = new AbortController()
  const aborted = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true })
  })
  const timer = setTimeout(() => controller.abort(), timeoutMs)
  try {
    // Settles on abort even when the transport ignores the signal.
    return await Promise.race([task(controller.signal), aborted])
  } catch (error) {
    if (controller.signal.aborted) {
      throw new ProviderError(`${kind} request timed out after ${timeoutMs}ms`, {
        provider: kind,
        timeoutMs
      })
    }
    throw new ProviderError(`${kind} request failed: ${toErrorMessage(error)}`, {
      provider: kind
    })
  } finally {
    clearTimeout(timer)
  }
}

const readJson = async (response: Response): Promise<unknown> => {
  const raw = await response.text()
  if (raw.length === 0) {
    return {}
  }
  try {
    return JSON.parse(raw) as unknown
  } catch {
    return { raw }
  }
}

const extractErrorMessage = (payload: unknown): string => {
  if (!payload || typeof payload !== 'object' || Array.isArray(payload)) {
    return 'unknown error'
  }
  const record = payload as Record<string, unknown>
  const error = record.error
  if (typeof error === 'string' && error.length > 0) {
    return error
  }
  if (error && typeof error === 'object' && !Array.isArray(error)) {
    const message = (error as Record<string, unknown>).message
    if (typeof message === 'string' && message.length > 0) {
      return message
    }
  }
  if (typeof record.raw === 'string' && record.raw.length > 0) {
    return record.raw.slice(0, 200)
  }
  return 'unknown error'
}

const readStringPath = (payload: unknown, path: ReadonlyArray<string | number>): string => {
  let current: unknown = payload
  for (const key of path) {
    if (typeof key === 'number') {
      current = Array.isArray(current) ? current[key] : undefined
    } else if (current && typeof current === 'object' && !Array.isArray(current)) {
      current = (current as Record<string, unknown>)[key]
    } else {
      current = undefined
    }
  }

  if (typeof current !== 'string') {
    throw new ProviderError(`response is missing text at ${path.join('.')}`, {
      path: path.join('.')
    })
  }
  return current
}
