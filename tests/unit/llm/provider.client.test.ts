import { describe, expect, it } from 'vitest'
import type { ConversationMessage } from '../../../src/domain/types.js'
import {
  createModelProvider,
  flattenConversation
} from '../../../src/services/llm/provider.client.js'
import type { HttpTransport, ProviderSettings } from '../../../src/services/llm/provider.client.js'
import { ConfigurationError, ProviderError } from '../../../src/utils/errors.js'

type CapturedRequest = {
  url: string
  init: RequestInit
}

const conversation: ConversationMessage[] = [
  { role: 'system', content: 'sys' },
  { role: 'user', content: 'usr' },
  { role: 'repair', content: 'fix' }
]

const settings = (provider: string, overrides: Partial<ProviderSettings> = {}): ProviderSettings => ({
  provider,
  apiBase: 'http://localhost:11434',
  apiKey: 'test-key',
  model: 'llama3.2',
  chatTimeoutMs: 1000,
  generateTimeoutMs: 1000,
  numCtx: 4096,
  ...overrides
})

const respondWith = (
  body: unknown,
  status = 200
): { transport: HttpTransport; requests: CapturedRequest[] } => {
  const requests: CapturedRequest[] = []
  const transport: HttpTransport = async (url, init) => {
    requests.push({ url, init })
    const text = typeof body === 'string' ? body : JSON.stringify(body)
    return new Response(text, { status })
  }
  return { transport, requests }
}

const sentBody = (request: CapturedRequest | undefined): unknown =>
  JSON.parse(String(request?.init.body))

describe('flattenConversation', () => {
  it('lays out the turns as a transcript ending with the assistant cue', () => {
    expect(flattenConversation(conversation)).toBe('SYSTEM: sys\nUSER: usr\nUSER: fix\nASSISTANT: ')
  })
})

describe('createModelProvider', () => {
  it('posts a generate request and returns the response field', async () => {
    const { transport, requests } = respondWith({ response: '{"metrics":[]}' })
    const provider = createModelProvider(settings('ollama-generate'), { transport })

    await expect(provider.complete(conversation)).resolves.toBe('{"metrics":[]}')
    expect(requests).toHaveLength(1)
    expect(requests[0]?.url).toBe('http://localhost:11434/api/generate')
    expect(requests[0]?.init.method).toBe('POST')
    expect(sentBody(requests[0])).toEqual({
      model: 'llama3.2',
      prompt: 'SYSTEM: sys\nUSER: usr\nUSER: fix\nASSISTANT: ',
      stream: false,
      options: { temperature: 0, num_ctx: 4096 },
      format: 'json'
    })
  })

  it('accepts the bare ollama id as the generate variant', () => {
    const { transport } = respondWith({ response: '{}' })
    expect(createModelProvider(settings('ollama'), { transport }).kind).toBe('ollama-generate')
  })

  it('posts a local chat request and reads message.content', async () => {
    const { transport, requests } = respondWith({ message: { role: 'assistant', content: '{"metrics":[]}' } })
    const provider = createModelProvider(settings('ollama-chat'), { transport })

    await expect(provider.complete(conversation)).resolves.toBe('{"metrics":[]}')
    expect(requests[0]?.url).toBe('http://localhost:11434/api/chat')
    expect(sentBody(requests[0])).toEqual({
      model: 'llama3.2',
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'usr' },
        { role: 'user', content: 'fix' }
      ],
      stream: false,
      options: { temperature: 0, num_ctx: 4096 },
      format: 'json'
    })
  })

  it('posts an OpenAI-compatible request with a bearer token', async () => {
    const { transport, requests } = respondWith({
      choices: [{ message: { role: 'assistant', content: '{"metrics":[]}' } }]
    })
    const provider = createModelProvider(
      settings('openai-compatible', { apiBase: 'http://api.test/' }),
      { transport }
    )

    await expect(provider.complete(conversation)).resolves.toBe('{"metrics":[]}')
    expect(requests[0]?.url).toBe('http://api.test/v1/chat/completions')
    expect(new Headers(requests[0]?.init.headers).get('authorization')).toBe('Bearer test-key')
    expect(sentBody(requests[0])).toEqual({
      model: 'llama3.2',
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'usr' },
        { role: 'user', content: 'fix' }
      ],
      temperature: 0,
      response_format: { type: 'json_object' }
    })
  })

  it('rejects unknown providers before any request', () => {
    const { transport, requests } = respondWith({})
    expect(() => createModelProvider(settings('llama-cpp'), { transport })).toThrow(ConfigurationError)
    expect(requests).toHaveLength(0)
  })

  it('raises a provider error for non-success statuses', async () => {
    const { transport } = respondWith({ error: 'model "llama3.2" not found' }, 404)
    const provider = createModelProvider(settings('ollama-generate'), { transport })

    const failure = provider.complete(conversation)
    await expect(failure).rejects.toBeInstanceOf(ProviderError)
    await expect(failure).rejects.toThrow('ollama-generate 404: model "llama3.2" not found')
  })

  it('raises a provider error when the transport fails', async () => {
    const transport: HttpTransport = async () => {
      throw new TypeError('fetch failed')
    }
    const provider = createModelProvider(settings('ollama-chat'), { transport })

    await expect(provider.complete(conversation)).rejects.toThrow(
      'ollama-chat request failed: fetch failed'
    )
  })

  it('raises a provider error when the text field is missing', async () => {
    const { transport } = respondWith({ choices: [] })
    const provider = createModelProvider(settings('openai-compatible'), { transport })

    await expect(provider.complete(conversation)).rejects.toThrow(
      'response is missing text at choices.0.message.content'
    )
  })

  it('raises a provider error for empty content', async () => {
    const { transport } = respondWith({ response: '   ' })
    const provider = createModelProvider(settings('ollama-generate'), { transport })

    await expect(provider.complete(conversation)).rejects.toThrow(
      'ollama-generate returned empty content'
    )
  })

  it('raises a provider error on timeout', async () => {
    const transport: HttpTransport = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => reject(new Error('aborted')))
      })
    const provider = createModelProvider(settings('ollama-chat', { chatTimeoutMs: 10 }), {
      transport
    })

    await expect(provider.complete(conversation)).rejects.toThrow(
      'ollama-chat request timed out after 10ms'
    )
  })

  it('times out when the body stalls after the headers arrive', async () => {
    const transport: HttpTransport = async () =>
      new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 200 })
    const provider = createModelProvider(settings('ollama-chat', { chatTimeoutMs: 50 }), {
      transport
    })

    await expect(provider.complete(conversation)).rejects.toThrow(
      'ollama-chat request timed out after 50ms'
    )
  })

  it('wraps a body stream failure in a provider error', async () => {
    const transport: HttpTransport = async () =>
      new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.error(new TypeError('terminated'))
          }
        }),
        { status: 200 }
      )
    const provider = createModelProvider(settings('ollama-generate'), { transport })

    const failure = provider.complete(conversation)
    await expect(failure).rejects.toBeInstanceOf(ProviderError)
    await expect(failure).rejects.toThrow('ollama-generate request failed: terminated')
  })
})
