import { describe, expect, it } from 'vitest'
import { DEFAULT_CONFIG, loadConfig, resolveProviderKind } from '../../src/config.js'
import { ConfigurationError } from '../../src/utils/errors.js'

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG)
  })

  it('reads provider settings from the environment', () => {
    const config = loadConfig({
      PROVIDER: 'OpenAI-Compatible',
      API_BASE: 'http://localhost:8000/',
      API_KEY: 'test-key',
      MODEL: 'qwen2.5'
    })

    expect(config.provider).toBe('openai-compatible')
    expect(config.apiBase).toBe('http://localhost:8000')
    expect(config.apiKey).toBe('test-key')
    expect(config.model).toBe('qwen2.5')
  })

  it('keeps the default repair budget for unusable values', () => {
    expect(loadConfig({ MAX_REPAIRS: '3' }).maxRepairs).toBe(3)
    expect(loadConfig({ MAX_REPAIRS: 'abc' }).maxRepairs).toBe(2)
    expect(loadConfig({ MAX_REPAIRS: '-1' }).maxRepairs).toBe(2)
    expect(loadConfig({ MAX_REPAIRS: '0' }).maxRepairs).toBe(0)
  })

  it('applies overrides after the environment', () => {
    const config = loadConfig({ OUTPUT_DIR: 'out' }, { outputDir: 'elsewhere' })
    expect(config.outputDir).toBe('elsewhere')
  })

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true)
  })
})

describe('resolveProviderKind', () => {
  it('maps the bare ollama alias to the generate endpoint', () => {
    expect(resolveProviderKind('ollama')).toBe('ollama-generate')
    expect(resolveProviderKind(' Ollama-Chat ')).toBe('ollama-chat')
  })

  it('rejects unknown providers', () => {
    expect(() => resolveProviderKind('llama-cpp')).toThrow(ConfigurationError)
    expect(() => resolveProviderKind('llama-cpp')).toThrow('unknown provider: llama-cpp')
  })
})
