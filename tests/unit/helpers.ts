import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { ProviderKind } from '../../src/domain/enums.js'
import type { ConversationMessage, PageCorpus } from '../../src/domain/types.js'
import type { ModelProvider } from '../../src/services/llm/provider.client.js'

export const SCOPE_1_LINE = 'Scope 1 emissions: 1,234.5 tCO2e'

export const VALID_RESPONSE =
  '{"metrics":[{"name":"Scope 1","value":1234.5,"unit":"tCO2e","year":2023,"page":1}]}'

export const INVALID_RESPONSE =
  '{"metrics":[{"name":"Scope 9","value":"bad","unit":"kg","year":1800,"page":0}]}'

export const scopeCorpus = (): PageCorpus => ({
  pages: [{ page: 1, lines: [SCOPE_1_LINE] }]
})

export const silentCorpus = (): PageCorpus => ({
  pages: [
    { page: 1, lines: ['Our commitment to people', 'Chapter summary'] },
    { page: 2, lines: ['Governance overview'], tables: [[['Topic', 'Owner']]] }
  ]
})

export type ScriptedProvider = {
  provider: ModelProvider
  calls: ConversationMessage[][]
}

/**
 * Replies with the scripted responses in order and repeats the last one once
 * the script runs out. A scripted Error is thrown instead of returned.
 */
export const createScriptedProvider = (
  responses: ReadonlyArray<string | Error>
): ScriptedProvider => {
  const calls: ConversationMessage[][] = []
  const provider: ModelProvider = {
    kind: ProviderKind.OLLAMA_GENERATE,
    model: 'stub-model',
    complete: async (conversation) => {
      calls.push([...conversation])
      const next = responses[Math.min(calls.length, responses.length) - 1]
      if (next === undefined) {
        throw new Error('no scripted response')
      }
      if (next instanceof Error) {
        throw next
      }
      return next
    }
  }
  return { provider, calls }
}

export const createTempDir = async (): Promise<string> =>
  mkdtemp(path.join(tmpdir(), 'scopeline-test-'))

export const removeTempDir = async (dir: string): Promise<void> => {
  await rm(dir, { recursive: true, force: true })
}
