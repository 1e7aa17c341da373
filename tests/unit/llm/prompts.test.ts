import { describe, expect, it } from 'vitest'
import { METRICS_JSON_SCHEMA } from '../../../src/services/llm/jsonSchemas.js'
import {
  buildRepairPrompt,
  buildSystemPrompt,
  buildUserPrompt,
  EXAMPLE_PAYLOAD
} from '../../../src/services/llm/prompts.js'

describe('buildSystemPrompt', () => {
  it('fixes the output contract and forbids guessing', () => {
    const prompt = buildSystemPrompt()
    expect(prompt).toContain('Return JSON only.')
    expect(prompt).toContain('omit it instead of guessing')
  })
})

describe('buildUserPrompt', () => {
  const snippets = ['[p1] Scope 1 emissions: 1,234.5 tCO2e', '[p4] Scope 3 12.5 MtCO2e']
  const prompt = buildUserPrompt(snippets)

  it('embeds the schema verbatim', () => {
    expect(prompt).toContain(JSON.stringify(METRICS_JSON_SCHEMA, null, 2))
  })

  it('lists every snippet on its own line', () => {
    const lines = prompt.split('\n')
    expect(lines).toContain(snippets[0])
    expect(lines).toContain(snippets[1])
  })

  it('marks the example as not ground truth', () => {
    expect(prompt).toContain('It is NOT ground truth')
    expect(prompt).toContain(JSON.stringify(EXAMPLE_PAYLOAD))
  })
})

describe('buildRepairPrompt', () => {
  it('keeps the first ten errors and summarises the rest', () => {
    const errors = Array.from({ length: 12 }, (_, index) => `e${index + 1}`)
    const prompt = buildRepairPrompt(errors, '{"metrics":[]}')

    const bullets = prompt.split('\n').filter((line) => line.startsWith('- '))
    expect(bullets).toEqual([
      '- e1',
      '- e2',
      '- e3',
      '- e4',
      '- e5',
      '- e6',
      '- e7',
      '- e8',
      '- e9',
      '- e10',
      '- ... and 2 more'
    ])
  })

  it('includes the previous answer and asks for JSON only', () => {
    const prompt = buildRepairPrompt(['metrics[0] value must be a number'], '{"metrics":[{"value":"x"}]}')
    expect(prompt.split('\n')).toContain('{"metrics":[{"value":"x"}]}')
    expect(prompt).toContain('return the corrected JSON only')
  })
})
