import { METRICS_JSON_SCHEMA } from './jsonSchemas.js'

export {
  buildSystemPrompt,
  buildUserPrompt,
  buildRepairPrompt,
  EXAMPLE_PAYLOAD,
  MAX_REPAIR_ERRORS
}

const MAX_REPAIR_ERRORS = 10

const EXAMPLE_PAYLOAD = {
  metrics: [
    {
      name: 'Scope 1',
      value: 1234.5,
      unit: 'tCO2e',
      year: 2023,
      page: 10,
      snippet: 'Scope 1 emissions: 1,234.5 tCO2e',
      confidence: 0.9
    }
  ]
} as const

const COMMON_RULES = [
  'Return JSON only. No Markdown, no code fences, no explanations.',
  'Only report values that appear in the context. Never invent or estimate numbers.',
  'If a metric or its year is uncertain, omit it instead of guessing.'
] as const

const buildSystemPrompt = (): string =>
  [
    'You are an expert ESG analyst extracting greenhouse-gas emissions metrics from sustainability reports.',
    ...COMMON_RULES
  ].join('\n')

const buildUserPrompt = (snippets: ReadonlyArray<string>): string =>
  [
    'Task: extract Scope 1, Scope 2 (location-based and market-based) and Scope 3 emissions from the context.',
    'Output JSON schema:',
    JSON.stringify(METRICS_JSON_SCHEMA, null, 2),
    'Context (each line is tagged with its source page as [p<N>]):',
    snippets.join('\n'),
    'Instructions:',
    '1. Convert every value to a plain number (remove thousands separators such as commas).',
    '2. Use the page number from the [p<N>] tag of the line the value came from.',
    '3. Copy the supporting text into "snippet" and set "confidence" between 0 and 1.',
    ...COMMON_RULES,
    'Illustrative example of the output format only. It is NOT ground truth; do not copy its values:',
    JSON.stringify(EXAMPLE_PAYLOAD)
  ].join('\n')

const buildRepairPrompt = (errors: ReadonlyArray<string>, lastJson: string): string => {
  const shown = errors.slice(0, MAX_REPAIR_ERRORS)
  const hidden = errors.length - shown.length
  const errorLines = shown.map((error) => `- ${error}`)
  if (hidden > 0) {
    errorLines.push(`- ... and ${hidden} more`)
  }

  return [
    'Your previous answer did not satisfy the schema.',
    'Validation errors:',
    ...errorLines,
    'Previous answer:',
    lastJson,
    'Correct only the invalid fields, drop any metric that cannot be corrected from the context, and return the corrected JSON only.'
  ].join('\n')
}
