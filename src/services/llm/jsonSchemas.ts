import { EmissionUnit, MetricName } from '../../domain/enums.js'
import type { ExtractionPayload, Metric } from '../../domain/types.js'

export {
  METRICS_JSON_SCHEMA,
  YEAR_RANGE,
  validateExtractionPayload,
  validateMetric,
  findMetricError,
  toMetric,
  toExtractionPayload,
  decodeModelOutput,
  normalizeJsonCandidateText
}
export type { DecodeResult }

type DecodeResult = { ok: true; value: unknown } | { ok: false; message: string }

const METRIC_NAMES: ReadonlyArray<string> = Object.values(MetricName)
const EMISSION_UNITS: ReadonlyArray<string> = Object.values(EmissionUnit)
const YEAR_RANGE = { min: 1990, max: 2100 } as const

const METRICS_JSON_SCHEMA = {
  type: 'object',
  required: ['metrics'],
  properties: {
    metrics: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'value', 'unit', 'year', 'page'],
        properties: {
          name: { enum: METRIC_NAMES },
          value: { type: 'number' },
          unit: { enum: EMISSION_UNITS },
          year: { type: 'integer', minimum: YEAR_RANGE.min, maximum: YEAR_RANGE.max },
          page: { type: 'integer', minimum: 1 },
          snippet: { type: 'string' },
          confidence: { type: 'number', minimum: 0, maximum: 1 }
        }
      }
    }
  }
} as const

const STRUCTURAL_ERROR = 'payload must be an object with a "metrics" array'

/**
 * Checks a decoded model response against the metrics contract.
 *
 * Returns one message per violation; an empty list means the payload is valid.
 * A payload without a `metrics` array yields a single structural message.
 */
const validateExtractionPayload = (value: unknown): string[] => {
  const record = asRecord(value)
  if (!record || !Array.isArray(record.metrics)) {
    return [STRUCTURAL_ERROR]
  }

  return record.metrics.flatMap((item, index) =>
    validateMetric(item).map((reason) => `metrics[${index}] ${reason}`)
  )
}

/** Field-level reasons for one metric, without the index prefix. */
const validateMetric = (value: unknown): string[] => {
  const metric = asRecord(value)
  if (!metric) {
    return ['is not an object']
  }

  const reasons: string[] = []

  if (typeof metric.name !== 'string' || !METRIC_NAMES.includes(metric.name)) {
    reasons.push(`name must be one of: ${METRIC_NAMES.join(', ')}`)
  }
  if (!isFiniteNumber(metric.value)) {
    reasons.push('value must be a number')
  }
  if (typeof metric.unit !== 'string' || !EMISSION_UNITS.includes(metric.unit)) {
    reasons.push(`unit must be one of: ${EMISSION_UNITS.join(', ')}`)
  }
  if (!isIntegerInRange(metric.year, YEAR_RANGE.min, YEAR_RANGE.max)) {
    reasons.push(`year must be an integer between ${YEAR_RANGE.min} and ${YEAR_RANGE.max}`)
  }
  if (!isIntegerInRange(metric.page, 1, Number.MAX_SAFE_INTEGER)) {
    reasons.push('page must be an integer >= 1')
  }
  if (isPresent(metric.confidence)) {
    const { confidence } = metric
    if (!isFiniteNumber(confidence) || confidence < 0 || confidence > 1) {
      reasons.push('confidence must be a number between 0 and 1')
    }
  }
  if (isPresent(metric.snippet) && typeof metric.snippet !== 'string') {
    reasons.push('snippet must be a string')
  }

  return reasons
}

const findMetricError = (value: unknown): string | undefined => validateMetric(value)[0]

/**
 * Returns a clean copy of a valid metric, or null. Optional fields sent as
 * `null` are left out of the copy, as are keys outside the contract.
 */
const toMetric = (value: unknown): Metric | null => {
  const metric = asRecord(value)
  if (!metric || validateMetric(metric).length > 0) {
    return null
  }

  const { name, value: amount, unit, year, page, snippet, confidence } = metric
  if (
    !isMetricName(name) ||
    !isEmissionUnit(unit) ||
    typeof amount !== 'number' ||
    typeof year !== 'number' ||
    typeof page !== 'number'
  ) {
    return null
  }

  return {
    name,
    value: amount,
    unit,
    year,
    page,
    ...(typeof snippet === 'string' ? { snippet } : {}),
    ...(typeof confidence === 'number' ? { confidence } : {})
  }
}

const toExtractionPayload = (value: unknown): ExtractionPayload | null => {
  const record = asRecord(value)
  if (!record || !Array.isArray(record.metrics)) {
    return null
  }

  const metrics: Metric[] = []
  for (const item of record.metrics) {
    const metric = toMetric(item)
    if (!metric) {
      return null
    }
    metrics.push(metric)
  }
  return { metrics }
}

const decodeModelOutput = (raw: string): DecodeResult => {
  const normalized = normalizeJsonCandidateText(raw)
  if (normalized.length === 0) {
    return { ok: false, message: 'response is empty' }
  }

  try {
    return { ok: true, value: JSON.parse(normalized) as unknown }
  } catch (error) {
    return {
      ok: false,
      message: error instanceof Error ? error.message : 'unparseable JSON'
    }
  }
}

const normalizeJsonCandidateText = (text: string): string => {
  const trimmed = text.trim()

  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i)
  if (fenced && fenced[1] !== undefined) {
    return fenced[1].trim()
  }

  const objectStart = trimmed.indexOf('{')
  const objectEnd = trimmed.lastIndexOf('}')
  if (objectStart >= 0 && objectEnd > objectStart) {
    return trimmed.slice(objectStart, objectEnd + 1).trim()
  }

  return trimmed
}

const asRecord = (value: unknown): Record<string, unknown> | null => {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return null
  }
  return value as Record<string, unknown>
}

const isMetricName = (value: unknown): value is MetricName =>
  typeof value === 'string' && METRIC_NAMES.includes(value)

const isEmissionUnit = (value: unknown): value is EmissionUnit =>
  typeof value === 'string' && EMISSION_UNITS.includes(value)

const isPresent = (value: unknown): boolean => value !== undefined && value !== null

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value)

const isIntegerInRange = (value: unknown, min: number, max: number): boolean =>
  typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max
