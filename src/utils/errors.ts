import type { ContentfulStatusCode } from 'hono/utils/http-status'

export const ErrorCodes = {
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_PDF: 'INVALID_PDF',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  PROVIDER_ERROR: 'PROVIDER_ERROR',
  DECODE_ERROR: 'DECODE_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR'
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes] | (string & {})

export type ErrorPayload = {
  error: {
    code: ErrorCode
    message: string
    details?: Record<string, unknown>
  }
}

export const buildError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ErrorPayload => {
  if (details) {
    return { error: { code, message, details } }
  }

  return { error: { code, message } }
}

export class AppError extends Error {
  public readonly code: ErrorCode
  public readonly status: ContentfulStatusCode
  public readonly details?: Record<string, unknown>

  constructor(
    code: ErrorCode,
    message: string,
    status: ContentfulStatusCode = 500,
    details?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.status = status
    if (details) {
      this.details = details
    }
  }
}

/** Unknown provider id or unusable setting; raised before any network call. */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.CONFIGURATION_ERROR, message, 500, details)
    this.name = 'ConfigurationError'
  }
}

/** Transport failure, non-2xx status or unusable response body from a model backend. */
export class ProviderError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.PROVIDER_ERROR, message, 502, details)
    this.name = 'ProviderError'
  }
}

/** Model output still not parseable as JSON once the repair budget is spent. */
export class DecodeError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.DECODE_ERROR, message, 502, details)
    this.name = 'DecodeError'
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError

export const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message
  return String(error)
}

export const toErrorResponse = (
  error: unknown,
  fallbackMessage = 'internal error'
): { status: ContentfulStatusCode; payload: ErrorPayload } => {
  if (isAppError(error)) {
    return {
      status: error.status,
      payload: buildError(error.code, error.message, error.details)
    }
  }

  return {
    status: 500,
    payload: buildError(ErrorCodes.INTERNAL_ERROR, fallbackMessage)
  }
}
