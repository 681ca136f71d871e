import type { ZodError } from 'zod'

/**
 * Raised when caller-supplied configuration fails validation.
 * Analysis paths never throw; this only fires at construction time.
 */
export class ValidationError extends Error {
  constructor(message: string, public field?: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * Convert the first zod issue into a ValidationError
 */
export function fromZodError(error: ZodError, context: string): ValidationError {
  const issue = error.issues[0]
  const field = issue?.path.join('.') || undefined
  const detail = issue ? `${field ? `${field}: ` : ''}${issue.message}` : 'invalid value'
  return new ValidationError(`Invalid ${context} (${detail})`, field)
}

/**
 * Extract user-friendly error message from error object
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'An unknown error occurred'
}
