import { ValidationError } from '@/lib/errors'
import type { GenerationRequest } from '@/lib/types'

export const DURATION_LIMITS = { min: 10, max: 600, default: 60 } as const
export const SEGMENT_LIMITS = { min: 1, max: 10, default: 3 } as const

const readBoundedInt = (
  value: unknown,
  field: string,
  limits: { min: number; max: number; default: number }
): number => {
  if (value === undefined || value === null) return limits.default
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`${field} must be an integer`)
  }
  if (value < limits.min || value > limits.max) {
    throw new ValidationError(`${field} must be between ${limits.min} and ${limits.max}`)
  }
  return value
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Validate an incoming generation request body
 */
export function parseGenerationRequest(body: unknown): GenerationRequest {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object')
  }
  const input = body

  const prompt = typeof input.prompt === 'string' ? input.prompt.trim() : ''
  if (!prompt) {
    throw new ValidationError('prompt is required')
  }

  return {
    prompt,
    duration: readBoundedInt(input.duration, 'duration', DURATION_LIMITS),
    segments: readBoundedInt(input.segments, 'segments', SEGMENT_LIMITS),
  }
}
