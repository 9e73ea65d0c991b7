import { describe, expect, it } from 'vitest'
import { ValidationError } from '@/lib/errors'
import { parseGenerationRequest } from '@/lib/validation'

describe('parseGenerationRequest', () => {
  it('applies defaults and trims the prompt', () => {
    expect(parseGenerationRequest({ prompt: '  intro to tides ' })).toEqual({
      prompt: 'intro to tides',
      duration: 60,
      segments: 3,
    })
  })

  it('accepts the inclusive bounds', () => {
    expect(parseGenerationRequest({ prompt: 'x', duration: 10, segments: 1 })).toEqual({
      prompt: 'x',
      duration: 10,
      segments: 1,
    })
    expect(parseGenerationRequest({ prompt: 'x', duration: 600, segments: 10 })).toEqual({
      prompt: 'x',
      duration: 600,
      segments: 10,
    })
  })

  it.each([
    [null, 'Request body must be a JSON object'],
    [['prompt'], 'Request body must be a JSON object'],
    [{ prompt: '   ' }, 'prompt is required'],
    [{ prompt: 42 }, 'prompt is required'],
    [{ prompt: 'x', duration: 9 }, 'duration must be between 10 and 600'],
    [{ prompt: 'x', duration: 601 }, 'duration must be between 10 and 600'],
    [{ prompt: 'x', duration: 30.5 }, 'duration must be an integer'],
    [{ prompt: 'x', duration: '30' }, 'duration must be an integer'],
    [{ prompt: 'x', segments: 0 }, 'segments must be between 1 and 10'],
    [{ prompt: 'x', segments: 11 }, 'segments must be between 1 and 10'],
  ])('rejects %j', (body, message) => {
    expect(() => parseGenerationRequest(body)).toThrow(ValidationError)
    expect(() => parseGenerationRequest(body)).toThrow(message)
  })
})
