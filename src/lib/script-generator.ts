/**
 * Narration script writer
 * Asks Claude for a segmented script and normalizes the reply into a VideoScript
 */

import Anthropic from '@anthropic-ai/sdk'
import { estimateCost, findScriptModel } from '@/lib/claude-models'
import type { ProviderGuard } from '@/lib/concurrency'
import type { PipelineConfig } from '@/lib/config'
import { errorMessage, MalformedScriptError, ProviderError } from '@/lib/errors'
import type { ScriptSegment, VideoScript } from '@/lib/types'

/** Text-in, text-out completion call used for script writing */
export interface ScriptCompletionClient {
  complete(prompt: string, signal?: AbortSignal): Promise<string>
}

type UnknownRecord = Record<string, unknown>

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const asText = (value: unknown): string | undefined => {
  if (typeof value !== 'string') return undefined
  const trimmed = value.trim()
  return trimmed ? trimmed : undefined
}

/**
 * Build the single completion request for a script
 */
export function buildScriptPrompt(prompt: string, duration: number, segmentCount: number): string {
  const segmentDuration = duration / segmentCount

  return `Create a video script for: "${prompt.trim()}"

Requirements:
- Total video duration: ${duration} seconds
- Divide into exactly ${segmentCount} equal segments
- Each segment should take approximately ${segmentDuration.toFixed(1)} seconds when spoken
- For each segment, provide:
  1. Engaging narration text (concise but informative)
  2. A detailed, photorealistic image prompt for an image generation model

Output ONLY valid JSON in this shape:
{"segments":[{"segment_id":1,"content":"Narration text for segment 1","image_prompt":"Detailed photorealistic image description"}]}

Make sure the narration is natural, engaging, and fits the timing. Image prompts should be detailed and photorealistic.`
}

type JsonAttempt = { ok: true; value: unknown } | { ok: false }

const tryParseJson = (text: string): JsonAttempt => {
  try {
    return { ok: true, value: JSON.parse(text) }
  } catch {
    return { ok: false }
  }
}

/**
 * Parse the model reply strictly first, then from a fenced code block
 */
export function extractScriptJson(raw: string): unknown {
  const direct = tryParseJson(raw.trim())
  if (direct.ok) return direct.value

  const match = raw.match(/```(?:json)?\s*([\s\S]*?)\s*```/i)
  if (match?.[1]) {
    const fenced = tryParseJson(match[1].trim())
    if (fenced.ok) return fenced.value
    throw new MalformedScriptError('Fenced script block is not valid JSON')
  }

  throw new MalformedScriptError('Failed to parse script JSON')
}

/**
 * Turn parsed model output into a VideoScript. Segments are renumbered in
 * reply order and every duration is the uniform nominal split; anything the
 * model said about ids or timing is ignored.
 */
export function normalizeScript(payload: unknown, duration: number, segmentCount: number): VideoScript {
  const rawSegments = Array.isArray(payload) ? payload : isRecord(payload) ? payload.segments : undefined
  if (!Array.isArray(rawSegments)) {
    throw new MalformedScriptError('Script JSON has no segments array')
  }
  if (rawSegments.length < segmentCount) {
    throw new MalformedScriptError(`Expected ${segmentCount} segments, got ${rawSegments.length}`)
  }
  if (rawSegments.length > segmentCount) {
    console.warn(`[Script] Model returned ${rawSegments.length} segments, keeping the first ${segmentCount}`)
  }

  const segmentDuration = duration / segmentCount
  const segments: ScriptSegment[] = rawSegments.slice(0, segmentCount).map((item: unknown, index) => {
    const seg = isRecord(item) ? item : {}
    const content = asText(seg.content) ?? asText(seg.narration)
    const imagePrompt = asText(seg.image_prompt) ?? asText(seg.imagePrompt)
    if (!content || !imagePrompt) {
      throw new MalformedScriptError(`Segment ${index + 1} is missing content or image_prompt`)
    }
    return {
      segment_id: index + 1,
      content,
      duration: segmentDuration,
      image_prompt: imagePrompt,
    }
  })

  return { segments, total_duration: duration }
}

export const parseScript = (raw: string, duration: number, segmentCount: number): VideoScript =>
  normalizeScript(extractScriptJson(raw), duration, segmentCount)

type AnthropicScriptConfig = Pick<PipelineConfig, 'anthropicApiKey' | 'scriptModel' | 'scriptMaxTokens'>

export class AnthropicScriptClient implements ScriptCompletionClient {
  constructor(private readonly config: AnthropicScriptConfig) {}

  async complete(prompt: string, signal?: AbortSignal): Promise<string> {
    if (!this.config.anthropicApiKey) {
      throw new ProviderError('anthropic', 'Anthropic API key is not configured')
    }

    const anthropic = new Anthropic({ apiKey: this.config.anthropicApiKey })
    let response: Anthropic.Message
    try {
      response = await anthropic.messages.create(
        {
          model: this.config.scriptModel,
          max_tokens: this.config.scriptMaxTokens,
          temperature: 0.7,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal }
      )
    } catch (err) {
      const status = err instanceof Anthropic.APIError ? err.status : undefined
      throw new ProviderError('anthropic', `Script provider error: ${errorMessage(err)}`, { cause: err, status })
    }

    const model = findScriptModel(this.config.scriptModel)
    if (model) {
      const cost = estimateCost(model, response.usage)
      console.log(`[Script] ${model.name} used ${response.usage.input_tokens}/${response.usage.output_tokens} tokens (~$${cost.toFixed(4)})`)
    }

    const parts: string[] = []
    for (const block of response.content) {
      if (block.type === 'text') parts.push(block.text)
    }
    const text = parts.join('').trim()
    if (!text) {
      throw new ProviderError('anthropic', 'Script provider returned no text')
    }
    return text
  }
}

export interface ScriptWriter {
  generateScript(prompt: string, duration: number, segmentCount: number): Promise<VideoScript>
}

/**
 * Single attempt, no retries: the pipeline decides what a failure means.
 */
export class ScriptGenerator implements ScriptWriter {
  constructor(
    private readonly client: ScriptCompletionClient,
    private readonly guard?: ProviderGuard
  ) {}

  async generateScript(prompt: string, duration: number, segmentCount: number): Promise<VideoScript> {
    const request = buildScriptPrompt(prompt, duration, segmentCount)

    let raw: string
    try {
      raw = this.guard
        ? await this.guard('script', (signal) => this.client.complete(request, signal))
        : await this.client.complete(request)
    } catch (err) {
      if (err instanceof ProviderError) throw err
      throw new ProviderError('script', `Script generation failed: ${errorMessage(err)}`, { cause: err })
    }

    const script = parseScript(raw, duration, segmentCount)
    console.log(`[Script] Generated ${script.segments.length} segments for ${duration}s`)
    return script
  }
}

export function createScriptGenerator(config: PipelineConfig, guard?: ProviderGuard): ScriptGenerator {
  return new ScriptGenerator(new AnthropicScriptClient(config), guard)
}
