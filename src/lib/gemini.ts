import { ProviderError } from '@/lib/errors'

export interface GeminiImageRequest {
  prompt: string
  apiKey?: string
  model: string
  aspectRatio?: '16:9' | '1:1' | '9:16'
  maxRetries?: number
  signal?: AbortSignal
}

export interface GeminiImageResult {
  mimeType: string
  base64Data: string
}

type UnknownRecord = Record<string, unknown>

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null

const asString = (value: unknown): string | undefined =>
  typeof value === 'string' && value ? value : undefined

const resolveEndpoint = (model: string) =>
  `https://generativelanguage.googleapis.com/v1beta/models/${model}:generateContent`

export const extractInlineImage = (response: unknown): GeminiImageResult | null => {
  if (!isRecord(response)) return null
  const nested = isRecord(response.data) ? response.data.candidates : undefined
  const candidates = response.candidates ?? nested
  if (!Array.isArray(candidates)) return null

  for (const candidate of candidates) {
    const content = isRecord(candidate) ? candidate.content : undefined
    const parts = isRecord(content) ? content.parts : undefined
    if (!Array.isArray(parts)) continue

    for (const part of parts) {
      if (!isRecord(part)) continue
      const inline = part.inlineData ?? part.inline_data
      if (!isRecord(inline)) continue
      const data = asString(inline.data)
      const mimeType = asString(inline.mimeType) ?? asString(inline.mime_type)
      if (data && mimeType) {
        return { mimeType, base64Data: data }
      }
    }
  }

  return null
}

const describeError = (raw: unknown, fallback: string): string => {
  if (!isRecord(raw)) return fallback
  const nested = isRecord(raw.error) ? asString(raw.error.message) : undefined
  return nested ?? asString(raw.message) ?? fallback
}

const RETRY_DELAYS = [2000, 5000, 10000]

const sleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) return reject(signal.reason)
    const timer = setTimeout(resolve, ms)
    signal?.addEventListener('abort', () => {
      clearTimeout(timer)
      reject(signal.reason)
    }, { once: true })
  })

export async function generateGeminiImage(request: GeminiImageRequest): Promise<GeminiImageResult> {
  const apiKey = request.apiKey
  if (!apiKey) {
    throw new ProviderError('gemini', 'Gemini API key is not configured')
  }

  const model = request.model
  const maxRetries = request.maxRetries ?? 2

  const imageConfig = { aspectRatio: request.aspectRatio ?? '16:9' }

  const payload = {
    contents: [
      {
        role: 'user',
        parts: [{ text: request.prompt }],
      },
    ],
    generationConfig: {
      responseModalities: ['TEXT', 'IMAGE'],
      imageConfig,
    },
  }

  let lastError: Error | null = null

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      const delay = RETRY_DELAYS[attempt - 1] || RETRY_DELAYS[RETRY_DELAYS.length - 1]
      console.log(`[Gemini] Retry attempt ${attempt}/${maxRetries} after ${delay}ms delay...`)
      await sleep(delay, request.signal)
    }

    console.log(`[Gemini] Calling ${model} for image generation${attempt > 0 ? ` (attempt ${attempt + 1})` : ''}...`)
    const response = await fetch(resolveEndpoint(model), {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-goog-api-key': apiKey,
      },
      body: JSON.stringify(payload),
      signal: request.signal,
    })

    const raw: unknown = await response.json().catch(() => ({}))

    if (!response.ok) {
      const message = describeError(raw, response.statusText)
      console.error(`[Gemini] API error (${response.status}):`, message)

      if ((response.status === 429 || response.status >= 500) && attempt < maxRetries) {
        lastError = new ProviderError('gemini', response.status === 429
          ? 'Rate limit exceeded'
          : `Server error ${response.status}`, { status: response.status })
        continue
      }

      if (response.status === 400 && message.toLowerCase().includes('safety')) {
        throw new ProviderError('gemini', 'Content blocked by safety filters', { status: response.status })
      }
      throw new ProviderError('gemini', message || `Gemini error ${response.status}`, { status: response.status })
    }

    const inline = extractInlineImage(raw)
    if (!inline) {
      throw new ProviderError('gemini', 'Gemini response did not include image data')
    }

    console.log(`[Gemini] Received ${inline.mimeType} image`)
    return inline
  }

  throw lastError || new ProviderError('gemini', 'Failed after maximum retries')
}
