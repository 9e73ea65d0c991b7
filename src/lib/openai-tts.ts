import { writeFile } from 'node:fs/promises'
import { ProviderError } from '@/lib/errors'

const SPEECH_ENDPOINT = 'https://api.openai.com/v1/audio/speech'

export interface SpeechRequest {
  input: string
  apiKey?: string
  model: string
  voice: string
  outputPath: string
  signal?: AbortSignal
}

/**
 * Synthesizes narration as MP3 and writes it to `outputPath`. Returns the
 * number of bytes written.
 */
export async function writeSpeechMp3(request: SpeechRequest): Promise<number> {
  if (!request.apiKey) {
    throw new ProviderError('openai-tts', 'OpenAI API key is not configured')
  }

  const res = await fetch(SPEECH_ENDPOINT, {
    method: 'POST',
    headers: {
      authorization: `Bearer ${request.apiKey}`,
      'content-type': 'application/json',
    },
    body: JSON.stringify({
      model: request.model,
      voice: request.voice,
      input: request.input,
      response_format: 'mp3',
    }),
    signal: request.signal,
  })

  if (!res.ok) {
    const body = await res.text().catch(() => '')
    throw new ProviderError('openai-tts', `OpenAI TTS error (${res.status}): ${body || res.statusText}`, {
      status: res.status,
    })
  }

  const audio = Buffer.from(await res.arrayBuffer())
  if (audio.length === 0) {
    throw new ProviderError('openai-tts', 'OpenAI TTS returned an empty body')
  }
  request.signal?.throwIfAborted()
  await writeFile(request.outputPath, audio)
  return audio.length
}
