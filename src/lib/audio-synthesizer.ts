import { rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { buildAudioPath } from '@/lib/asset-paths'
import { encodeSilentWav, estimateSpokenDuration, SILENCE_SAMPLE_RATE } from '@/lib/audio-utils'
import type { ProviderGuard } from '@/lib/concurrency'
import type { AssetDirectories, PipelineConfig } from '@/lib/config'
import { FallbackChain, type AssetProvider } from '@/lib/fallback'
import type { MediaToolkit } from '@/lib/media'
import { writeSpeechMp3 } from '@/lib/openai-tts'

export type AudioInput = {
  text: string
  segmentId: number
  outputPath: string
}

export interface AudioSynthesizer {
  /** Resolves to the written MP3 path; rejects only with AssetGenerationError */
  synthesizeAudio(text: string, segmentId: number, generationId: string): Promise<string>
}

type SpeechProviderConfig = Pick<PipelineConfig, 'openaiApiKey' | 'ttsModel' | 'ttsVoice'>

export class OpenAiSpeechProvider implements AssetProvider<AudioInput> {
  readonly name = 'openai-tts'

  constructor(private readonly config: SpeechProviderConfig) {}

  async generate(input: AudioInput, signal?: AbortSignal): Promise<void> {
    await writeSpeechMp3({
      input: input.text,
      apiKey: this.config.openaiApiKey,
      model: this.config.ttsModel,
      voice: this.config.ttsVoice,
      outputPath: input.outputPath,
      signal,
    })
  }
}

/**
 * Silent clip roughly as long as the narration would take to read, encoded
 * to the same MP3 container the speech provider returns.
 */
export class SilentAudioProvider implements AssetProvider<AudioInput> {
  readonly name = 'silence'

  constructor(
    private readonly media: Pick<MediaToolkit, 'transcodeAudio'>,
    private readonly sampleRate = SILENCE_SAMPLE_RATE
  ) {}

  async generate(input: AudioInput): Promise<void> {
    const seconds = estimateSpokenDuration(input.text)
    const parsed = path.parse(input.outputPath)
    const wavPath = path.join(parsed.dir, `${parsed.name}.wav`)

    await writeFile(wavPath, encodeSilentWav(seconds, this.sampleRate))
    try {
      await this.media.transcodeAudio(wavPath, input.outputPath)
    } finally {
      await rm(wavPath, { force: true })
    }
  }
}

export class FallbackAudioSynthesizer implements AudioSynthesizer {
  private readonly chain: FallbackChain<AudioInput>

  constructor(
    private readonly dirs: AssetDirectories,
    primary: AssetProvider<AudioInput>,
    fallback: AssetProvider<AudioInput>,
    guard?: ProviderGuard
  ) {
    this.chain = new FallbackChain('Audio', primary, fallback, guard)
  }

  async synthesizeAudio(text: string, segmentId: number, generationId: string): Promise<string> {
    const outputPath = buildAudioPath(this.dirs, generationId, segmentId)
    await this.chain.generate({ text, segmentId, outputPath }, `segment ${segmentId} of ${generationId}`)
    return outputPath
  }
}

export function createAudioSynthesizer(
  config: PipelineConfig,
  media: MediaToolkit,
  guard?: ProviderGuard
): AudioSynthesizer {
  return new FallbackAudioSynthesizer(
    config.dirs,
    new OpenAiSpeechProvider(config),
    new SilentAudioProvider(media),
    guard
  )
}
