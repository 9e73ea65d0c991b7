import path from 'node:path'
import { CLAUDE_FAST_MODEL } from '@/lib/claude-models'

export interface VideoRenderSettings {
  fps: number
  width: number
  height: number
  videoCodec: string
  audioCodec: string
}

export interface AssetDirectories {
  imagesDir: string
  audioDir: string
  videosDir: string
}

/**
 * Everything the pipeline needs from the environment, read once and passed
 * explicitly to each synthesizer and the assembler.
 */
export interface PipelineConfig {
  dirs: AssetDirectories
  anthropicApiKey?: string
  scriptModel: string
  scriptMaxTokens: number
  geminiApiKey?: string
  geminiImageModel: string
  imageMaxRetries: number
  openaiApiKey?: string
  ttsModel: string
  ttsVoice: string
  ffmpegPath?: string
  ffprobePath?: string
  video: VideoRenderSettings
  maxConcurrentPipelines: number
  maxConcurrentProviderCalls: number
  providerTimeoutMs: number
  supabaseUrl?: string
  supabaseServiceKey?: string
}

const readString = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

const readPositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value)
  return Number.isFinite(parsed) && parsed > 0 ? Math.floor(parsed) : fallback
}

const readNonNegativeInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value)
  return value !== undefined && value.trim() !== '' && Number.isFinite(parsed) && parsed >= 0
    ? Math.floor(parsed)
    : fallback
}

export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env): PipelineConfig {
  const root = readString(env.GENERATED_ROOT) ?? path.join(process.cwd(), 'generated')

  return {
    dirs: {
      imagesDir: path.join(root, 'generated_images'),
      audioDir: path.join(root, 'generated_audio'),
      videosDir: path.join(root, 'generated_videos'),
    },
    anthropicApiKey: readString(env.ANTHROPIC_API_KEY),
    scriptModel: readString(env.SCRIPT_MODEL) ?? CLAUDE_FAST_MODEL.name,
    scriptMaxTokens: readPositiveInt(env.SCRIPT_MAX_TOKENS, CLAUDE_FAST_MODEL.maxTokens),
    geminiApiKey: readString(env.GEMINI_API_KEY),
    geminiImageModel: readString(env.GEMINI_IMAGE_MODEL) ?? 'gemini-2.5-flash-image',
    imageMaxRetries: readNonNegativeInt(env.GEMINI_IMAGE_RETRIES, 2),
    openaiApiKey: readString(env.OPENAI_API_KEY),
    ttsModel: readString(env.OPENAI_TTS_MODEL) ?? 'tts-1-hd',
    ttsVoice: readString(env.OPENAI_TTS_VOICE) ?? 'nova',
    ffmpegPath: readString(env.FFMPEG_PATH),
    ffprobePath: readString(env.FFPROBE_PATH),
    video: {
      fps: 24,
      width: 1792,
      height: 1024,
      videoCodec: 'libx264',
      audioCodec: 'aac',
    },
    maxConcurrentPipelines: readPositiveInt(env.MAX_CONCURRENT_PIPELINES, 2),
    maxConcurrentProviderCalls: readPositiveInt(env.MAX_CONCURRENT_PROVIDER_CALLS, 4),
    providerTimeoutMs: readPositiveInt(env.PROVIDER_TIMEOUT_MS, 120000),
    supabaseUrl: readString(env.NEXT_PUBLIC_SUPABASE_URL),
    supabaseServiceKey: readString(env.SUPABASE_SERVICE_ROLE_KEY),
  }
}
