import { AssetOrchestrator } from '@/lib/asset-orchestrator'
import { createAudioSynthesizer, type AudioSynthesizer } from '@/lib/audio-synthesizer'
import { createProviderGuard, GenerationQueue } from '@/lib/concurrency'
import { loadConfig, type PipelineConfig } from '@/lib/config'
import { createGenerationStore } from '@/lib/generation-store'
import { VideoGenerationService } from '@/lib/generation-service'
import { createImageSynthesizer, type ImageSynthesizer } from '@/lib/image-synthesizer'
import { createMediaToolkit } from '@/lib/media'
import { createScriptGenerator, type ScriptWriter } from '@/lib/script-generator'
import { VideoAssembler } from '@/lib/video-assembler'

export type PipelineComponents = {
  config: PipelineConfig
  scriptWriter: ScriptWriter
  images: ImageSynthesizer
  audio: AudioSynthesizer
  service: VideoGenerationService
}

/**
 * Wire the production pipeline from configuration. All outbound provider
 * calls share one guard, so the cap applies across concurrent generations.
 */
export function buildPipelineComponents(config: PipelineConfig): PipelineComponents {
  const guard = createProviderGuard({
    concurrency: config.maxConcurrentProviderCalls,
    timeoutMs: config.providerTimeoutMs,
  })
  const media = createMediaToolkit(config)
  const store = createGenerationStore(config)

  const scriptWriter = createScriptGenerator(config, guard)
  const images = createImageSynthesizer(config, guard)
  const audio = createAudioSynthesizer(config, media, guard)

  const service = new VideoGenerationService({
    store,
    queue: new GenerationQueue(config.maxConcurrentPipelines),
    dirs: config.dirs,
    pipeline: {
      store,
      scriptWriter,
      orchestrator: new AssetOrchestrator(images, audio),
      assembler: new VideoAssembler(config.dirs, media),
    },
  })

  return { config, scriptWriter, images, audio, service }
}

let components: PipelineComponents | null = null

export function getPipelineComponents(): PipelineComponents {
  if (!components) {
    components = buildPipelineComponents(loadConfig())
  }
  return components
}

export const getVideoGenerationService = (): VideoGenerationService => getPipelineComponents().service
