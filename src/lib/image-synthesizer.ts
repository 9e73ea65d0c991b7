import { buildImagePath } from '@/lib/asset-paths'
import type { ProviderGuard } from '@/lib/concurrency'
import type { AssetDirectories, PipelineConfig } from '@/lib/config'
import { FallbackChain, type AssetProvider } from '@/lib/fallback'
import { generateGeminiImage } from '@/lib/gemini'
import { renderPlaceholderImage, writeVideoFrame, type FrameSize } from '@/lib/image-utils'

export const IMAGE_PROMPT_MAX_LENGTH = 1000

/**
 * Every segment gets the same style directive so the slideshow reads as one
 * piece even though each frame is generated independently.
 */
export const buildImagePrompt = (prompt: string): string => {
  const clean = prompt.trim().slice(0, IMAGE_PROMPT_MAX_LENGTH)
  return `High quality, photorealistic: ${clean}. Professional lighting, detailed, 16:9 aspect ratio suitable for video.`
}

export type ImageInput = {
  prompt: string
  segmentId: number
  outputPath: string
}

export interface ImageSynthesizer {
  /** Resolves to the written asset path; rejects only with AssetGenerationError */
  synthesizeImage(prompt: string, segmentId: number, generationId: string): Promise<string>
}

type GeminiProviderConfig = Pick<PipelineConfig, 'geminiApiKey' | 'geminiImageModel' | 'imageMaxRetries' | 'video'>

export class GeminiImageProvider implements AssetProvider<ImageInput> {
  readonly name = 'gemini'

  constructor(private readonly config: GeminiProviderConfig) {}

  async generate(input: ImageInput, signal?: AbortSignal): Promise<void> {
    const result = await generateGeminiImage({
      prompt: buildImagePrompt(input.prompt),
      apiKey: this.config.geminiApiKey,
      model: this.config.geminiImageModel,
      maxRetries: this.config.imageMaxRetries,
      aspectRatio: '16:9',
      signal,
    })
    signal?.throwIfAborted()
    await writeVideoFrame(Buffer.from(result.base64Data, 'base64'), input.outputPath, this.config.video)
  }
}

export class PlaceholderImageProvider implements AssetProvider<ImageInput> {
  readonly name = 'placeholder'

  constructor(private readonly size: FrameSize) {}

  async generate(input: ImageInput): Promise<void> {
    await renderPlaceholderImage(input.prompt, input.segmentId, input.outputPath, this.size)
  }
}

export class FallbackImageSynthesizer implements ImageSynthesizer {
  private readonly chain: FallbackChain<ImageInput>

  constructor(
    private readonly dirs: AssetDirectories,
    primary: AssetProvider<ImageInput>,
    fallback: AssetProvider<ImageInput>,
    guard?: ProviderGuard
  ) {
    this.chain = new FallbackChain('Image', primary, fallback, guard)
  }

  async synthesizeImage(prompt: string, segmentId: number, generationId: string): Promise<string> {
    const outputPath = buildImagePath(this.dirs, generationId, segmentId)
    await this.chain.generate({ prompt, segmentId, outputPath }, `segment ${segmentId} of ${generationId}`)
    return outputPath
  }
}

export function createImageSynthesizer(config: PipelineConfig, guard?: ProviderGuard): ImageSynthesizer {
  return new FallbackImageSynthesizer(
    config.dirs,
    new GeminiImageProvider(config),
    new PlaceholderImageProvider(config.video),
    guard
  )
}
