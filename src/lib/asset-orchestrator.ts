import type { AudioSynthesizer } from '@/lib/audio-synthesizer'
import type { GenerationStatusTracker } from '@/lib/generation-status'
import type { ImageSynthesizer } from '@/lib/image-synthesizer'
import type { VideoScript } from '@/lib/types'

export type SegmentAssets = {
  segmentId: number
  imagePath: string
  audioPath: string
}

const settle = async <T>(tasks: Promise<T>[]): Promise<T[]> => {
  const results = await Promise.allSettled(tasks)
  const values: T[] = []
  for (const result of results) {
    if (result.status === 'rejected') throw result.reason
    values.push(result.value)
  }
  return values
}

export class AssetOrchestrator {
  constructor(
    private readonly images: ImageSynthesizer,
    private readonly audio: AudioSynthesizer
  ) {}

  /**
   * Persists the script, moves the record to `generating_assets`, then runs
   * every image and audio synthesis at once. Resolves only after all 2×N
   * operations have finished; if a fallback failed, the first such error is
   * rethrown once the rest have settled.
   */
  async generateAssets(tracker: GenerationStatusTracker, script: VideoScript): Promise<SegmentAssets[]> {
    await tracker.advance('generating_assets', { script })

    const generationId = tracker.generationId
    const startedAt = Date.now()
    const imageTasks = script.segments.map((segment) =>
      this.images.synthesizeImage(segment.image_prompt, segment.segment_id, generationId)
    )
    const audioTasks = script.segments.map((segment) =>
      this.audio.synthesizeAudio(segment.content, segment.segment_id, generationId)
    )

    const paths = await settle([...imageTasks, ...audioTasks])
    const count = script.segments.length

    console.log(`[Assets] ${generationId}: ${count * 2} assets ready in ${Date.now() - startedAt}ms`)
    return script.segments.map((segment, index) => ({
      segmentId: segment.segment_id,
      imagePath: paths[index],
      audioPath: paths[count + index],
    }))
  }
}
