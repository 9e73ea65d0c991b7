import { mkdtemp, rm } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { buildAudioPath, buildImagePath, buildVideoPath, fileExists } from '@/lib/asset-paths'
import type { AssetDirectories } from '@/lib/config'
import { AssemblyError, errorMessage, MissingAssetError } from '@/lib/errors'
import type { MediaToolkit } from '@/lib/media'
import type { VideoScript } from '@/lib/types'

/** Relative gap between nominal and measured timing that is worth a warning */
const DRIFT_WARNING_RATIO = 0.5

export type AssembledSegment = {
  segmentId: number
  nominalSeconds: number
  measuredSeconds: number
}

export type AssembledVideo = {
  videoPath: string
  durationSeconds: number
  segments: AssembledSegment[]
}

export class VideoAssembler {
  constructor(
    private readonly dirs: AssetDirectories,
    private readonly media: MediaToolkit,
    private readonly tmpRoot: string = os.tmpdir()
  ) {}

  /**
   * Renders one still-image clip per segment, timed to the measured length of
   * its narration, and concatenates them in segment order. Intermediate clips
   * are deleted whether or not rendering succeeds.
   */
  async assemble(generationId: string, script: VideoScript): Promise<AssembledVideo> {
    let workDir: string
    try {
      workDir = await mkdtemp(path.join(this.tmpRoot, `vidgen-${generationId}-`))
    } catch (err) {
      throw new AssemblyError(`Video creation failed: ${errorMessage(err)}`, { cause: err })
    }

    const ordered = [...script.segments].sort((a, b) => a.segment_id - b.segment_id)

    try {
      const clipPaths: string[] = []
      const timings: AssembledSegment[] = []

      for (const segment of ordered) {
        const imagePath = buildImagePath(this.dirs, generationId, segment.segment_id)
        const audioPath = buildAudioPath(this.dirs, generationId, segment.segment_id)

        const missing: ('image' | 'audio')[] = []
        if (!(await fileExists(imagePath))) missing.push('image')
        if (!(await fileExists(audioPath))) missing.push('audio')
        if (missing.length > 0) throw new MissingAssetError(segment.segment_id, missing)

        const measured = await this.media.probeDuration(audioPath)
        if (Math.abs(measured - segment.duration) > segment.duration * DRIFT_WARNING_RATIO) {
          console.warn(
            `[Assemble] ${generationId} segment ${segment.segment_id}: narration runs ${measured.toFixed(1)}s, script planned ${segment.duration.toFixed(1)}s`
          )
        }

        const clipPath = path.join(workDir, `clip_${String(segment.segment_id).padStart(2, '0')}.mp4`)
        await this.media.renderStillClip({
          imagePath,
          audioPath,
          durationSeconds: measured,
          outputPath: clipPath,
        })
        clipPaths.push(clipPath)
        timings.push({ segmentId: segment.segment_id, nominalSeconds: segment.duration, measuredSeconds: measured })
      }

      const videoPath = buildVideoPath(this.dirs, generationId)
      await this.media.concatClips(clipPaths, videoPath, workDir)
      if (!(await fileExists(videoPath))) {
        throw new AssemblyError(`Rendered video is missing at ${videoPath}`)
      }

      const durationSeconds = timings.reduce((sum, timing) => sum + timing.measuredSeconds, 0)
      console.log(`[Assemble] ${generationId}: ${clipPaths.length} clips, ${durationSeconds.toFixed(1)}s`)
      return { videoPath, durationSeconds, segments: timings }
    } catch (err) {
      if (err instanceof MissingAssetError || err instanceof AssemblyError) throw err
      throw new AssemblyError(`Video creation failed: ${errorMessage(err)}`, { cause: err })
    } finally {
      await rm(workDir, { recursive: true, force: true })
    }
  }
}
