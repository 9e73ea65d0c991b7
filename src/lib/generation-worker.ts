import type { AssetOrchestrator } from '@/lib/asset-orchestrator'
import { buildVideoUrl } from '@/lib/asset-paths'
import { errorMessage } from '@/lib/errors'
import { GenerationStatusTracker } from '@/lib/generation-status'
import type { GenerationStore } from '@/lib/generation-store'
import type { ScriptWriter } from '@/lib/script-generator'
import type { GenerationRequest, GenerationStatus } from '@/lib/types'
import type { VideoAssembler } from '@/lib/video-assembler'

export type PipelineDeps = {
  store: GenerationStore
  scriptWriter: ScriptWriter
  orchestrator: AssetOrchestrator
  assembler: Pick<VideoAssembler, 'assemble'>
}

type PipelineResult = {
  generationId: string
  status: GenerationStatus
  elapsedMs: number
}

/**
 * Runs one generation end to end, exactly once. Any stage error ends the
 * run with the record marked `failed`; nothing is retried here.
 */
export async function processVideoGeneration(
  deps: PipelineDeps,
  generationId: string,
  request: GenerationRequest
): Promise<PipelineResult> {
  const tracker = new GenerationStatusTracker(deps.store, generationId)
  const startedAt = Date.now()

  try {
    await tracker.advance('generating_script')
    const script = await deps.scriptWriter.generateScript(request.prompt, request.duration, request.segments)

    await deps.orchestrator.generateAssets(tracker, script)

    await tracker.advance('creating_video')
    const video = await deps.assembler.assemble(generationId, script)

    await tracker.advance('completed', { video_url: buildVideoUrl(generationId) })
    console.log('[Pipeline] Completed', {
      generationId,
      segments: script.segments.length,
      videoSeconds: Number(video.durationSeconds.toFixed(2)),
      elapsedMs: Date.now() - startedAt,
    })
  } catch (err) {
    console.error(`[Pipeline] ${generationId} failed during ${tracker.status}:`, errorMessage(err))
    await tracker.fail(err)
  }

  return { generationId, status: tracker.status, elapsedMs: Date.now() - startedAt }
}
