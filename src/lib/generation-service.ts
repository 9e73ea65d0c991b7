import { randomUUID } from 'node:crypto'
import { createReadStream } from 'node:fs'
import { stat } from 'node:fs/promises'
import type { Readable } from 'node:stream'
import { buildVideoPath, ensureAssetDirectories, fileExists } from '@/lib/asset-paths'
import type { GenerationQueue } from '@/lib/concurrency'
import type { AssetDirectories } from '@/lib/config'
import type { GenerationStore } from '@/lib/generation-store'
import { processVideoGeneration, type PipelineDeps } from '@/lib/generation-worker'
import type { GenerationRecord, GenerationRequest, VideoFile } from '@/lib/types'

export const DEFAULT_LIST_LIMIT = 100

const SAFE_ID = /^[A-Za-z0-9_-]+$/

/** Pull-based web stream over a file stream; cancelling the response closes the file */
const toWebStream = (source: Readable): ReadableStream<Uint8Array> => {
  const chunks = source[Symbol.asyncIterator]()
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const next: IteratorResult<unknown> = await chunks.next()
      if (next.done) {
        controller.close()
      } else if (next.value instanceof Uint8Array) {
        controller.enqueue(next.value)
      }
    },
    cancel() {
      source.destroy()
    },
  })
}

export type VideoGenerationServiceDeps = {
  store: GenerationStore
  queue: GenerationQueue
  pipeline: PipelineDeps
  dirs: AssetDirectories
  newId?: () => string
  now?: () => Date
}

/**
 * Operations the HTTP layer calls. Starting a generation only creates the
 * record and schedules the pipeline; it never waits for the pipeline.
 */
export class VideoGenerationService {
  private readonly newId: () => string
  private readonly now: () => Date

  constructor(private readonly deps: VideoGenerationServiceDeps) {
    this.newId = deps.newId ?? randomUUID
    this.now = deps.now ?? (() => new Date())
  }

  async startGeneration(request: GenerationRequest): Promise<GenerationRecord> {
    await ensureAssetDirectories(this.deps.dirs)

    const record: GenerationRecord = {
      id: this.newId(),
      prompt: request.prompt,
      duration: request.duration,
      segments: request.segments,
      status: 'processing',
      video_url: null,
      script: null,
      error: null,
      created_at: this.now().toISOString(),
    }
    await this.deps.store.insert(record)

    this.deps.queue.enqueue(record.id, async () => {
      await processVideoGeneration(this.deps.pipeline, record.id, request)
    })
    return record
  }

  getStatus(id: string): Promise<GenerationRecord | null> {
    return this.deps.store.findById(id)
  }

  listGenerations(limit = DEFAULT_LIST_LIMIT): Promise<GenerationRecord[]> {
    return this.deps.store.list(limit)
  }

  /** The assembled file, only once its generation has completed */
  async getVideoFile(id: string): Promise<VideoFile | null> {
    if (!SAFE_ID.test(id)) return null

    const record = await this.deps.store.findById(id)
    if (!record || record.status !== 'completed') return null

    const videoPath = buildVideoPath(this.deps.dirs, id)
    if (!(await fileExists(videoPath))) return null

    const { size } = await stat(videoPath)
    return {
      stream: toWebStream(createReadStream(videoPath)),
      size,
      fileName: `video_${id}.mp4`,
      contentType: 'video/mp4',
    }
  }
}
