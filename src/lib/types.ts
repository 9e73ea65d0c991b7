export type GenerationStatus =
  | 'processing'
  | 'generating_script'
  | 'generating_assets'
  | 'creating_video'
  | 'completed'
  | 'failed'

export interface GenerationRequest {
  prompt: string
  duration: number
  segments: number
}

export interface ScriptSegment {
  segment_id: number
  content: string
  duration: number
  image_prompt: string
}

export interface VideoScript {
  segments: ScriptSegment[]
  total_duration: number
}

export interface GenerationRecord {
  id: string
  prompt: string
  duration: number
  segments: number
  status: GenerationStatus
  video_url: string | null
  script: VideoScript | null
  error: string | null
  created_at: string
}

/** Fields the pipeline is allowed to change after insert */
export type GenerationPatch = Partial<Pick<GenerationRecord, 'status' | 'video_url' | 'script' | 'error'>>

export interface VideoFile {
  stream: ReadableStream<Uint8Array>
  size: number
  fileName: string
  contentType: 'video/mp4'
}
