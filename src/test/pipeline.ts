import { AssetOrchestrator } from '@/lib/asset-orchestrator'
import { buildAudioPath } from '@/lib/asset-paths'
import { FallbackAudioSynthesizer, SilentAudioProvider, type AudioInput } from '@/lib/audio-synthesizer'
import type { AssetProvider } from '@/lib/fallback'
import type { PipelineDeps } from '@/lib/generation-worker'
import { FallbackImageSynthesizer, PlaceholderImageProvider, type ImageInput } from '@/lib/image-synthesizer'
import { ScriptGenerator } from '@/lib/script-generator'
import { VideoAssembler } from '@/lib/video-assembler'
import {
  FakeCompletionClient,
  FakeMediaToolkit,
  RecordingStore,
  scriptReply,
  writingProvider,
  type TempWorkspace,
} from '@/test/fakes'

export const TEST_FRAME = { width: 160, height: 90 }

export type PipelineHarnessOptions = {
  reply?: string | Error
  imagePrimary?: AssetProvider<ImageInput>
  imageFallback?: AssetProvider<ImageInput>
  audioPrimary?: AssetProvider<AudioInput>
  segments?: number
}

export type PipelineHarness = {
  deps: PipelineDeps
  store: RecordingStore
  media: FakeMediaToolkit
  assembler: VideoAssembler
  client: FakeCompletionClient
  /** Sets the probed narration length of one segment's audio */
  setMeasuredDuration: (generationId: string, segmentId: number, seconds: number) => void
}

/**
 * Real pipeline wiring over fake providers and a fake media toolkit
 */
export function createPipelineHarness(workspace: TempWorkspace, options: PipelineHarnessOptions = {}): PipelineHarness {
  const store = new RecordingStore()
  const media = new FakeMediaToolkit()
  const client = new FakeCompletionClient(options.reply ?? scriptReply(options.segments ?? 3))
  const images = new FallbackImageSynthesizer(
    workspace.dirs,
    options.imagePrimary ?? writingProvider<ImageInput>('stub-image'),
    options.imageFallback ?? new PlaceholderImageProvider(TEST_FRAME)
  )
  const audio = new FallbackAudioSynthesizer(
    workspace.dirs,
    options.audioPrimary ?? writingProvider<AudioInput>('stub-speech'),
    new SilentAudioProvider(media)
  )
  const assembler = new VideoAssembler(workspace.dirs, media, workspace.tmpRoot)

  return {
    deps: {
      store,
      scriptWriter: new ScriptGenerator(client),
      orchestrator: new AssetOrchestrator(images, audio),
      assembler,
    },
    store,
    media,
    assembler,
    client,
    setMeasuredDuration: (generationId, segmentId, seconds) => {
      media.durations.set(buildAudioPath(workspace.dirs, generationId, segmentId), seconds)
    },
  }
}
