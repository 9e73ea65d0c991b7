import { beforeEach, describe, expect, it, vi } from 'vitest'
import { AssetOrchestrator } from '@/lib/asset-orchestrator'
import type { AudioSynthesizer } from '@/lib/audio-synthesizer'
import { AssetGenerationError } from '@/lib/errors'
import { GenerationStatusTracker } from '@/lib/generation-status'
import type { ImageSynthesizer } from '@/lib/image-synthesizer'
import type { GenerationStatus, VideoScript } from '@/lib/types'
import { makeRecord, RecordingStore } from '@/test/fakes'

const script: VideoScript = {
  total_duration: 30,
  segments: [1, 2, 3].map((id) => ({
    segment_id: id,
    content: `Narration ${id}`,
    duration: 10,
    image_prompt: `Picture ${id}`,
  })),
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
})

const setup = async () => {
  const store = new RecordingStore()
  await store.insert(makeRecord({ status: 'generating_script' }))
  const tracker = new GenerationStatusTracker(store, 'gen-1', 'generating_script')
  return { store, tracker }
}

describe('AssetOrchestrator', () => {
  it('stores the script before synthesis and runs every operation concurrently', async () => {
    const { store, tracker } = await setup()
    const started: string[] = []
    const statusAtStart: (GenerationStatus | undefined)[] = []
    let release = () => {}
    const gate = new Promise<void>((resolve) => {
      release = () => resolve()
    })
    const track = async (key: string, result: string) => {
      statusAtStart.push((await store.findById('gen-1'))?.status)
      started.push(key)
      await gate
      return result
    }
    const images: ImageSynthesizer = {
      synthesizeImage: (prompt, id, gen) => track(`image ${id}`, `${gen}/${prompt}.jpg`),
    }
    const audio: AudioSynthesizer = {
      synthesizeAudio: (text, id, gen) => track(`audio ${id}`, `${gen}/${text}.mp3`),
    }

    const pending = new AssetOrchestrator(images, audio).generateAssets(tracker, script)
    await vi.waitFor(() => expect(started).toHaveLength(6))
    release()

    await expect(pending).resolves.toEqual([
      { segmentId: 1, imagePath: 'gen-1/Picture 1.jpg', audioPath: 'gen-1/Narration 1.mp3' },
      { segmentId: 2, imagePath: 'gen-1/Picture 2.jpg', audioPath: 'gen-1/Narration 2.mp3' },
      { segmentId: 3, imagePath: 'gen-1/Picture 3.jpg', audioPath: 'gen-1/Narration 3.mp3' },
    ])
    expect(statusAtStart.every((status) => status === 'generating_assets')).toBe(true)
    expect((await store.findById('gen-1'))?.script).toEqual(script)
  })

  it('waits for every operation before rethrowing a fallback failure', async () => {
    const { tracker } = await setup()
    const finished: string[] = []
    const images: ImageSynthesizer = {
      synthesizeImage: async (_prompt, id) => {
        await new Promise((resolve) => setTimeout(resolve, 10))
        finished.push(`image ${id}`)
        return `image-${id}.jpg`
      },
    }
    const audio: AudioSynthesizer = {
      synthesizeAudio: async (_text, id) => {
        if (id === 2) throw new AssetGenerationError('Audio generation completely failed for segment 2 of gen-1: no disk')
        finished.push(`audio ${id}`)
        return `audio-${id}.mp3`
      },
    }

    await expect(new AssetOrchestrator(images, audio).generateAssets(tracker, script)).rejects.toBeInstanceOf(
      AssetGenerationError
    )
    expect(finished.sort()).toEqual(['audio 1', 'audio 3', 'image 1', 'image 2', 'image 3'])
  })
})
