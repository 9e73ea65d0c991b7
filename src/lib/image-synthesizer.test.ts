import { readdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import sharp from 'sharp'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createProviderGuard } from '@/lib/concurrency'
import { loadConfig } from '@/lib/config'
import { AssetGenerationError } from '@/lib/errors'
import {
  buildImagePrompt,
  createImageSynthesizer,
  FallbackImageSynthesizer,
  GeminiImageProvider,
  PlaceholderImageProvider,
  type ImageInput,
} from '@/lib/image-synthesizer'
import { isPlaceholderImage } from '@/lib/image-utils'
import { createTempWorkspace, failingProvider, type TempWorkspace } from '@/test/fakes'

const FRAME = { width: 160, height: 90 }

const solidJpeg = (output: string) =>
  sharp({ create: { width: 32, height: 18, channels: 3, background: { r: 200, g: 30, b: 30 } } })
    .jpeg()
    .toFile(output)

let workspace: TempWorkspace

beforeEach(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
  workspace = await createTempWorkspace()
})

afterEach(async () => {
  vi.restoreAllMocks()
  vi.unstubAllGlobals()
  await workspace.cleanup()
})

describe('buildImagePrompt', () => {
  it('wraps the prompt in the shared style directive', () => {
    expect(buildImagePrompt(' Moon over ocean ')).toBe(
      'High quality, photorealistic: Moon over ocean. Professional lighting, detailed, 16:9 aspect ratio suitable for video.'
    )
  })

  it('caps the prompt at 1000 characters', () => {
    const prompt = buildImagePrompt('a'.repeat(1500))
    expect(prompt).toContain('a'.repeat(1000))
    expect(prompt).not.toContain('a'.repeat(1001))
  })
})

describe('FallbackImageSynthesizer', () => {
  it('keeps the primary image when the provider succeeds', async () => {
    const primary = {
      name: 'stub',
      generate: async (input: ImageInput) => {
        await solidJpeg(input.outputPath)
      },
    }
    const synthesizer = new FallbackImageSynthesizer(workspace.dirs, primary, new PlaceholderImageProvider(FRAME))

    const imagePath = await synthesizer.synthesizeImage('Moon over ocean', 2, 'gen-1')

    expect(imagePath).toBe(path.join(workspace.dirs.imagesDir, 'gen-1_segment_2.jpg'))
    expect(await isPlaceholderImage(imagePath)).toBe(false)
    expect(await readdir(workspace.dirs.imagesDir)).toEqual(['gen-1_segment_2.jpg'])
  })

  it('replaces a failed provider call with the placeholder at the same path', async () => {
    const target = path.join(workspace.dirs.imagesDir, 'gen-1_segment_1.jpg')
    await writeFile(target, 'stale bytes')
    const synthesizer = new FallbackImageSynthesizer(
      workspace.dirs,
      failingProvider<ImageInput>('gemini'),
      new PlaceholderImageProvider(FRAME)
    )

    const imagePath = await synthesizer.synthesizeImage('Moon & <ocean>', 1, 'gen-1')

    expect(imagePath).toBe(target)
    expect(await isPlaceholderImage(imagePath)).toBe(true)
    const meta = await sharp(imagePath).metadata()
    expect({ width: meta.width, height: meta.height, format: meta.format }).toEqual({
      width: 160,
      height: 90,
      format: 'jpeg',
    })
  })

  it('falls back to the placeholder when the provider hangs past its timeout', async () => {
    const hanging = { name: 'hanging', generate: () => new Promise<void>(() => {}) }
    const guard = createProviderGuard({ concurrency: 1, timeoutMs: 10 })
    const synthesizer = new FallbackImageSynthesizer(workspace.dirs, hanging, new PlaceholderImageProvider(FRAME), guard)

    const imagePath = await synthesizer.synthesizeImage('Moon over ocean', 1, 'gen-1')

    expect(await isPlaceholderImage(imagePath)).toBe(true)
  })

  it('keeps the placeholder when a timed-out provider finishes writing later', async () => {
    const lateWriter = {
      name: 'slow',
      generate: async (input: ImageInput) => {
        await new Promise((resolve) => setTimeout(resolve, 80))
        await writeFile(input.outputPath, 'late primary bytes')
      },
    }
    const guard = createProviderGuard({ concurrency: 1, timeoutMs: 20 })
    const synthesizer = new FallbackImageSynthesizer(
      workspace.dirs,
      lateWriter,
      new PlaceholderImageProvider(FRAME),
      guard
    )

    const imagePath = await synthesizer.synthesizeImage('Moon over ocean', 1, 'gen-1')
    await new Promise((resolve) => setTimeout(resolve, 150))

    expect(await isPlaceholderImage(imagePath)).toBe(true)
    expect(await readdir(workspace.dirs.imagesDir)).toEqual(['gen-1_segment_1.jpg'])
  })

  it('raises AssetGenerationError when the placeholder fails too', async () => {
    const synthesizer = new FallbackImageSynthesizer(
      workspace.dirs,
      failingProvider<ImageInput>('gemini'),
      failingProvider<ImageInput>('placeholder', 'disk full')
    )

    const err = await synthesizer.synthesizeImage('x', 1, 'gen-1').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(AssetGenerationError)
    expect(err).toMatchObject({
      message: 'Image generation completely failed for segment 1 of gen-1: disk full',
    })
  })
})

describe('GeminiImageProvider', () => {
  it('fits the returned image to the video frame', async () => {
    const png = await sharp({ create: { width: 40, height: 40, channels: 3, background: { r: 0, g: 0, b: 255 } } })
      .png()
      .toBuffer()
    const fetchMock = vi.fn(async () => ({
      ok: true,
      status: 200,
      statusText: 'OK',
      json: async () => ({
        candidates: [{ content: { parts: [{ inlineData: { mimeType: 'image/png', data: png.toString('base64') } }] } }],
      }),
    }))
    vi.stubGlobal('fetch', fetchMock)

    const provider = new GeminiImageProvider({
      geminiApiKey: 'test-secret',
      geminiImageModel: 'test-image-model',
      imageMaxRetries: 0,
      video: { fps: 24, width: 64, height: 36, videoCodec: 'libx264', audioCodec: 'aac' },
    })
    const outputPath = path.join(workspace.dirs.imagesDir, 'frame.jpg')
    await provider.generate({ prompt: 'Blue square', segmentId: 1, outputPath })

    const meta = await sharp(outputPath).metadata()
    expect({ width: meta.width, height: meta.height, format: meta.format }).toEqual({
      width: 64,
      height: 36,
      format: 'jpeg',
    })
    expect(fetchMock).toHaveBeenCalledTimes(1)
  })
})

describe('createImageSynthesizer', () => {
  it('falls back to the placeholder when no Gemini key is configured', async () => {
    const config = loadConfig({ GENERATED_ROOT: workspace.root })
    const fetchMock = vi.fn()
    vi.stubGlobal('fetch', fetchMock)

    const imagePath = await createImageSynthesizer(config).synthesizeImage('Tide pools', 3, 'gen-2')

    expect(imagePath).toBe(path.join(workspace.root, 'generated_images', 'gen-2_segment_3.jpg'))
    expect(await isPlaceholderImage(imagePath)).toBe(true)
    expect(fetchMock).not.toHaveBeenCalled()
  })
})
