/**
 * Deterministic asset locations. Every asset is keyed by
 * (generationId, segmentId), so a rerun overwrites rather than accumulates.
 */

import { access, mkdir } from 'node:fs/promises'
import path from 'node:path'
import type { AssetDirectories } from '@/lib/config'

export const buildAssetFileName = (generationId: string, segmentId: number, extension: string): string =>
  `${generationId}_segment_${segmentId}.${extension}`

export const buildImagePath = (dirs: AssetDirectories, generationId: string, segmentId: number): string =>
  path.join(dirs.imagesDir, buildAssetFileName(generationId, segmentId, 'jpg'))

export const buildAudioPath = (dirs: AssetDirectories, generationId: string, segmentId: number): string =>
  path.join(dirs.audioDir, buildAssetFileName(generationId, segmentId, 'mp3'))

export const buildVideoPath = (dirs: AssetDirectories, generationId: string): string =>
  path.join(dirs.videosDir, `${generationId}.mp4`)

/** Public URL the video route serves the assembled file under */
export const buildVideoUrl = (generationId: string): string => `/api/videos/${generationId}.mp4`

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

export async function ensureAssetDirectories(dirs: AssetDirectories): Promise<void> {
  await Promise.all([
    mkdir(dirs.imagesDir, { recursive: true }),
    mkdir(dirs.audioDir, { recursive: true }),
    mkdir(dirs.videosDir, { recursive: true }),
  ])
}
