/**
 * Raster helpers for segment images
 */

import sharp from 'sharp'

/** Solid background of the placeholder frame, also used to recognise it */
export const PLACEHOLDER_BACKGROUND = { r: 73, g: 109, b: 137 } as const

const PLACEHOLDER_PROMPT_CHARS = 100
const MARKER_SAMPLE_SIZE = 8
const MARKER_TOLERANCE = 6

export type FrameSize = { width: number; height: number }

const escapeXml = (text: string): string =>
  text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')

/**
 * Fit any provider raster onto the fixed video frame and write it as JPEG
 */
export const writeVideoFrame = async (buffer: Buffer, outputPath: string, size: FrameSize): Promise<void> => {
  await sharp(buffer)
    .rotate()
    .resize({ width: size.width, height: size.height, fit: 'cover' })
    .jpeg({ quality: 90 })
    .toFile(outputPath)
}

/**
 * Build the SVG text layer drawn over the placeholder background
 */
export const buildPlaceholderOverlay = (prompt: string, segmentId: number, size: FrameSize): string => {
  const excerpt = `${prompt.trim().slice(0, PLACEHOLDER_PROMPT_CHARS)}...`
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${size.width}" height="${size.height}">
  <text x="50" y="${Math.round(size.height / 2)}" fill="#ffffff" font-family="sans-serif" font-size="48">
    <tspan x="50" dy="0">Segment ${segmentId}</tspan>
    <tspan x="50" dy="64" font-size="32">${escapeXml(excerpt)}</tspan>
  </text>
</svg>`
}

/**
 * Render the local stand-in used when the image provider fails
 */
export const renderPlaceholderImage = async (
  prompt: string,
  segmentId: number,
  outputPath: string,
  size: FrameSize
): Promise<void> => {
  const overlay = Buffer.from(buildPlaceholderOverlay(prompt, segmentId, size))
  await sharp({
    create: {
      width: size.width,
      height: size.height,
      channels: 3,
      background: PLACEHOLDER_BACKGROUND,
    },
  })
    .composite([{ input: overlay, top: 0, left: 0 }])
    .jpeg({ quality: 92 })
    .toFile(outputPath)
}

/**
 * True when the top-left corner carries the placeholder background colour.
 * Text starts well inside the frame, so the corner is always background.
 */
export const isPlaceholderImage = async (filePath: string): Promise<boolean> => {
  const { data, info } = await sharp(filePath)
    .removeAlpha()
    .extract({ left: 0, top: 0, width: MARKER_SAMPLE_SIZE, height: MARKER_SAMPLE_SIZE })
    .raw()
    .toBuffer({ resolveWithObject: true })

  const pixels = info.width * info.height
  const sums = [0, 0, 0]
  for (let i = 0; i < pixels; i++) {
    for (let channel = 0; channel < 3; channel++) {
      sums[channel] += data[i * info.channels + channel]
    }
  }
  const [r, g, b] = sums.map((sum) => sum / pixels)

  return (
    Math.abs(r - PLACEHOLDER_BACKGROUND.r) <= MARKER_TOLERANCE &&
    Math.abs(g - PLACEHOLDER_BACKGROUND.g) <= MARKER_TOLERANCE &&
    Math.abs(b - PLACEHOLDER_BACKGROUND.b) <= MARKER_TOLERANCE
  )
}
