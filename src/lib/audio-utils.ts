/**
 * Helpers for the silent narration stand-in
 */

export const SILENCE_SAMPLE_RATE = 44100
export const MIN_SPOKEN_SECONDS = 3
export const WORDS_PER_SECOND = 2.5

const WAV_HEADER_BYTES = 44
const BYTES_PER_SAMPLE = 2

export const countWords = (text: string): number =>
  text.split(/\s+/).filter((word) => word.length > 0).length

/**
 * Rough spoken length of `text` in seconds, never shorter than three seconds
 */
export const estimateSpokenDuration = (text: string): number =>
  Math.max(MIN_SPOKEN_SECONDS, countWords(text) / WORDS_PER_SECOND)

/**
 * 16-bit mono PCM WAV of pure silence
 */
export const encodeSilentWav = (durationSeconds: number, sampleRate = SILENCE_SAMPLE_RATE): Buffer => {
  const samples = Math.floor(sampleRate * durationSeconds)
  const dataBytes = samples * BYTES_PER_SAMPLE
  const buffer = Buffer.alloc(WAV_HEADER_BYTES + dataBytes)

  buffer.write('RIFF', 0, 'ascii')
  buffer.writeUInt32LE(36 + dataBytes, 4)
  buffer.write('WAVE', 8, 'ascii')
  buffer.write('fmt ', 12, 'ascii')
  buffer.writeUInt32LE(16, 16)
  buffer.writeUInt16LE(1, 20) // PCM
  buffer.writeUInt16LE(1, 22) // mono
  buffer.writeUInt32LE(sampleRate, 24)
  buffer.writeUInt32LE(sampleRate * BYTES_PER_SAMPLE, 28)
  buffer.writeUInt16LE(BYTES_PER_SAMPLE, 32)
  buffer.writeUInt16LE(16, 34)
  buffer.write('data', 36, 'ascii')
  buffer.writeUInt32LE(dataBytes, 40)

  return buffer
}
