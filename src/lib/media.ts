/**
 * Thin layer over the ffmpeg/ffprobe binaries. Everything that touches media
 * containers goes through MediaToolkit so tests can swap in a fake.
 */

import { writeFile } from 'node:fs/promises'
import path from 'node:path'
import ffmpeg from 'fluent-ffmpeg'
import type { PipelineConfig, VideoRenderSettings } from '@/lib/config'

type FfmpegCommand = ffmpeg.FfmpegCommand

export interface StillClipOptions {
  imagePath: string
  audioPath: string
  durationSeconds: number
  outputPath: string
}

export interface MediaToolkit {
  probeDuration(filePath: string): Promise<number>
  transcodeAudio(inputPath: string, outputPath: string): Promise<void>
  renderStillClip(options: StillClipOptions): Promise<void>
  concatClips(clipPaths: string[], outputPath: string, workDir: string): Promise<void>
}

/** Line for ffmpeg's concat demuxer list; single quotes need the '\'' dance */
export const buildConcatEntry = (filePath: string): string =>
  `file '${filePath.replace(/\\/g, '/').replace(/'/g, `'\\''`)}'`

const runCommand = (command: FfmpegCommand, outputPath: string): Promise<void> =>
  new Promise((resolve, reject) => {
    command
      .on('end', () => resolve())
      .on('error', (err: Error) => reject(err))
      .save(outputPath)
  })

export class FfmpegToolkit implements MediaToolkit {
  constructor(
    private readonly settings: VideoRenderSettings,
    private readonly binaries: { ffmpegPath?: string; ffprobePath?: string } = {}
  ) {}

  private command(input?: string): FfmpegCommand {
    const command = input ? ffmpeg(input) : ffmpeg()
    if (this.binaries.ffmpegPath) command.setFfmpegPath(this.binaries.ffmpegPath)
    if (this.binaries.ffprobePath) command.setFfprobePath(this.binaries.ffprobePath)
    return command
  }

  probeDuration(filePath: string): Promise<number> {
    return new Promise((resolve, reject) => {
      this.command(filePath).ffprobe((err, data) => {
        if (err) return reject(err)
        const duration = data?.format?.duration
        if (typeof duration === 'number' && duration > 0) return resolve(duration)
        reject(new Error(`Could not read duration of ${path.basename(filePath)}`))
      })
    })
  }

  transcodeAudio(inputPath: string, outputPath: string): Promise<void> {
    const command = this.command(inputPath)
      .audioCodec('libmp3lame')
      .audioBitrate('128k')
      .outputOptions(['-y'])
    return runCommand(command, outputPath)
  }

  renderStillClip(options: StillClipOptions): Promise<void> {
    const { fps, width, height, videoCodec, audioCodec } = this.settings
    const command = this.command()
      .input(options.imagePath)
      .inputOptions(['-loop', '1'])
      .input(options.audioPath)
      .outputOptions([
        '-t', options.durationSeconds.toFixed(3),
        '-vf', `scale=${width}:${height}:force_original_aspect_ratio=decrease,pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2,setsar=1`,
        '-c:v', videoCodec,
        '-tune', 'stillimage',
        '-pix_fmt', 'yuv420p',
        '-r', String(fps),
        '-c:a', audioCodec,
        '-ar', '44100',
        '-ac', '2',
        '-y',
      ])
    return runCommand(command, options.outputPath)
  }

  async concatClips(clipPaths: string[], outputPath: string, workDir: string): Promise<void> {
    const listPath = path.join(workDir, 'clips.txt')
    await writeFile(listPath, `${clipPaths.map(buildConcatEntry).join('\n')}\n`)
    // Clips share codec parameters, so the concat demuxer can copy streams
    const command = this.command(listPath)
      .inputOptions(['-f', 'concat', '-safe', '0'])
      .outputOptions(['-c', 'copy', '-movflags', '+faststart', '-y'])
    await runCommand(command, outputPath)
  }
}

export function createMediaToolkit(config: PipelineConfig): MediaToolkit {
  return new FfmpegToolkit(config.video, {
    ffmpegPath: config.ffmpegPath,
    ffprobePath: config.ffprobePath,
  })
}
