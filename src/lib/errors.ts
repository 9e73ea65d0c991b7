/**
 * Error taxonomy for the generation pipeline.
 *
 * Script and assembly errors are fatal for a generation. Provider errors on
 * image/audio are absorbed by fallback synthesis; only an
 * AssetGenerationError (the fallback itself failed) escapes those stages.
 */

export class VideoPipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Request rejected before the pipeline starts */
export class ValidationError extends VideoPipelineError {}

/** An upstream generation call did not succeed */
export class ProviderError extends VideoPipelineError {
  readonly status: number | null

  constructor(
    readonly provider: string,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, options)
    this.status = options?.status ?? null
  }
}

export class MalformedScriptError extends VideoPipelineError {}

export class AssetGenerationError extends VideoPipelineError {}

export class MissingAssetError extends VideoPipelineError {
  constructor(readonly segmentId: number, readonly missing: ('image' | 'audio')[]) {
    super(`Missing ${missing.join(' and ')} asset for segment ${segmentId}`)
  }
}

export class AssemblyError extends VideoPipelineError {}

export const errorMessage = (err: unknown): string => {
  if (err instanceof Error && err.message) return err.message
  if (typeof err === 'string' && err.trim()) return err
  return 'Unknown error'
}
