import { randomUUID } from 'node:crypto'
import { rename, rm } from 'node:fs/promises'
import path from 'node:path'
import type { ProviderGuard } from '@/lib/concurrency'
import { AssetGenerationError, errorMessage } from '@/lib/errors'

/**
 * One way of producing an asset. Primary (network) and fallback (local)
 * implementations share this shape so either can be swapped independently.
 */
export interface AssetProvider<TInput> {
  readonly name: string
  generate(input: TInput, signal?: AbortSignal): Promise<void>
}

export type FallbackOutcome = 'primary' | 'fallback'

const unguarded: ProviderGuard = (_label, run) => run(new AbortController().signal)

/** Sibling of the final asset, same extension, unique per attempt */
export const buildStagingPath = (outputPath: string): string => {
  const { dir, name, ext } = path.parse(outputPath)
  return path.join(dir, `${name}.primary-${randomUUID()}${ext}`)
}

/**
 * Two-tier strategy: any primary failure falls through to the fallback; a
 * fallback failure is fatal and surfaces as AssetGenerationError.
 *
 * The primary writes to a staging file that is renamed onto the final path
 * only when it finishes inside the guard. A primary that timed out but keeps
 * running can never touch the asset the fallback produced.
 */
export class FallbackChain<TInput extends { outputPath: string }> {
  constructor(
    private readonly tag: string,
    private readonly primary: AssetProvider<TInput>,
    private readonly fallback: AssetProvider<TInput>,
    private readonly guard: ProviderGuard = unguarded
  ) {}

  async generate(input: TInput, label: string): Promise<FallbackOutcome> {
    const stagingPath = buildStagingPath(input.outputPath)
    let attempt: Promise<void> | undefined

    try {
      await this.guard(`${this.primary.name} ${label}`, (signal) => {
        attempt = this.primary.generate({ ...input, outputPath: stagingPath }, signal)
        return attempt
      })
      await rename(stagingPath, input.outputPath)
      return 'primary'
    } catch (err) {
      console.error(
        `[${this.tag}] ${this.primary.name} failed for ${label}, falling back to ${this.fallback.name}:`,
        errorMessage(err)
      )
      this.discardStaging(attempt, stagingPath)
    }

    try {
      await this.fallback.generate(input)
      console.log(`[${this.tag}] ${this.fallback.name} produced ${label}`)
      return 'fallback'
    } catch (err) {
      console.error(`[${this.tag}] ${this.fallback.name} failed for ${label}:`, errorMessage(err))
      throw new AssetGenerationError(
        `${this.tag} generation completely failed for ${label}: ${errorMessage(err)}`,
        { cause: err }
      )
    }
  }

  /** Removes the staging file once the primary has really stopped */
  private discardStaging(attempt: Promise<void> | undefined, stagingPath: string) {
    void Promise.allSettled([attempt])
      .then(() => rm(stagingPath, { force: true }))
      .catch((err: unknown) => {
        console.warn(`[${this.tag}] Could not remove ${stagingPath}:`, errorMessage(err))
      })
  }
}
