import { errorMessage } from '@/lib/errors'
import type { GenerationStore } from '@/lib/generation-store'
import type { GenerationPatch, GenerationStatus } from '@/lib/types'

/** Forward-only order of the happy path */
export const STATUS_ORDER: readonly GenerationStatus[] = [
  'processing',
  'generating_script',
  'generating_assets',
  'creating_video',
  'completed',
]

export const GENERATION_STATUSES: readonly GenerationStatus[] = [...STATUS_ORDER, 'failed']

export const isGenerationStatus = (value: unknown): value is GenerationStatus =>
  typeof value === 'string' && (GENERATION_STATUSES as readonly string[]).includes(value)

export const isTerminalStatus = (status: GenerationStatus): boolean =>
  status === 'completed' || status === 'failed'

/**
 * A record moves one stage forward at a time, or to `failed` from any
 * non-terminal stage. Terminal records never move again.
 */
export function canTransition(from: GenerationStatus, to: GenerationStatus): boolean {
  if (isTerminalStatus(from)) return false
  if (to === 'failed') return true
  return STATUS_ORDER.indexOf(to) === STATUS_ORDER.indexOf(from) + 1
}

/**
 * Sole writer of a generation's status while its pipeline runs. Each
 * transition is one independent update on the store.
 */
export class GenerationStatusTracker {
  private current: GenerationStatus

  constructor(
    private readonly store: GenerationStore,
    readonly generationId: string,
    initial: GenerationStatus = 'processing'
  ) {
    this.current = initial
  }

  get status(): GenerationStatus {
    return this.current
  }

  async advance(next: GenerationStatus, patch: Omit<GenerationPatch, 'status'> = {}): Promise<void> {
    if (!canTransition(this.current, next)) {
      throw new Error(`Illegal status transition ${this.current} -> ${next} for ${this.generationId}`)
    }
    await this.store.update(this.generationId, { ...patch, status: next })
    console.log(`[Pipeline] ${this.generationId}: ${this.current} -> ${next}`)
    this.current = next
  }

  /** Marks the record failed unless it already reached a terminal state */
  async fail(err: unknown): Promise<void> {
    if (isTerminalStatus(this.current)) return
    await this.store.update(this.generationId, { status: 'failed', error: errorMessage(err) })
    console.log(`[Pipeline] ${this.generationId}: ${this.current} -> failed`)
    this.current = 'failed'
  }
}
