import { errorMessage } from '@/lib/errors'

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>

const normalizeConcurrency = (value: number) =>
  Number.isFinite(value) && value > 0 ? Math.floor(value) : 1

/**
 * Caps how many tasks run at once. A released slot is handed straight to the
 * next waiter so the cap holds even when new callers arrive in between.
 */
export function createLimiter(concurrency: number): Limiter {
  const limit = normalizeConcurrency(concurrency)
  let active = 0
  const waiting: (() => void)[] = []

  const acquire = (): Promise<void> => {
    if (active < limit) {
      active += 1
      return Promise.resolve()
    }
    return new Promise((resolve) => waiting.push(resolve))
  }

  const release = () => {
    const next = waiting.shift()
    if (next) next()
    else active -= 1
  }

  return async <T>(task: () => Promise<T>): Promise<T> => {
    await acquire()
    try {
      return await task()
    } finally {
      release()
    }
  }
}

/**
 * Runs `run` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects on timeout even if `run` ignores the signal.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  label: string,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController()
  const timeout = setTimeout(
    () => controller.abort(new Error(`${label} timed out after ${timeoutMs}ms`)),
    timeoutMs
  )
  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true })
  })
  try {
    return await Promise.race([run(controller.signal), aborted])
  } finally {
    clearTimeout(timeout)
  }
}

/** Shared gate for outbound provider calls: bounded concurrency plus a per-call timeout */
export type ProviderGuard = <T>(label: string, run: (signal: AbortSignal) => Promise<T>) => Promise<T>

export function createProviderGuard(options: { concurrency: number; timeoutMs: number }): ProviderGuard {
  const limit = createLimiter(options.concurrency)
  return <T>(label: string, run: (signal: AbortSignal) => Promise<T>) =>
    limit(() => withTimeout(options.timeoutMs, label, run))
}

type QueuedJob = {
  id: string
  run: () => Promise<void>
}

/**
 * In-process FIFO of detached generation pipelines. Callers enqueue and
 * return immediately; at most `concurrency` pipelines run at a time and a
 * failing pipeline is logged here rather than surfacing as an unhandled
 * rejection.
 */
export class GenerationQueue {
  private readonly pending: QueuedJob[] = []
  private readonly idleWaiters: (() => void)[] = []
  private readonly concurrency: number
  private active = 0

  constructor(concurrency: number) {
    this.concurrency = normalizeConcurrency(concurrency)
  }

  get size() {
    return this.pending.length
  }

  get running() {
    return this.active
  }

  enqueue(id: string, run: () => Promise<void>): void {
    this.pending.push({ id, run })
    console.log('[Queue] Enqueued', { id, pending: this.pending.length, running: this.active })
    this.drain()
  }

  /** Resolves once nothing is queued or running */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.pending.length === 0) return Promise.resolve()
    return new Promise((resolve) => this.idleWaiters.push(resolve))
  }

  private drain() {
    while (this.active < this.concurrency && this.pending.length > 0) {
      const job = this.pending.shift()
      if (!job) break
      this.active += 1
      void this.runJob(job)
    }
    if (this.active === 0 && this.pending.length === 0) {
      const waiters = this.idleWaiters.splice(0)
      for (const resolve of waiters) resolve()
    }
  }

  private async runJob(job: QueuedJob) {
    try {
      await job.run()
    } catch (err) {
      console.error(`[Queue] Job ${job.id} crashed:`, errorMessage(err))
    } finally {
      this.active -= 1
      this.drain()
    }
  }
}
