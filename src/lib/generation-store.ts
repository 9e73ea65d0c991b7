import type { SupabaseClient } from '@supabase/supabase-js'
import type { PipelineConfig } from '@/lib/config'
import { T } from '@/lib/db-tables'
import { isGenerationStatus } from '@/lib/generation-status'
import { createServiceClient } from '@/lib/supabase/server'
import type { GenerationPatch, GenerationRecord, ScriptSegment, VideoScript } from '@/lib/types'

/**
 * Durable home of generation records. Updates are partial and apply to a
 * single row; nothing here spans more than one record.
 */
export interface GenerationStore {
  insert(record: GenerationRecord): Promise<void>
  update(id: string, patch: GenerationPatch): Promise<void>
  findById(id: string): Promise<GenerationRecord | null>
  /** Newest first */
  list(limit: number): Promise<GenerationRecord[]>
}

type UnknownRecord = Record<string, unknown>

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const asNullableString = (value: unknown): string | null => (typeof value === 'string' ? value : null)

const toSegment = (value: unknown): ScriptSegment | null => {
  if (!isRecord(value)) return null
  const { segment_id, content, duration, image_prompt } = value
  if (
    typeof segment_id !== 'number' ||
    typeof content !== 'string' ||
    typeof duration !== 'number' ||
    typeof image_prompt !== 'string'
  ) {
    return null
  }
  return { segment_id, content, duration, image_prompt }
}

const toScript = (value: unknown): VideoScript | null => {
  if (!isRecord(value) || !Array.isArray(value.segments) || typeof value.total_duration !== 'number') return null
  const segments: ScriptSegment[] = []
  for (const item of value.segments) {
    const segment = toSegment(item)
    if (!segment) return null
    segments.push(segment)
  }
  return { segments, total_duration: value.total_duration }
}

/**
 * Narrow a row read from the database into a GenerationRecord
 */
export function toGenerationRecord(row: unknown): GenerationRecord | null {
  if (!isRecord(row)) return null
  const { id, prompt, duration, segments, status, created_at } = row
  if (
    typeof id !== 'string' ||
    typeof prompt !== 'string' ||
    typeof duration !== 'number' ||
    typeof segments !== 'number' ||
    !isGenerationStatus(status) ||
    typeof created_at !== 'string'
  ) {
    return null
  }
  return {
    id,
    prompt,
    duration,
    segments,
    status,
    video_url: asNullableString(row.video_url),
    script: toScript(row.script),
    error: asNullableString(row.error),
    created_at,
  }
}

export class SupabaseGenerationStore implements GenerationStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async insert(record: GenerationRecord): Promise<void> {
    const { error } = await this.supabase.from(T.video_generations).insert(record)
    if (error) throw new Error(`Failed to create generation record: ${error.message}`)
  }

  async update(id: string, patch: GenerationPatch): Promise<void> {
    const { error } = await this.supabase.from(T.video_generations).update(patch).eq('id', id)
    if (error) throw new Error(`Failed to update generation ${id}: ${error.message}`)
  }

  async findById(id: string): Promise<GenerationRecord | null> {
    const { data, error } = await this.supabase
      .from(T.video_generations)
      .select('*')
      .eq('id', id)
      .maybeSingle()
    if (error) throw new Error(`Failed to fetch generation ${id}: ${error.message}`)
    return data ? toGenerationRecord(data) : null
  }

  async list(limit: number): Promise<GenerationRecord[]> {
    const { data, error } = await this.supabase
      .from(T.video_generations)
      .select('*')
      .order('created_at', { ascending: false })
      .limit(Math.max(1, limit))
    if (error) throw new Error(`Failed to list generations: ${error.message}`)
    const rows: unknown[] = data ?? []
    return rows
      .map((row) => toGenerationRecord(row))
      .filter((record): record is GenerationRecord => record !== null)
  }
}

/**
 * Process-local store for running without a database. Records live only as
 * long as the server process.
 */
export class MemoryGenerationStore implements GenerationStore {
  private readonly records = new Map<string, GenerationRecord>()

  async insert(record: GenerationRecord): Promise<void> {
    if (this.records.has(record.id)) throw new Error(`Generation ${record.id} already exists`)
    this.records.set(record.id, structuredClone(record))
  }

  async update(id: string, patch: GenerationPatch): Promise<void> {
    const existing = this.records.get(id)
    if (!existing) throw new Error(`Failed to update generation ${id}: not found`)
    this.records.set(id, { ...existing, ...structuredClone(patch) })
  }

  async findById(id: string): Promise<GenerationRecord | null> {
    const record = this.records.get(id)
    return record ? structuredClone(record) : null
  }

  async list(limit: number): Promise<GenerationRecord[]> {
    return [...this.records.values()]
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .slice(0, Math.max(1, limit))
      .map((record) => structuredClone(record))
  }
}

export function createGenerationStore(config: PipelineConfig): GenerationStore {
  if (config.supabaseUrl && config.supabaseServiceKey) {
    return new SupabaseGenerationStore(createServiceClient(config))
  }
  console.warn('[Store] Supabase is not configured, keeping generation records in memory')
  return new MemoryGenerationStore()
}
