/**
 * Claude models the script writer can be pointed at via SCRIPT_MODEL
 */

export interface ScriptModel {
  name: string
  maxTokens: number
  /** USD per 1k tokens */
  pricing?: { input: number; output: number }
}

export type TokenUsage = { input_tokens: number; output_tokens: number }

export const CLAUDE_FAST_MODEL: ScriptModel = {
  name: 'claude-haiku-4-5-20251001',
  maxTokens: 4096,
  pricing: { input: 0.001, output: 0.005 },
}

export const CLAUDE_SMART_MODEL: ScriptModel = {
  name: 'claude-sonnet-4-5-20250929',
  maxTokens: 8192,
  pricing: { input: 0.003, output: 0.015 },
}

const SCRIPT_MODELS: readonly ScriptModel[] = [CLAUDE_FAST_MODEL, CLAUDE_SMART_MODEL]

export const findScriptModel = (name: string): ScriptModel | undefined =>
  SCRIPT_MODELS.find((model) => model.name === name)

/** Zero for models without known pricing */
export const estimateCost = (model: ScriptModel, usage: TokenUsage): number =>
  model.pricing
    ? (usage.input_tokens * model.pricing.input + usage.output_tokens * model.pricing.output) / 1000
    : 0
