/** Centralized table name constants — all tables use the vidgen_ prefix */
export const T = {
  video_generations: 'vidgen_video_generations',
} as const
