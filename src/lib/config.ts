/**
 * Game configuration
 *
 * Validates the options that drive a game and its computer opponent.
 * Values may arrive as strings (environment variables, key=value files),
 * so numbers and booleans are coerced.
 */

import { z } from 'zod'
import { BOARD_SIZES, type Player, isBoardSize } from '../game/othello'
import type { EngineConfig } from '../ai/ai-engine'
import { SEARCH_ALGORITHMS } from '../ai/search'
import { setDebugLogging } from './logger'

const booleanish = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
])

export const gameConfigSchema = z.object({
  size: z.coerce
    .number()
    .int()
    .refine(isBoardSize, `Board size must be one of ${BOARD_SIZES.join(', ')}`)
    .default(8),
  debug: booleanish.default(false),
  /** Side(s) played by the computer: X = black, O = white, A = both */
  aiColor: z.enum(['X', 'O', 'A']).default('O'),
  aiMode: z.enum(SEARCH_ALGORITHMS).default('minimax'),
  aiDepth: z.coerce.number().int().min(0, 'AI depth must be at least 0').default(3),
  aiHeuristic: z.string().min(1).default('all_in_one'),
})

export type GameConfigInput = z.input<typeof gameConfigSchema>

export type GameConfig = z.output<typeof gameConfigSchema>

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly details: string
  ) {
    super(`${message}: ${details}`)
    this.name = 'ConfigError'
  }
}

// Helper to format validation errors
export function formatZodError(error: z.ZodError): { error: string; details: string } {
  const [issue] = error.errors
  if (!issue) {
    return { error: 'Invalid configuration', details: 'unknown error' }
  }
  const path = issue.path.join('.')
  return {
    error: 'Invalid configuration',
    details: path ? `${path}: ${issue.message}` : issue.message,
  }
}

/**
 * Validates a configuration object, filling in defaults.
 *
 * @throws ConfigError describing the first invalid option
 */
export function parseGameConfig(input: unknown): GameConfig {
  const result = gameConfigSchema.safeParse(input)
  if (!result.success) {
    const { error, details } = formatZodError(result.error)
    throw new ConfigError(error, details)
  }
  return result.data
}

const ENV_KEYS: Record<keyof GameConfigInput, string> = {
  size: 'OTHELLO_SIZE',
  debug: 'OTHELLO_DEBUG',
  aiColor: 'OTHELLO_AI_COLOR',
  aiMode: 'OTHELLO_AI_MODE',
  aiDepth: 'OTHELLO_AI_DEPTH',
  aiHeuristic: 'OTHELLO_AI_HEURISTIC',
}

/**
 * Reads the configuration from `OTHELLO_*` environment variables.
 * Unset variables take their defaults.
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): GameConfig {
  const input: Record<string, string> = {}
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable]
    if (value !== undefined && value !== '') {
      input[key] = value
    }
  }
  return parseGameConfig(input)
}

/**
 * Applies process-wide settings (currently debug logging).
 */
export function applyConfig(config: GameConfig): void {
  setDebugLogging(config.debug)
}

export function toEngineConfig(config: GameConfig): EngineConfig {
  return { searchDepth: config.aiDepth, heuristic: config.aiHeuristic }
}

export function aiPlaysColor(config: GameConfig, player: Player): boolean {
  if (config.aiColor === 'A') return true
  return config.aiColor === (player === 'black' ? 'X' : 'O')
}

export const DEFAULT_GAME_CONFIG: GameConfig = parseGameConfig({})
