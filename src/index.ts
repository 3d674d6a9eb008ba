/**
 * Othello engine public API
 */

export * from './game/bitboard'
export * from './game/errors'
export * from './game/movegen'
export * from './game/othello'
export * from './ai/heuristics'
export * from './ai/search'
export * from './ai/ai-engine'
export * from './ai/engines'
export * from './ai/match'
export * from './lib/config'
export * from './lib/errorUtils'
export * from './lib/logger'
