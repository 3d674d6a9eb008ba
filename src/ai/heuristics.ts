/**
 * Static evaluation heuristics
 *
 * Each heuristic scores a position for one color as a signed percentage:
 * +100 is a complete advantage, -100 a complete disadvantage. The all-in-one
 * heuristic is a weighted sum and is not clamped.
 *
 * Asking for the 'empty' color returns the 'empty' sentinel instead of a
 * number (corners captured excepted, which always scores).
 */

import {
  type Color,
  type GameState,
  type Player,
  opposite,
} from '../game/othello'
import { createLogger } from '../lib/logger'

const logger = createLogger('Heuristics')

export type HeuristicValue = number | 'empty'

/**
 * Heuristic as consumed by the search, which only ever maximizes for a
 * real side.
 */
export type Heuristic = (state: GameState, color: Player) => number

export type HeuristicName = 'corners_captured' | 'coin_parity' | 'mobility' | 'all_in_one'

// Weights of the all-in-one combination
export const ALL_IN_ONE_WEIGHTS = {
  corners: 10,
  mobility: 4,
  coins: 1,
} as const

/**
 * `100 * (own - other) / (own + other)`, truncated toward zero. Swapping the
 * two counts negates the result. Zero when both are zero.
 */
export function roundPercentage(own: number, other: number): number {
  const total = own + other
  if (total === 0) return 0
  const percentage = Math.trunc((100 * (own - other)) / total)
  // no -0 for small negative ratios
  return percentage === 0 ? 0 : percentage
}

// ============================================================================
// HEURISTICS
// ============================================================================

/**
 * Share of the four corners held by `color` against its opponent.
 */
export function cornersCapturedHeuristic(state: GameState, color: Color): number {
  if (color === 'empty') return 0

  const last = state.size - 1
  const corners = [
    [0, 0],
    [last, 0],
    [0, last],
    [last, last],
  ] as const

  let own = 0
  let other = 0
  for (const [x, y] of corners) {
    const owner = state.cellAt(x, y)
    if (owner === color) own++
    else if (owner !== 'empty') other++
  }

  return roundPercentage(own, other)
}

/**
 * Disc count advantage.
 */
export function coinParityHeuristic(state: GameState, color: Player): number
export function coinParityHeuristic(state: GameState, color: Color): HeuristicValue
export function coinParityHeuristic(state: GameState, color: Color): HeuristicValue {
  if (color === 'empty') return 'empty'
  return roundPercentage(state.countDiscs(color), state.countDiscs(opposite(color)))
}

/**
 * Legal move count advantage.
 */
export function mobilityHeuristic(state: GameState, color: Player): number
export function mobilityHeuristic(state: GameState, color: Color): HeuristicValue
export function mobilityHeuristic(state: GameState, color: Color): HeuristicValue {
  if (color === 'empty') return 'empty'
  const own = state.getPossibleMoves(color).popcount()
  const other = state.getPossibleMoves(opposite(color)).popcount()
  return roundPercentage(own, other)
}

/**
 * `10 * corners + 4 * mobility + 1 * coin parity`.
 */
export function allInOneHeuristic(state: GameState, color: Player): number
export function allInOneHeuristic(state: GameState, color: Color): HeuristicValue
export function allInOneHeuristic(state: GameState, color: Color): HeuristicValue {
  if (color === 'empty') return 'empty'
  return (
    ALL_IN_ONE_WEIGHTS.corners * cornersCapturedHeuristic(state, color) +
    ALL_IN_ONE_WEIGHTS.mobility * mobilityHeuristic(state, color) +
    ALL_IN_ONE_WEIGHTS.coins * coinParityHeuristic(state, color)
  )
}

// ============================================================================
// LOOKUP
// ============================================================================

export const HEURISTICS: Readonly<Record<HeuristicName, Heuristic>> = {
  corners_captured: cornersCapturedHeuristic,
  coin_parity: coinParityHeuristic,
  mobility: mobilityHeuristic,
  all_in_one: allInOneHeuristic,
}

export function isHeuristicName(name: string): name is HeuristicName {
  return Object.prototype.hasOwnProperty.call(HEURISTICS, name)
}

/**
 * Looks a heuristic up by name. Unknown names get the all-in-one heuristic.
 */
export function resolveHeuristic(name: string): Heuristic {
  if (isHeuristicName(name)) {
    return HEURISTICS[name]
  }
  logger.debug(`Unknown heuristic "${name}", using all_in_one`)
  return HEURISTICS.all_in_one
}
