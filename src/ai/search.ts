/**
 * Tree search
 *
 * Minimax and alpha-beta over a single GameState that is mutated with
 * play/pop while walking the tree. Every play inside the recursion goes
 * through `withMove`, so the matching pop happens on every exit path.
 * Root candidates are searched on their own clone of the state.
 */

import { type GameState, type Move, type Player, PASS, isPass } from '../game/othello'
import { type Heuristic, resolveHeuristic } from './heuristics'
import { createLogger } from '../lib/logger'

const logger = createLogger('Search')

/**
 * Window bound for alpha-beta. Larger than any score the built-in
 * heuristics produce (all-in-one peaks at 1500).
 */
export const SCORE_BOUND = 10000

export const SEARCH_ALGORITHMS = ['minimax', 'alphabeta', 'ab'] as const

export type SearchAlgorithm = (typeof SEARCH_ALGORITHMS)[number]

/**
 * Counters filled in while searching.
 */
export interface SearchStats {
  /** Positions visited, leaves included */
  nodes: number
  /** Sibling loops cut short by alpha-beta */
  cutoffs: number
}

export function createSearchStats(): SearchStats {
  return { nodes: 0, cutoffs: 0 }
}

// ============================================================================
// SCOPED MOVE
// ============================================================================

/**
 * Plays `move`, runs `fn`, and pops the move again however `fn` exits.
 */
export function withMove<T>(state: GameState, move: Move, fn: () => T): T {
  state.play(move.x, move.y)
  try {
    return fn()
  } finally {
    state.pop()
  }
}

function legalMoves(state: GameState): Move[] {
  return state.getPossibleMoves(state.currentPlayer).hotBitsCoordinates()
}

// ============================================================================
// MINIMAX
// ============================================================================

/**
 * Plain minimax value of `state` for `maximizingColor`.
 *
 * A side to move without legal moves does not pass here: the same position
 * is searched one ply shallower with the same side to move.
 */
export function minimax(
  state: GameState,
  depth: number,
  maximizingColor: Player,
  heuristic: Heuristic,
  stats?: SearchStats
): number {
  if (stats) stats.nodes++

  if (depth <= 0 || state.isGameOver()) {
    return heuristic(state, maximizingColor)
  }

  const moves = legalMoves(state)
  if (moves.length === 0) {
    return minimax(state, depth - 1, maximizingColor, heuristic, stats)
  }

  const maximizing = state.currentPlayer === maximizingColor
  let evaluation = maximizing ? -SCORE_BOUND : SCORE_BOUND

  for (const move of moves) {
    const score = withMove(state, move, () =>
      minimax(state, depth - 1, maximizingColor, heuristic, stats)
    )
    evaluation = maximizing ? Math.max(evaluation, score) : Math.min(evaluation, score)
  }

  return evaluation
}

// ============================================================================
// ALPHA-BETA
// ============================================================================

/**
 * Minimax with alpha-beta pruning. Called with the full
 * `[-SCORE_BOUND, SCORE_BOUND]` window it returns the minimax value.
 */
export function alphabeta(
  state: GameState,
  depth: number,
  alpha: number,
  beta: number,
  maximizingColor: Player,
  heuristic: Heuristic,
  stats?: SearchStats
): number {
  if (stats) stats.nodes++

  if (depth <= 0 || state.isGameOver()) {
    return heuristic(state, maximizingColor)
  }

  const moves = legalMoves(state)
  if (moves.length === 0) {
    return alphabeta(state, depth - 1, alpha, beta, maximizingColor, heuristic, stats)
  }

  if (state.currentPlayer === maximizingColor) {
    let evaluation = -SCORE_BOUND
    for (const move of moves) {
      const score = withMove(state, move, () =>
        alphabeta(state, depth - 1, alpha, beta, maximizingColor, heuristic, stats)
      )
      evaluation = Math.max(evaluation, score)
      alpha = Math.max(alpha, evaluation)
      if (beta <= alpha) {
        if (stats) stats.cutoffs++
        break
      }
    }
    return evaluation
  }

  let evaluation = SCORE_BOUND
  for (const move of moves) {
    const score = withMove(state, move, () =>
      alphabeta(state, depth - 1, alpha, beta, maximizingColor, heuristic, stats)
    )
    evaluation = Math.min(evaluation, score)
    beta = Math.min(beta, evaluation)
    if (beta <= alpha) {
      if (stats) stats.cutoffs++
      break
    }
  }
  return evaluation
}

// ============================================================================
// ROOT
// ============================================================================

export interface RootSearchResult {
  /** Chosen move, PASS when nothing was searched */
  move: Move
  /** Score of the chosen move, null when nothing was searched */
  score: number | null
  stats: SearchStats
}

/**
 * Scores every legal move of the side to move and keeps the one scoring
 * strictly higher than the best so far. The best score starts at -Infinity
 * when `maximizingColor` is on move and at +Infinity otherwise, so a search
 * for the side not on move selects nothing and returns PASS. The first of
 * equally scored moves wins.
 */
export function searchRoot(
  state: GameState,
  depth: number,
  maximizingColor: Player,
  algorithm: SearchAlgorithm,
  heuristic: Heuristic
): RootSearchResult {
  const stats = createSearchStats()

  if (depth <= 0 || state.isGameOver()) {
    return { move: { ...PASS }, score: null, stats }
  }

  const moves = legalMoves(state)
  const maximizing = state.currentPlayer === maximizingColor
  logger.debug(`Evaluating ${moves.length} moves at depth ${depth} for ${maximizingColor}`)

  let bestMove: Move = { ...PASS }
  let bestScore = maximizing ? -Infinity : Infinity

  for (const move of moves) {
    const child = state.clone()
    child.play(move.x, move.y)

    const score =
      algorithm === 'minimax'
        ? minimax(child, depth - 1, maximizingColor, heuristic, stats)
        : alphabeta(child, depth - 1, -SCORE_BOUND, SCORE_BOUND, maximizingColor, heuristic, stats)
    logger.debug(`Move (${move.x}, ${move.y}) scored ${score}`)

    if (score > bestScore) {
      bestScore = score
      bestMove = move
    }
  }

  if (isPass(bestMove)) {
    logger.debug(`No move selected for ${maximizingColor} with ${state.currentPlayer} on move`)
    return { move: bestMove, score: null, stats }
  }
  return { move: bestMove, score: bestScore, stats }
}

/**
 * Best move for the side to move, or PASS when depth is 0, the game is over
 * or `maximizingColor` is not the side to move.
 *
 * @param algorithm - 'minimax', or 'alphabeta' / 'ab'
 * @param heuristicName - unknown names fall back to all_in_one
 * @param benchmark - log the elapsed time and node count
 */
export function findBestMove(
  state: GameState,
  depth = 3,
  maximizingColor: Player = 'black',
  algorithm: SearchAlgorithm = 'minimax',
  heuristicName = 'corners_captured',
  benchmark = false
): Move {
  const startTime = Date.now()
  const result = searchRoot(state, depth, maximizingColor, algorithm, resolveHeuristic(heuristicName))

  if (benchmark) {
    logger.info(
      `${algorithm} depth ${depth}: ${Date.now() - startTime} ms, ` +
        `${result.stats.nodes} nodes, ${result.stats.cutoffs} cutoffs`
    )
  }

  return result.move
}

/**
 * Uniformly random legal move for the side to move.
 *
 * @throws Error if the side to move has no legal move
 */
export function randomMove(state: GameState, random: () => number = Math.random): Move {
  const moves = legalMoves(state)
  if (moves.length === 0) {
    throw new Error('No valid moves available')
  }
  return moves[Math.min(moves.length - 1, Math.floor(random() * moves.length))]
}
