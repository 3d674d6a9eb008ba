/**
 * Search Engines
 *
 * Wrap the root search as pluggable engines: one running plain minimax,
 * one running alpha-beta. Both search on clones, so the caller's state is
 * never touched.
 */

import type { EngineConfig, MoveResult, OthelloEngine } from '../ai-engine'
import type { GameState, Player } from '../../game/othello'
import { resolveHeuristic } from '../heuristics'
import { type SearchAlgorithm, searchRoot } from '../search'

export class SearchEngine implements OthelloEngine {
  constructor(
    readonly name: string,
    readonly description: string,
    private readonly algorithm: SearchAlgorithm
  ) {}

  selectMove(state: GameState, config: EngineConfig): MoveResult {
    const startTime = Date.now()
    const result = searchRoot(
      state,
      config.searchDepth,
      state.currentPlayer,
      this.algorithm,
      resolveHeuristic(config.heuristic)
    )

    return {
      move: result.move,
      score: result.score ?? undefined,
      searchInfo: {
        depth: config.searchDepth,
        nodesSearched: result.stats.nodes,
        timeUsed: Date.now() - startTime,
      },
    }
  }

  evaluatePosition(state: GameState, player: Player, config: EngineConfig): number {
    return resolveHeuristic(config.heuristic)(state, player)
  }
}

export const minimaxEngine = new SearchEngine(
  'minimax',
  'Exhaustive minimax search to a fixed depth',
  'minimax'
)

export const alphaBetaEngine = new SearchEngine(
  'alphabeta',
  'Minimax search with alpha-beta pruning',
  'alphabeta'
)
