/**
 * Random Engine
 *
 * Picks uniformly among the legal moves. Useful as a weak opponent and as a
 * baseline when benchmarking the search engines.
 */

import type { EngineConfig, MoveResult, OthelloEngine } from '../ai-engine'
import { type GameState, PASS } from '../../game/othello'
import { randomMove } from '../search'

export class RandomEngine implements OthelloEngine {
  readonly name = 'random'
  readonly description = 'Picks uniformly among the legal moves'

  constructor(private readonly random: () => number = Math.random) {}

  selectMove(state: GameState, _config: EngineConfig): MoveResult {
    const startTime = Date.now()
    const move =
      state.isGameOver() || state.getPossibleMoves(state.currentPlayer).isEmpty()
        ? { ...PASS }
        : randomMove(state, this.random)

    return {
      move,
      searchInfo: { depth: 0, nodesSearched: 1, timeUsed: Date.now() - startTime },
    }
  }
}

export const randomEngine = new RandomEngine()
