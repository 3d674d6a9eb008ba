/**
 * Package Entry Tests
 */

import { describe, it, expect } from 'vitest'
import { GameState, alphaBetaEngine, engineRegistry, minimaxEngine, randomEngine } from './index'

describe('package entry', () => {
  it('should expose a filled engine registry', () => {
    expect(engineRegistry.list().map((engine) => engine.name)).toEqual([
      'minimax',
      'alphabeta',
      'random',
    ])
    expect(engineRegistry.get('minimax')).toBe(minimaxEngine)
    expect(engineRegistry.get('random')).toBe(randomEngine)
    expect(engineRegistry.getWithFallback('ab')).toBe(alphaBetaEngine)
  })

  it('should let the default engine pick an opening move', () => {
    const engine = engineRegistry.getWithFallback('minimax')
    const { move } = engine.selectMove(new GameState(8), { searchDepth: 1, heuristic: 'coin_parity' })
    expect(new GameState(8).getPossibleMoves('black').get(move.x, move.y)).toBe(true)
  })
})
