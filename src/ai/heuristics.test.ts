import { describe, it, expect } from 'vitest'
import {
  ALL_IN_ONE_WEIGHTS,
  HEURISTICS,
  allInOneHeuristic,
  coinParityHeuristic,
  cornersCapturedHeuristic,
  isHeuristicName,
  mobilityHeuristic,
  resolveHeuristic,
  roundPercentage,
} from './heuristics'
import { GameState } from '../game/othello'

// Black holds two corners, white one, on top of the 8x8 opening
function cornersPosition(): GameState {
  const state = new GameState(8)
  state.black.set(0, 0, true)
  state.black.set(7, 7, true)
  state.white.set(7, 0, true)
  return state
}

function oneCornerEach(): GameState {
  const state = new GameState(8)
  state.black.set(0, 0, true)
  state.white.set(7, 7, true)
  return state
}

function emptyBoard(): GameState {
  const state = new GameState(6)
  state.black.bits = 0n
  state.white.bits = 0n
  return state
}

describe('Heuristics', () => {
  describe('roundPercentage', () => {
    it('returns the signed share difference', () => {
      expect(roundPercentage(3, 1)).toBe(50)
      expect(roundPercentage(1, 7)).toBe(-75)
      expect(roundPercentage(4, 0)).toBe(100)
    })

    it('truncates toward zero', () => {
      expect(roundPercentage(9, 7)).toBe(12)
      expect(roundPercentage(7, 9)).toBe(-12)
      expect(roundPercentage(2, 1)).toBe(33)
      expect(roundPercentage(1, 2)).toBe(-33)
    })

    it('returns a plain zero for small negative shares', () => {
      expect(Object.is(roundPercentage(70, 71), 0)).toBe(true)
    })

    it('is zero when both counts are zero', () => {
      expect(roundPercentage(0, 0)).toBe(0)
    })
  })

  describe('cornersCapturedHeuristic', () => {
    it('scores 0 without corners', () => {
      const state = new GameState(6)
      expect(cornersCapturedHeuristic(state, 'black')).toBe(0)
      expect(cornersCapturedHeuristic(state, 'white')).toBe(0)
    })

    it('favours the side with more corners', () => {
      const state = cornersPosition()
      expect(cornersCapturedHeuristic(state, 'black')).toBe(33)
      expect(cornersCapturedHeuristic(state, 'white')).toBe(-33)
    })

    it('scores 100 for all four corners', () => {
      const state = new GameState(8)
      for (const [x, y] of [[0, 0], [7, 0], [0, 7], [7, 7]]) {
        state.black.set(x, y, true)
      }
      expect(cornersCapturedHeuristic(state, 'black')).toBe(100)
      expect(cornersCapturedHeuristic(state, 'white')).toBe(-100)
    })

    it('scores 0 for one corner each', () => {
      const state = oneCornerEach()
      expect(cornersCapturedHeuristic(state, 'black')).toBe(0)
      expect(cornersCapturedHeuristic(state, 'white')).toBe(0)
    })

    it('scores 0 for the empty color', () => {
      expect(cornersCapturedHeuristic(cornersPosition(), 'empty')).toBe(0)
    })
  })

  describe('coinParityHeuristic', () => {
    it('scores 0 at the opening', () => {
      const state = new GameState(6)
      expect(coinParityHeuristic(state, 'black')).toBe(0)
      expect(coinParityHeuristic(state, 'white')).toBe(0)
    })

    it('favours the side with more discs', () => {
      const state = cornersPosition()
      expect(coinParityHeuristic(state, 'black')).toBe(14)
      expect(coinParityHeuristic(state, 'white')).toBe(-14)
    })

    it('turns when white gains a disc', () => {
      const state = oneCornerEach()
      expect(coinParityHeuristic(state, 'black')).toBe(0)
      state.white.set(1, 1, true)
      expect(coinParityHeuristic(state, 'black')).toBe(-14)
      expect(coinParityHeuristic(state, 'white')).toBe(14)
    })

    it('scores 0 on an empty board', () => {
      expect(coinParityHeuristic(emptyBoard(), 'black')).toBe(0)
    })

    it('returns the empty sentinel for the empty color', () => {
      expect(coinParityHeuristic(new GameState(6), 'empty')).toBe('empty')
    })
  })

  describe('mobilityHeuristic', () => {
    it('scores 0 at the opening', () => {
      const state = new GameState(6)
      expect(mobilityHeuristic(state, 'black')).toBe(0)
      expect(mobilityHeuristic(state, 'white')).toBe(0)
    })

    it('scores 0 when nobody can move', () => {
      const state = emptyBoard()
      expect(mobilityHeuristic(state, 'black')).toBe(0)
      expect(mobilityHeuristic(state, 'white')).toBe(0)
    })

    it('compares legal move counts', () => {
      // white has 1 move, black 8
      const state = new GameState(6, { currentPlayer: 'white' })
      for (let x = 0; x < 5; x++) {
        state.black.set(x, 4, true)
        state.black.set(x, 5, true)
      }
      for (const [x, y] of [[1, 1], [1, 2], [1, 3], [2, 2], [2, 3], [3, 2], [3, 3], [4, 2]]) {
        state.black.set(x, y, false)
        state.white.set(x, y, true)
      }
      expect(mobilityHeuristic(state, 'white')).toBe(-77)
      expect(mobilityHeuristic(state, 'black')).toBe(77)
    })

    it('returns the empty sentinel for the empty color', () => {
      expect(mobilityHeuristic(new GameState(6), 'empty')).toBe('empty')
    })
  })

  describe('allInOneHeuristic', () => {
    it('scores 0 at the opening', () => {
      const state = new GameState(6)
      expect(allInOneHeuristic(state, 'black')).toBe(0)
      expect(allInOneHeuristic(state, 'white')).toBe(0)
    })

    it('weights corners, mobility and discs', () => {
      const state = cornersPosition()
      expect(ALL_IN_ONE_WEIGHTS).toEqual({ corners: 10, mobility: 4, coins: 1 })
      // 10 * 33 + 4 * 0 + 14
      expect(allInOneHeuristic(state, 'black')).toBe(344)
      expect(allInOneHeuristic(state, 'white')).toBe(-344)
    })

    it('returns the empty sentinel for the empty color', () => {
      expect(allInOneHeuristic(new GameState(6), 'empty')).toBe('empty')
    })
  })

  describe('lookup', () => {
    it('maps every name to its heuristic', () => {
      expect(HEURISTICS.corners_captured).toBe(cornersCapturedHeuristic)
      expect(HEURISTICS.coin_parity).toBe(coinParityHeuristic)
      expect(HEURISTICS.mobility).toBe(mobilityHeuristic)
      expect(HEURISTICS.all_in_one).toBe(allInOneHeuristic)
    })

    it('recognises heuristic names', () => {
      expect(isHeuristicName('mobility')).toBe(true)
      expect(isHeuristicName('toString')).toBe(false)
      expect(isHeuristicName('parity')).toBe(false)
    })

    it('falls back to all_in_one for unknown names', () => {
      expect(resolveHeuristic('coin_parity')).toBe(coinParityHeuristic)
      expect(resolveHeuristic('nonsense')).toBe(allInOneHeuristic)
    })
  })
})
