import { describe, it, expect } from 'vitest'
import { lineCap, lineCapMove } from './movegen'
import { sizeMaskRegistry } from './bitboard'
import { OutOfBoundsError } from './errors'

const masks8 = sizeMaskRegistry.get(8)

// Standard opening: white on (3,3) (4,4), black on (4,3) (3,4)
const openingWhite = (1n << 27n) | (1n << 36n)
const openingBlack = (1n << 28n) | (1n << 35n)

// Board diagrams below list rows from y = 0; C marks an expected move

describe('lineCapMove', () => {
  it('finds the four opening moves for black', () => {
    expect(lineCapMove(openingBlack, openingWhite, masks8)).toBe(
      0b0000000000000000000100000010000000000100000010000000000000000000n
    )
  })

  it('finds moves in a later position', () => {
    const white = 0b0000000000000000000100000001000000011000000000000000000000000000n
    const black = 0b0000000000010000000000000000100000100000000000000000000000000000n
    expect(lineCapMove(black, white, masks8)).toBe(
      0b0000000000100000000010000010000000000100001110000000000000000000n
    )
    expect(lineCapMove(white, black, masks8)).toBe(
      0b0001000000000000000011000000010001000100010000000000000000000000n
    )
  })

  it('finds white moves against a row of black discs', () => {
    // . . . . . . . .
    // . . . . . . . .
    // . . C . C . . .
    // . . X X X . . .
    // . . C X O . . .
    const white = 0b0000000000000000000000000001000000000000000000000000000000000000n
    const black = 0b0000000000000000000000000000100000011100000000000000000000000000n
    expect(lineCapMove(white, black, masks8)).toBe(
      0b0000000000000000000000000000010000000000000101000000000000000000n
    )
  })

  it('returns nothing without discs', () => {
    expect(lineCapMove(0n, 0n, masks8)).toBe(0n)
    expect(lineCapMove(openingBlack, 0n, masks8)).toBe(0n)
  })

  it('does not capture across the east edge', () => {
    // own on the last column of row 0, opponent at the start of row 1
    const own = 1n << 7n
    const opp = 1n << 8n
    expect(lineCapMove(own, opp, masks8)).toBe(0n)
  })

  it('does not modify its inputs', () => {
    const own = openingBlack
    const opp = openingWhite
    lineCapMove(own, opp, masks8)
    expect(own).toBe(openingBlack)
    expect(opp).toBe(openingWhite)
  })
})

describe('lineCap', () => {
  it('captures one disc from the opening', () => {
    expect(lineCap(4, 5, openingBlack, openingWhite, masks8)).toBe(
      0b0000000000000000000100000001000000000000000000000000000000000000n
    )
  })

  it('captures along several lines at once', () => {
    const white = 0b0000100000000100100000001000010010001000100001001000000011110000n
    const black = 0b0000000000000000011110000100100001000100010010000111000000000000n
    expect(lineCap(4, 4, white, black, masks8)).toBe(
      0b0000000000000000000010000001100000000000000000000000000000000000n
    )
  })

  it('captures nothing when a run reaches the edge', () => {
    // opponent at (1,0) and (2,0), nothing of ours behind them
    const opp = (1n << 1n) | (1n << 2n)
    expect(lineCap(0, 0, 0n, opp, masks8)).toBe(1n)
  })

  it('captures nothing when a run ends on an empty cell', () => {
    const own = 1n << 4n
    const opp = 1n << 1n
    expect(lineCap(0, 0, own, opp, masks8)).toBe(1n)
  })

  it('throws OutOfBoundsError off the board', () => {
    expect(() => lineCap(8, 0, openingBlack, openingWhite, masks8)).toThrow(OutOfBoundsError)
    expect(() => lineCap(0, -1, openingBlack, openingWhite, masks8)).toThrow(OutOfBoundsError)
  })
})
