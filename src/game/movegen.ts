/**
 * Move generation
 *
 * Works directly on the raw bits of the two colors so the search does not
 * allocate a Bitboard per shift. `own` is the side being generated for,
 * `opp` its opponent.
 */

import { DIRECTIONS, type SizeMasks, shiftBits } from './bitboard'
import { OutOfBoundsError } from './errors'

/**
 * Bits of every legal destination square for the side owning `own`.
 *
 * Directional flood fill: from each own disc, slide across one or more
 * contiguous opponent discs; the first empty square reached is a legal move.
 * Inputs are not modified.
 */
export function lineCapMove(own: bigint, opp: bigint, masks: SizeMasks): bigint {
  const empty = masks.full & ~(own | opp)
  let moves = 0n

  for (const direction of DIRECTIONS) {
    let run = opp & shiftBits(own, direction, masks)
    while (run !== 0n) {
      moves |= empty & shiftBits(run, direction, masks)
      run = opp & shiftBits(run, direction, masks)
    }
  }

  return moves
}

/**
 * Bits flipped (plus the placed square itself) by placing a disc at (x, y).
 *
 * Legality is not checked: on a square outside the legal-move mask the
 * result is meaningless, so callers test membership first.
 */
export function lineCap(
  x: number,
  y: number,
  own: bigint,
  opp: bigint,
  masks: SizeMasks
): bigint {
  const { size } = masks
  if (x < 0 || y < 0 || x >= size || y >= size) {
    throw new OutOfBoundsError(x, y, size)
  }

  const position = 1n << BigInt(y * size + x)
  let captured = position

  for (const direction of DIRECTIONS) {
    let run = 0n
    let pointer = shiftBits(position, direction, masks)
    // Walk until the board edge (pointer vanishes) or a non-opponent cell
    while ((pointer & opp) !== 0n) {
      run |= pointer
      pointer = shiftBits(pointer, direction, masks)
    }
    if ((pointer & own) !== 0n) {
      captured |= run
    }
  }

  return captured
}
