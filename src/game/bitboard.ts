/**
 * Bitboard
 *
 * A fixed-width bit set over a square grid, one bit per cell. Bit index
 * `y * size + x` holds cell (x, y), so bits are laid out row-major with x
 * varying fastest. Storage is a `bigint` because a 12x12 board needs 144
 * bits, more than any machine word.
 */

import { OutOfBoundsError } from './errors'

// ============================================================================
// DIRECTIONS
// ============================================================================

/**
 * Compass directions a bitboard can be shifted in.
 * North is towards row 0, east towards the last column.
 */
export type Direction =
  | 'north'
  | 'south'
  | 'east'
  | 'west'
  | 'north-east'
  | 'north-west'
  | 'south-east'
  | 'south-west'

export const DIRECTIONS: readonly Direction[] = [
  'north',
  'south',
  'east',
  'west',
  'north-east',
  'north-west',
  'south-east',
  'south-west',
]

// ============================================================================
// SIZE MASKS
// ============================================================================

/**
 * Masks shared by every bitboard of a given size.
 */
export interface SizeMasks {
  readonly size: number
  /** Every cell of the board */
  readonly full: bigint
  /** Every cell except column 0 */
  readonly west: bigint
  /** Every cell except the last column */
  readonly east: bigint
}

/**
 * Lazily computes and caches the mask triple of each board size.
 * Entries are never invalidated.
 */
export class SizeMaskRegistry {
  private masks: Map<number, SizeMasks> = new Map()

  /**
   * Get (computing on first use) the masks for a board size.
   *
   * @throws RangeError if size is not a positive integer
   */
  get(size: number): SizeMasks {
    const cached = this.masks.get(size)
    if (cached) return cached

    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`Bitboard size must be a positive integer, got ${size}`)
    }

    let full = 0n
    let west = 0n
    let east = 0n
    for (let i = 0; i < size * size; i++) {
      const bit = 1n << BigInt(i)
      full |= bit
      if (i % size !== 0) west |= bit
      if (i % size !== size - 1) east |= bit
    }

    const entry: SizeMasks = { size, full, west, east }
    this.masks.set(size, entry)
    return entry
  }

  has(size: number): boolean {
    return this.masks.has(size)
  }

  get size(): number {
    return this.masks.size
  }
}

// Shared registry used unless a bitboard is given its own
export const sizeMaskRegistry = new SizeMaskRegistry()

// ============================================================================
// RAW BIT OPERATIONS
// ============================================================================

/**
 * Shifts raw bits one cell in a direction.
 *
 * Horizontal components drop the column that would wrap into the next row
 * before shifting: moving east keeps only `masks.east`, moving west only
 * `masks.west`. Diagonals pair that with a vertical shift of size ± 1.
 */
export function shiftBits(bits: bigint, direction: Direction, masks: SizeMasks): bigint {
  const size = BigInt(masks.size)
  switch (direction) {
    case 'north':
      return bits >> size
    case 'south':
      return (bits << size) & masks.full
    case 'east':
      return ((bits & masks.east) << 1n) & masks.full
    case 'west':
      return (bits & masks.west) >> 1n
    case 'north-east':
      return (bits & masks.east) >> (size - 1n)
    case 'north-west':
      return (bits & masks.west) >> (size + 1n)
    case 'south-east':
      return ((bits & masks.east) << (size + 1n)) & masks.full
    case 'south-west':
      return ((bits & masks.west) << (size - 1n)) & masks.full
  }
}

const CHUNK_MASK = 0xffffffffffffffffn
const M1 = 0x5555555555555555n
const M2 = 0x3333333333333333n
const M4 = 0x0f0f0f0f0f0f0f0fn
const M8 = 0x00ff00ff00ff00ffn
const M16 = 0x0000ffff0000ffffn
const M32 = 0x00000000ffffffffn

/**
 * Counts set bits of a non-negative bigint of any width.
 *
 * Works on 64-bit chunks, each reduced with SWAR pairwise sums at
 * 1, 2, 4, 8, 16 and 32-bit granularity.
 */
export function popcount(value: bigint): number {
  if (value < 0n) {
    throw new RangeError('popcount is only defined for non-negative values')
  }

  let total = 0n
  let remaining = value
  while (remaining > 0n) {
    let chunk = remaining & CHUNK_MASK
    chunk = (chunk & M1) + ((chunk >> 1n) & M1)
    chunk = (chunk & M2) + ((chunk >> 2n) & M2)
    chunk = (chunk & M4) + ((chunk >> 4n) & M4)
    chunk = (chunk & M8) + ((chunk >> 8n) & M8)
    chunk = (chunk & M16) + ((chunk >> 16n) & M16)
    chunk = (chunk & M32) + ((chunk >> 32n) & M32)
    total += chunk
    remaining >>= 64n
  }
  return Number(total)
}

/**
 * Index of the single set bit of a power of two.
 */
function bitIndex(singleBit: bigint): number {
  return singleBit.toString(2).length - 1
}

// ============================================================================
// BITBOARD
// ============================================================================

export interface Coordinate {
  x: number
  y: number
}

export class Bitboard {
  readonly size: number
  readonly masks: SizeMasks
  private value: bigint
  private readonly registry: SizeMaskRegistry

  constructor(size: number, bits = 0n, registry: SizeMaskRegistry = sizeMaskRegistry) {
    this.registry = registry
    this.masks = registry.get(size)
    this.size = size
    this.value = bits & this.masks.full
  }

  /**
   * Builds a bitboard with the given cells set.
   */
  static fromCoordinates(
    size: number,
    coordinates: Iterable<Coordinate>,
    registry: SizeMaskRegistry = sizeMaskRegistry
  ): Bitboard {
    const board = new Bitboard(size, 0n, registry)
    for (const { x, y } of coordinates) {
      board.set(x, y, true)
    }
    return board
  }

  get bits(): bigint {
    return this.value
  }

  /** Assigned bits outside the board are dropped. */
  set bits(bits: bigint) {
    this.value = bits & this.masks.full
  }

  set(x: number, y: number, value: boolean): void {
    const bit = this.bitAt(x, y)
    if (value) {
      this.value |= bit
    } else {
      this.value &= this.masks.full ^ bit
    }
  }

  get(x: number, y: number): boolean {
    return (this.value & this.bitAt(x, y)) !== 0n
  }

  shift(direction: Direction): Bitboard {
    return this.withBits(shiftBits(this.value, direction, this.masks))
  }

  popcount(): number {
    return popcount(this.value)
  }

  isEmpty(): boolean {
    return this.value === 0n
  }

  /**
   * Coordinates of every set bit, lowest bit index first
   * (row-major, x varying fastest).
   */
  hotBitsCoordinates(): Coordinate[] {
    const coordinates: Coordinate[] = []
    let remaining = this.value
    while (remaining > 0n) {
      const lowest = remaining & -remaining
      const index = bitIndex(lowest)
      coordinates.push({ x: index % this.size, y: Math.floor(index / this.size) })
      remaining &= remaining - 1n
    }
    return coordinates
  }

  and(other: Bitboard): Bitboard {
    return this.withBits(this.value & other.bits)
  }

  or(other: Bitboard): Bitboard {
    return this.withBits(this.value | other.bits)
  }

  xor(other: Bitboard): Bitboard {
    return this.withBits(this.value ^ other.bits)
  }

  not(): Bitboard {
    return this.withBits(~this.value)
  }

  equals(other: Bitboard): boolean {
    return this.size === other.size && this.value === other.bits
  }

  /**
   * Structural key on (size, bits), usable as a Map or Set key.
   */
  hashKey(): string {
    return `${this.size}:${this.value.toString(16)}`
  }

  clone(): Bitboard {
    return this.withBits(this.value)
  }

  /**
   * A bitboard of the same size and registry holding `bits`.
   */
  withBits(bits: bigint): Bitboard {
    return new Bitboard(this.size, bits, this.registry)
  }

  private bitAt(x: number, y: number): bigint {
    if (
      !Number.isInteger(x) ||
      !Number.isInteger(y) ||
      x < 0 ||
      y < 0 ||
      x >= this.size ||
      y >= this.size
    ) {
      throw new OutOfBoundsError(x, y, this.size)
    }
    return 1n << BigInt(y * this.size + x)
  }
}
