/**
 * Othello Game Engine
 *
 * Board state, move application with undo, and the save-file export.
 * Pure TypeScript with no UI dependencies. Every mutation goes through
 * `play` and is reverted by `pop`.
 */

import { Bitboard, type Coordinate } from './bitboard'
import { lineCap, lineCapMove } from './movegen'
import { CannotPopError, IllegalBoardSizeError, IllegalMoveError } from './errors'
import { createLogger } from '../lib/logger'

const logger = createLogger('Othello')

// ============================================================================
// BOARD SIZES
// ============================================================================

export const BOARD_SIZES = [6, 8, 10, 12] as const

export type BoardSize = (typeof BOARD_SIZES)[number]

export function isBoardSize(value: number): value is BoardSize {
  return BOARD_SIZES.some((size) => size === value)
}

/**
 * Narrows a number to a supported board size.
 *
 * @throws IllegalBoardSizeError for anything outside 6, 8, 10 and 12
 */
export function toBoardSize(value: number): BoardSize {
  if (!isBoardSize(value)) {
    throw new IllegalBoardSizeError(value)
  }
  return value
}

// ============================================================================
// COLORS
// ============================================================================

// The two sides that can be on move
export type Player = 'black' | 'white'

// What a cell can hold
export type Color = Player | 'empty'

export const COLOR_GLYPHS: Readonly<Record<Color, string>> = {
  black: 'X',
  white: 'O',
  empty: '_',
}

/**
 * Black and white swap; empty stays empty.
 */
export function opposite(color: Player): Player
export function opposite(color: Color): Color
export function opposite(color: Color): Color {
  if (color === 'black') return 'white'
  if (color === 'white') return 'black'
  return 'empty'
}

// ============================================================================
// MOVES
// ============================================================================

export type Move = Coordinate

/** Sentinel for "no move": a pass. */
export const PASS: Readonly<Move> = Object.freeze({ x: -1, y: -1 })

export function isPass(move: Move): boolean {
  return move.x === PASS.x && move.y === PASS.y
}

/**
 * Formats a move the way the save file does: column letter then 1-indexed
 * row (`c4`), or `-1-1` for a pass.
 */
export function moveToString(move: Move): string {
  if (isPass(move)) return '-1-1'
  return `${String.fromCharCode('a'.charCodeAt(0) + move.x)}${move.y + 1}`
}

// ============================================================================
// GAME STATE
// ============================================================================

/**
 * Board snapshot taken before a move, or at the moment of a pass.
 */
export interface HistoryEntry {
  readonly black: Bitboard
  readonly white: Bitboard
  readonly x: number
  readonly y: number
  readonly player: Player
}

export interface GameStateOptions {
  black?: Bitboard
  white?: Bitboard
  currentPlayer?: Player
}

export type GameResult = Player | 'draw' | null

export class GameState {
  readonly size: BoardSize
  black: Bitboard
  white: Bitboard
  currentPlayer: Player
  forcedGameOver = false
  private history: HistoryEntry[] = []

  /**
   * Creates a game. Without bitboards the standard four-disc opening is
   * placed and black moves first.
   *
   * @throws IllegalBoardSizeError if the size is unsupported or a provided
   * bitboard has a different size
   */
  constructor(size: number, options: GameStateOptions = {}) {
    this.size = toBoardSize(size)
    this.currentPlayer = options.currentPlayer ?? 'black'

    const { black, white } = options
    if (black || white) {
      const mismatch = [black, white].find((board) => board && board.size !== this.size)
      if (mismatch) {
        logger.error(`Provided bitboard of size ${mismatch.size} on a board of size ${size}`)
        throw new IllegalBoardSizeError(mismatch.size)
      }
      this.black = black ?? new Bitboard(this.size)
      this.white = white ?? new Bitboard(this.size)
    } else {
      this.black = new Bitboard(this.size)
      this.white = new Bitboard(this.size)
      this.placeOpening()
    }
  }

  private placeOpening(): void {
    const half = this.size / 2
    this.white.set(half - 1, half - 1, true)
    this.white.set(half, half, true)
    this.black.set(half - 1, half, true)
    this.black.set(half, half - 1, true)
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  /**
   * Legal destination squares for a color.
   */
  getPossibleMoves(color: Player): Bitboard {
    return this.black.withBits(this.legalBits(color))
  }

  /**
   * Squares captured (including the placed one) if `color` plays at (x, y).
   * Does not check legality.
   */
  lineCap(x: number, y: number, color: Player): Bitboard {
    const [own, opp] = this.sides(color)
    return this.black.withBits(lineCap(x, y, own, opp, this.black.masks))
  }

  cellAt(x: number, y: number): Color {
    if (this.black.get(x, y)) return 'black'
    if (this.white.get(x, y)) return 'white'
    return 'empty'
  }

  countDiscs(color: Player): number {
    return (color === 'black' ? this.black : this.white).popcount()
  }

  isGameOver(): boolean {
    return (
      this.forcedGameOver ||
      (this.legalBits(this.currentPlayer) === 0n &&
        this.legalBits(opposite(this.currentPlayer)) === 0n)
    )
  }

  /**
   * The side with more discs once the game is over, 'draw' on equal counts,
   * or null while the game is still running.
   */
  getWinner(): GameResult {
    if (!this.isGameOver()) return null
    const black = this.countDiscs('black')
    const white = this.countDiscs('white')
    if (black === white) return 'draw'
    return black > white ? 'black' : 'white'
  }

  /**
   * Turn number starting at 1. A turn is two history entries (passes
   * included), black then white.
   */
  getTurnId(): number {
    return Math.floor(this.history.length / 2) + 1
  }

  getHistory(): HistoryEntry[] {
    return [...this.history]
  }

  /**
   * The most recent entry that is not a pass, or null.
   */
  getLastPlay(): HistoryEntry | null {
    for (let i = this.history.length - 1; i >= 0; i--) {
      if (!isPass(this.history[i])) return this.history[i]
    }
    return null
  }

  // ==========================================================================
  // MUTATIONS
  // ==========================================================================

  /**
   * Plays a move for the side to move.
   *
   * `(-1, -1)` records a pass without changing the side to move. Any other
   * square must be a legal move. After a real move, if the opponent has no
   * legal reply a pass is recorded for them and the turn comes back.
   *
   * @throws IllegalMoveError if the square is not a legal move
   */
  play(x: number, y: number): void {
    if (isPass({ x, y })) {
      logger.debug(`Player ${this.currentPlayer} passes their turn`)
      this.history.push(this.snapshot(PASS))
      return
    }

    const cell = this.cellBit(x, y)
    if (cell === 0n || (this.legalBits(this.currentPlayer) & cell) === 0n) {
      logger.debug(`Move (${x}, ${y}) is illegal for ${this.currentPlayer}`)
      throw new IllegalMoveError(x, y, this.currentPlayer)
    }

    this.history.push(this.snapshot({ x, y }))

    const [own, opp] = this.sides(this.currentPlayer)
    const captured = lineCap(x, y, own, opp, this.black.masks)
    this.assign(this.currentPlayer, own | captured, opp & ~captured)
    this.currentPlayer = opposite(this.currentPlayer)

    if (this.legalBits(this.currentPlayer) === 0n) {
      logger.debug(`Player ${this.currentPlayer} has no legal moves and must pass`)
      this.history.push(this.snapshot(PASS))
      this.currentPlayer = opposite(this.currentPlayer)
    }
  }

  /**
   * Undoes the last move. A pass is undone together with the move below it.
   *
   * @throws CannotPopError if there is nothing to undo
   */
  pop(): void {
    let entry = this.history.pop()
    if (!entry) {
      throw new CannotPopError()
    }
    if (isPass(entry)) {
      entry = this.history.pop() ?? entry
    }
    this.black = entry.black
    this.white = entry.white
    this.currentPlayer = entry.player
  }

  forceGameOver(): void {
    logger.debug('Game over forced by external call')
    this.forcedGameOver = true
  }

  /**
   * Resets to the opening position, keeping the size.
   */
  restart(): void {
    logger.debug(`Restarting game with board size ${this.size}`)
    this.history = []
    this.forcedGameOver = false
    this.black = new Bitboard(this.size)
    this.white = new Bitboard(this.size)
    this.currentPlayer = 'black'
    this.placeOpening()
  }

  /**
   * Value copy of the position: both bitboards, the side to move and the
   * forced game-over flag. History is not carried over.
   */
  clone(): GameState {
    const copy = new GameState(this.size, {
      black: this.black.clone(),
      white: this.white.clone(),
      currentPlayer: this.currentPlayer,
    })
    copy.forcedGameOver = this.forcedGameOver
    return copy
  }

  equals(other: GameState): boolean {
    return (
      this.currentPlayer === other.currentPlayer &&
      this.black.equals(other.black) &&
      this.white.equals(other.white)
    )
  }

  // ==========================================================================
  // EXPORT
  // ==========================================================================

  /**
   * `# board`, the side to move, then one line per row of X / O / _.
   */
  exportBoard(): string {
    const rows: string[] = []
    for (let y = 0; y < this.size; y++) {
      const cells: string[] = []
      for (let x = 0; x < this.size; x++) {
        cells.push(COLOR_GLYPHS[this.cellAt(x, y)])
      }
      rows.push(cells.join(' '))
    }
    return `# board\n${COLOR_GLYPHS[this.currentPlayer]}\n${rows.join('\n')}`
  }

  /**
   * `# history` followed by numbered turns: `1. X d3 O c5`.
   * A white move opening a turn is preceded by a black pass.
   */
  exportHistory(): string {
    let output = '# history\n'
    this.history.forEach((entry, index) => {
      const turn = Math.floor(index / 2) + 1
      if (entry.player === 'black') {
        output += `${turn}. X ${moveToString(entry)}`
      } else {
        if (index % 2 === 0) {
          output += `${turn}. X ${moveToString(PASS)}`
        }
        output += ` O ${moveToString(entry)}\n`
      }
    })
    return output
  }

  export(): string {
    return `${this.exportBoard()}\n${this.exportHistory()}`
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private legalBits(color: Player): bigint {
    const [own, opp] = this.sides(color)
    return lineCapMove(own, opp, this.black.masks)
  }

  private sides(color: Player): [own: bigint, opp: bigint] {
    return color === 'black'
      ? [this.black.bits, this.white.bits]
      : [this.white.bits, this.black.bits]
  }

  private assign(color: Player, own: bigint, opp: bigint): void {
    const [black, white] = color === 'black' ? [own, opp] : [opp, own]
    this.black = this.black.withBits(black)
    this.white = this.white.withBits(white)
  }

  private snapshot(move: Move): HistoryEntry {
    return {
      black: this.black.clone(),
      white: this.white.clone(),
      x: move.x,
      y: move.y,
      player: this.currentPlayer,
    }
  }

  // 0n for coordinates off the board
  private cellBit(x: number, y: number): bigint {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return 0n
    if (x < 0 || y < 0 || x >= this.size || y >= this.size) return 0n
    return 1n << BigInt(y * this.size + x)
  }
}

// ============================================================================
// REPLAY
// ============================================================================

/**
 * Rebuilds a game from its move list. Passes in the list are recorded
 * literally, so auto-passes should not be listed again.
 *
 * @throws IllegalMoveError on the first illegal move
 */
export function replayMoves(size: number, moves: Iterable<Move>): GameState {
  const state = new GameState(size)
  for (const move of moves) {
    state.play(move.x, move.y)
  }
  return state
}
