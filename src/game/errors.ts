/**
 * Othello engine errors
 *
 * Every violation is raised synchronously to the caller. Only
 * IllegalMoveError is expected during normal play (a UI re-prompts on it);
 * the others indicate a logic error in the caller.
 */

export type OthelloErrorKind =
  | 'illegal-move'
  | 'cannot-pop'
  | 'illegal-board-size'
  | 'out-of-bounds'

/**
 * Base class for all engine errors.
 */
export abstract class OthelloError extends Error {
  abstract readonly kind: OthelloErrorKind

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Thrown when a placement is not in the legal-move mask of the side to move.
 */
export class IllegalMoveError extends OthelloError {
  readonly kind = 'illegal-move'

  constructor(
    readonly x: number,
    readonly y: number,
    readonly player: string
  ) {
    super(`Move ${x}:${y} from player ${player} is illegal`)
  }
}

/**
 * Thrown when undoing on a board with an empty history.
 */
export class CannotPopError extends OthelloError {
  readonly kind = 'cannot-pop'

  constructor() {
    super('Cannot pop from this board')
  }
}

export class IllegalBoardSizeError extends OthelloError {
  readonly kind = 'illegal-board-size'

  constructor(readonly size: number) {
    super(`Boards of size ${size} are not possible`)
  }
}

/**
 * Thrown when a coordinate falls outside the grid.
 */
export class OutOfBoundsError extends OthelloError {
  readonly kind = 'out-of-bounds'

  constructor(
    readonly x: number,
    readonly y: number,
    readonly size: number
  ) {
    super(`Coordinate ${x}:${y} is outside a ${size}x${size} board`)
  }
}
