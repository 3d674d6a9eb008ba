/**
 * Error handling utilities
 *
 * Consistent message extraction and classification for errors raised by the
 * engine and its callers.
 */

import { IllegalMoveError, OthelloError } from '../game/errors'
import { createLogger } from './logger'

/**
 * Extract a readable message from an unknown error value.
 * Handles Error objects, strings, and objects with message/error properties.
 *
 * @param fallback - Used when no message can be extracted
 *
 * @example
 * try {
 *   state.play(x, y)
 * } catch (err) {
 *   console.log(getErrorMessage(err))
 * }
 */
export function getErrorMessage(err: unknown, fallback = 'An error occurred'): string {
  if (err instanceof Error) {
    return err.message
  }

  if (typeof err === 'string') {
    return err
  }

  if (err && typeof err === 'object') {
    if ('error' in err && typeof err.error === 'string') {
      return err.error
    }
    if ('message' in err && typeof err.message === 'string') {
      return err.message
    }
  }

  return fallback
}

export function isOthelloError(err: unknown): err is OthelloError {
  return err instanceof OthelloError
}

export function isIllegalMoveError(err: unknown): err is IllegalMoveError {
  return err instanceof IllegalMoveError
}

/**
 * Whether the game can carry on after this error. An illegal move only means
 * the input was rejected; a failed pop means nothing was played yet.
 * Anything else points at a broken caller.
 */
export function isRecoverableError(err: unknown): boolean {
  return isOthelloError(err) && (err.kind === 'illegal-move' || err.kind === 'cannot-pop')
}

/**
 * Log an error with context for debugging.
 *
 * @param context - Where the error occurred, used as the log prefix
 */
export function logError(context: string, err: unknown): void {
  createLogger(context).error(getErrorMessage(err), err)
}
