/**
 * Match driver
 *
 * Plays the computer's turns of a game. Each side may have a seat (an engine
 * plus its configuration); sides without one are left to the caller, which
 * plays them with `GameState.play` and calls back in.
 */

import { type EngineConfig, type MoveResult, type OthelloEngine, engineRegistry } from './ai-engine'
import './engines'
import {
  type GameResult,
  type GameState,
  type Move,
  type Player,
  isPass,
  moveToString,
} from '../game/othello'
import { type GameConfig, aiPlaysColor, toEngineConfig } from '../lib/config'
import { createLogger } from '../lib/logger'

const logger = createLogger('Match')

export interface Seat {
  engine: OthelloEngine
  config: EngineConfig
}

export type Seats = Partial<Record<Player, Seat>>

export interface MatchResult {
  /** True once the game is over; false when a side without a seat is on move */
  finished: boolean
  winner: GameResult
  /** Moves played by the seats during this call, automatic passes excluded */
  moves: Move[]
  score: Record<Player, number>
}

/**
 * Seats for the sides the configuration gives to the computer. The engine is
 * looked up by `aiMode`, unknown modes falling back to the default engine.
 */
export function createSeats(config: GameConfig, registry = engineRegistry): Seats {
  const seats: Seats = {}
  for (const player of ['black', 'white'] as const) {
    if (aiPlaysColor(config, player)) {
      seats[player] = {
        engine: registry.getWithFallback(config.aiMode),
        config: toEngineConfig(config),
      }
    }
  }
  return seats
}

/**
 * Asks the seat's engine for a move for the side to move. Does not play it.
 */
export function suggestMove(state: GameState, seat: Seat): MoveResult {
  return seat.engine.selectMove(state, seat.config)
}

/**
 * Plays one engine move for the side to move.
 *
 * @throws Error if the engine passes while the side to move has a legal move
 */
export function playTurn(state: GameState, seat: Seat): Move {
  const player = state.currentPlayer
  const { move } = suggestMove(state, seat)
  if (isPass(move)) {
    throw new Error(`Engine "${seat.engine.name}" returned no move for ${player}`)
  }

  state.play(move.x, move.y)
  logger.debug(`${player} (${seat.engine.name}) plays ${moveToString(move)}`)
  return move
}

/**
 * Plays seated turns until the game is over or an unseated side is on move.
 */
export function runMatch(state: GameState, seats: Seats): MatchResult {
  const moves: Move[] = []

  let seat = seats[state.currentPlayer]
  while (!state.isGameOver() && seat) {
    moves.push(playTurn(state, seat))
    seat = seats[state.currentPlayer]
  }

  const finished = state.isGameOver()
  const score = { black: state.countDiscs('black'), white: state.countDiscs('white') }
  if (finished) {
    logger.debug(`Final score - Black: ${score.black}, White: ${score.white}`)
  }

  return { finished, winner: state.getWinner(), moves, score }
}
