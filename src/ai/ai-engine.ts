/**
 * AI Engine Abstraction Layer
 *
 * Provides a pluggable interface for computer opponents. Engines are looked
 * up by name in a registry so the configured AI mode can be swapped without
 * touching the caller.
 */

import type { GameState, Move, Player } from '../game/othello'
import { createLogger } from '../lib/logger'

const logger = createLogger('Engines')

// ============================================================================
// CORE TYPES
// ============================================================================

/**
 * Configuration passed to engines for move selection.
 */
export interface EngineConfig {
  /** Search depth in plies; 0 makes search engines pass */
  searchDepth: number
  /** Heuristic name; unknown names use all_in_one */
  heuristic: string
}

/**
 * Search statistics for debugging and benchmarking.
 */
export interface SearchInfo {
  depth: number
  nodesSearched: number
  /** Time spent on move selection (ms) */
  timeUsed: number
}

export interface MoveResult {
  /** Selected move, PASS when the engine has nothing to play */
  move: Move
  /** Score of the selected move, if the engine computes one */
  score?: number
  searchInfo?: SearchInfo
}

/**
 * Pluggable AI engine interface.
 *
 * Engines are stateless and never mutate the state they are given.
 */
export interface OthelloEngine {
  /** Unique engine identifier */
  readonly name: string

  /** Human-readable description */
  readonly description: string

  /**
   * Select a move for the side to move.
   *
   * @param state - Current game state
   * @param config - Engine configuration
   */
  selectMove(state: GameState, config: EngineConfig): MoveResult

  /**
   * Evaluate the position for the given player.
   * Optional - not all engines support static evaluation.
   */
  evaluatePosition?(state: GameState, player: Player, config: EngineConfig): number
}

// ============================================================================
// ENGINE REGISTRY
// ============================================================================

/**
 * Registry for AI engines.
 * Provides lookup by name or alias with fallback to the default engine.
 */
export class EngineRegistry {
  private engines: Map<string, OthelloEngine> = new Map()
  private aliases: Map<string, string> = new Map()
  private defaultEngineName: string | null = null

  /**
   * Register an engine. The first registered engine becomes the default.
   */
  register(engine: OthelloEngine): void {
    this.engines.set(engine.name, engine)

    if (this.defaultEngineName === null) {
      this.defaultEngineName = engine.name
    }
  }

  /**
   * Make `alias` resolve to the engine registered as `name`.
   */
  alias(alias: string, name: string): void {
    this.aliases.set(alias, name)
  }

  /**
   * Get an engine by name or alias.
   *
   * @returns Engine instance or null if not found
   */
  get(name: string): OthelloEngine | null {
    return this.engines.get(name) ?? this.engines.get(this.aliases.get(name) ?? '') ?? null
  }

  /**
   * Get an engine by name, falling back to the default engine.
   *
   * @throws Error if the name is unknown and there is no default
   */
  getWithFallback(name: string): OthelloEngine {
    const engine = this.get(name)
    if (engine) {
      return engine
    }

    const fallback = this.getDefault()
    if (fallback) {
      logger.warn(`Engine "${name}" not found, falling back to "${fallback.name}"`)
      return fallback
    }

    throw new Error('No AI engines available')
  }

  /**
   * @throws Error if engine not registered
   */
  setDefault(name: string): void {
    if (!this.engines.has(name)) {
      throw new Error(`Engine "${name}" not registered`)
    }
    this.defaultEngineName = name
  }

  getDefault(): OthelloEngine | null {
    if (this.defaultEngineName === null) return null
    return this.get(this.defaultEngineName)
  }

  list(): Array<{ name: string; description: string }> {
    return Array.from(this.engines.values()).map((engine) => ({
      name: engine.name,
      description: engine.description,
    }))
  }
}

// Global engine registry instance, filled by ./engines
export const engineRegistry = new EngineRegistry()
