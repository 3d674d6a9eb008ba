/**
 * AI Engines Index
 *
 * Registers all available AI engines with the global registry.
 * Import this module to ensure engines are registered before use.
 */

import { engineRegistry } from '../ai-engine'
import { SearchEngine, alphaBetaEngine, minimaxEngine } from './search-engine'
import { RandomEngine, randomEngine } from './random-engine'

engineRegistry.register(minimaxEngine)
engineRegistry.register(alphaBetaEngine)
engineRegistry.register(randomEngine)
engineRegistry.alias('ab', 'alphabeta')

// Set standard minimax as the default engine
engineRegistry.setDefault('minimax')

export { SearchEngine, RandomEngine, minimaxEngine, alphaBetaEngine, randomEngine }
