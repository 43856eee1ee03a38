/**
 * Game Engine
 *
 * Core Texas Hold'em table logic.
 */

// Card primitives
export * from './Card';
export * from './Deck';

// Hand evaluation
export * from './HandRank';
export * from './HandEvaluator';

// Game state
export * from './TableState';
export * from './BettingRound';
export * from './HandPhase';

// Orchestration
export * from './EngineErrors';
export * from './GameEvents';
export * from './Snapshot';
export * from './GameLoop';
