/**
 * HandPhase.ts
 * Hand lifecycle phases and the transitions allowed between them
 */

import { Street } from './TableState';
import { EngineErrors } from './EngineErrors';

// ============================================================================
// Types
// ============================================================================

export type HandPhase =
  | 'HAND_SETUP'
  | 'PREFLOP_BETTING'
  | 'FLOP'
  | 'FLOP_BETTING'
  | 'TURN'
  | 'TURN_BETTING'
  | 'RIVER'
  | 'RIVER_BETTING'
  | 'SHOWDOWN'
  | 'HAND_COMPLETE';

// ============================================================================
// Transition Table
// ============================================================================

/**
 * Any betting phase may end the hand early when one player remains.
 */
export const HAND_TRANSITIONS: Readonly<Record<HandPhase, readonly HandPhase[]>> = {
  HAND_SETUP: ['PREFLOP_BETTING'],
  PREFLOP_BETTING: ['FLOP', 'HAND_COMPLETE'],
  FLOP: ['FLOP_BETTING'],
  FLOP_BETTING: ['TURN', 'HAND_COMPLETE'],
  TURN: ['TURN_BETTING'],
  TURN_BETTING: ['RIVER', 'HAND_COMPLETE'],
  RIVER: ['RIVER_BETTING'],
  RIVER_BETTING: ['SHOWDOWN', 'HAND_COMPLETE'],
  SHOWDOWN: ['HAND_COMPLETE'],
  HAND_COMPLETE: [],
};

const BETTING_PHASE_BY_STREET: Record<Street, HandPhase> = {
  preflop: 'PREFLOP_BETTING',
  flop: 'FLOP_BETTING',
  turn: 'TURN_BETTING',
  river: 'RIVER_BETTING',
};

export function canTransition(from: HandPhase, to: HandPhase): boolean {
  return HAND_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: HandPhase, to: HandPhase): HandPhase {
  if (!canTransition(from, to)) {
    throw EngineErrors.invalidTransition(from, to);
  }
  return to;
}

export function bettingPhaseFor(street: Street): HandPhase {
  return BETTING_PHASE_BY_STREET[street];
}

export function isBettingPhase(phase: HandPhase): boolean {
  return phase.endsWith('_BETTING');
}
