/**
 * EngineErrors.ts
 * Error types raised by the hand engine
 *
 * Recoverable errors (IllegalActionError and its subtype) leave state untouched
 * and the actor is asked again. Everything else aborts the hand.
 */

import type { Card } from './Card';

// ============================================================================
// Error Codes
// ============================================================================

export enum EngineErrorCode {
  // Action errors (recoverable)
  ILLEGAL_ACTION = 'ILLEGAL_ACTION',
  INSUFFICIENT_STACK = 'INSUFFICIENT_STACK',

  // Invariant violations (fatal)
  EMPTY_DECK = 'EMPTY_DECK',
  INVALID_HAND = 'INVALID_HAND',
  INVALID_TRANSITION = 'INVALID_TRANSITION',

  // Table management
  TABLE_SETUP = 'TABLE_SETUP',
}

/**
 * Specific reason an action was rejected
 */
export type IllegalActionReason =
  | 'NO_ACTIVE_HAND'
  | 'ROUND_COMPLETE'
  | 'NOT_YOUR_TURN'
  | 'PLAYER_NOT_ACTIVE'
  | 'CHECK_NOT_ALLOWED'
  | 'NOTHING_TO_CALL'
  | 'BELOW_MIN_RAISE'
  | 'RAISE_NOT_ALLOWED'
  | 'INVALID_AMOUNT'
  | 'NO_CHIPS'
  | 'UNKNOWN_ACTION'
  | 'INSUFFICIENT_STACK';

// ============================================================================
// Base Error Class
// ============================================================================

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: EngineErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

export class IllegalActionError extends EngineError {
  readonly reason: IllegalActionReason;

  constructor(
    reason: IllegalActionReason,
    message: string,
    details?: Record<string, unknown>,
    code: EngineErrorCode = EngineErrorCode.ILLEGAL_ACTION
  ) {
    super(code, message, { reason, ...details });
    this.name = 'IllegalActionError';
    this.reason = reason;
  }
}

/**
 * A raise needs more chips than the player holds. Going all-in is the
 * corrected action to offer.
 */
export class InsufficientStackError extends IllegalActionError {
  readonly playerId: string;
  readonly requested: number;
  readonly available: number;
  readonly suggestedAction = 'all-in' as const;

  constructor(playerId: string, requested: number, available: number) {
    super(
      'INSUFFICIENT_STACK',
      `Player ${playerId} needs ${requested} chips but has ${available}; go all-in instead`,
      { playerId, requested, available, suggestedAction: 'all-in' },
      EngineErrorCode.INSUFFICIENT_STACK
    );
    this.name = 'InsufficientStackError';
    this.playerId = playerId;
    this.requested = requested;
    this.available = available;
  }
}

export class EmptyDeckError extends EngineError {
  constructor(requested: number, remaining: number) {
    super(
      EngineErrorCode.EMPTY_DECK,
      `Cannot deal ${requested} cards, only ${remaining} remaining`,
      { requested, remaining }
    );
    this.name = 'EmptyDeckError';
  }
}

export class HandEvaluationError extends EngineError {
  constructor(message: string, cards?: readonly Card[]) {
    super(EngineErrorCode.INVALID_HAND, message, cards ? { cards } : undefined);
    this.name = 'HandEvaluationError';
  }
}

export class InvalidTransitionError extends EngineError {
  constructor(from: string, to: string) {
    super(
      EngineErrorCode.INVALID_TRANSITION,
      `Illegal hand transition ${from} -> ${to}`,
      { from, to }
    );
    this.name = 'InvalidTransitionError';
  }
}

export class TableSetupError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(EngineErrorCode.TABLE_SETUP, message, details);
    this.name = 'TableSetupError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * True for errors the caller should answer by asking the same actor again.
 */
export function isRecoverableError(error: unknown): error is IllegalActionError {
  return error instanceof IllegalActionError;
}

// ============================================================================
// Error Factory
// ============================================================================

export const EngineErrors = {
  noActiveHand: () =>
    new IllegalActionError('NO_ACTIVE_HAND', 'No hand is in progress'),

  roundComplete: () =>
    new IllegalActionError('ROUND_COMPLETE', 'Betting round is already complete'),

  notYourTurn: (playerId: string, expected: string | null) =>
    new IllegalActionError(
      'NOT_YOUR_TURN',
      `Not ${playerId}'s turn${expected ? `, waiting on ${expected}` : ''}`,
      { playerId, expected }
    ),

  playerNotActive: (playerId: string, status: string) =>
    new IllegalActionError(
      'PLAYER_NOT_ACTIVE',
      `Player ${playerId} cannot act while ${status}`,
      { playerId, status }
    ),

  checkNotAllowed: (toCall: number) =>
    new IllegalActionError(
      'CHECK_NOT_ALLOWED',
      `Cannot check, ${toCall} to call`,
      { toCall }
    ),

  nothingToCall: () =>
    new IllegalActionError('NOTHING_TO_CALL', 'Nothing to call, check instead'),

  belowMinRaise: (amount: number, minRaiseTo: number) =>
    new IllegalActionError(
      'BELOW_MIN_RAISE',
      `Raise to ${amount} is below the minimum raise to ${minRaiseTo}`,
      { amount, minRaiseTo }
    ),

  raiseNotAllowed: (playerId: string) =>
    new IllegalActionError(
      'RAISE_NOT_ALLOWED',
      `Betting was not reopened for ${playerId}; call or fold`,
      { playerId }
    ),

  invalidAmount: (amount: unknown) =>
    new IllegalActionError(
      'INVALID_AMOUNT',
      `Invalid amount ${String(amount)}: must be a positive integer`,
      { amount }
    ),

  noChips: (playerId: string) =>
    new IllegalActionError('NO_CHIPS', `Player ${playerId} has no chips`, { playerId }),

  unknownAction: (type: string) =>
    new IllegalActionError('UNKNOWN_ACTION', `Unknown action type ${type}`, { type }),

  insufficientStack: (playerId: string, requested: number, available: number) =>
    new InsufficientStackError(playerId, requested, available),

  emptyDeck: (requested: number, remaining: number) =>
    new EmptyDeckError(requested, remaining),

  invalidHand: (message: string, cards?: readonly Card[]) =>
    new HandEvaluationError(message, cards),

  invalidTransition: (from: string, to: string) =>
    new InvalidTransitionError(from, to),

  tableSetup: (message: string, details?: Record<string, unknown>) =>
    new TableSetupError(message, details),
};
