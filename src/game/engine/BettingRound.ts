/**
 * BettingRound.ts
 * Betting logic for Texas Hold'em
 *
 * Handles action validation and state updates for one betting round.
 * Every chip moved is recorded in the hand's contribution ledger.
 */

import {
  TableState,
  Street,
  canAct,
  commitChips,
  getActivePlayers,
  getClockwiseOrder,
  updatePlayer,
} from './TableState';
import { EngineErrors } from './EngineErrors';
import type { ContributionLedger } from '../../economy/Pot';

// ============================================================================
// Types
// ============================================================================

export type ActionType = 'fold' | 'check' | 'call' | 'raise' | 'all-in';

export interface ActionRequest {
  readonly playerId: string;
  readonly type: ActionType;
  /** Raise-to total for the round. Only read for raises. */
  readonly amount?: number;
}

export type RoundStatus = 'awaiting-action' | 'complete';

export interface BettingRoundState {
  readonly street: Street;
  /** Bet-to-call for this round */
  readonly currentBet: number;
  /** Size of the last full raise, never below the big blind */
  readonly minRaise: number;
  readonly lastAggressorIndex: number;
  /** Player indices still to act; the first one is on the clock */
  readonly pending: readonly number[];
  /** Players who may only call or fold after a short all-in */
  readonly raiseLocked: readonly number[];
  readonly status: RoundStatus;
}

export interface ValidActions {
  readonly canFold: boolean;
  readonly canCheck: boolean;
  readonly canCall: boolean;
  readonly callAmount: number;
  readonly canRaise: boolean;
  readonly minRaiseTo: number;
  readonly maxRaiseTo: number;
  readonly canAllIn: boolean;
  readonly allInAmount: number;
}

export interface AppliedAction {
  readonly playerId: string;
  readonly type: ActionType;
  /** Chips moved from the stack by this action */
  readonly amount: number;
  /** The player's round commitment afterwards */
  readonly roundBet: number;
  readonly isAllIn: boolean;
}

export interface RoundUpdate {
  readonly table: TableState;
  readonly round: BettingRoundState;
  readonly action: AppliedAction;
}

export const NO_VALID_ACTIONS: ValidActions = {
  canFold: false,
  canCheck: false,
  canCall: false,
  callAmount: 0,
  canRaise: false,
  minRaiseTo: 0,
  maxRaiseTo: 0,
  canAllIn: false,
  allInAmount: 0,
};

// ============================================================================
// Round Setup
// ============================================================================

/**
 * Open a betting round. Blinds must already be posted for pre-flop.
 *
 * Pre-flop action starts left of the big blind, later streets left of the
 * button. A lone player who can still act only gets a turn when unmatched.
 */
export function startBettingRound(table: TableState, street: Street): BettingRoundState {
  const highestBet = Math.max(0, ...table.players.map(p => p.currentBet));
  const currentBet = street === 'preflop'
    ? Math.max(table.bigBlind, highestBet)
    : highestBet;

  const startAfter = street === 'preflop' ? table.bigBlindIndex : table.dealerIndex;
  const order = getClockwiseOrder(table, startAfter, canAct);

  let pending: number[] = [];
  if (getActivePlayers(table).length > 1) {
    if (order.length >= 2) {
      pending = order;
    } else if (order.length === 1 && table.players[order[0]].currentBet < currentBet) {
      pending = order;
    }
  }

  return {
    street,
    currentBet,
    minRaise: table.bigBlind,
    lastAggressorIndex: street === 'preflop' ? table.bigBlindIndex : -1,
    pending,
    raiseLocked: [],
    status: pending.length === 0 ? 'complete' : 'awaiting-action',
  };
}

export function getActorIndex(round: BettingRoundState): number {
  return round.status === 'complete' ? -1 : round.pending[0] ?? -1;
}

export function isRoundComplete(round: BettingRoundState): boolean {
  return round.status === 'complete';
}

// ============================================================================
// Action Validation
// ============================================================================

/**
 * Get valid actions for the player on the clock
 */
export function getValidActions(table: TableState, round: BettingRoundState): ValidActions {
  const actorIndex = getActorIndex(round);
  const player = table.players[actorIndex];

  if (!player || !canAct(player)) {
    return NO_VALID_ACTIONS;
  }

  const toCall = Math.max(0, round.currentBet - player.currentBet);
  const locked = round.raiseLocked.includes(actorIndex);
  const minRaiseTo = round.currentBet + round.minRaise;
  const maxRaiseTo = player.currentBet + player.stack;
  const canRaise = !locked && player.stack > toCall && maxRaiseTo >= minRaiseTo;

  return {
    canFold: true,
    canCheck: toCall === 0,
    canCall: toCall > 0 && player.stack > 0,
    callAmount: Math.min(toCall, player.stack),
    canRaise,
    minRaiseTo: canRaise ? minRaiseTo : 0,
    maxRaiseTo: canRaise ? maxRaiseTo : 0,
    canAllIn: player.stack > 0 && (!locked || player.stack <= toCall),
    allInAmount: player.stack,
  };
}

/**
 * Throw the IllegalActionError the request violates, if any
 */
export function validateAction(
  table: TableState,
  round: BettingRoundState,
  request: ActionRequest
): void {
  if (round.status === 'complete') {
    throw EngineErrors.roundComplete();
  }

  const actorIndex = getActorIndex(round);
  const player = table.players[actorIndex];
  if (!player || player.id !== request.playerId) {
    throw EngineErrors.notYourTurn(request.playerId, player ? player.id : null);
  }
  if (!canAct(player)) {
    throw EngineErrors.playerNotActive(player.id, player.status);
  }

  const toCall = Math.max(0, round.currentBet - player.currentBet);
  const locked = round.raiseLocked.includes(actorIndex);

  switch (request.type) {
    case 'fold':
      return;

    case 'check':
      if (toCall > 0) {
        throw EngineErrors.checkNotAllowed(toCall);
      }
      return;

    case 'call':
      if (toCall === 0) {
        throw EngineErrors.nothingToCall();
      }
      return;

    case 'raise': {
      const amount = request.amount;
      if (amount === undefined || !Number.isInteger(amount) || amount <= 0) {
        throw EngineErrors.invalidAmount(amount);
      }
      if (locked) {
        throw EngineErrors.raiseNotAllowed(player.id);
      }
      const minRaiseTo = round.currentBet + round.minRaise;
      if (amount < minRaiseTo) {
        throw EngineErrors.belowMinRaise(amount, minRaiseTo);
      }
      const needed = amount - player.currentBet;
      if (needed > player.stack) {
        throw EngineErrors.insufficientStack(player.id, needed, player.stack);
      }
      return;
    }

    case 'all-in':
      if (player.stack <= 0) {
        throw EngineErrors.noChips(player.id);
      }
      if (locked && player.stack > toCall) {
        throw EngineErrors.raiseNotAllowed(player.id);
      }
      return;

    default:
      throw EngineErrors.unknownAction(String(request.type));
  }
}

// ============================================================================
// Action Application
// ============================================================================

/**
 * Apply an action and return the new table and round state.
 * Throws without touching either when the action is illegal.
 */
export function applyAction(
  table: TableState,
  round: BettingRoundState,
  request: ActionRequest,
  ledger: ContributionLedger
): RoundUpdate {
  validateAction(table, round, request);

  const playerIndex = getActorIndex(round);
  const player = table.players[playerIndex];
  const remaining = round.pending.slice(1);

  let newTable = table;
  let newRound: BettingRoundState = { ...round, pending: remaining };
  let moved = 0;

  const commit = (amount: number): void => {
    if (amount <= 0) return;
    newTable = commitChips(newTable, playerIndex, amount);
    ledger.contribute(player.id, amount, round.street);
    moved = amount;
  };

  switch (request.type) {
    case 'fold':
      newTable = updatePlayer(newTable, playerIndex, { status: 'folded' });
      break;

    case 'check':
      break;

    case 'call':
      commit(Math.min(round.currentBet - player.currentBet, player.stack));
      break;

    case 'raise': {
      const raiseTo = request.amount ?? 0;
      commit(raiseTo - player.currentBet);
      newRound = fullRaise(newTable, round, playerIndex, raiseTo);
      break;
    }

    case 'all-in': {
      const newBet = player.currentBet + player.stack;
      commit(player.stack);

      const raiseSize = newBet - round.currentBet;
      if (raiseSize >= round.minRaise) {
        newRound = fullRaise(newTable, round, playerIndex, newBet);
      } else if (raiseSize > 0) {
        // Short all-in: others must respond, but it does not reopen raising
        // for anyone who already acted since the last full raise.
        const others = othersToAct(newTable, playerIndex);
        const alreadyActed = others.filter(i => !remaining.includes(i));
        newRound = {
          ...round,
          currentBet: newBet,
          pending: others,
          raiseLocked: [...new Set([...round.raiseLocked, ...alreadyActed])],
        };
      }
      break;
    }
  }

  const updated = newTable.players[playerIndex];
  return {
    table: newTable,
    round: settleStatus(newTable, newRound),
    action: {
      playerId: player.id,
      type: request.type,
      amount: moved,
      roundBet: updated.currentBet,
      isAllIn: updated.status === 'all-in',
    },
  };
}

// ============================================================================
// Helpers
// ============================================================================

function othersToAct(table: TableState, fromIndex: number): number[] {
  return getClockwiseOrder(table, fromIndex, canAct).filter(i => i !== fromIndex);
}

function fullRaise(
  table: TableState,
  round: BettingRoundState,
  raiserIndex: number,
  raiseTo: number
): BettingRoundState {
  return {
    ...round,
    currentBet: raiseTo,
    minRaise: Math.max(round.minRaise, raiseTo - round.currentBet),
    lastAggressorIndex: raiserIndex,
    pending: othersToAct(table, raiserIndex),
    raiseLocked: [],
  };
}

function settleStatus(table: TableState, round: BettingRoundState): BettingRoundState {
  if (getActivePlayers(table).length <= 1 || round.pending.length === 0) {
    return { ...round, pending: [], status: 'complete' };
  }
  return { ...round, status: 'awaiting-action' };
}
