/**
 * TableState.ts
 * Hand-scoped table state for Texas Hold'em
 *
 * Immutable state representation for a table during one hand.
 * All state transitions return new state objects.
 */

import { Card } from './Card';

// ============================================================================
// Types
// ============================================================================

export type Street = 'preflop' | 'flop' | 'turn' | 'river';

export type PlayerStatus = 'active' | 'folded' | 'all-in' | 'sitting-out';

/**
 * A seat as it persists between hands
 */
export interface Seat {
  readonly id: string;
  readonly name: string;
  readonly seat: number;
  readonly stack: number;
  readonly sittingOut: boolean;
}

export interface Player {
  readonly id: string;
  readonly name: string;
  readonly seat: number;
  readonly stack: number;
  /** Stack before blinds; committed chips never exceed it */
  readonly startingStack: number;
  readonly holeCards: readonly Card[];
  readonly status: PlayerStatus;
  readonly currentBet: number; // Bet in current betting round
  readonly totalBetThisHand: number; // Total bet across all streets
}

export interface TableState {
  /** All seated players, in seat order */
  readonly players: readonly Player[];
  /** Dealer button position (player index) */
  readonly dealerIndex: number;
  readonly smallBlindIndex: number;
  readonly bigBlindIndex: number;
  readonly street: Street;
  readonly communityCards: readonly Card[];
  readonly smallBlind: number;
  readonly bigBlind: number;
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Per-hand copy of a seat. Empty stacks and sitting-out seats are not dealt in.
 */
export function createHandPlayer(seat: Seat): Player {
  const dealtIn = seat.stack > 0 && !seat.sittingOut;
  return {
    id: seat.id,
    name: seat.name,
    seat: seat.seat,
    stack: seat.stack,
    startingStack: seat.stack,
    holeCards: [],
    status: dealtIn ? 'active' : 'sitting-out',
    currentBet: 0,
    totalBetThisHand: 0,
  };
}

/**
 * Create table state for a new hand. The dealer index must point at a
 * dealt-in player.
 */
export function createTableState(
  seats: readonly Seat[],
  dealerIndex: number,
  smallBlind: number,
  bigBlind: number
): TableState {
  const players = seats.map(createHandPlayer);
  const draft: TableState = {
    players,
    dealerIndex,
    smallBlindIndex: -1,
    bigBlindIndex: -1,
    street: 'preflop',
    communityCards: [],
    smallBlind,
    bigBlind,
  };

  // Heads-up: dealer is SB. 3+ players: left of dealer is SB.
  const dealtIn = getDealtInPlayers(draft).length;
  const smallBlindIndex = dealtIn === 2
    ? dealerIndex
    : getNextIndex(draft, dealerIndex, isDealtIn);
  const bigBlindIndex = getNextIndex(draft, smallBlindIndex, isDealtIn);

  return { ...draft, smallBlindIndex, bigBlindIndex };
}

// ============================================================================
// State Query Functions
// ============================================================================

export function isDealtIn(player: Player): boolean {
  return player.status !== 'sitting-out';
}

/**
 * Still contesting the pot (active or all-in)
 */
export function isInHand(player: Player): boolean {
  return player.status === 'active' || player.status === 'all-in';
}

/**
 * Can still make betting decisions
 */
export function canAct(player: Player): boolean {
  return player.status === 'active';
}

export function getDealtInPlayers(state: TableState): readonly Player[] {
  return state.players.filter(isDealtIn);
}

/**
 * Get players still in the hand (not folded, not sitting out)
 */
export function getActivePlayers(state: TableState): readonly Player[] {
  return state.players.filter(isInHand);
}

/**
 * Next index clockwise from `fromIndex` (exclusive) whose player matches,
 * or -1 when nobody does.
 */
export function getNextIndex(
  state: TableState,
  fromIndex: number,
  predicate: (player: Player) => boolean
): number {
  const numPlayers = state.players.length;

  for (let i = 1; i <= numPlayers; i++) {
    const nextIndex = (fromIndex + i) % numPlayers;
    if (predicate(state.players[nextIndex])) {
      return nextIndex;
    }
  }

  return -1;
}

/**
 * Indices of matching players clockwise, starting left of `fromIndex`
 * and ending with `fromIndex` itself.
 */
export function getClockwiseOrder(
  state: TableState,
  fromIndex: number,
  predicate: (player: Player) => boolean
): number[] {
  const numPlayers = state.players.length;
  const order: number[] = [];

  for (let i = 1; i <= numPlayers; i++) {
    const index = (fromIndex + i) % numPlayers;
    if (predicate(state.players[index])) {
      order.push(index);
    }
  }

  return order;
}

/**
 * Player ids left of the dealer, ending with the dealer. Used for odd chips.
 */
export function getPositionOrder(state: TableState): string[] {
  return getClockwiseOrder(state, state.dealerIndex, isDealtIn).map(i => state.players[i].id);
}

// ============================================================================
// State Update Functions
// ============================================================================

export function updatePlayer(
  state: TableState,
  playerIndex: number,
  updates: Partial<Player>
): TableState {
  const newPlayers = state.players.map((p, i) =>
    i === playerIndex ? { ...p, ...updates } : p
  );
  return { ...state, players: newPlayers };
}

/**
 * Move chips from a player's stack into their round and hand commitments.
 * Emptying the stack makes the player all-in.
 */
export function commitChips(state: TableState, playerIndex: number, amount: number): TableState {
  const player = state.players[playerIndex];
  const stack = player.stack - amount;
  return updatePlayer(state, playerIndex, {
    stack,
    currentBet: player.currentBet + amount,
    totalBetThisHand: player.totalBetThisHand + amount,
    status: stack === 0 ? 'all-in' : player.status,
  });
}

/**
 * Move to the given street and clear per-round bets
 */
export function advanceStreet(state: TableState, street: Street): TableState {
  return {
    ...state,
    street,
    players: state.players.map(p => ({ ...p, currentBet: 0 })),
  };
}

export function addCommunityCards(state: TableState, cards: readonly Card[]): TableState {
  return {
    ...state,
    communityCards: [...state.communityCards, ...cards],
  };
}

/**
 * Credit pot winnings back to stacks
 */
export function applyPayouts(
  state: TableState,
  payouts: ReadonlyMap<string, number>
): TableState {
  return {
    ...state,
    players: state.players.map(p => ({
      ...p,
      stack: p.stack + (payouts.get(p.id) ?? 0),
    })),
  };
}
