/**
 * Snapshot.ts
 * Read-only, per-viewer view of the table
 *
 * Hole cards are only shown to their owner, except that players still in
 * the hand at showdown are revealed to everyone. Folded hands stay hidden.
 */

import { Card } from './Card';
import { Street, Seat, TableState, PlayerStatus, isInHand } from './TableState';
import { HandPhase } from './HandPhase';
import { ActionType } from './BettingRound';

// ============================================================================
// Types
// ============================================================================

export interface ActionLogEntry {
  readonly street: Street;
  readonly playerId: string;
  readonly type: ActionType | 'small-blind' | 'big-blind';
  /** Chips moved by the action */
  readonly amount: number;
  readonly roundBet: number;
  readonly isAllIn: boolean;
}

export interface PlayerView {
  readonly id: string;
  readonly name: string;
  readonly seat: number;
  readonly stack: number;
  readonly status: PlayerStatus;
  readonly currentBet: number;
  readonly totalBet: number;
  /** null when hidden from the viewer */
  readonly holeCards: readonly Card[] | null;
  readonly isDealer: boolean;
  readonly isSmallBlind: boolean;
  readonly isBigBlind: boolean;
  readonly isActor: boolean;
}

export interface PotView {
  readonly index: number;
  readonly amount: number;
  readonly eligiblePlayerIds: readonly string[];
}

export interface TableSnapshot {
  readonly tableId: string;
  readonly viewerId: string | null;
  readonly handId: string | null;
  readonly handNumber: number;
  readonly phase: HandPhase | null;
  readonly street: Street | null;
  readonly board: readonly Card[];
  readonly pots: readonly PotView[];
  readonly potTotal: number;
  readonly currentBet: number;
  readonly players: readonly PlayerView[];
  readonly actorId: string | null;
  readonly dealerSeat: number | null;
  readonly smallBlind: number;
  readonly bigBlind: number;
  readonly actions: readonly ActionLogEntry[];
}

/**
 * What the engine exposes to build a snapshot
 */
export interface SnapshotSource {
  readonly tableId: string;
  readonly smallBlind: number;
  readonly bigBlind: number;
  readonly seats: readonly Seat[];
  readonly handNumber: number;
  readonly hand: {
    readonly handId: string;
    readonly phase: HandPhase;
    readonly table: TableState;
    readonly pots: readonly PotView[];
    readonly potTotal: number;
    readonly currentBet: number;
    readonly actorIndex: number;
    readonly reachedShowdown: boolean;
    readonly actions: readonly ActionLogEntry[];
  } | null;
}

// ============================================================================
// Builder
// ============================================================================

export function buildTableSnapshot(source: SnapshotSource, viewerId: string | null = null): TableSnapshot {
  const { hand } = source;

  if (!hand) {
    return {
      tableId: source.tableId,
      viewerId,
      handId: null,
      handNumber: source.handNumber,
      phase: null,
      street: null,
      board: [],
      pots: [],
      potTotal: 0,
      currentBet: 0,
      players: source.seats.map((seat): PlayerView => ({
        id: seat.id,
        name: seat.name,
        seat: seat.seat,
        stack: seat.stack,
        status: seat.sittingOut || seat.stack === 0 ? 'sitting-out' : 'active',
        currentBet: 0,
        totalBet: 0,
        holeCards: null,
        isDealer: false,
        isSmallBlind: false,
        isBigBlind: false,
        isActor: false,
      })),
      actorId: null,
      dealerSeat: null,
      smallBlind: source.smallBlind,
      bigBlind: source.bigBlind,
      actions: [],
    };
  }

  const { table } = hand;
  const players: PlayerView[] = table.players.map((player, index) => {
    const visible =
      player.holeCards.length > 0 &&
      (player.id === viewerId || (hand.reachedShowdown && isInHand(player)));

    return {
      id: player.id,
      name: player.name,
      seat: player.seat,
      stack: player.stack,
      status: player.status,
      currentBet: player.currentBet,
      totalBet: player.totalBetThisHand,
      holeCards: visible ? [...player.holeCards] : null,
      isDealer: index === table.dealerIndex,
      isSmallBlind: index === table.smallBlindIndex,
      isBigBlind: index === table.bigBlindIndex,
      isActor: index === hand.actorIndex,
    };
  });

  const actor = table.players[hand.actorIndex];

  return {
    tableId: source.tableId,
    viewerId,
    handId: hand.handId,
    handNumber: source.handNumber,
    phase: hand.phase,
    street: table.street,
    board: [...table.communityCards],
    pots: hand.pots.map(pot => ({ ...pot, eligiblePlayerIds: [...pot.eligiblePlayerIds] })),
    potTotal: hand.potTotal,
    currentBet: hand.currentBet,
    players,
    actorId: actor ? actor.id : null,
    dealerSeat: table.players[table.dealerIndex]?.seat ?? null,
    smallBlind: table.smallBlind,
    bigBlind: table.bigBlind,
    actions: [...hand.actions],
  };
}
