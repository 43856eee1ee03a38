/**
 * GameEvents.ts
 * Event types emitted during hand transitions
 *
 * Events are immutable, JSON-friendly records of state changes.
 * Used for hand history export and console rendering.
 */

import { Street } from './TableState';
import { Card } from './Card';

// ============================================================================
// Event Types
// ============================================================================

export type GameEventType =
  | 'HAND_STARTED'
  | 'BLINDS_POSTED'
  | 'HOLE_CARDS_DEALT'
  | 'PLAYER_TO_ACT'
  | 'PLAYER_ACTED'
  | 'BETTING_ROUND_COMPLETE'
  | 'STREET_CHANGED'
  | 'COMMUNITY_CARDS_DEALT'
  | 'HAND_REVEALED'
  | 'POT_AWARDED'
  | 'HAND_ENDED'
  | 'HAND_ABORTED';

export type HandEndReason = 'showdown' | 'uncontested';

// ============================================================================
// Base Event Interface
// ============================================================================

export interface BaseGameEvent {
  readonly type: GameEventType;
  readonly timestamp: number;
  readonly eventId: string;
  readonly handId: string;
  readonly tableId: string;
  readonly sequence: number;
}

/**
 * Identifies the hand an event belongs to
 */
export interface EventContext {
  readonly handId: string;
  readonly tableId: string;
}

// ============================================================================
// Specific Events
// ============================================================================

export interface HandStartedEvent extends BaseGameEvent {
  readonly type: 'HAND_STARTED';
  readonly handNumber: number;
  readonly dealerSeat: number;
  readonly smallBlindSeat: number;
  readonly bigBlindSeat: number;
  readonly playerIds: readonly string[];
  readonly startingStacks: Readonly<Record<string, number>>;
}

export interface PostedBlind {
  readonly playerId: string;
  readonly amount: number;
  readonly isAllIn: boolean;
}

export interface BlindsPostedEvent extends BaseGameEvent {
  readonly type: 'BLINDS_POSTED';
  readonly smallBlind: PostedBlind;
  readonly bigBlind: PostedBlind;
  readonly potTotal: number;
}

export interface HoleCardsDealtEvent extends BaseGameEvent {
  readonly type: 'HOLE_CARDS_DEALT';
  readonly playerCards: Readonly<Record<string, readonly Card[]>>;
}

export interface PlayerToActEvent extends BaseGameEvent {
  readonly type: 'PLAYER_TO_ACT';
  readonly playerId: string;
  readonly street: Street;
  readonly callAmount: number;
  readonly minRaiseTo: number;
  readonly maxRaiseTo: number;
}

export interface PlayerActedEvent extends BaseGameEvent {
  readonly type: 'PLAYER_ACTED';
  readonly playerId: string;
  readonly street: Street;
  readonly action: string;
  readonly amount: number;
  readonly roundBet: number;
  readonly playerStack: number;
  readonly potTotal: number;
  readonly isAllIn: boolean;
}

export interface BettingRoundCompleteEvent extends BaseGameEvent {
  readonly type: 'BETTING_ROUND_COMPLETE';
  readonly street: Street;
  readonly potTotal: number;
  readonly activePlayerCount: number;
}

export interface StreetChangedEvent extends BaseGameEvent {
  readonly type: 'STREET_CHANGED';
  readonly fromStreet: Street;
  readonly toStreet: Street;
  readonly potTotal: number;
}

export interface CommunityCardsDealtEvent extends BaseGameEvent {
  readonly type: 'COMMUNITY_CARDS_DEALT';
  readonly street: Street;
  readonly cards: readonly Card[];
  readonly board: readonly Card[];
}

export interface HandRevealedEvent extends BaseGameEvent {
  readonly type: 'HAND_REVEALED';
  readonly playerId: string;
  readonly holeCards: readonly Card[];
  readonly handRank: string;
  readonly handDescription: string;
}

export interface PotAwardedEvent extends BaseGameEvent {
  readonly type: 'POT_AWARDED';
  readonly potIndex: number;
  readonly amount: number;
  readonly winnerIds: readonly string[];
  readonly amounts: Readonly<Record<string, number>>;
  readonly winningHandDescription: string | null;
}

export interface HandEndedEvent extends BaseGameEvent {
  readonly type: 'HAND_ENDED';
  readonly reason: HandEndReason;
  readonly winnerIds: readonly string[];
  readonly finalStacks: Readonly<Record<string, number>>;
  readonly handDuration: number;
}

export interface HandAbortedEvent extends BaseGameEvent {
  readonly type: 'HAND_ABORTED';
  readonly errorCode: string;
  readonly errorMessage: string;
  readonly restoredStacks: Readonly<Record<string, number>>;
}

// ============================================================================
// Event Union Type
// ============================================================================

export type GameEvent =
  | HandStartedEvent
  | BlindsPostedEvent
  | HoleCardsDealtEvent
  | PlayerToActEvent
  | PlayerActedEvent
  | BettingRoundCompleteEvent
  | StreetChangedEvent
  | CommunityCardsDealtEvent
  | HandRevealedEvent
  | PotAwardedEvent
  | HandEndedEvent
  | HandAbortedEvent;

// ============================================================================
// Event Factories
// ============================================================================

let eventCounter = 0;
let sequenceCounter = 0;

function generateEventId(): string {
  return `evt_${Date.now()}_${++eventCounter}`;
}

function nextSequence(): number {
  return ++sequenceCounter;
}

export function resetEventSequence(): void {
  sequenceCounter = 0;
}

function stamp<T extends GameEventType>(type: T, context: EventContext) {
  return {
    type,
    timestamp: Date.now(),
    eventId: generateEventId(),
    handId: context.handId,
    tableId: context.tableId,
    sequence: nextSequence(),
  };
}

export function createHandStartedEvent(
  context: EventContext,
  handNumber: number,
  seats: { dealer: number; smallBlind: number; bigBlind: number },
  playerIds: readonly string[],
  startingStacks: Readonly<Record<string, number>>
): HandStartedEvent {
  return {
    ...stamp('HAND_STARTED', context),
    handNumber,
    dealerSeat: seats.dealer,
    smallBlindSeat: seats.smallBlind,
    bigBlindSeat: seats.bigBlind,
    playerIds,
    startingStacks,
  };
}

export function createBlindsPostedEvent(
  context: EventContext,
  smallBlind: PostedBlind,
  bigBlind: PostedBlind,
  potTotal: number
): BlindsPostedEvent {
  return {
    ...stamp('BLINDS_POSTED', context),
    smallBlind,
    bigBlind,
    potTotal,
  };
}

export function createHoleCardsDealtEvent(
  context: EventContext,
  playerCards: Readonly<Record<string, readonly Card[]>>
): HoleCardsDealtEvent {
  return { ...stamp('HOLE_CARDS_DEALT', context), playerCards };
}

export function createPlayerToActEvent(
  context: EventContext,
  playerId: string,
  street: Street,
  callAmount: number,
  minRaiseTo: number,
  maxRaiseTo: number
): PlayerToActEvent {
  return {
    ...stamp('PLAYER_TO_ACT', context),
    playerId,
    street,
    callAmount,
    minRaiseTo,
    maxRaiseTo,
  };
}

export function createPlayerActedEvent(
  context: EventContext,
  details: {
    playerId: string;
    street: Street;
    action: string;
    amount: number;
    roundBet: number;
    playerStack: number;
    potTotal: number;
    isAllIn: boolean;
  }
): PlayerActedEvent {
  return { ...stamp('PLAYER_ACTED', context), ...details };
}

export function createBettingRoundCompleteEvent(
  context: EventContext,
  street: Street,
  potTotal: number,
  activePlayerCount: number
): BettingRoundCompleteEvent {
  return {
    ...stamp('BETTING_ROUND_COMPLETE', context),
    street,
    potTotal,
    activePlayerCount,
  };
}

export function createStreetChangedEvent(
  context: EventContext,
  fromStreet: Street,
  toStreet: Street,
  potTotal: number
): StreetChangedEvent {
  return {
    ...stamp('STREET_CHANGED', context),
    fromStreet,
    toStreet,
    potTotal,
  };
}

export function createCommunityCardsDealtEvent(
  context: EventContext,
  street: Street,
  cards: readonly Card[],
  board: readonly Card[]
): CommunityCardsDealtEvent {
  return {
    ...stamp('COMMUNITY_CARDS_DEALT', context),
    street,
    cards,
    board,
  };
}

export function createHandRevealedEvent(
  context: EventContext,
  playerId: string,
  holeCards: readonly Card[],
  handRank: string,
  handDescription: string
): HandRevealedEvent {
  return {
    ...stamp('HAND_REVEALED', context),
    playerId,
    holeCards,
    handRank,
    handDescription,
  };
}

export function createPotAwardedEvent(
  context: EventContext,
  potIndex: number,
  amount: number,
  winnerIds: readonly string[],
  amounts: Readonly<Record<string, number>>,
  winningHandDescription: string | null
): PotAwardedEvent {
  return {
    ...stamp('POT_AWARDED', context),
    potIndex,
    amount,
    winnerIds,
    amounts,
    winningHandDescription,
  };
}

export function createHandEndedEvent(
  context: EventContext,
  reason: HandEndReason,
  winnerIds: readonly string[],
  finalStacks: Readonly<Record<string, number>>,
  handDuration: number
): HandEndedEvent {
  return {
    ...stamp('HAND_ENDED', context),
    reason,
    winnerIds,
    finalStacks,
    handDuration,
  };
}

export function createHandAbortedEvent(
  context: EventContext,
  errorCode: string,
  errorMessage: string,
  restoredStacks: Readonly<Record<string, number>>
): HandAbortedEvent {
  return {
    ...stamp('HAND_ABORTED', context),
    errorCode,
    errorMessage,
    restoredStacks,
  };
}

// ============================================================================
// Event Listener Types
// ============================================================================

export type GameEventListener = (event: GameEvent) => void;

export interface GameEventEmitter {
  on(listener: GameEventListener): () => void;
  emit(event: GameEvent): void;
  getHistory(): readonly GameEvent[];
  getHandHistory(handId: string): readonly GameEvent[];
  clearHistory(): void;
}

/**
 * Simple event emitter implementation.
 * A throwing listener is reported and skipped; the hand carries on.
 */
export function createGameEventEmitter(): GameEventEmitter {
  const listeners: Set<GameEventListener> = new Set();
  const history: GameEvent[] = [];

  return {
    on(listener: GameEventListener): () => void {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },

    emit(event: GameEvent): void {
      history.push(event);
      for (const listener of listeners) {
        try {
          listener(event);
        } catch (error) {
          console.error(`Event listener failed on ${event.type}:`, error);
        }
      }
    },

    getHistory(): readonly GameEvent[] {
      return [...history];
    },

    getHandHistory(handId: string): readonly GameEvent[] {
      return history.filter(e => e.handId === handId);
    },

    clearHistory(): void {
      history.length = 0;
    },
  };
}
