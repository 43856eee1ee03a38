/**
 * HandHistory.ts
 * Hand history export and action log formatting
 *
 * A record is plain JSON: cards are short keys ("As", "Td"), maps become
 * objects. Read-only with respect to game logic.
 */

import { cardKey, formatCards } from '../engine/Card';
import { Street } from '../engine/TableState';
import { GameEvent, PostedBlind } from '../engine/GameEvents';
import { HandResult } from '../engine/GameLoop';

// ============================================================================
// Version
// ============================================================================

/** Current hand history format version. Increment on breaking changes. */
export const HAND_HISTORY_VERSION = 1;

// ============================================================================
// Record Types
// ============================================================================

export interface HistoryAction {
  readonly street: Street;
  readonly playerId: string;
  readonly action: string;
  readonly amount: number;
  readonly roundBet: number;
  readonly isAllIn: boolean;
}

export interface HistoryPot {
  readonly index: number;
  readonly amount: number;
  readonly eligiblePlayerIds: readonly string[];
  readonly winners: Readonly<Record<string, number>>;
  readonly winningHand: string | null;
}

export interface HistoryShowdownHand {
  readonly playerId: string;
  readonly cards: readonly string[];
  readonly category: string;
  readonly description: string;
}

export interface HandHistoryRecord {
  /** Format version for compatibility checking */
  readonly version: number;
  readonly handId: string;
  readonly handNumber: number;
  readonly tableId: string;
  readonly startedAt: number | null;
  readonly dealerSeat: number | null;
  readonly startingStacks: Readonly<Record<string, number>>;
  readonly holeCards: Readonly<Record<string, readonly string[]>>;
  readonly actions: readonly HistoryAction[];
  readonly board: readonly string[];
  readonly reason: HandResult['reason'];
  readonly showdown: readonly HistoryShowdownHand[];
  readonly pots: readonly HistoryPot[];
  readonly payouts: Readonly<Record<string, number>>;
  readonly finalStacks: Readonly<Record<string, number>>;
}

// ============================================================================
// Export
// ============================================================================

/**
 * Build an exportable record from a finished hand and its events.
 * Events from other hands are ignored.
 */
export function toHandHistoryRecord(
  result: HandResult,
  events: readonly GameEvent[]
): HandHistoryRecord {
  let tableId = '';
  let startedAt: number | null = null;
  let dealerSeat: number | null = null;
  let startingStacks: Readonly<Record<string, number>> = {};
  const dealt: Record<string, readonly string[]> = {};
  const folded = new Set<string>();
  const actions: HistoryAction[] = [];

  for (const event of events) {
    if (event.handId !== result.handId) continue;

    switch (event.type) {
      case 'HAND_STARTED':
        tableId = event.tableId;
        startedAt = event.timestamp;
        dealerSeat = event.dealerSeat;
        startingStacks = { ...event.startingStacks };
        break;

      case 'BLINDS_POSTED':
        actions.push(blindAction('small-blind', event.smallBlind));
        actions.push(blindAction('big-blind', event.bigBlind));
        break;

      case 'HOLE_CARDS_DEALT':
        for (const [playerId, cards] of Object.entries(event.playerCards)) {
          dealt[playerId] = cards.map(cardKey);
        }
        break;

      case 'PLAYER_ACTED':
        if (event.action === 'fold') folded.add(event.playerId);
        actions.push({
          street: event.street,
          playerId: event.playerId,
          action: event.action,
          amount: event.amount,
          roundBet: event.roundBet,
          isAllIn: event.isAllIn,
        });
        break;

      default:
        break;
    }
  }

  // Folded hands stay private
  const holeCards = Object.fromEntries(
    Object.entries(dealt).filter(([playerId]) => !folded.has(playerId))
  );

  return {
    version: HAND_HISTORY_VERSION,
    handId: result.handId,
    handNumber: result.handNumber,
    tableId,
    startedAt,
    dealerSeat,
    startingStacks,
    holeCards,
    actions,
    board: result.board.map(cardKey),
    reason: result.reason,
    showdown: result.revealedHands.map(hand => ({
      playerId: hand.playerId,
      cards: hand.holeCards.map(cardKey),
      category: hand.category,
      description: hand.description,
    })),
    pots: result.pots.map(pot => ({
      index: pot.index,
      amount: pot.amount,
      eligiblePlayerIds: [...pot.eligiblePlayerIds],
      winners: { ...pot.amounts },
      winningHand: pot.winningHand,
    })),
    payouts: Object.fromEntries(result.payouts),
    finalStacks: Object.fromEntries(result.finalStacks),
  };
}

function blindAction(
  action: 'small-blind' | 'big-blind',
  blind: PostedBlind
): HistoryAction {
  return {
    street: 'preflop',
    playerId: blind.playerId,
    action,
    amount: blind.amount,
    roundBet: blind.amount,
    isAllIn: blind.isAllIn,
  };
}

// ============================================================================
// Formatting Functions
// ============================================================================

function formatAction(action: string, roundBet: number, isAllIn: boolean): string {
  const suffix = isAllIn ? ' and is all-in' : '';
  switch (action) {
    case 'fold': return 'folds';
    case 'check': return 'checks';
    case 'call': return `calls (${roundBet})${suffix}`;
    case 'raise': return `raises to ${roundBet}${suffix}`;
    case 'all-in': return `goes all-in for ${roundBet}`;
    default: return action;
  }
}

/**
 * Format an event as an action log line, or null for events the log skips.
 * `names` maps player ids to display names.
 */
export function formatHistoryEvent(
  event: GameEvent,
  names: ReadonlyMap<string, string> = new Map()
): string | null {
  const name = (playerId: string): string => names.get(playerId) ?? playerId;

  switch (event.type) {
    case 'HAND_STARTED':
      return `--- Hand #${event.handNumber} ---`;

    case 'BLINDS_POSTED':
      return `Blinds: ${name(event.smallBlind.playerId)} posts SB ${event.smallBlind.amount}, ` +
        `${name(event.bigBlind.playerId)} posts BB ${event.bigBlind.amount}`;

    case 'PLAYER_ACTED':
      return `${event.street.toUpperCase()}: ${name(event.playerId)} ` +
        `${formatAction(event.action, event.roundBet, event.isAllIn)} (Pot: ${event.potTotal})`;

    case 'COMMUNITY_CARDS_DEALT': {
      const streetLabel = event.street.charAt(0).toUpperCase() + event.street.slice(1);
      return `*** ${streetLabel} *** [${formatCards(event.cards)}]`;
    }

    case 'HAND_REVEALED':
      return `${name(event.playerId)} shows [${formatCards(event.holeCards)}] - ${event.handDescription}`;

    case 'POT_AWARDED': {
      const label = event.potIndex === 0 ? 'main pot' : `side pot ${event.potIndex}`;
      const winners = event.winnerIds.map(name).join(', ');
      const verb = event.winnerIds.length > 1 ? 'split' : 'wins';
      const hand = event.winningHandDescription ? ` with ${event.winningHandDescription}` : '';
      return `*** ${winners} ${verb} the ${label} (${event.amount})${hand} ***`;
    }

    case 'HAND_ABORTED':
      return `!!! Hand aborted: ${event.errorMessage}`;

    default:
      return null;
  }
}
