/**
 * GameLoop.ts
 * Main table orchestration engine
 *
 * Drives hand progression through all phases:
 * setup → betting rounds → board reveals → showdown → settlement
 *
 * Seat stacks are the only state that outlives a hand. They are written
 * once, when the hand completes, so an aborted hand leaves them untouched.
 */

import { Card } from './Card';
import {
  Seat,
  Street,
  TableState,
  createTableState,
  commitChips,
  updatePlayer,
  advanceStreet,
  addCommunityCards,
  applyPayouts,
  getActivePlayers,
  getDealtInPlayers,
  getClockwiseOrder,
  getPositionOrder,
  isDealtIn,
} from './TableState';
import { Deck, RandomSource, createRandomSource, dealCards, resetDeck } from './Deck';
import {
  ActionRequest,
  BettingRoundState,
  ValidActions,
  NO_VALID_ACTIONS,
  startBettingRound,
  applyAction,
  getActorIndex,
  getValidActions,
  isRoundComplete,
} from './BettingRound';
import { HandPhase, assertTransition, bettingPhaseFor, isBettingPhase } from './HandPhase';
import { HandRank, getCategoryName } from './HandRank';
import { evaluateHand } from './HandEvaluator';
import { EngineError, EngineErrors, isRecoverableError } from './EngineErrors';
import {
  EventContext,
  GameEvent,
  GameEventEmitter,
  GameEventListener,
  HandEndReason,
  createGameEventEmitter,
  createHandStartedEvent,
  createBlindsPostedEvent,
  createHoleCardsDealtEvent,
  createPlayerToActEvent,
  createPlayerActedEvent,
  createBettingRoundCompleteEvent,
  createStreetChangedEvent,
  createCommunityCardsDealtEvent,
  createHandRevealedEvent,
  createPotAwardedEvent,
  createHandEndedEvent,
  createHandAbortedEvent,
} from './GameEvents';
import { ActionLogEntry, PotView, TableSnapshot, buildTableSnapshot } from './Snapshot';
import { TableConfig, createTableConfig } from '../config/TableConfig';
import { PotManager, PotResolution } from '../../economy/Pot';
import { EconomyError } from '../../economy/EconomyErrors';

// ============================================================================
// Types
// ============================================================================

export interface SeatRequest {
  readonly id: string;
  readonly name?: string;
  readonly stack: number;
  /** First free seat when omitted */
  readonly seat?: number;
}

export interface TableEngineOptions {
  /** Supplies the deck for each hand; tests use it to stack the deck */
  readonly deckProvider?: (random: RandomSource) => Deck;
  readonly random?: RandomSource;
}

export interface RevealedHand {
  readonly playerId: string;
  readonly holeCards: readonly Card[];
  readonly category: string;
  readonly description: string;
  readonly rank: HandRank;
}

export interface PotResult {
  readonly index: number;
  readonly amount: number;
  readonly eligiblePlayerIds: readonly string[];
  readonly winnerIds: readonly string[];
  readonly amounts: Readonly<Record<string, number>>;
  readonly winningHand: string | null;
}

export interface HandResult {
  readonly handId: string;
  readonly handNumber: number;
  readonly reason: HandEndReason;
  readonly board: readonly Card[];
  readonly pots: readonly PotResult[];
  readonly payouts: ReadonlyMap<string, number>;
  readonly revealedHands: readonly RevealedHand[];
  readonly finalStacks: ReadonlyMap<string, number>;
  readonly duration: number;
}

interface HandContext {
  readonly handId: string;
  readonly handNumber: number;
  readonly startedAt: number;
  readonly pot: PotManager;
  phase: HandPhase;
  table: TableState;
  round: BettingRoundState;
  deck: Deck;
  reachedShowdown: boolean;
  readonly actions: ActionLogEntry[];
}

interface StreetReveal {
  readonly street: Street;
  readonly phase: HandPhase;
  readonly cards: number;
}

const NEXT_STREET: Record<Street, StreetReveal | null> = {
  preflop: { street: 'flop', phase: 'FLOP', cards: 3 },
  flop: { street: 'turn', phase: 'TURN', cards: 1 },
  turn: { street: 'river', phase: 'RIVER', cards: 1 },
  river: null,
};

// ============================================================================
// Table Engine
// ============================================================================

/**
 * TableEngine orchestrates the complete hand lifecycle
 */
export class TableEngine {
  private readonly config: TableConfig;
  private readonly random: RandomSource;
  private readonly deckProvider: (random: RandomSource) => Deck;
  private readonly eventEmitter: GameEventEmitter;
  private seats: Seat[];
  private buttonSeat: number | null;
  private hand: HandContext | null;
  private handCounter: number;
  private lastResult: HandResult | null;

  constructor(config: Partial<TableConfig> = {}, options: TableEngineOptions = {}) {
    this.config = createTableConfig(config);
    this.random = options.random ?? createRandomSource(this.config.seed);
    this.deckProvider = options.deckProvider ?? resetDeck;
    this.eventEmitter = createGameEventEmitter();
    this.seats = [];
    this.buttonSeat = null;
    this.hand = null;
    this.handCounter = 0;
    this.lastResult = null;
  }

  // ==========================================================================
  // Seat Management
  // ==========================================================================

  /**
   * Seat a player between hands
   */
  seatPlayer(request: SeatRequest): Seat {
    if (this.isHandInProgress()) {
      throw EngineErrors.tableSetup('Cannot seat players during a hand', { playerId: request.id });
    }

    if (request.id.trim() === '') {
      throw EngineErrors.tableSetup('Player id must not be empty');
    }

    if (this.seats.some(s => s.id === request.id)) {
      throw EngineErrors.tableSetup(`Player ${request.id} already at table`, { playerId: request.id });
    }

    if (!Number.isInteger(request.stack) || request.stack < 0) {
      throw EngineErrors.tableSetup(`Stack must be a non-negative integer, got ${request.stack}`, {
        playerId: request.id,
        stack: request.stack,
      });
    }

    const seatNumber = request.seat ?? this.findFreeSeat();
    if (!Number.isInteger(seatNumber) || seatNumber < 0 || seatNumber >= this.config.maxPlayers) {
      throw EngineErrors.tableSetup(`Seat ${seatNumber} does not exist`, { seat: seatNumber });
    }

    if (this.seats.some(s => s.seat === seatNumber)) {
      throw EngineErrors.tableSetup(`Seat ${seatNumber} already taken`, { seat: seatNumber });
    }

    const seat: Seat = {
      id: request.id,
      name: request.name ?? request.id,
      seat: seatNumber,
      stack: request.stack,
      sittingOut: false,
    };

    this.seats = [...this.seats, seat].sort((a, b) => a.seat - b.seat);
    return seat;
  }

  /**
   * Remove a player between hands
   */
  removePlayer(playerId: string): void {
    if (this.isHandInProgress()) {
      throw EngineErrors.tableSetup('Cannot remove players during a hand', { playerId });
    }

    this.requireSeat(playerId);
    this.seats = this.seats.filter(s => s.id !== playerId);
  }

  /**
   * Takes effect from the next hand
   */
  setSittingOut(playerId: string, sittingOut: boolean): void {
    this.requireSeat(playerId);
    this.seats = this.seats.map(s => (s.id === playerId ? { ...s, sittingOut } : s));
  }

  getSeats(): readonly Seat[] {
    return [...this.seats];
  }

  getSeat(playerId: string): Seat | null {
    return this.seats.find(s => s.id === playerId) ?? null;
  }

  getConfig(): TableConfig {
    return this.config;
  }

  // ==========================================================================
  // Event Subscription
  // ==========================================================================

  onEvent(listener: GameEventListener): () => void {
    return this.eventEmitter.on(listener);
  }

  /**
   * Events of the running hand, or of the last one once it is over
   */
  getEventHistory(): readonly GameEvent[] {
    return this.eventEmitter.getHistory();
  }

  getHandEvents(handId: string): readonly GameEvent[] {
    return this.eventEmitter.getHandHistory(handId);
  }

  // ==========================================================================
  // Hand Lifecycle
  // ==========================================================================

  /**
   * Start a new hand: move the button, post blinds, deal hole cards
   */
  startHand(): string {
    if (this.isHandInProgress()) {
      throw EngineErrors.tableSetup('A hand is already in progress');
    }

    const eligible = this.seats.filter(s => s.stack > 0 && !s.sittingOut);
    const required = Math.max(2, this.config.minPlayers);
    if (eligible.length < required) {
      throw EngineErrors.tableSetup(
        `Need at least ${required} players with chips, have ${eligible.length}`,
        { required, available: eligible.length }
      );
    }

    const buttonSeat = this.nextButtonSeat(eligible);
    const handNumber = this.handCounter + 1;
    const handId = `${this.config.tableId}-hand-${handNumber}`;
    const context: EventContext = { handId, tableId: this.config.tableId };

    return this.guard(context, () => {
      this.handCounter = handNumber;
      this.buttonSeat = buttonSeat;
      this.lastResult = null;
      this.eventEmitter.clearHistory();

      const dealerIndex = this.seats.findIndex(s => s.seat === buttonSeat);
      const pot = new PotManager(handId);
      const actions: ActionLogEntry[] = [];
      let phase: HandPhase = 'HAND_SETUP';
      let table = createTableState(this.seats, dealerIndex, this.config.smallBlind, this.config.bigBlind);

      this.eventEmitter.emit(createHandStartedEvent(
        context,
        handNumber,
        {
          dealer: table.players[table.dealerIndex].seat,
          smallBlind: table.players[table.smallBlindIndex].seat,
          bigBlind: table.players[table.bigBlindIndex].seat,
        },
        getDealtInPlayers(table).map(p => p.id),
        stacksRecord(getDealtInPlayers(table))
      ));

      table = this.postBlinds(context, table, pot, actions);

      let deck = this.deckProvider(this.random);
      const playerCards: Record<string, readonly Card[]> = {};
      for (const index of getClockwiseOrder(table, table.dealerIndex, isDealtIn)) {
        const [cards, rest] = dealCards(deck, 2);
        deck = rest;
        table = updatePlayer(table, index, { holeCards: cards });
        playerCards[table.players[index].id] = cards;
      }
      this.eventEmitter.emit(createHoleCardsDealtEvent(context, playerCards));

      phase = assertTransition(phase, 'PREFLOP_BETTING');
      const hand: HandContext = {
        handId,
        handNumber,
        startedAt: Date.now(),
        pot,
        phase,
        table,
        round: startBettingRound(table, 'preflop'),
        deck,
        reachedShowdown: false,
        actions,
      };
      this.hand = hand;

      this.progress(hand);
      return handId;
    });
  }

  /**
   * Apply an action for the player on the clock. Illegal actions throw
   * and leave the hand unchanged.
   */
  act(request: ActionRequest): TableSnapshot {
    const hand = this.hand;
    if (!hand || !isBettingPhase(hand.phase)) {
      throw EngineErrors.noActiveHand();
    }

    return this.guard(this.contextOf(hand), () => {
      const street = hand.table.street;
      const update = applyAction(hand.table, hand.round, request, hand.pot);
      hand.table = update.table;
      hand.round = update.round;

      const { action } = update;
      hand.actions.push({
        street,
        playerId: action.playerId,
        type: action.type,
        amount: action.amount,
        roundBet: action.roundBet,
        isAllIn: action.isAllIn,
      });

      const actor = hand.table.players.find(p => p.id === action.playerId);
      this.eventEmitter.emit(createPlayerActedEvent(this.contextOf(hand), {
        playerId: action.playerId,
        street,
        action: action.type,
        amount: action.amount,
        roundBet: action.roundBet,
        playerStack: actor ? actor.stack : 0,
        potTotal: hand.pot.getTotal(),
        isAllIn: action.isAllIn,
      }));

      this.progress(hand);
      return this.getSnapshot(request.playerId);
    });
  }

  /**
   * Abandon the running hand after a failure outside the engine. The seats
   * keep their pre-hand stacks and HAND_ABORTED is emitted.
   */
  abortHand(error: unknown): void {
    const hand = this.hand;
    if (!hand || hand.phase === 'HAND_COMPLETE') {
      return;
    }
    this.abort(this.contextOf(hand), error);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  isHandInProgress(): boolean {
    return this.hand !== null && this.hand.phase !== 'HAND_COMPLETE';
  }

  getPhase(): HandPhase | null {
    return this.hand ? this.hand.phase : null;
  }

  getHandNumber(): number {
    return this.handCounter;
  }

  getButtonSeat(): number | null {
    return this.buttonSeat;
  }

  getCurrentActorId(): string | null {
    const hand = this.hand;
    if (!hand || !isBettingPhase(hand.phase)) return null;
    const player = hand.table.players[getActorIndex(hand.round)];
    return player ? player.id : null;
  }

  getValidActions(): ValidActions {
    const hand = this.hand;
    if (!hand || !isBettingPhase(hand.phase)) {
      return NO_VALID_ACTIONS;
    }
    return getValidActions(hand.table, hand.round);
  }

  getSnapshot(viewerId: string | null = null): TableSnapshot {
    const hand = this.hand;
    const base = {
      tableId: this.config.tableId,
      smallBlind: this.config.smallBlind,
      bigBlind: this.config.bigBlind,
      seats: this.seats,
      handNumber: this.handCounter,
    };

    if (!hand) {
      return buildTableSnapshot({ ...base, hand: null }, viewerId);
    }

    const betting = isBettingPhase(hand.phase);
    return buildTableSnapshot({
      ...base,
      hand: {
        handId: hand.handId,
        phase: hand.phase,
        table: hand.table,
        pots: this.currentPots(hand),
        potTotal: hand.pot.getTotal(),
        currentBet: betting ? hand.round.currentBet : 0,
        actorIndex: betting ? getActorIndex(hand.round) : -1,
        reachedShowdown: hand.reachedShowdown,
        actions: hand.actions,
      },
    }, viewerId);
  }

  getLastHandResult(): HandResult | null {
    return this.lastResult;
  }

  // ==========================================================================
  // Private: Hand Progression
  // ==========================================================================

  /**
   * Advance through every round that needs no more input. Stops when
   * someone must act or the hand is complete.
   */
  private progress(hand: HandContext): void {
    while (isRoundComplete(hand.round)) {
      this.eventEmitter.emit(createBettingRoundCompleteEvent(
        this.contextOf(hand),
        hand.table.street,
        hand.pot.getTotal(),
        getActivePlayers(hand.table).length
      ));

      if (getActivePlayers(hand.table).length <= 1) {
        this.completeUncontested(hand);
        return;
      }

      const next = NEXT_STREET[hand.table.street];
      if (!next) {
        this.transition(hand, 'SHOWDOWN');
        this.showdown(hand);
        return;
      }

      this.dealStreet(hand, next);
    }

    this.emitPlayerToAct(hand);
  }

  private dealStreet(hand: HandContext, next: StreetReveal): void {
    const context = this.contextOf(hand);
    const fromStreet = hand.table.street;

    this.transition(hand, next.phase);
    const [cards, deck] = dealCards(hand.deck, next.cards);
    hand.deck = deck;
    hand.table = addCommunityCards(advanceStreet(hand.table, next.street), cards);

    this.eventEmitter.emit(createStreetChangedEvent(context, fromStreet, next.street, hand.pot.getTotal()));
    this.eventEmitter.emit(createCommunityCardsDealtEvent(context, next.street, cards, hand.table.communityCards));

    this.transition(hand, bettingPhaseFor(next.street));
    hand.round = startBettingRound(hand.table, next.street);
  }

  private showdown(hand: HandContext): void {
    hand.reachedShowdown = true;
    const board = hand.table.communityCards;
    const live = getActivePlayers(hand.table);
    const ranks = new Map<string, HandRank>();
    const revealed: RevealedHand[] = [];

    for (const player of live) {
      const rank = evaluateHand([...player.holeCards, ...board]);
      ranks.set(player.id, rank);
      revealed.push({
        playerId: player.id,
        holeCards: player.holeCards,
        category: getCategoryName(rank.category),
        description: rank.description,
        rank,
      });
      this.eventEmitter.emit(createHandRevealedEvent(
        this.contextOf(hand),
        player.id,
        player.holeCards,
        getCategoryName(rank.category),
        rank.description
      ));
    }

    const resolution = hand.pot.resolve(
      live.map(p => p.id),
      ranks,
      this.oddChipOrder(hand.table)
    );
    this.finishHand(hand, 'showdown', resolution, revealed);
  }

  private completeUncontested(hand: HandContext): void {
    const [winner] = getActivePlayers(hand.table);
    if (!winner) {
      throw EngineErrors.tableSetup(`Hand ${hand.handId} has no remaining players`);
    }
    this.finishHand(hand, 'uncontested', hand.pot.awardUncontested(winner.id), []);
  }

  private finishHand(
    hand: HandContext,
    reason: HandEndReason,
    resolution: PotResolution,
    revealed: readonly RevealedHand[]
  ): void {
    const context = this.contextOf(hand);
    this.transition(hand, 'HAND_COMPLETE');
    hand.table = applyPayouts(hand.table, resolution.payouts);

    const pots: PotResult[] = resolution.awards.map(award => {
      const amounts: Record<string, number> = {};
      for (const winnerId of award.winnerIds) {
        amounts[winnerId] = award.amountPerWinner + (award.remainderTo === winnerId ? award.remainder : 0);
      }
      const winnerHand = revealed.find(r => r.playerId === award.winnerIds[0]);
      return {
        index: award.potIndex,
        amount: award.amount,
        eligiblePlayerIds: award.eligiblePlayers,
        winnerIds: award.winnerIds,
        amounts,
        winningHand: winnerHand ? winnerHand.description : null,
      };
    });

    const finalStacks = new Map(hand.table.players.map(p => [p.id, p.stack] as const));
    this.seats = this.seats.map(seat => ({ ...seat, stack: finalStacks.get(seat.id) ?? seat.stack }));

    const result: HandResult = {
      handId: hand.handId,
      handNumber: hand.handNumber,
      reason,
      board: hand.table.communityCards,
      pots,
      payouts: resolution.payouts,
      revealedHands: revealed,
      finalStacks,
      duration: Date.now() - hand.startedAt,
    };
    this.lastResult = result;

    for (const pot of pots) {
      this.eventEmitter.emit(createPotAwardedEvent(
        context,
        pot.index,
        pot.amount,
        pot.winnerIds,
        pot.amounts,
        pot.winningHand
      ));
    }

    const winnerIds = [...new Set(pots.flatMap(p => p.winnerIds))];
    this.eventEmitter.emit(createHandEndedEvent(
      context,
      reason,
      winnerIds,
      Object.fromEntries(finalStacks),
      result.duration
    ));
  }

  // ==========================================================================
  // Private: Setup Helpers
  // ==========================================================================

  /**
   * Short stacks post what they have and are all-in
   */
  private postBlinds(
    context: EventContext,
    table: TableState,
    pot: PotManager,
    actions: ActionLogEntry[]
  ): TableState {
    let state = table;

    const post = (index: number, amount: number, type: 'small-blind' | 'big-blind') => {
      const player = state.players[index];
      const posted = Math.min(amount, player.stack);
      if (posted > 0) {
        state = commitChips(state, index, posted);
        pot.contribute(player.id, posted, 'preflop');
      }
      const isAllIn = state.players[index].status === 'all-in';
      actions.push({ street: 'preflop', playerId: player.id, type, amount: posted, roundBet: posted, isAllIn });
      return { playerId: player.id, amount: posted, isAllIn };
    };

    const smallBlind = post(state.smallBlindIndex, state.smallBlind, 'small-blind');
    const bigBlind = post(state.bigBlindIndex, state.bigBlind, 'big-blind');

    this.eventEmitter.emit(createBlindsPostedEvent(context, smallBlind, bigBlind, pot.getTotal()));
    return state;
  }

  /**
   * First hand: first eligible seat at or after the configured seat.
   * Later hands: next eligible seat after the previous button.
   */
  private nextButtonSeat(eligible: readonly Seat[]): number {
    if (this.buttonSeat === null) {
      const start = this.config.initialDealerSeat;
      const atOrAfter = eligible.find(s => s.seat >= start);
      return (atOrAfter ?? eligible[0]).seat;
    }

    const previous = this.buttonSeat;
    const after = eligible.find(s => s.seat > previous);
    return (after ?? eligible[0]).seat;
  }

  private findFreeSeat(): number {
    for (let seat = 0; seat < this.config.maxPlayers; seat++) {
      if (!this.seats.some(s => s.seat === seat)) {
        return seat;
      }
    }
    throw EngineErrors.tableSetup(`Table is full (${this.config.maxPlayers} seats)`);
  }

  private requireSeat(playerId: string): Seat {
    const seat = this.getSeat(playerId);
    if (!seat) {
      throw EngineErrors.tableSetup(`Player ${playerId} is not seated`, { playerId });
    }
    return seat;
  }

  // ==========================================================================
  // Private: Misc
  // ==========================================================================

  private oddChipOrder(table: TableState): string[] {
    if (this.config.oddChipPolicy === 'lowest-seat') {
      return [...getDealtInPlayers(table)]
        .sort((a, b) => a.seat - b.seat)
        .map(p => p.id);
    }
    return getPositionOrder(table);
  }

  private currentPots(hand: HandContext): PotView[] {
    if (hand.phase === 'HAND_COMPLETE' && this.lastResult) {
      return this.lastResult.pots.map(p => ({
        index: p.index,
        amount: p.amount,
        eligiblePlayerIds: p.eligiblePlayerIds,
      }));
    }
    if (hand.pot.getTotal() === 0) {
      return [];
    }
    const live = getActivePlayers(hand.table);
    return hand.pot
      .calculateOpenPots(
        live.map(p => p.id),
        live.filter(p => p.status === 'all-in').map(p => p.id)
      )
      .map(p => ({ index: p.index, amount: p.amount, eligiblePlayerIds: p.eligiblePlayers }));
  }

  private emitPlayerToAct(hand: HandContext): void {
    const player = hand.table.players[getActorIndex(hand.round)];
    if (!player) return;

    const valid = getValidActions(hand.table, hand.round);
    this.eventEmitter.emit(createPlayerToActEvent(
      this.contextOf(hand),
      player.id,
      hand.table.street,
      valid.callAmount,
      valid.minRaiseTo,
      valid.maxRaiseTo
    ));
  }

  private transition(hand: HandContext, to: HandPhase): void {
    hand.phase = assertTransition(hand.phase, to);
  }

  private contextOf(hand: HandContext): EventContext {
    return { handId: hand.handId, tableId: this.config.tableId };
  }

  /**
   * Run a hand step. Anything but an illegal action aborts the hand.
   */
  private guard<T>(context: EventContext, step: () => T): T {
    try {
      return step();
    } catch (error) {
      if (isRecoverableError(error)) {
        throw error;
      }
      this.abort(context, error);
      throw error;
    }
  }

  private abort(context: EventContext, error: unknown): void {
    this.hand = null;
    const code = error instanceof EngineError || error instanceof EconomyError
      ? error.code
      : 'INTERNAL_ERROR';
    const message = error instanceof Error ? error.message : String(error);
    this.eventEmitter.emit(createHandAbortedEvent(context, code, message, stacksRecord(this.seats)));
  }
}

// ============================================================================
// Helpers
// ============================================================================

function stacksRecord(players: readonly { id: string; stack: number }[]): Record<string, number> {
  return Object.fromEntries(players.map(p => [p.id, p.stack]));
}

/**
 * Create a table engine instance
 */
export function createTableEngine(
  config: Partial<TableConfig> = {},
  options: TableEngineOptions = {}
): TableEngine {
  return new TableEngine(config, options);
}
