/**
 * HandHistory.test.ts
 */

import { toHandHistoryRecord, formatHistoryEvent, HAND_HISTORY_VERSION } from '../HandHistory';
import { TableEngine } from '../../engine/GameLoop';
import { createStackedDeck } from '../../engine/Deck';
import { parseCards } from '../../engine/Card';
import { GameEvent, resetEventSequence } from '../../engine/GameEvents';

function createEngine(deck: string): TableEngine {
  const engine = new TableEngine({}, { deckProvider: () => createStackedDeck(parseCards(deck)) });
  engine.seatPlayer({ id: 'a', stack: 1000 });
  engine.seatPlayer({ id: 'b', stack: 1000 });
  engine.seatPlayer({ id: 'c', stack: 1000 });
  return engine;
}

function lines(events: readonly GameEvent[], names?: ReadonlyMap<string, string>): string[] {
  return events.flatMap(e => {
    const line = formatHistoryEvent(e, names);
    return line === null ? [] : [line];
  });
}

beforeEach(() => {
  resetEventSequence();
});

describe('toHandHistoryRecord', () => {
  test('records an uncontested hand', () => {
    const engine = createEngine('Ah Ad Kh Kd 7c 2d');
    const handId = engine.startHand();
    engine.act({ playerId: 'a', type: 'fold' });
    engine.act({ playerId: 'b', type: 'fold' });

    const result = engine.getLastHandResult();
    if (!result) throw new Error('no result');
    const record = toHandHistoryRecord(result, engine.getEventHistory());

    expect(record).toMatchObject({
      version: HAND_HISTORY_VERSION,
      handId,
      handNumber: 1,
      tableId: 'table-1',
      dealerSeat: 0,
      startingStacks: { a: 1000, b: 1000, c: 1000 },
      holeCards: { c: ['Kh', 'Kd'] },
      board: [],
      reason: 'uncontested',
      showdown: [],
      payouts: { c: 30 },
      finalStacks: { a: 1000, b: 990, c: 1010 },
    });
    expect(record.actions).toEqual([
      { street: 'preflop', playerId: 'b', action: 'small-blind', amount: 10, roundBet: 10, isAllIn: false },
      { street: 'preflop', playerId: 'c', action: 'big-blind', amount: 20, roundBet: 20, isAllIn: false },
      { street: 'preflop', playerId: 'a', action: 'fold', amount: 0, roundBet: 0, isAllIn: false },
      { street: 'preflop', playerId: 'b', action: 'fold', amount: 0, roundBet: 10, isAllIn: false },
    ]);
    expect(record.pots).toEqual([
      { index: 0, amount: 30, eligiblePlayerIds: ['c'], winners: { c: 30 }, winningHand: null },
    ]);
  });

  test('the record is plain JSON', () => {
    const engine = createEngine('Ah Ad Kh Kd 7c 2d');
    engine.startHand();
    engine.act({ playerId: 'a', type: 'fold' });
    engine.act({ playerId: 'b', type: 'fold' });

    const result = engine.getLastHandResult();
    if (!result) throw new Error('no result');
    const record = toHandHistoryRecord(result, engine.getEventHistory());

    expect(JSON.parse(JSON.stringify(record))).toEqual(record);
  });

  test('folded hole cards are left out after a showdown', () => {
    const engine = createEngine('Ah Ad Kh Kd 7c 2d As 9c 4h 3s Qc');
    engine.startHand();
    engine.act({ playerId: 'a', type: 'raise', amount: 60 });
    engine.act({ playerId: 'b', type: 'call' });
    engine.act({ playerId: 'c', type: 'fold' });
    for (let street = 0; street < 3; street++) {
      engine.act({ playerId: 'b', type: 'check' });
      engine.act({ playerId: 'a', type: 'check' });
    }

    const result = engine.getLastHandResult();
    if (!result) throw new Error('no result');
    const record = toHandHistoryRecord(result, engine.getEventHistory());

    expect(record.holeCards).toEqual({ b: ['Ah', 'Ad'], a: ['7c', '2d'] });
    expect(record.showdown.map(h => [h.playerId, h.cards])).toEqual([
      ['a', ['7c', '2d']],
      ['b', ['Ah', 'Ad']],
    ]);
  });

  test('ignores events from other hands', () => {
    const engine = createEngine('Ah Ad Kh Kd 7c 2d');
    engine.startHand();
    engine.act({ playerId: 'a', type: 'fold' });
    engine.act({ playerId: 'b', type: 'fold' });
    engine.startHand();
    engine.act({ playerId: 'b', type: 'fold' });
    engine.act({ playerId: 'c', type: 'fold' });

    const result = engine.getLastHandResult();
    if (!result) throw new Error('no result');
    const record = toHandHistoryRecord(result, engine.getEventHistory());

    expect(record.handNumber).toBe(2);
    expect(record.dealerSeat).toBe(1);
    expect(record.actions.map(a => `${a.playerId}:${a.action}`)).toEqual([
      'c:small-blind',
      'a:big-blind',
      'b:fold',
      'c:fold',
    ]);
  });
});

describe('formatHistoryEvent', () => {
  test('an uncontested hand', () => {
    const engine = createEngine('Ah Ad Kh Kd 7c 2d');
    engine.startHand();
    engine.act({ playerId: 'a', type: 'fold' });
    engine.act({ playerId: 'b', type: 'fold' });

    expect(lines(engine.getEventHistory(), new Map([['a', 'Alice']]))).toEqual([
      '--- Hand #1 ---',
      'Blinds: b posts SB 10, c posts BB 20',
      'PREFLOP: Alice folds (Pot: 30)',
      'PREFLOP: b folds (Pot: 30)',
      '*** c wins the main pot (30) ***',
    ]);
  });

  test('a hand that reaches showdown', () => {
    // b: Ah Ad, c: Kh Kd, a: 7c 2d, board As 9c 4h 3s Qc
    const engine = createEngine('Ah Ad Kh Kd 7c 2d As 9c 4h 3s Qc');
    engine.startHand();
    engine.act({ playerId: 'a', type: 'raise', amount: 60 });
    engine.act({ playerId: 'b', type: 'call' });
    engine.act({ playerId: 'c', type: 'fold' });
    for (const street of ['flop', 'turn', 'river']) {
      expect(engine.getSnapshot().street).toBe(street);
      engine.act({ playerId: 'b', type: 'check' });
      engine.act({ playerId: 'a', type: 'check' });
    }

    expect(lines(engine.getEventHistory())).toEqual([
      '--- Hand #1 ---',
      'Blinds: b posts SB 10, c posts BB 20',
      'PREFLOP: a raises to 60 (Pot: 90)',
      'PREFLOP: b calls (60) (Pot: 140)',
      'PREFLOP: c folds (Pot: 140)',
      '*** Flop *** [A♠ 9♣ 4♥]',
      'FLOP: b checks (Pot: 140)',
      'FLOP: a checks (Pot: 140)',
      '*** Turn *** [3♠]',
      'TURN: b checks (Pot: 140)',
      'TURN: a checks (Pot: 140)',
      '*** River *** [Q♣]',
      'RIVER: b checks (Pot: 140)',
      'RIVER: a checks (Pot: 140)',
      'a shows [7♣ 2♦] - High Card, Ace',
      'b shows [A♥ A♦] - Three of a Kind, Aces',
      '*** b wins the main pot (140) with Three of a Kind, Aces ***',
    ]);
  });

  test('an aborted hand', () => {
    const engine = createEngine('Ah Ad Kh Kd 7c 2d');
    engine.startHand();
    engine.abortHand(new Error('table closed'));

    const history = engine.getEventHistory();
    expect(formatHistoryEvent(history[history.length - 1])).toBe('!!! Hand aborted: table closed');
  });
});
