/**
 * HandEvaluator.test.ts
 * Category detection, tie-breaking and best-five selection
 */

import { parseCards } from '../Card';
import { evaluateHand, determineWinners } from '../HandEvaluator';
import { HandCategory, compareHandRanks, createHandRank, getCategoryName } from '../HandRank';
import { HandEvaluationError } from '../EngineErrors';

// ============================================================================
// Categories
// ============================================================================

describe('evaluateHand categories', () => {
  const cases: Array<[string, HandCategory, string]> = [
    ['As Ks Qs Js Ts', 'straight-flush', 'Royal Flush'],
    ['9h 8h 7h 6h 5h', 'straight-flush', 'Straight Flush, 9 high'],
    ['Kc Kd Kh Ks 2c', 'four-of-a-kind', 'Four of a Kind, Kings'],
    ['6c 6d 6h 9s 9c', 'full-house', 'Full House, Sixes full of 9s'],
    ['Ad Jd 8d 4d 2d', 'flush', 'Flush, Ace high'],
    ['Tc 9d 8h 7s 6c', 'straight', 'Straight, 10 high'],
    ['Qc Qd Qh 7s 2c', 'three-of-a-kind', 'Three of a Kind, Queens'],
    ['Jc Jd 4h 4s Ac', 'two-pair', 'Two Pair, Jacks and 4s'],
    ['Ac Ad 9h 7s 2c', 'one-pair', 'Pair of Aces'],
    ['Kc Jd 9h 7s 2c', 'high-card', 'High Card, King'],
  ];

  test.each(cases)('%s is %s (%s)', (notation, category, description) => {
    const rank = evaluateHand(parseCards(notation));
    expect(rank.category).toBe(category);
    expect(rank.description).toBe(description);
  });

  test('categories rank strictly in order', () => {
    const ranks = cases.map(([notation]) => evaluateHand(parseCards(notation)));
    for (let i = 0; i < ranks.length - 1; i++) {
      expect(compareHandRanks(ranks[i], ranks[i + 1])).toBeGreaterThan(0);
    }
  });

  test('category names', () => {
    expect(getCategoryName('one-pair')).toBe('One Pair');
    expect(getCategoryName('straight-flush')).toBe('Straight Flush');
  });

  test('kickers follow the rank groups', () => {
    expect(evaluateHand(parseCards('Jc Jd 4h 4s Ac')).kickers).toEqual([11, 4, 14]);
    expect(evaluateHand(parseCards('6c 6d 6h 9s 9c')).kickers).toEqual([6, 9]);
    expect(evaluateHand(parseCards('Kc Kd Kh Ks 2c')).kickers).toEqual([13, 2]);
  });

  test('rank value packs category and kickers', () => {
    const pair = createHandRank('one-pair', [14, 13, 12, 9]);
    expect(pair.value).toBe(((((1 * 15 + 14) * 15 + 13) * 15 + 12) * 15 + 9) * 15);
    expect(pair.description).toBe('Pair of Aces');
  });
});

// ============================================================================
// Straights
// ============================================================================

describe('wheel', () => {
  test('A-2-3-4-5 is a five-high straight', () => {
    const rank = evaluateHand(parseCards('Ac 2d 3h 4s 5c'));
    expect(rank.category).toBe('straight');
    expect(rank.kickers).toEqual([5]);
    expect(rank.description).toBe('Straight, 5 high');
  });

  test('wheel loses to a six-high straight', () => {
    const wheel = evaluateHand(parseCards('Ac 2d 3h 4s 5c'));
    const sixHigh = evaluateHand(parseCards('2c 3d 4h 5s 6c'));
    expect(compareHandRanks(wheel, sixHigh)).toBeLessThan(0);
  });

  test('steel wheel is a five-high straight flush', () => {
    const rank = evaluateHand(parseCards('Ah 2h 3h 4h 5h'));
    expect(rank.category).toBe('straight-flush');
    expect(rank.description).toBe('Straight Flush, 5 high');
  });

  test('K-A-2-3-4 is not a straight', () => {
    expect(evaluateHand(parseCards('Kc Ad 2h 3s 4c')).category).toBe('high-card');
  });
});

// ============================================================================
// Seven Cards
// ============================================================================

describe('seven-card selection', () => {
  test('finds the flush over the pair', () => {
    const rank = evaluateHand(parseCards('Ah 9h 2h 7h Kh Ac 3d'));
    expect(rank.category).toBe('flush');
    expect(rank.description).toBe('Flush, Ace high');
  });

  test('uses the best kickers from the board', () => {
    const rank = evaluateHand(parseCards('Ac Ad Kh Qs 2c 3d 9h'));
    expect(rank.category).toBe('one-pair');
    expect(rank.kickers).toEqual([14, 13, 12, 9]);
  });

  test('picks the higher full house from two trips', () => {
    const rank = evaluateHand(parseCards('9c 9d 9h 4s 4c 4d 2h'));
    expect(rank.description).toBe('Full House, 9s full of 4s');
  });

  test('evaluation is independent of card order', () => {
    const cards = parseCards('Jc Jd 4h 4s Ac 9d 2h');
    const forward = evaluateHand(cards);
    const reversed = evaluateHand([...cards].reverse());
    expect(compareHandRanks(forward, reversed)).toBe(0);
    expect(reversed).toEqual(forward);
  });

  test('evaluation is idempotent', () => {
    const cards = parseCards('Tc 9d 8h 7s 6c Kd 2h');
    expect(evaluateHand(cards)).toEqual(evaluateHand(cards));
  });
});

// ============================================================================
// Comparison
// ============================================================================

describe('comparison', () => {
  test('kicker decides between equal pairs', () => {
    const board = parseCards('Ac 8d 5h 3s 2c');
    const kingKicker = [...board, ...parseCards('Ad Kh')];
    const queenKicker = [...board, ...parseCards('Ah Qh')];
    expect(compareHandRanks(evaluateHand(kingKicker), evaluateHand(queenKicker))).toBeGreaterThan(0);
  });

  test('playing the board is a tie', () => {
    const board = parseCards('Ac Kd Qh Js Tc');
    expect(determineWinners([
      [...board, ...parseCards('2d 3h')],
      [...board, ...parseCards('4d 5h')],
    ])).toEqual([0, 1]);
  });

  test('determineWinners returns the single best index', () => {
    const board = parseCards('7c 7d 2h 9s Jc');
    expect(determineWinners([
      [...board, ...parseCards('Ah Kh')],
      [...board, ...parseCards('7h 3s')],
      [...board, ...parseCards('Jd Js')],
    ])).toEqual([2]);
  });
});

// ============================================================================
// Errors
// ============================================================================

describe('invalid input', () => {
  test('rejects fewer than five cards', () => {
    expect(() => evaluateHand(parseCards('Ac Kd Qh Js'))).toThrow(HandEvaluationError);
  });

  test('rejects more than seven cards', () => {
    expect(() => evaluateHand(parseCards('Ac Kd Qh Js Tc 9d 8h 7s'))).toThrow('Need 5 to 7 cards, got 8');
  });

  test('rejects duplicate cards', () => {
    expect(() => evaluateHand(parseCards('Ac Ac Qh Js Tc'))).toThrow('Duplicate card Ac');
  });
});
