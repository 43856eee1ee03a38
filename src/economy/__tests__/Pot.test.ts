/**
 * Pot.test.ts
 * Side pot partitioning, settlement and chip conservation
 */

import { PotManager } from '../Pot';
import { SidePot, SidePotCalculator, PlayerContributionInfo, determineWinnersPerPot } from '../SidePot';
import {
  EconomyError,
  InvalidAmountError,
  PotAlreadySettledError,
  PotConservationError,
} from '../EconomyErrors';
import { HandRank, createHandRank } from '../../game/engine/HandRank';
import { evaluateHand } from '../../game/engine/HandEvaluator';
import { parseCards } from '../../game/engine/Card';

// ============================================================================
// Test Setup
// ============================================================================

function contribution(playerId: string, totalContribution: number, isFolded = false): PlayerContributionInfo {
  return { playerId, totalContribution, isFolded };
}

function rank(notation: string): HandRank {
  return evaluateHand(parseCards(notation));
}

/** Loses every tier above the main pot */
class MainPotOnly extends PotManager {
  calculatePots(livePlayerIds: readonly string[]): SidePot[] {
    return super.calculatePots(livePlayerIds).slice(0, 1);
  }
}

// ============================================================================
// Partitioning
// ============================================================================

describe('SidePotCalculator.calculate', () => {
  test('100/300/300 all-in splits into 300 main and 400 side', () => {
    const pots = SidePotCalculator.calculate([
      contribution('a', 100),
      contribution('b', 300),
      contribution('c', 300),
    ]);

    expect(pots).toEqual([
      { index: 0, amount: 300, eligiblePlayers: ['a', 'b', 'c'], contributionLevel: 100 },
      { index: 1, amount: 400, eligiblePlayers: ['b', 'c'], contributionLevel: 300 },
    ]);
  });

  test('equal contributions make a single pot', () => {
    const pots = SidePotCalculator.calculate([
      contribution('a', 50),
      contribution('b', 50),
    ]);

    expect(pots).toHaveLength(1);
    expect(pots[0].amount).toBe(100);
  });

  test('folded chips stay in the pot but win nothing', () => {
    const pots = SidePotCalculator.calculate([
      contribution('a', 50, true),
      contribution('b', 100),
      contribution('c', 100),
    ]);

    expect(pots).toEqual([
      { index: 0, amount: 250, eligiblePlayers: ['b', 'c'], contributionLevel: 100 },
    ]);
  });

  test('folded chips above the top level join the last pot', () => {
    const contributions = [
      contribution('a', 300, true),
      contribution('b', 100),
      contribution('c', 100),
    ];
    const pots = SidePotCalculator.calculate(contributions);

    expect(pots).toHaveLength(1);
    expect(pots[0].amount).toBe(500);
    expect(SidePotCalculator.verifyConservation(contributions, pots)).toBe(true);
  });

  test('three all-in levels', () => {
    const contributions = [
      contribution('a', 50),
      contribution('b', 120),
      contribution('c', 200),
      contribution('d', 200),
      contribution('e', 30, true),
    ];
    const pots = SidePotCalculator.calculate(contributions);

    expect(pots.map(p => p.amount)).toEqual([230, 210, 160]);
    expect(pots.map(p => p.eligiblePlayers)).toEqual([
      ['a', 'b', 'c', 'd'],
      ['b', 'c', 'd'],
      ['c', 'd'],
    ]);
    expect(SidePotCalculator.verifyConservation(contributions, pots)).toBe(true);
  });

  test('no contributions means no pots', () => {
    expect(SidePotCalculator.calculate([contribution('a', 0)])).toEqual([]);
  });

  test('throws when every contributor folded', () => {
    expect(() => SidePotCalculator.calculate([contribution('a', 10, true)]))
      .toThrow("Invalid operation 'calculate': Every contributor has folded");
  });
});

describe('SidePotCalculator.calculateOpen', () => {
  test('unmatched blinds stay in one pot', () => {
    const pots = SidePotCalculator.calculateOpen(
      [contribution('b', 10), contribution('c', 20), contribution('a', 0)],
      []
    );

    expect(pots).toEqual([
      { index: 0, amount: 30, eligiblePlayers: ['b', 'c', 'a'], contributionLevel: 20 },
    ]);
  });

  test('only an all-in caps a tier', () => {
    const pots = SidePotCalculator.calculateOpen(
      [contribution('b', 300), contribution('c', 20), contribution('a', 100)],
      ['a']
    );

    expect(pots).toEqual([
      { index: 0, amount: 220, eligiblePlayers: ['b', 'c', 'a'], contributionLevel: 100 },
      { index: 1, amount: 200, eligiblePlayers: ['b', 'c'], contributionLevel: 300 },
    ]);
  });

  test('nothing contributed means no pots', () => {
    expect(SidePotCalculator.calculateOpen([contribution('a', 0)], [])).toEqual([]);
  });
});

// ============================================================================
// Splitting
// ============================================================================

describe('SidePotCalculator.splitPot', () => {
  test('odd chip goes to the first winner', () => {
    const split = SidePotCalculator.splitPot(25, ['x', 'y']);
    expect(split.get('x')).toBe(13);
    expect(split.get('y')).toBe(12);
  });

  test('three-way split of 100', () => {
    const split = SidePotCalculator.splitPot(100, ['x', 'y', 'z']);
    expect([...split.values()]).toEqual([34, 33, 33]);
  });
});

describe('SidePotCalculator.settle', () => {
  test('rejects a winner who is not eligible', () => {
    const pots = SidePotCalculator.calculate([contribution('a', 100), contribution('b', 300), contribution('c', 300)]);
    expect(() => SidePotCalculator.settle(pots, [['a'], ['a']]))
      .toThrow("Invalid operation 'settle': Player a is not eligible for pot 1");
  });

  test('rejects a pot without winners', () => {
    const pots = SidePotCalculator.calculate([contribution('a', 100), contribution('b', 100)]);
    expect(() => SidePotCalculator.settle(pots, [])).toThrow(EconomyError);
  });
});

describe('determineWinnersPerPot', () => {
  test('orders tied winners by position', () => {
    const pair = createHandRank('one-pair', [14, 13, 12, 9]);
    const ranks = new Map<string, HandRank>([
      ['a', pair],
      ['b', pair],
      ['c', createHandRank('high-card', [13, 11, 9, 7, 2])],
    ]);
    const pots = SidePotCalculator.calculate([contribution('a', 15), contribution('b', 15), contribution('c', 15)]);

    expect(determineWinnersPerPot(pots, ranks, ['b', 'c', 'a'])).toEqual([['b', 'a']]);
  });

  test('requires a rank for every contested player', () => {
    const pots = SidePotCalculator.calculate([contribution('a', 15), contribution('b', 15)]);
    expect(() => determineWinnersPerPot(pots, new Map([['a', rank('Ac Ad 9h 7s 2c')]]), ['a', 'b']))
      .toThrow('No hand rank for player b');
  });
});

// ============================================================================
// Pot Manager
// ============================================================================

describe('PotManager', () => {
  test('tracks contributions by player and street', () => {
    const pot = new PotManager('hand-1');
    pot.contribute('a', 10, 'preflop');
    pot.contribute('b', 20, 'preflop');
    pot.contribute('a', 10, 'preflop');
    pot.contribute('a', 40, 'flop');

    expect(pot.getTotal()).toBe(80);
    expect(pot.getPlayerContribution('a')).toBe(60);
    expect(pot.getPlayerStreetContribution('a', 'preflop')).toBe(20);
    expect(pot.getStreetTotal('preflop')).toBe(40);
    expect(pot.getStreetTotal('river')).toBe(0);
    expect(pot.getContributions()).toHaveLength(4);
  });

  test('open pots include live players who have not put in chips', () => {
    const pot = new PotManager('hand-1');
    pot.contribute('b', 10, 'preflop');
    pot.contribute('c', 20, 'preflop');

    const pots = pot.calculateOpenPots(['a', 'b', 'c'], []);
    expect(pots.map(p => [p.amount, p.eligiblePlayers])).toEqual([[30, ['b', 'c', 'a']]]);
  });

  test('rejects non-positive and fractional amounts', () => {
    const pot = new PotManager('hand-1');
    expect(() => pot.contribute('a', 0, 'preflop')).toThrow(InvalidAmountError);
    expect(() => pot.contribute('a', -5, 'preflop')).toThrow(InvalidAmountError);
    expect(() => pot.contribute('a', 1.5, 'preflop')).toThrow(InvalidAmountError);
    expect(pot.getTotal()).toBe(0);
  });

  test('pays the main pot to the best hand and the side pot to the next', () => {
    const pot = new PotManager('hand-2');
    pot.contribute('a', 100, 'preflop');
    pot.contribute('b', 300, 'preflop');
    pot.contribute('c', 300, 'preflop');

    const ranks = new Map<string, HandRank>([
      ['a', rank('Kc Kd Kh Ks 2c')],
      ['b', rank('Ac Ad 9h 7s 2d')],
      ['c', rank('Qc Jd 9c 7h 3d')],
    ]);
    const resolution = pot.resolve(['a', 'b', 'c'], ranks, ['a', 'b', 'c']);

    expect(resolution.payouts.get('a')).toBe(300);
    expect(resolution.payouts.get('b')).toBe(400);
    expect(resolution.payouts.has('c')).toBe(false);
    expect(resolution.totalAwarded).toBe(700);
    expect(resolution.totalContributed).toBe(700);
    expect(pot.isSettled()).toBe(true);
  });

  test('pays nothing when the awards do not add up to the contributions', () => {
    const pot = new MainPotOnly('hand-7');
    pot.contribute('a', 100, 'preflop');
    pot.contribute('b', 300, 'preflop');
    pot.contribute('c', 300, 'preflop');

    const ranks = new Map<string, HandRank>([
      ['a', rank('Kc Kd Kh Ks 2c')],
      ['b', rank('Ac Ad 9h 7s 2d')],
      ['c', rank('Qc Jd 9c 7h 3d')],
    ]);

    expect(() => pot.resolve(['a', 'b', 'c'], ranks, ['a', 'b', 'c'])).toThrow(PotConservationError);
    expect(() => pot.resolve(['a', 'b', 'c'], ranks, ['a', 'b', 'c']))
      .toThrow('Pot conservation violation for hand hand-7: contributed 700, awarded 300');
    expect(pot.isSettled()).toBe(false);
    expect(pot.getTotal()).toBe(700);
  });

  test('odd chip of a split goes to the first winner in position order', () => {
    const pot = new PotManager('hand-3');
    pot.contribute('a', 15, 'preflop');
    pot.contribute('b', 15, 'preflop');
    pot.contribute('c', 15, 'preflop');

    const pair = createHandRank('one-pair', [14, 13, 12, 9]);
    const ranks = new Map<string, HandRank>([
      ['a', pair],
      ['b', pair],
      ['c', createHandRank('high-card', [13, 11, 9, 7, 2])],
    ]);
    const resolution = pot.resolve(['a', 'b', 'c'], ranks, ['b', 'c', 'a']);

    expect(resolution.payouts.get('b')).toBe(23);
    expect(resolution.payouts.get('a')).toBe(22);
    expect(resolution.awards[0].remainder).toBe(1);
    expect(resolution.awards[0].remainderTo).toBe('b');
  });

  test('folded players contribute to pots they cannot win', () => {
    const pot = new PotManager('hand-4');
    pot.contribute('a', 40, 'preflop');
    pot.contribute('b', 100, 'preflop');
    pot.contribute('c', 100, 'preflop');

    const ranks = new Map<string, HandRank>([
      ['b', rank('2c 2d 9h 7s 4d')],
      ['c', rank('Qc Jd 9c 7h 3d')],
    ]);
    const resolution = pot.resolve(['b', 'c'], ranks, ['a', 'b', 'c']);

    expect(resolution.payouts.get('b')).toBe(240);
    expect(resolution.pots).toHaveLength(1);
  });

  test('uncontested pot goes to the last player standing', () => {
    const pot = new PotManager('hand-5');
    pot.contribute('a', 10, 'preflop');
    pot.contribute('b', 20, 'preflop');
    pot.contribute('c', 60, 'preflop');

    const resolution = pot.awardUncontested('c');

    expect(resolution.payouts.get('c')).toBe(90);
    expect(resolution.pots).toEqual([
      { index: 0, amount: 90, eligiblePlayers: ['c'], contributionLevel: 60 },
    ]);
  });

  test('a settled pot takes no more chips and cannot settle again', () => {
    const pot = new PotManager('hand-6');
    pot.contribute('a', 10, 'preflop');
    pot.contribute('b', 20, 'preflop');
    pot.awardUncontested('b');

    expect(() => pot.contribute('a', 10, 'flop')).toThrow(PotAlreadySettledError);
    expect(() => pot.awardUncontested('b')).toThrow('Pot for hand hand-6 has already been settled');
  });
});
