/**
 * HandPhase.test.ts
 */

import { canTransition, assertTransition, bettingPhaseFor, isBettingPhase } from '../HandPhase';
import { InvalidTransitionError } from '../EngineErrors';

describe('hand transitions', () => {
  test('streets follow each other in order', () => {
    expect(canTransition('HAND_SETUP', 'PREFLOP_BETTING')).toBe(true);
    expect(canTransition('PREFLOP_BETTING', 'FLOP')).toBe(true);
    expect(canTransition('RIVER_BETTING', 'SHOWDOWN')).toBe(true);
    expect(canTransition('SHOWDOWN', 'HAND_COMPLETE')).toBe(true);
  });

  test('any betting phase may end the hand', () => {
    expect(canTransition('FLOP_BETTING', 'HAND_COMPLETE')).toBe(true);
    expect(canTransition('FLOP', 'HAND_COMPLETE')).toBe(false);
  });

  test('skipping a street is rejected', () => {
    expect(() => assertTransition('FLOP_BETTING', 'RIVER')).toThrow(InvalidTransitionError);
    expect(() => assertTransition('FLOP_BETTING', 'RIVER')).toThrow('Illegal hand transition FLOP_BETTING -> RIVER');
  });

  test('nothing follows a finished hand', () => {
    expect(canTransition('HAND_COMPLETE', 'HAND_SETUP')).toBe(false);
  });

  test('betting phase lookup', () => {
    expect(bettingPhaseFor('turn')).toBe('TURN_BETTING');
    expect(isBettingPhase('TURN_BETTING')).toBe(true);
    expect(isBettingPhase('TURN')).toBe(false);
  });
});
