/**
 * parseActionInput.test.ts
 */

import { parseActionInput } from '../parseActionInput';

describe('parseActionInput', () => {
  test.each([
    ['fold', { type: 'fold' }],
    ['  CHECK ', { type: 'check' }],
    ['call', { type: 'call' }],
    ['raise 60', { type: 'raise', amount: 60 }],
    ['bet   120', { type: 'raise', amount: 120 }],
    ['r 45', { type: 'raise', amount: 45 }],
    ['all-in', { type: 'all-in' }],
    ['allin', { type: 'all-in' }],
    ['x', { type: 'check' }],
  ])('%s', (line, decision) => {
    expect(parseActionInput(line)).toEqual({ valid: true, decision });
  });

  test.each([
    ['', 'Enter an action: fold | check | call | raise <amount> | all-in'],
    ['dance', "Unknown action 'dance'. Try: fold | check | call | raise <amount> | all-in"],
    ['constructor', "Unknown action 'constructor'. Try: fold | check | call | raise <amount> | all-in"],
    ['raise', 'Raise needs exactly one amount, e.g. "raise 60"'],
    ['raise 10 20', 'Raise needs exactly one amount, e.g. "raise 60"'],
    ['raise ten', "Raise amount must be a whole number of chips, got 'ten'"],
    ['raise 12.5', "Raise amount must be a whole number of chips, got '12.5'"],
    ['raise 0', 'Raise amount must be greater than zero'],
    ['call 20', "'call' takes no amount"],
  ])('rejects %p', (line, error) => {
    expect(parseActionInput(line)).toEqual({ valid: false, error });
  });
});
