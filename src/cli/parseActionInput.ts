/**
 * parseActionInput.ts
 * Turns a typed line into an action decision
 *
 * Accepted forms: "fold", "check", "call", "raise <to>", "all-in".
 * Single-letter shortcuts f/x/c/r/a work too. Parsing is stateless; the
 * engine still decides whether the action is legal.
 */

import { ActionDecision } from '../game/controller/ActionProvider';

// ============================================================================
// Result Types
// ============================================================================

export type ParseResult =
  | { readonly valid: true; readonly decision: ActionDecision }
  | { readonly valid: false; readonly error: string };

const KEYWORDS: ReadonlyMap<string, ActionDecision['type']> = new Map<string, ActionDecision['type']>([
  ['fold', 'fold'],
  ['f', 'fold'],
  ['check', 'check'],
  ['x', 'check'],
  ['call', 'call'],
  ['c', 'call'],
  ['raise', 'raise'],
  ['bet', 'raise'],
  ['r', 'raise'],
  ['all-in', 'all-in'],
  ['allin', 'all-in'],
  ['shove', 'all-in'],
  ['a', 'all-in'],
]);

export const ACTION_INPUT_HELP = 'fold | check | call | raise <amount> | all-in';

// ============================================================================
// Parser
// ============================================================================

export function parseActionInput(line: string): ParseResult {
  const words = line.trim().toLowerCase().split(/\s+/).filter(w => w.length > 0);
  if (words.length === 0) {
    return invalid(`Enter an action: ${ACTION_INPUT_HELP}`);
  }

  const [keyword, ...rest] = words;
  const type = KEYWORDS.get(keyword);
  if (!type) {
    return invalid(`Unknown action '${keyword}'. Try: ${ACTION_INPUT_HELP}`);
  }

  if (type !== 'raise') {
    if (rest.length > 0) {
      return invalid(`'${keyword}' takes no amount`);
    }
    return { valid: true, decision: { type } };
  }

  if (rest.length !== 1) {
    return invalid('Raise needs exactly one amount, e.g. "raise 60"');
  }

  const amountText = rest[0];
  if (!/^\d+$/.test(amountText)) {
    return invalid(`Raise amount must be a whole number of chips, got '${amountText}'`);
  }

  const amount = Number(amountText);
  if (amount <= 0) {
    return invalid('Raise amount must be greater than zero');
  }

  return { valid: true, decision: { type: 'raise', amount } };
}

function invalid(error: string): ParseResult {
  return { valid: false, error };
}
