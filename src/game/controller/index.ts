/**
 * Game Controller
 *
 * Async hand runners, rule-based agents and hand history export.
 */

export * from './ActionProvider';
export * from './GameController';
export * from './SimpleAI';
export * from './HandHistory';
