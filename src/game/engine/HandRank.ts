/**
 * HandRank.ts
 * The nine Hold'em hand categories and the rank value that orders them
 *
 * A rank packs its category strength and tie-break ranks into one integer,
 * base 15, strength first. Two hands compare by that value alone.
 */

import { Rank } from './Card';

// ============================================================================
// Types
// ============================================================================

export type HandCategory =
  | 'high-card'
  | 'one-pair'
  | 'two-pair'
  | 'three-of-a-kind'
  | 'straight'
  | 'flush'
  | 'full-house'
  | 'four-of-a-kind'
  | 'straight-flush';

export interface HandRank {
  readonly category: HandCategory;
  /** Tie-break ranks, most significant first */
  readonly kickers: readonly Rank[];
  readonly value: number;
  readonly description: string;
}

interface CategoryEntry {
  readonly category: HandCategory;
  readonly name: string;
  readonly describe: (ranks: readonly Rank[]) => string;
}

// ============================================================================
// Category Table
// ============================================================================

function rankName(rank: Rank): string {
  switch (rank) {
    case 14: return 'Ace';
    case 13: return 'King';
    case 12: return 'Queen';
    case 11: return 'Jack';
    default: return String(rank);
  }
}

function rankPlural(rank: Rank): string {
  return rank === 6 ? 'Sixes' : `${rankName(rank)}s`;
}

/**
 * Weakest first. A category's index is its strength.
 */
const CATEGORY_TABLE: readonly CategoryEntry[] = [
  {
    category: 'high-card',
    name: 'High Card',
    describe: ([high]) => `High Card, ${rankName(high)}`,
  },
  {
    category: 'one-pair',
    name: 'One Pair',
    describe: ([pair]) => `Pair of ${rankPlural(pair)}`,
  },
  {
    category: 'two-pair',
    name: 'Two Pair',
    describe: ([high, low]) => `Two Pair, ${rankPlural(high)} and ${rankPlural(low)}`,
  },
  {
    category: 'three-of-a-kind',
    name: 'Three of a Kind',
    describe: ([trips]) => `Three of a Kind, ${rankPlural(trips)}`,
  },
  {
    category: 'straight',
    name: 'Straight',
    describe: ([top]) => `Straight, ${rankName(top)} high`,
  },
  {
    category: 'flush',
    name: 'Flush',
    describe: ([high]) => `Flush, ${rankName(high)} high`,
  },
  {
    category: 'full-house',
    name: 'Full House',
    describe: ([trips, pair]) => `Full House, ${rankPlural(trips)} full of ${rankPlural(pair)}`,
  },
  {
    category: 'four-of-a-kind',
    name: 'Four of a Kind',
    describe: ([quads]) => `Four of a Kind, ${rankPlural(quads)}`,
  },
  {
    category: 'straight-flush',
    name: 'Straight Flush',
    describe: ([top]) => (top === 14 ? 'Royal Flush' : `Straight Flush, ${rankName(top)} high`),
  },
];

export const HAND_CATEGORIES: readonly HandCategory[] = CATEGORY_TABLE.map(entry => entry.category);

function entryFor(category: HandCategory): CategoryEntry {
  const entry = CATEGORY_TABLE.find(e => e.category === category);
  if (!entry) {
    throw new RangeError(`Unknown hand category ${category}`);
  }
  return entry;
}

// ============================================================================
// Functions
// ============================================================================

const KICKER_SLOTS = 5;
const BASE = 15;

export function categoryStrength(category: HandCategory): number {
  return HAND_CATEGORIES.indexOf(category);
}

export function createHandRank(category: HandCategory, kickers: readonly Rank[]): HandRank {
  let value = categoryStrength(category);
  for (let slot = 0; slot < KICKER_SLOTS; slot++) {
    value = value * BASE + (kickers[slot] ?? 0);
  }
  return { category, kickers, value, description: entryFor(category).describe(kickers) };
}

/**
 * Negative when a is weaker, positive when stronger, 0 for an exact tie
 */
export function compareHandRanks(a: HandRank, b: HandRank): number {
  return a.value - b.value;
}

export function getCategoryName(category: HandCategory): string {
  return entryFor(category).name;
}
