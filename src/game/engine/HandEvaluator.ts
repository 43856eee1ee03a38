/**
 * HandEvaluator.ts
 * Best five-card rank out of five to seven cards
 *
 * Every five-card subset is ranked. Without a straight or flush, the
 * category follows from the sizes of the rank groups, and the group ranks
 * in (size, rank) order are already the tie-breakers.
 */

import { Card, Rank, cardKey, findDuplicateCard } from './Card';
import { HandCategory, HandRank, createHandRank } from './HandRank';
import { EngineErrors } from './EngineErrors';

interface RankGroup {
  readonly rank: Rank;
  readonly size: number;
}

const HAND_SIZE = 5;

const CATEGORY_BY_SHAPE: ReadonlyMap<string, HandCategory> = new Map<string, HandCategory>([
  ['4-1', 'four-of-a-kind'],
  ['3-2', 'full-house'],
  ['3-1-1', 'three-of-a-kind'],
  ['2-2-1', 'two-pair'],
  ['2-1-1-1', 'one-pair'],
  ['1-1-1-1-1', 'high-card'],
]);

// ============================================================================
// Five Cards
// ============================================================================

/**
 * Largest groups first, higher rank first within a size
 */
function groupByRank(cards: readonly Card[]): RankGroup[] {
  const sizes = new Map<Rank, number>();
  for (const card of cards) {
    sizes.set(card.rank, (sizes.get(card.rank) ?? 0) + 1);
  }
  return Array.from(sizes, ([rank, size]) => ({ rank, size }))
    .sort((a, b) => b.size - a.size || b.rank - a.rank);
}

/**
 * Top rank of a five-rank run, or null. The wheel plays its ace low.
 */
function straightTop(groups: readonly RankGroup[]): Rank | null {
  if (groups.length !== HAND_SIZE) return null;

  const top = groups[0].rank;
  if (top - groups[HAND_SIZE - 1].rank === HAND_SIZE - 1) return top;
  if (top === 14 && groups[1].rank === 5) return 5;
  return null;
}

function rankFive(cards: readonly Card[]): HandRank {
  const groups = groupByRank(cards);
  const flush = cards.every(card => card.suit === cards[0].suit);
  const top = straightTop(groups);

  if (top !== null) {
    return createHandRank(flush ? 'straight-flush' : 'straight', [top]);
  }

  const ranks = groups.map(g => g.rank);
  if (flush) {
    return createHandRank('flush', ranks);
  }

  const shape = groups.map(g => g.size).join('-');
  const category = CATEGORY_BY_SHAPE.get(shape);
  if (!category) {
    throw EngineErrors.invalidHand(`No category for rank groups ${shape}`, cards);
  }
  return createHandRank(category, ranks);
}

function fiveCardSubsets(cards: readonly Card[]): Card[][] {
  const subsets: Card[][] = [];
  for (let mask = 0; mask < 1 << cards.length; mask++) {
    const picked = cards.filter((_, i) => (mask & (1 << i)) !== 0);
    if (picked.length === HAND_SIZE) {
      subsets.push(picked);
    }
  }
  return subsets;
}

// ============================================================================
// Main API
// ============================================================================

/**
 * Evaluate the best 5-card hand from 5 to 7 unique cards
 */
export function evaluateHand(cards: readonly Card[]): HandRank {
  if (cards.length < HAND_SIZE || cards.length > 7) {
    throw EngineErrors.invalidHand(`Need 5 to 7 cards, got ${cards.length}`, cards);
  }

  const duplicate = findDuplicateCard(cards);
  if (duplicate) {
    throw EngineErrors.invalidHand(`Duplicate card ${cardKey(duplicate)}`, cards);
  }

  return fiveCardSubsets(cards)
    .map(rankFive)
    .reduce((best, rank) => (rank.value > best.value ? rank : best));
}

/**
 * Indices of every hand that ties for best
 */
export function determineWinners(hands: readonly (readonly Card[])[]): number[] {
  const values = hands.map(hand => evaluateHand(hand).value);
  const best = Math.max(...values);
  return values.flatMap((value, i) => (value === best ? [i] : []));
}
