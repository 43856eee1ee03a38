/**
 * Deck.ts
 * Standard 52-card deck with shuffle and deal
 *
 * Uses Fisher-Yates shuffle for uniform randomness.
 * Immutable operations return new deck state.
 */

import seedrandom from 'seedrandom';
import { Card, SUITS, RANKS, createCard, cardKey, findDuplicateCard, formatCard } from './Card';
import { EngineErrors } from './EngineErrors';

// ============================================================================
// Types
// ============================================================================

export interface Deck {
  readonly cards: readonly Card[];
  readonly dealt: number; // Number of cards dealt from top
}

/**
 * Uniform float in [0, 1)
 */
export type RandomSource = () => number;

// ============================================================================
// Functions
// ============================================================================

/**
 * Seeded source when a seed is given, Math.random otherwise.
 * The same seed always produces the same shuffle order.
 */
export function createRandomSource(seed?: string): RandomSource {
  if (seed === undefined) {
    return Math.random;
  }
  return seedrandom(seed);
}

/**
 * Create a fresh 52-card deck (unshuffled)
 */
export function createDeck(): Deck {
  const cards: Card[] = [];

  for (const suit of SUITS) {
    for (const rank of RANKS) {
      cards.push(createCard(suit, rank));
    }
  }

  return { cards, dealt: 0 };
}

/**
 * Shuffle the undealt cards using Fisher-Yates
 * Returns a new shuffled deck
 */
export function shuffleDeck(deck: Deck, random: RandomSource = Math.random): Deck {
  const cards = deck.cards.slice(deck.dealt);

  for (let i = cards.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [cards[i], cards[j]] = [cards[j], cards[i]];
  }

  return { cards, dealt: 0 };
}

/**
 * Deal n cards from the top of the deck
 * Returns [dealt cards, new deck state]
 */
export function dealCards(deck: Deck, count: number): [Card[], Deck] {
  const remaining = deck.cards.length - deck.dealt;

  if (count > remaining) {
    throw EngineErrors.emptyDeck(count, remaining);
  }

  const dealtCards = deck.cards.slice(deck.dealt, deck.dealt + count);
  const newDeck: Deck = {
    cards: deck.cards,
    dealt: deck.dealt + count,
  };

  return [dealtCards, newDeck];
}

/**
 * Get remaining card count
 */
export function remainingCards(deck: Deck): number {
  return deck.cards.length - deck.dealt;
}

/**
 * Repopulate all 52 cards and reshuffle
 */
export function resetDeck(random: RandomSource = Math.random): Deck {
  return shuffleDeck(createDeck(), random);
}

/**
 * Deck with the given cards on top, followed by every other card in
 * canonical order. Used to replay or script a hand.
 */
export function createStackedDeck(topCards: readonly Card[]): Deck {
  const duplicate = findDuplicateCard(topCards);
  if (duplicate) {
    throw new Error(`Stacked deck repeats ${formatCard(duplicate)}`);
  }

  const onTop = new Set(topCards.map(cardKey));
  const rest = createDeck().cards.filter(card => !onTop.has(cardKey(card)));

  return { cards: [...topCards, ...rest], dealt: 0 };
}
