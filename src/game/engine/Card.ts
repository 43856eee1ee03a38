/**
 * Card.ts
 * Card representation for Texas Hold'em
 *
 * Immutable card type with suit and rank.
 */

// ============================================================================
// Types
// ============================================================================

export type Suit = 'clubs' | 'diamonds' | 'hearts' | 'spades';

export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;
// 11 = Jack, 12 = Queen, 13 = King, 14 = Ace

export interface Card {
  readonly suit: Suit;
  readonly rank: Rank;
}

// ============================================================================
// Constants
// ============================================================================

export const SUITS: readonly Suit[] = ['clubs', 'diamonds', 'hearts', 'spades'];

export const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];

export const RANK_NAMES: Record<Rank, string> = {
  2: '2',
  3: '3',
  4: '4',
  5: '5',
  6: '6',
  7: '7',
  8: '8',
  9: '9',
  10: 'T',
  11: 'J',
  12: 'Q',
  13: 'K',
  14: 'A',
};

export const SUIT_SYMBOLS: Record<Suit, string> = {
  clubs: '♣',
  diamonds: '♦',
  hearts: '♥',
  spades: '♠',
};

const SUIT_LETTERS: Record<Suit, string> = {
  clubs: 'c',
  diamonds: 'd',
  hearts: 'h',
  spades: 's',
};

const RANK_BY_CHAR: Readonly<Record<string, Rank>> = {
  '2': 2,
  '3': 3,
  '4': 4,
  '5': 5,
  '6': 6,
  '7': 7,
  '8': 8,
  '9': 9,
  T: 10,
  '10': 10,
  J: 11,
  Q: 12,
  K: 13,
  A: 14,
};

const SUIT_BY_CHAR: Readonly<Record<string, Suit>> = {
  c: 'clubs',
  d: 'diamonds',
  h: 'hearts',
  s: 'spades',
  '♣': 'clubs',
  '♦': 'diamonds',
  '♥': 'hearts',
  '♠': 'spades',
};

// ============================================================================
// Functions
// ============================================================================

/**
 * Create a card
 */
export function createCard(suit: Suit, rank: Rank): Card {
  return { suit, rank };
}

/**
 * Format card for display (e.g., "A♠", "K♥")
 */
export function formatCard(card: Card): string {
  return `${RANK_NAMES[card.rank]}${SUIT_SYMBOLS[card.suit]}`;
}

export function formatCards(cards: readonly Card[]): string {
  return cards.map(formatCard).join(' ');
}

/**
 * Stable short key ("As", "Td") used for equality sets and hand histories.
 */
export function cardKey(card: Card): string {
  return `${RANK_NAMES[card.rank]}${SUIT_LETTERS[card.suit]}`;
}

/**
 * Returns the first card that appears more than once, or null.
 */
export function findDuplicateCard(cards: readonly Card[]): Card | null {
  const seen = new Set<string>();
  for (const card of cards) {
    const key = cardKey(card);
    if (seen.has(key)) return card;
    seen.add(key);
  }
  return null;
}

/**
 * Parse card from string notation (e.g., "As", "Kh", "10c", "Q♦")
 */
export function parseCard(notation: string): Card | null {
  const trimmed = notation.trim();
  if (trimmed.length < 2) return null;

  const rank = RANK_BY_CHAR[trimmed.slice(0, -1).toUpperCase()];
  const suit = SUIT_BY_CHAR[trimmed.slice(-1).toLowerCase()];

  if (rank === undefined || suit === undefined) {
    return null;
  }

  return createCard(suit, rank);
}

/**
 * Parse a whitespace separated list ("As Kd 2c"); throws on the first bad token.
 */
export function parseCards(notation: string): Card[] {
  return notation
    .split(/\s+/)
    .filter(token => token.length > 0)
    .map(token => {
      const card = parseCard(token);
      if (!card) {
        throw new Error(`Invalid card notation: ${token}`);
      }
      return card;
    });
}
