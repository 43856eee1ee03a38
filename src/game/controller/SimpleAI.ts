/**
 * SimpleAI.ts
 * Simple rule-based AI for opponent decisions
 *
 * Makes basic decisions:
 * - Check when possible
 * - Call small bets
 * - Fold to large bets (sometimes)
 * - Occasionally raise
 *
 * Only ever picks from the valid actions it is shown.
 */

import { RandomSource } from '../engine/Deck';
import { ValidActions } from '../engine/BettingRound';
import { ActionDecision, ActionPrompt, ActionProvider } from './ActionProvider';

// ============================================================================
// Types
// ============================================================================

export type AIStyle = 'passive' | 'neutral' | 'aggressive';

export interface AIConfig {
  readonly style: AIStyle;
  readonly foldThreshold: number; // Fold if call amount > stack * threshold
  readonly raiseFrequency: number; // 0-1, chance to raise when possible
  /** Bet sizing variance - min factor of pot (default by style) */
  readonly betSizeMin?: number;
  /** Bet sizing variance - max factor of pot (default by style) */
  readonly betSizeMax?: number;
}

// ============================================================================
// AI Style Presets
// ============================================================================

export const AI_STYLES: Record<AIStyle, AIConfig> = {
  passive: {
    style: 'passive',
    foldThreshold: 0.3,
    raiseFrequency: 0.05,
  },
  neutral: {
    style: 'neutral',
    foldThreshold: 0.5,
    raiseFrequency: 0.2,
  },
  aggressive: {
    style: 'aggressive',
    foldThreshold: 0.7,
    raiseFrequency: 0.4,
  },
};

const STYLE_FREQUENCIES: Record<AIStyle, { bet: number; heroicCall: number }> = {
  passive: { bet: 0.1, heroicCall: 0.1 },
  neutral: { bet: 0.2, heroicCall: 0.2 },
  aggressive: { bet: 0.35, heroicCall: 0.3 },
};

// ============================================================================
// Decision Functions
// ============================================================================

/**
 * Make a decision for the AI player
 */
export function makeAIDecision(
  prompt: ActionPrompt,
  config: AIConfig = AI_STYLES.neutral,
  random: RandomSource = Math.random
): ActionDecision {
  const { snapshot, validActions } = prompt;
  const player = snapshot.players.find(p => p.id === prompt.playerId);
  const frequencies = STYLE_FREQUENCIES[config.style];

  if (!player || player.stack === 0) {
    return validActions.canCheck ? { type: 'check' } : { type: 'fold' };
  }

  // If can check, usually check but sometimes bet
  if (validActions.canCheck) {
    if (validActions.canRaise && random() < frequencies.bet) {
      return {
        type: 'raise',
        amount: calculateRaiseTo(snapshot.potTotal, snapshot.currentBet, validActions, config, random),
      };
    }
    return { type: 'check' };
  }

  // Facing a bet - consider pot odds
  const callAmount = validActions.callAmount;
  const potOdds = callAmount / (snapshot.potTotal + callAmount);
  const callRatio = callAmount / player.stack;

  if (callRatio > config.foldThreshold || potOdds > 0.5) {
    // Bad odds - usually fold, sometimes call anyway
    if (validActions.canCall && random() < frequencies.heroicCall) {
      return { type: 'call' };
    }
    return { type: 'fold' };
  }

  if (validActions.canRaise && random() < config.raiseFrequency) {
    return {
      type: 'raise',
      amount: calculateRaiseTo(snapshot.potTotal, snapshot.currentBet, validActions, config, random),
    };
  }

  if (validActions.canCall) {
    return { type: 'call' };
  }

  return { type: 'fold' };
}

/**
 * Raise-to amount relative to the pot, clamped to the legal range
 */
function calculateRaiseTo(
  pot: number,
  currentBet: number,
  validActions: ValidActions,
  config: AIConfig,
  random: RandomSource
): number {
  const { minRaiseTo, maxRaiseTo } = validActions;

  const betMin = config.betSizeMin ?? (config.style === 'passive' ? 0.3 : 0.5);
  const betMax = config.betSizeMax ?? (config.style === 'aggressive' ? 1.5 : 1.0);

  const factor = betMin + random() * (betMax - betMin);
  const target = currentBet + Math.floor(pot * factor);

  return Math.min(Math.max(minRaiseTo, target), maxRaiseTo);
}

/**
 * Create an action provider that plays with the given style
 */
export function createSimpleAgent(
  style: AIStyle = 'neutral',
  random: RandomSource = Math.random
): ActionProvider {
  const config = AI_STYLES[style];
  return {
    requestAction: async (prompt: ActionPrompt) => makeAIDecision(prompt, config, random),
  };
}
