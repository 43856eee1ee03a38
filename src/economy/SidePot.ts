/**
 * SidePot.ts
 * Side pot calculation for all-in scenarios
 *
 * Algorithm:
 * 1. Collect the distinct contribution levels of players who have not folded
 * 2. Peel each layer off every contribution, folded players included
 * 3. Each layer is eligible to the non-folded players who reached it
 *
 * Example:
 * Player A: 100 (all-in)
 * Player B: 300 (all-in)
 * Player C: 300
 *
 * Results in:
 * - Main pot: 300 (100 * 3) - A, B, C eligible
 * - Side pot: 400 ((300-100) * 2) - B, C eligible
 */

import { HandRank, compareHandRanks } from '../game/engine/HandRank';
import { EconomyErrors } from './EconomyErrors';

// ============================================================================
// Types
// ============================================================================

export interface PlayerContributionInfo {
  readonly playerId: string;
  readonly totalContribution: number;
  readonly isFolded: boolean;
}

export interface SidePot {
  /** 0 is the main pot */
  readonly index: number;
  readonly amount: number;
  readonly eligiblePlayers: readonly string[];
  readonly contributionLevel: number; // The contribution threshold for this pot
}

export interface PotAward {
  readonly potIndex: number;
  readonly amount: number;
  readonly eligiblePlayers: readonly string[];
  readonly winnerIds: readonly string[];
  readonly amountPerWinner: number;
  readonly remainder: number; // Odd chips that can't be split evenly
  readonly remainderTo: string | null;
}

export interface SettlementResult {
  readonly awards: readonly PotAward[];
  readonly totalAwarded: number;
  readonly playerPayouts: ReadonlyMap<string, number>;
}

// ============================================================================
// Side Pot Calculator
// ============================================================================

export class SidePotCalculator {
  /**
   * Partition contributions into pot tiers
   */
  static calculate(contributions: readonly PlayerContributionInfo[]): SidePot[] {
    const validContributions = contributions.filter(c => c.totalContribution > 0);

    if (validContributions.length === 0) {
      return [];
    }

    const levels = [...new Set(
      validContributions
        .filter(c => !c.isFolded)
        .map(c => c.totalContribution)
    )].sort((a, b) => a - b);

    if (levels.length === 0) {
      throw EconomyErrors.invalidOperation('calculate', 'Every contributor has folded');
    }

    return SidePotCalculator.partition(
      validContributions,
      levels,
      (c, level) => !c.isFolded && c.totalContribution >= level,
      validContributions
    );
  }

  /**
   * Peel each level off every contribution. Chips above the last level
   * join the last pot.
   */
  private static partition(
    contributions: readonly PlayerContributionInfo[],
    levels: readonly number[],
    isEligible: (contribution: PlayerContributionInfo, level: number) => boolean,
    candidates: readonly PlayerContributionInfo[]
  ): SidePot[] {
    const pots: SidePot[] = [];
    let previousLevel = 0;

    levels.forEach((level, i) => {
      const isLast = i === levels.length - 1;

      let amount = 0;
      for (const c of contributions) {
        const upper = isLast ? c.totalContribution : Math.min(c.totalContribution, level);
        amount += Math.max(0, upper - previousLevel);
      }

      pots.push({
        index: pots.length,
        amount,
        eligiblePlayers: candidates.filter(c => isEligible(c, level)).map(c => c.playerId),
        contributionLevel: level,
      });

      previousLevel = level;
    });

    return pots;
  }

  /**
   * Pot tiers while betting is still open. Only all-in players cap a tier;
   * everyone else still in the hand stays eligible for the top pot whether
   * or not they have matched the bet yet.
   */
  static calculateOpen(
    contributions: readonly PlayerContributionInfo[],
    allInPlayerIds: readonly string[]
  ): SidePot[] {
    const validContributions = contributions.filter(c => c.totalContribution > 0);
    const live = contributions.filter(c => !c.isFolded);

    if (validContributions.length === 0 || live.length === 0) {
      return [];
    }

    const allIn = new Set(allInPlayerIds);
    const top = Math.max(...live.map(c => c.totalContribution));
    const capped = [...new Set(
      live
        .filter(c => allIn.has(c.playerId) && c.totalContribution < top)
        .map(c => c.totalContribution)
    )].sort((a, b) => a - b);

    return SidePotCalculator.partition(
      validContributions,
      [...capped, top],
      (c, level) => !c.isFolded && (c.totalContribution >= level || !allIn.has(c.playerId)),
      live
    );
  }

  /**
   * Settle pots and determine payouts
   *
   * @param winnersByPot winners for each pot, in odd-chip order
   */
  static settle(
    pots: readonly SidePot[],
    winnersByPot: readonly (readonly string[])[]
  ): SettlementResult {
    const awards: PotAward[] = [];
    const playerPayouts = new Map<string, number>();

    pots.forEach((pot, i) => {
      const winners = winnersByPot[i];

      if (!winners || winners.length === 0) {
        throw EconomyErrors.invalidOperation('settle', `No winners specified for pot ${pot.index}`);
      }

      for (const winnerId of winners) {
        if (!pot.eligiblePlayers.includes(winnerId)) {
          throw EconomyErrors.invalidOperation(
            'settle',
            `Player ${winnerId} is not eligible for pot ${pot.index}`
          );
        }
      }

      const split = SidePotCalculator.splitPot(pot.amount, winners);
      for (const [winnerId, amount] of split) {
        playerPayouts.set(winnerId, (playerPayouts.get(winnerId) ?? 0) + amount);
      }

      const amountPerWinner = Math.floor(pot.amount / winners.length);
      const remainder = pot.amount - amountPerWinner * winners.length;

      awards.push({
        potIndex: pot.index,
        amount: pot.amount,
        eligiblePlayers: pot.eligiblePlayers,
        winnerIds: winners,
        amountPerWinner,
        remainder,
        remainderTo: remainder > 0 ? winners[0] : null,
      });
    });

    const totalAwarded = Array.from(playerPayouts.values()).reduce(
      (sum, amount) => sum + amount,
      0
    );

    return { awards, totalAwarded, playerPayouts };
  }

  /**
   * Split pot evenly among winners with remainder to first winner
   */
  static splitPot(amount: number, winnerIds: readonly string[]): Map<string, number> {
    const payouts = new Map<string, number>();
    if (winnerIds.length === 0) {
      return payouts;
    }

    const amountPerWinner = Math.floor(amount / winnerIds.length);
    const remainder = amount - amountPerWinner * winnerIds.length;

    for (const winnerId of winnerIds) {
      payouts.set(winnerId, amountPerWinner);
    }

    if (remainder > 0) {
      const firstWinner = winnerIds[0];
      payouts.set(firstWinner, (payouts.get(firstWinner) ?? 0) + remainder);
    }

    return payouts;
  }

  /**
   * Verify pot amounts match total contributions
   */
  static verifyConservation(
    contributions: readonly PlayerContributionInfo[],
    pots: readonly SidePot[]
  ): boolean {
    const totalContributions = contributions.reduce((sum, c) => sum + c.totalContribution, 0);
    const totalPots = pots.reduce((sum, p) => sum + p.amount, 0);
    return totalContributions === totalPots;
  }
}

// ============================================================================
// Helper functions for showdown integration
// ============================================================================

/**
 * Best-ranked eligible players for each pot, sorted by `positionOrder`.
 * A pot with a single eligible player needs no rank for it.
 */
export function determineWinnersPerPot(
  pots: readonly SidePot[],
  rankByPlayer: ReadonlyMap<string, HandRank>,
  positionOrder: readonly string[]
): string[][] {
  const position = (playerId: string): number => {
    const index = positionOrder.indexOf(playerId);
    return index === -1 ? positionOrder.length : index;
  };

  return pots.map(pot => {
    if (pot.eligiblePlayers.length === 1) {
      return [...pot.eligiblePlayers];
    }

    let best: HandRank | null = null;
    let winners: string[] = [];

    for (const playerId of pot.eligiblePlayers) {
      const rank = rankByPlayer.get(playerId);
      if (!rank) {
        throw EconomyErrors.invalidOperation('resolve', `No hand rank for player ${playerId}`);
      }

      const comparison = best === null ? 1 : compareHandRanks(rank, best);
      if (comparison > 0) {
        best = rank;
        winners = [playerId];
      } else if (comparison === 0) {
        winners.push(playerId);
      }
    }

    return winners.sort((a, b) => position(a) - position(b));
  });
}
