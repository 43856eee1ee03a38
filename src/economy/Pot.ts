/**
 * Pot.ts
 * Per-hand pot ledger
 *
 * Records every chip committed during a hand and partitions the total into
 * main and side pots at the end. Works with SidePot.ts for all-in situations.
 *
 * Key concepts:
 * - Contribution: chips a player put in on one street
 * - Total contribution: sum across streets, the basis for pot tiers
 * - Settlement: one pass that pays every tier and checks conservation
 */

import { Street } from '../game/engine/TableState';
import { HandRank } from '../game/engine/HandRank';
import { EconomyErrors } from './EconomyErrors';
import {
  SidePot,
  PotAward,
  SidePotCalculator,
  PlayerContributionInfo,
  determineWinnersPerPot,
} from './SidePot';

// ============================================================================
// Types
// ============================================================================

export interface PlayerContribution {
  readonly playerId: string;
  readonly amount: number;
  readonly street: Street;
}

/**
 * Anything that can record committed chips. The betting round writes to it.
 */
export interface ContributionLedger {
  contribute(playerId: string, amount: number, street: Street): PlayerContribution;
}

export interface PotResolution {
  readonly handId: string;
  readonly pots: readonly SidePot[];
  readonly awards: readonly PotAward[];
  readonly payouts: ReadonlyMap<string, number>;
  readonly totalContributed: number;
  readonly totalAwarded: number;
}

// ============================================================================
// Pot Manager
// ============================================================================

export class PotManager implements ContributionLedger {
  private readonly handId: string;
  private readonly contributions: PlayerContribution[] = [];
  private readonly contributionsByStreet = new Map<Street, Map<string, number>>();
  private readonly contributionsByPlayer = new Map<string, number>();
  private settled = false;

  constructor(handId: string) {
    this.handId = handId;
  }

  /**
   * Add a contribution to the pot
   */
  contribute(playerId: string, amount: number, street: Street): PlayerContribution {
    if (this.settled) {
      throw EconomyErrors.potAlreadySettled(this.handId);
    }

    if (!Number.isInteger(amount) || amount <= 0) {
      throw EconomyErrors.invalidAmount(amount, 'Pot contribution must be positive integer');
    }

    const contribution: PlayerContribution = { playerId, amount, street };
    this.contributions.push(contribution);

    let streetContrib = this.contributionsByStreet.get(street);
    if (!streetContrib) {
      streetContrib = new Map();
      this.contributionsByStreet.set(street, streetContrib);
    }
    streetContrib.set(playerId, (streetContrib.get(playerId) ?? 0) + amount);

    this.contributionsByPlayer.set(
      playerId,
      (this.contributionsByPlayer.get(playerId) ?? 0) + amount
    );

    return contribution;
  }

  getTotal(): number {
    let total = 0;
    for (const amount of this.contributionsByPlayer.values()) {
      total += amount;
    }
    return total;
  }

  getPlayerContribution(playerId: string): number {
    return this.contributionsByPlayer.get(playerId) ?? 0;
  }

  getPlayerStreetContribution(playerId: string, street: Street): number {
    return this.contributionsByStreet.get(street)?.get(playerId) ?? 0;
  }

  getStreetTotal(street: Street): number {
    let total = 0;
    for (const amount of this.contributionsByStreet.get(street)?.values() ?? []) {
      total += amount;
    }
    return total;
  }

  getContributions(): readonly PlayerContribution[] {
    return [...this.contributions];
  }

  isSettled(): boolean {
    return this.settled;
  }

  /**
   * Current pot tiers given the players still contesting the hand
   */
  calculatePots(livePlayerIds: readonly string[]): SidePot[] {
    return SidePotCalculator.calculate(this.toContributionInfo(livePlayerIds));
  }

  /**
   * Pot tiers mid-hand, capped only at all-in levels
   */
  calculateOpenPots(livePlayerIds: readonly string[], allInPlayerIds: readonly string[]): SidePot[] {
    const info = this.toContributionInfo(livePlayerIds);
    const missing = livePlayerIds
      .filter(id => !this.contributionsByPlayer.has(id))
      .map(playerId => ({ playerId, totalContribution: 0, isFolded: false }));
    return SidePotCalculator.calculateOpen([...info, ...missing], allInPlayerIds);
  }

  /**
   * Settle every tier among the live players by hand rank.
   * `positionOrder` decides who takes odd chips.
   */
  resolve(
    livePlayerIds: readonly string[],
    rankByPlayer: ReadonlyMap<string, HandRank>,
    positionOrder: readonly string[]
  ): PotResolution {
    this.assertOpen();

    const pots = this.calculatePots(livePlayerIds);
    const winnersByPot = determineWinnersPerPot(pots, rankByPlayer, positionOrder);
    return this.settle(pots, winnersByPot);
  }

  /**
   * Give the whole pot to the last player standing
   */
  awardUncontested(playerId: string): PotResolution {
    this.assertOpen();

    const total = this.getTotal();
    const pots: SidePot[] = total > 0
      ? [{
          index: 0,
          amount: total,
          eligiblePlayers: [playerId],
          contributionLevel: this.getPlayerContribution(playerId),
        }]
      : [];
    return this.settle(pots, pots.map(() => [playerId]));
  }

  // ==========================================================================
  // Private
  // ==========================================================================

  private settle(
    pots: readonly SidePot[],
    winnersByPot: readonly (readonly string[])[]
  ): PotResolution {
    const settlement = SidePotCalculator.settle(pots, winnersByPot);
    const totalContributed = this.getTotal();

    if (settlement.totalAwarded !== totalContributed) {
      throw EconomyErrors.potConservation(this.handId, totalContributed, settlement.totalAwarded);
    }

    this.settled = true;

    return {
      handId: this.handId,
      pots,
      awards: settlement.awards,
      payouts: settlement.playerPayouts,
      totalContributed,
      totalAwarded: settlement.totalAwarded,
    };
  }

  private assertOpen(): void {
    if (this.settled) {
      throw EconomyErrors.potAlreadySettled(this.handId);
    }
  }

  private toContributionInfo(livePlayerIds: readonly string[]): PlayerContributionInfo[] {
    const live = new Set(livePlayerIds);
    return Array.from(this.contributionsByPlayer.entries()).map(([playerId, totalContribution]) => ({
      playerId,
      totalContribution,
      isFolded: !live.has(playerId),
    }));
  }
}
