/**
 * Economy Module
 *
 * This module provides:
 * - Per-hand contribution ledger
 * - Main and side pot partitioning
 * - Settlement with chip conservation checks
 */

// ============================================================================
// Errors
// ============================================================================

export {
  EconomyError,
  EconomyErrorCode,
  InvalidAmountError,
  PotAlreadySettledError,
  PotConservationError,
  EconomyErrors,
} from './EconomyErrors';

// ============================================================================
// Pot
// ============================================================================

export {
  PlayerContribution,
  ContributionLedger,
  PotResolution,
  PotManager,
} from './Pot';

// ============================================================================
// Side Pots
// ============================================================================

export {
  PlayerContributionInfo,
  SidePot,
  PotAward,
  SettlementResult,
  SidePotCalculator,
  determineWinnersPerPot,
} from './SidePot';
