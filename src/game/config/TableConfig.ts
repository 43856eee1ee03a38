/**
 * TableConfig.ts
 * Table rules and their validation
 *
 * Config objects are frozen after validation; build a new one to change rules.
 */

import { TableConfigErrors } from './TableConfigErrors';

// ============================================================================
// Types
// ============================================================================

export type OddChipPolicy = 'left-of-dealer' | 'lowest-seat';

export type TimeoutPolicy = 're-prompt' | 'fold';

export interface TableConfig {
  readonly tableId: string;
  readonly smallBlind: number;
  readonly bigBlind: number;
  readonly minPlayers: number;
  readonly maxPlayers: number;
  /** Seed for a reproducible shuffle */
  readonly seed?: string;
  readonly initialDealerSeat: number;
  readonly oddChipPolicy: OddChipPolicy;
  /** 0 disables the timeout */
  readonly actionTimeoutMs: number;
  readonly timeoutPolicy: TimeoutPolicy;
}

// ============================================================================
// Defaults
// ============================================================================

/** One deck deals 2 hole cards to 22 players plus a 5-card board */
export const MAX_TABLE_PLAYERS = 22;

export const DEFAULT_TABLE_CONFIG: TableConfig = Object.freeze({
  tableId: 'table-1',
  smallBlind: 10,
  bigBlind: 20,
  minPlayers: 2,
  maxPlayers: 9,
  initialDealerSeat: 0,
  oddChipPolicy: 'left-of-dealer',
  actionTimeoutMs: 0,
  timeoutPolicy: 're-prompt',
});

const ODD_CHIP_POLICIES: readonly OddChipPolicy[] = ['left-of-dealer', 'lowest-seat'];
const TIMEOUT_POLICIES: readonly TimeoutPolicy[] = ['re-prompt', 'fold'];

// ============================================================================
// Builders
// ============================================================================

/**
 * Merge overrides over the defaults and validate the result
 */
export function createTableConfig(overrides: Partial<TableConfig> = {}): TableConfig {
  const config: TableConfig = { ...DEFAULT_TABLE_CONFIG, ...overrides };
  validateTableConfig(config);
  return Object.freeze(config);
}

export function validateTableConfig(config: TableConfig): void {
  if (config.tableId.trim() === '') {
    throw TableConfigErrors.invalidTableId();
  }

  if (!isPositiveInteger(config.smallBlind)) {
    throw TableConfigErrors.invalidBlind('smallBlind', config.smallBlind);
  }
  if (!isPositiveInteger(config.bigBlind)) {
    throw TableConfigErrors.invalidBlind('bigBlind', config.bigBlind);
  }
  if (config.smallBlind >= config.bigBlind) {
    throw TableConfigErrors.smallBlindNotBelowBigBlind(config.smallBlind, config.bigBlind);
  }

  const { minPlayers, maxPlayers } = config;
  if (!Number.isInteger(minPlayers) || minPlayers < 2) {
    throw TableConfigErrors.invalidPlayerLimits('minPlayers must be at least 2', minPlayers, maxPlayers);
  }
  if (!Number.isInteger(maxPlayers) || maxPlayers > MAX_TABLE_PLAYERS) {
    throw TableConfigErrors.invalidPlayerLimits(
      `maxPlayers must be at most ${MAX_TABLE_PLAYERS}`,
      minPlayers,
      maxPlayers
    );
  }
  if (minPlayers > maxPlayers) {
    throw TableConfigErrors.invalidPlayerLimits('minPlayers exceeds maxPlayers', minPlayers, maxPlayers);
  }

  if (
    !Number.isInteger(config.initialDealerSeat) ||
    config.initialDealerSeat < 0 ||
    config.initialDealerSeat >= maxPlayers
  ) {
    throw TableConfigErrors.invalidDealerSeat(config.initialDealerSeat, maxPlayers);
  }

  if (!ODD_CHIP_POLICIES.includes(config.oddChipPolicy)) {
    throw TableConfigErrors.invalidOddChipPolicy(config.oddChipPolicy);
  }

  if (!Number.isInteger(config.actionTimeoutMs) || config.actionTimeoutMs < 0) {
    throw TableConfigErrors.invalidTimeout('actionTimeoutMs must be a non-negative integer', {
      actionTimeoutMs: config.actionTimeoutMs,
    });
  }
  if (!TIMEOUT_POLICIES.includes(config.timeoutPolicy)) {
    throw TableConfigErrors.invalidTimeout(`unknown policy '${config.timeoutPolicy}'`, {
      timeoutPolicy: config.timeoutPolicy,
    });
  }
}

// ============================================================================
// Environment
// ============================================================================

/**
 * Read HOLDEM_* variables over the defaults. Unset variables keep the default.
 */
export function tableConfigFromEnv(env: NodeJS.ProcessEnv = process.env): TableConfig {
  const overrides: { -readonly [K in keyof TableConfig]?: TableConfig[K] } = {};

  if (env.HOLDEM_TABLE_ID) overrides.tableId = env.HOLDEM_TABLE_ID;
  if (env.HOLDEM_SEED) overrides.seed = env.HOLDEM_SEED;

  const smallBlind = readInt(env, 'HOLDEM_SMALL_BLIND');
  if (smallBlind !== undefined) overrides.smallBlind = smallBlind;

  const bigBlind = readInt(env, 'HOLDEM_BIG_BLIND');
  if (bigBlind !== undefined) overrides.bigBlind = bigBlind;

  const minPlayers = readInt(env, 'HOLDEM_MIN_PLAYERS');
  if (minPlayers !== undefined) overrides.minPlayers = minPlayers;

  const maxPlayers = readInt(env, 'HOLDEM_MAX_PLAYERS');
  if (maxPlayers !== undefined) overrides.maxPlayers = maxPlayers;

  const dealerSeat = readInt(env, 'HOLDEM_DEALER_SEAT');
  if (dealerSeat !== undefined) overrides.initialDealerSeat = dealerSeat;

  const timeout = readInt(env, 'HOLDEM_ACTION_TIMEOUT_MS');
  if (timeout !== undefined) overrides.actionTimeoutMs = timeout;

  const oddChip = env.HOLDEM_ODD_CHIP_POLICY;
  if (oddChip) {
    const policy = ODD_CHIP_POLICIES.find(p => p === oddChip);
    if (!policy) throw TableConfigErrors.invalidEnvValue('HOLDEM_ODD_CHIP_POLICY', oddChip);
    overrides.oddChipPolicy = policy;
  }

  const timeoutPolicy = env.HOLDEM_TIMEOUT_POLICY;
  if (timeoutPolicy) {
    const policy = TIMEOUT_POLICIES.find(p => p === timeoutPolicy);
    if (!policy) throw TableConfigErrors.invalidEnvValue('HOLDEM_TIMEOUT_POLICY', timeoutPolicy);
    overrides.timeoutPolicy = policy;
  }

  return createTableConfig(overrides);
}

// ============================================================================
// Helpers
// ============================================================================

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function readInt(env: NodeJS.ProcessEnv, variable: string): number | undefined {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') return undefined;

  if (!/^-?\d+$/.test(raw.trim())) {
    throw TableConfigErrors.invalidEnvValue(variable, raw);
  }
  return Number.parseInt(raw, 10);
}
