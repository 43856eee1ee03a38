/**
 * TableConfigErrors.ts
 * Typed errors for table configuration
 *
 * Deterministic, machine-readable error codes for all config violations.
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum TableConfigErrorCode {
  INVALID_TABLE_ID = 'INVALID_TABLE_ID',
  INVALID_BLINDS = 'INVALID_BLINDS',
  INVALID_PLAYER_LIMITS = 'INVALID_PLAYER_LIMITS',
  INVALID_DEALER_SEAT = 'INVALID_DEALER_SEAT',
  INVALID_ODD_CHIP_POLICY = 'INVALID_ODD_CHIP_POLICY',
  INVALID_TIMEOUT = 'INVALID_TIMEOUT',
  INVALID_ENV_VALUE = 'INVALID_ENV_VALUE',
}

// ============================================================================
// Base Error Class
// ============================================================================

export class TableConfigError extends Error {
  readonly code: TableConfigErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: TableConfigErrorCode,
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'TableConfigError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// Error Factory
// ============================================================================

export const TableConfigErrors = {
  invalidTableId: () =>
    new TableConfigError(TableConfigErrorCode.INVALID_TABLE_ID, 'tableId must be a non-empty string'),

  invalidBlind: (name: string, value: number) =>
    new TableConfigError(
      TableConfigErrorCode.INVALID_BLINDS,
      `${name} must be a positive integer, got ${value}`,
      { name, value }
    ),

  smallBlindNotBelowBigBlind: (smallBlind: number, bigBlind: number) =>
    new TableConfigError(
      TableConfigErrorCode.INVALID_BLINDS,
      `smallBlind ${smallBlind} must be less than bigBlind ${bigBlind}`,
      { smallBlind, bigBlind }
    ),

  invalidPlayerLimits: (reason: string, minPlayers: number, maxPlayers: number) =>
    new TableConfigError(
      TableConfigErrorCode.INVALID_PLAYER_LIMITS,
      `Invalid player limits: ${reason}`,
      { minPlayers, maxPlayers }
    ),

  invalidDealerSeat: (seat: number, maxPlayers: number) =>
    new TableConfigError(
      TableConfigErrorCode.INVALID_DEALER_SEAT,
      `initialDealerSeat ${seat} must be between 0 and ${maxPlayers - 1}`,
      { seat, maxPlayers }
    ),

  invalidOddChipPolicy: (policy: string) =>
    new TableConfigError(
      TableConfigErrorCode.INVALID_ODD_CHIP_POLICY,
      `Unknown odd chip policy '${policy}'`,
      { policy }
    ),

  invalidTimeout: (reason: string, details: Record<string, unknown>) =>
    new TableConfigError(TableConfigErrorCode.INVALID_TIMEOUT, `Invalid action timeout: ${reason}`, details),

  invalidEnvValue: (variable: string, value: string) =>
    new TableConfigError(
      TableConfigErrorCode.INVALID_ENV_VALUE,
      `${variable} has invalid value '${value}'`,
      { variable, value }
    ),
};
