/**
 * EconomyErrors.ts
 * Error types for pot accounting
 *
 * Any of these raised during a hand aborts it; chips are never paid out
 * from a ledger that failed a check.
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum EconomyErrorCode {
  INVALID_AMOUNT = 'INVALID_AMOUNT',
  POT_ALREADY_SETTLED = 'POT_ALREADY_SETTLED',
  POT_CONSERVATION_VIOLATION = 'POT_CONSERVATION_VIOLATION',
  INVALID_OPERATION = 'INVALID_OPERATION',
}

// ============================================================================
// Base Error Class
// ============================================================================

export class EconomyError extends Error {
  readonly code: EconomyErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: EconomyErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EconomyError';
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
// Specialized Error Classes
// ============================================================================

export class InvalidAmountError extends EconomyError {
  constructor(amount: number, reason: string) {
    super(
      EconomyErrorCode.INVALID_AMOUNT,
      `Invalid amount ${amount}: ${reason}`,
      { amount, reason }
    );
    this.name = 'InvalidAmountError';
  }
}

export class PotAlreadySettledError extends EconomyError {
  constructor(handId: string) {
    super(
      EconomyErrorCode.POT_ALREADY_SETTLED,
      `Pot for hand ${handId} has already been settled`,
      { handId }
    );
    this.name = 'PotAlreadySettledError';
  }
}

/**
 * Awarded chips differ from contributed chips. Indicates a partitioning bug.
 */
export class PotConservationError extends EconomyError {
  constructor(handId: string, contributed: number, awarded: number) {
    super(
      EconomyErrorCode.POT_CONSERVATION_VIOLATION,
      `Pot conservation violation for hand ${handId}: contributed ${contributed}, awarded ${awarded}`,
      { handId, contributed, awarded }
    );
    this.name = 'PotConservationError';
  }
}

// ============================================================================
// Error Factory
// ============================================================================

export const EconomyErrors = {
  invalidAmount: (amount: number, reason: string) =>
    new InvalidAmountError(amount, reason),

  potAlreadySettled: (handId: string) =>
    new PotAlreadySettledError(handId),

  potConservation: (handId: string, contributed: number, awarded: number) =>
    new PotConservationError(handId, contributed, awarded),

  invalidOperation: (operation: string, reason: string) =>
    new EconomyError(
      EconomyErrorCode.INVALID_OPERATION,
      `Invalid operation '${operation}': ${reason}`,
      { operation, reason }
    ),
};
