/**
 * Base class for every error raised by the budgeting engine.
 *
 * `code` is machine-readable so callers (commands, reports) can switch on it
 * without parsing messages.
 */
export class BudgetError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "BudgetError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Non-positive, non-numeric, or sub-cent amount given to spend/deposit or the amount parser. */
export class InvalidAmountError extends BudgetError {
  constructor(message = "Amount must be positive.") {
    super("INVALID_AMOUNT", message);
    this.name = "InvalidAmountError";
  }
}

/**
 * A funding period was presented that is not strictly after the envelope's
 * last funded period. This is a caller bug, never a user error.
 */
export class OutOfOrderFundingError extends BudgetError {
  readonly envelopeId: string;
  readonly period: string;
  readonly lastFundedPeriod: string;

  constructor(envelopeId: string, period: string, lastFundedPeriod: string) {
    super(
      "OUT_OF_ORDER_FUNDING",
      `Envelope "${envelopeId}" was already funded through ${lastFundedPeriod}; cannot fund ${period}.`
    );
    this.name = "OutOfOrderFundingError";
    this.envelopeId = envelopeId;
    this.period = period;
    this.lastFundedPeriod = lastFundedPeriod;
  }
}

export class EnvelopeNotFoundError extends BudgetError {
  readonly envelopeId: string;

  constructor(envelopeId: string) {
    super("ENVELOPE_NOT_FOUND", `Envelope not found: ${envelopeId}`);
    this.name = "EnvelopeNotFoundError";
    this.envelopeId = envelopeId;
  }
}

/**
 * The stored envelope changed between load and commit. Nothing was written;
 * reload and re-apply the operation.
 */
export class StaleEnvelopeError extends BudgetError {
  readonly envelopeId: string;
  readonly expectedVersion: number;

  constructor(envelopeId: string, expectedVersion: number) {
    super(
      "STALE_ENVELOPE",
      `Envelope "${envelopeId}" was modified concurrently (expected version ${expectedVersion}).`
    );
    this.name = "StaleEnvelopeError";
    this.envelopeId = envelopeId;
    this.expectedVersion = expectedVersion;
  }
}

/** Envelope creation input failed validation. One entry per failed field. */
export class InvalidEnvelopeError extends BudgetError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super("INVALID_ENVELOPE", `Envelope is invalid: ${details.join("; ")}`);
    this.name = "InvalidEnvelopeError";
    this.details = details;
  }
}

export class InvalidConfigError extends BudgetError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super("INVALID_CONFIG", `Configuration is invalid: ${details.join("; ")}`);
    this.name = "InvalidConfigError";
    this.details = details;
  }
}
