export type LedgerErrorCode =
  | "LengthMismatch"
  | "NoBatches"
  | "InsufficientBalance"
  | "InsufficientFunderBalance"
  | "NotRefundable"
  | "NothingToWithdraw"
  | "TransferFailed"
  | "BalanceOverflow"
  | "InvalidInput";

/**
 * Raised by every ledger operation that aborts. The operation's state changes
 * are never visible once this has been thrown.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(
    code: LedgerErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
    this.details = details;
  }
}

export const isLedgerError = (
  err: unknown,
  code?: LedgerErrorCode,
): err is LedgerError =>
  err instanceof LedgerError && (code === undefined || err.code === code);
