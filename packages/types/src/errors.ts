/**
 * Card Errors
 *
 * Every failure in the card stack is a CardError with a distinct code.
 * Always thrown, never returned; the failing call leaves no partial effect.
 */

/** Error codes shared by the ledger and the registry. */
export type CardErrorCode =
  | "NOT_EXISTS"
  | "ZERO_USE_COUNT"
  | "MAX_USES_COUNT_REACHED"
  | "WRONG_INPUT_PARAMS"
  | "CALLER_IS_NOT_OWNER_NOR_APPROVED"
  | "CAPABILITY_DENIED"
  | "HALTED"
  | "INVALID_VALUE"
  | "INVALID_RECIPIENT"
  | "ALREADY_MINTED"
  | "TRANSFER_FROM_INCORRECT_OWNER"
  | "INDEX_OUT_OF_BOUNDS"
  | "APPROVAL_TO_CURRENT_OWNER"
  | "UNSUPPORTED_SNAPSHOT_VERSION";

/**
 * Structured error from the card stack.
 */
export class CardError extends Error {
  public readonly code: CardErrorCode;

  constructor(code: CardErrorCode, message: string) {
    super(message);
    this.name = "CardError";
    this.code = code;
  }
}

/**
 * Narrow an unknown thrown value to a CardError, optionally of one code.
 */
export function isCardError(err: unknown, code?: CardErrorCode): err is CardError {
  if (!(err instanceof CardError)) return false;
  return code === undefined || err.code === code;
}
