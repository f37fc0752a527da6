/**
 * Engine error taxonomy.
 *
 * Every rejection thrown by a pool operation is a PoolError. The pool's
 * atomic wrapper restores state before the error reaches the caller, so
 * catching one never leaves a half-applied call behind.
 */

export type PoolErrorKind = "VALIDATION" | "STATE" | "AUTHORIZATION" | "EXTERNAL";

export type PoolErrorCode =
  // validation
  | "INVALID_AMOUNT"
  | "ZERO_AMOUNT"
  | "INVALID_OPTION"
  | "INVALID_PRICE"
  | "MISALIGNED_PRICE"
  | "LENGTH_MISMATCH"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_SHARES"
  | "DUST_ORDER"
  | "INVALID_TARGET_PRICE"
  | "DEGENERATE_POOL"
  | "INVALID_PARAMS"
  | "INVALID_CONFIG"
  // state
  | "SALE_NOT_LIVE"
  | "POOL_CLOSED"
  | "POOL_NOT_CLOSED"
  | "WINNER_ALREADY_CHOSEN"
  | "WINNER_NOT_FINALIZED"
  | "DISPUTE_WINDOW_OPEN"
  | "DISPUTE_WINDOW_CLOSED"
  | "ALREADY_DISPUTED"
  | "DUPLICATE_ORDER_ID"
  | "ORDER_NOT_FOUND"
  | "QUEUE_ALREADY_LIVE"
  | "INVALID_HANDLE"
  | "NOTHING_FILLED"
  | "NO_STAKE"
  | "PENDING_ORDERS"
  | "ALREADY_CLAIMED"
  | "NOTHING_TO_CLAIM"
  | "PUBLIC_POOL"
  | "REENTRANT_CALL"
  // authorization
  | "NOT_RESOLVER"
  | "NOT_MAKER"
  | "NOT_AUTHORIZED"
  // external
  | "ORACLE_NOT_FINALIZED"
  | "TRANSFER_MISMATCH"
  | "TRANSFER_FAILED";

export class PoolError extends Error {
  readonly kind: PoolErrorKind;
  readonly code: PoolErrorCode;
  /** True when resubmitting the same call later can succeed. */
  readonly retryable: boolean;

  constructor(kind: PoolErrorKind, code: PoolErrorCode, message: string, retryable = false) {
    super(message);
    this.name = "PoolError";
    this.kind = kind;
    this.code = code;
    this.retryable = retryable;
  }
}

export function validationError(code: PoolErrorCode, message: string): PoolError {
  return new PoolError("VALIDATION", code, message);
}

export function stateError(code: PoolErrorCode, message: string): PoolError {
  return new PoolError("STATE", code, message);
}

export function authorizationError(code: PoolErrorCode, message: string): PoolError {
  return new PoolError("AUTHORIZATION", code, message);
}

export function externalError(code: PoolErrorCode, message: string, retryable = false): PoolError {
  return new PoolError("EXTERNAL", code, message, retryable);
}

export function isPoolError(e: unknown, code?: PoolErrorCode): e is PoolError {
  return e instanceof PoolError && (code === undefined || e.code === code);
}
