import { isCallException, isError } from "ethers";

/**
 * How the state machine reacts to a failure:
 * - retryable: back off and try again, counted against the retry budget
 * - not_ready: re-check later, not counted
 * - permanent: the record fails and is never retried
 * - fatal: programming or encoding error, the record fails
 */
export type ErrorKind = "retryable" | "not_ready" | "permanent" | "fatal";

export class RelayError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RelayError";
    this.kind = kind;
  }
}

export class TimeoutError extends RelayError {
  constructor(operation: string, timeoutMs: number) {
    super("retryable", `${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class HeaderNotFoundError extends RelayError {
  constructor(chainId: number, block: string | number) {
    super("not_ready", `block ${block} not found on chain ${chainId}`);
    this.name = "HeaderNotFoundError";
  }
}

export class SignalNotFoundInStateError extends RelayError {
  constructor(signal: string, height: bigint) {
    super("not_ready", `signal ${signal} not in source state at height ${height}`);
    this.name = "SignalNotFoundInStateError";
  }
}

export class BlockNotSyncedError extends RelayError {
  constructor(chainId: number, height: bigint) {
    super("not_ready", `height ${height} not yet synced to chain ${chainId}`);
    this.name = "BlockNotSyncedError";
  }
}

export class RevertError extends RelayError {
  readonly reason: string | null;

  constructor(reason: string | null, message: string, options?: { cause?: unknown }) {
    super("permanent", message, options);
    this.name = "RevertError";
    this.reason = reason;
  }
}

export class EncodingError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("fatal", message, options);
    this.name = "EncodingError";
  }
}

const RETRYABLE_CODES = [
  "TIMEOUT",
  "NETWORK_ERROR",
  "SERVER_ERROR",
  "NONCE_EXPIRED",
  "REPLACEMENT_UNDERPRICED",
  "TRANSACTION_REPLACED",
  "UNKNOWN_ERROR",
] as const;

const RETRYABLE_PATTERNS = [
  /rate limit/i,
  /too many requests/i,
  /\b429\b/,
  /nonce too low/i,
  /underpriced/i,
  /timeout/i,
  /ECONNREFUSED|ECONNRESET|ETIMEDOUT/,
];

function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    // ethers errors carry a shorter message than their full dump
    if ("shortMessage" in err && typeof err.shortMessage === "string") {
      return err.shortMessage;
    }
    return err.message;
  }
  return String(err);
}

/**
 * Maps anything thrown by a chain call to a RelayError. Errors that are
 * already classified pass through untouched.
 */
export function classifyError(err: unknown): RelayError {
  if (err instanceof RelayError) {
    return err;
  }

  const message = errorMessage(err);

  if (isCallException(err)) {
    return new RevertError(err.reason, message, { cause: err });
  }

  // The relayer wallet is short of gas money until someone tops it up
  if (isError(err, "INSUFFICIENT_FUNDS") || /insufficient funds/i.test(message)) {
    return new RelayError("not_ready", message, { cause: err });
  }

  for (const code of RETRYABLE_CODES) {
    if (isError(err, code)) {
      return new RelayError("retryable", message, { cause: err });
    }
  }

  if (RETRYABLE_PATTERNS.some((pattern) => pattern.test(message))) {
    return new RelayError("retryable", message, { cause: err });
  }

  return new RelayError("fatal", message, { cause: err });
}

/** True when a node refused a transaction because its nonce is already used. */
export function isNonceExpired(err: unknown): boolean {
  const original = err instanceof RelayError && err.cause !== undefined ? err.cause : err;
  return isError(original, "NONCE_EXPIRED") || /nonce too low|nonce has already been used/i.test(errorMessage(original));
}
