/**
 * Errors surfaced by a bridge status lookup.
 *
 * Callers only need `BridgeStatusError`: every failure of a lookup, from a
 * refused connection to a payload without usable records, ends up as one,
 * with `reason` telling them apart.
 */

export type LookupFailureReason = "empty" | "uninterpretable" | "http" | "network" | "decode";

export class BridgeStatusError extends Error {
  readonly reason: LookupFailureReason;

  constructor(reason: LookupFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BridgeStatusError";
    this.reason = reason;

    // Keep instanceof working for subclasses of a built-in.
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static isBridgeStatusError(err: unknown): err is BridgeStatusError {
    return err instanceof BridgeStatusError;
  }
}

/** Failure of the single HTTP request, or of reading its body. */
export class FetchError extends BridgeStatusError {
  readonly url: string;
  readonly status: number | null;

  constructor(
    reason: Extract<LookupFailureReason, "http" | "network" | "decode">,
    message: string,
    details: { url: string; status?: number; cause?: unknown }
  ) {
    super(reason, message, { cause: details.cause });
    this.name = "FetchError";
    this.url = details.url;
    this.status = details.status ?? null;
  }
}

export class InterpretationError extends BridgeStatusError {
  constructor(reason: Extract<LookupFailureReason, "empty" | "uninterpretable">, message: string) {
    super(reason, message);
    this.name = "InterpretationError";
  }
}
