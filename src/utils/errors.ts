import { isError } from "ethers";

export type HeadKind = "newHeads" | "newSideHeads";

/**
 * Raised by a node provider when a head subscription fails.
 * `transient` is set by the provider: a dropped socket is transient, a
 * rejected `eth_subscribe` is not.
 */
export class SubscriptionError extends Error {
  constructor(
    message: string,
    readonly kind: HeadKind,
    readonly transient: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SubscriptionError";
  }
}

export class BlockNotFoundError extends Error {
  constructor(readonly ref: string | number) {
    super(`Block ${ref} not found`);
    this.name = "BlockNotFoundError";
  }
}

export class QueueOverflowError extends Error {
  constructor(readonly capacity: number) {
    super(`Event queue capacity of ${capacity} exceeded`);
    this.name = "QueueOverflowError";
  }
}

/** Caller-supplied SQL that was refused or failed. */
export class RawQueryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RawQueryError";
  }
}

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "ETIMEDOUT",
  "EAI_AGAIN",
]);

/**
 * Classifies an error raised below the provider boundary.
 */
export function isTransientConnectionError(error: unknown): boolean {
  if (error instanceof SubscriptionError) {
    return error.transient;
  }
  if (isError(error, "NETWORK_ERROR") || isError(error, "TIMEOUT")) {
    return true;
  }
  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    if (typeof code === "string" && TRANSIENT_CODES.has(code)) {
      return true;
    }
    return error.message.toLowerCase().includes("connection");
  }
  return false;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
