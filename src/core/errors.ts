/**
 * Error types raised while establishing a connection.
 *
 * Plugin rejections are not wrapped: whatever a connection-created hook
 * throws reaches the caller of `Client.connect` as-is.
 */

/** A required argument was missing or malformed. */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/** The underlying dial failed (refused, unresolvable, timed out, TLS). */
export class DialError extends Error {
  constructor(
    readonly network: string,
    readonly address: string,
    cause: unknown,
  ) {
    super(`dial ${network} ${address}: ${describeCause(cause)}`, { cause });
    this.name = 'DialError';
  }
}

/**
 * The HTTP CONNECT exchange did not yield `200 Connected to rpcx`.
 * The socket has already been closed when this is thrown.
 */
export class TunnelNegotiationError extends Error {
  constructor(
    readonly op: string,
    readonly net: string,
    cause: unknown,
  ) {
    super(`${op} ${net}: ${describeCause(cause)}`, { cause });
    this.name = 'TunnelNegotiationError';
  }
}

/** A registry entry exists for the name but no implementation is wired in. */
export class UnsupportedTransportError extends Error {
  constructor(readonly network: string) {
    super(`${network} transport is not available; register a connector for "${network}"`);
    this.name = 'UnsupportedTransportError';
  }
}

/** A connection deadline passed before the connection was closed. */
export class DeadlineExceededError extends Error {
  readonly code = 'ETIMEDOUT';

  constructor(readonly deadline: Date) {
    super(`i/o timeout: deadline ${deadline.toISOString()} exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
