/**
 * Bridge Errors
 *
 * Every session-ending failure has its own class so the session can map it
 * to an end reason, a close code and a diagnostic frame.
 */

/**
 * Base class for all bridge errors.
 */
export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BridgeError";
  }
}

/**
 * Client sent an envelope that cannot be decoded.
 */
export class MalformedEnvelopeError extends BridgeError {
  constructor(
    message: string,
    public readonly rawMessage?: string,
  ) {
    super(message, "malformed_envelope");
    this.name = "MalformedEnvelopeError";
  }
}

/**
 * Upstream could not be reached or refused the handshake.
 */
export class ConnectError extends BridgeError {
  constructor(
    public readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Upstream connect failed: ${reason}`, "upstream_unavailable", options);
    this.name = "ConnectError";
  }
}

export class SendError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "send_failed", options);
    this.name = "SendError";
  }
}

export class ReceiveError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "receive_failed", options);
    this.name = "ReceiveError";
  }
}

export class ReadError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "read_failed", options);
    this.name = "ReadError";
  }
}

export class WriteError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "write_failed", options);
    this.name = "WriteError";
  }
}

/**
 * Admission rejected: the registry is full.
 */
export class CapacityExceededError extends BridgeError {
  constructor(public readonly limit: number) {
    super(`Session limit reached (${limit})`, "capacity_exceeded");
    this.name = "CapacityExceededError";
  }
}

/**
 * Upstream produced a chunk larger than the outbound limit.
 */
export class UnencodableChunkError extends BridgeError {
  constructor(
    public readonly size: number,
    public readonly limit: number,
  ) {
    super(`Chunk of ${size} bytes exceeds limit of ${limit}`, "unencodable_chunk");
    this.name = "UnencodableChunkError";
  }
}

/**
 * Render any thrown value for a log line.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.cause instanceof Error ? `${err.message} (${err.cause.message})` : err.message;
  }
  return String(err);
}
