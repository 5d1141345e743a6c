export class RCONError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The TCP stream could not be established (refused, unresolvable host). */
export class ConnectionError extends RCONError {}

/** The peer ended the stream before a full packet arrived. */
export class ConnectionClosedError extends RCONError {}

export class AuthenticationError extends RCONError {}

/** A connect attempt or a packet read ran past its timeout. */
export class TimeoutError extends RCONError {
  constructor(
    message: string,
    readonly timeoutMs: number,
  ) {
    super(message);
  }
}

/** An operation was called in a session state that does not allow it. */
export class ProtocolStateError extends RCONError {}

export class ProtocolError extends RCONError {}

export class ConfigError extends RCONError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
