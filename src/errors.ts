/**
 * Error taxonomy shared by the RPC client, the feed pipeline and the registry.
 * Duplicate items are not errors and have no class here.
 */

abstract class RelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Daemon or feed source unreachable, timed out, or answered with a non-success status. */
export class TransportError extends RelayError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The daemon answered, but reported failure or sent something undecodable. */
export class ProtocolError extends RelayError {
  constructor(
    message: string,
    public readonly result?: string,
  ) {
    super(message);
  }
}

export class PatternError extends RelayError {
  constructor(
    public readonly pattern: string,
    reason: string,
  ) {
    super(`invalid pattern ${JSON.stringify(pattern)}: ${reason}`);
  }
}

export class InvalidArgumentError extends RelayError {}

export class FeedNotFoundError extends RelayError {
  constructor(public readonly feedId: number) {
    super(`feed ${feedId} not found`);
  }
}

export class FeedConflictError extends RelayError {
  constructor(public readonly url: string) {
    super(`a feed with url ${url} already exists`);
  }
}

export class PersistenceError extends RelayError {
  constructor(message: string, cause: unknown) {
    super(`${message}: ${errorMessage(cause)}`, { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
