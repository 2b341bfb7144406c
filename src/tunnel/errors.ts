export class RelayUnreachableError extends Error {
  /**
   * HTTP status the relay answered the upgrade with, when it answered at all.
   */
  public readonly statusCode?: number;

  constructor(message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'RelayUnreachableError';
    this.statusCode = options.statusCode;
  }
}

export class ClientVersionRejectedError extends Error {
  constructor(clientVersion: string) {
    super(`relay rejected client version ${clientVersion}; upgrade required`);
    this.name = 'ClientVersionRejectedError';
  }
}

export class HandshakeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HandshakeError';
  }
}

export class TunnelClosedError extends Error {
  public readonly code: number;

  public readonly reason: string;

  constructor(code: number, reason: string, cause?: unknown) {
    super(`tunnel closed unexpectedly (code ${code}${reason ? `: ${reason}` : ''})`, { cause });
    this.name = 'TunnelClosedError';
    this.code = code;
    this.reason = reason;
  }
}
