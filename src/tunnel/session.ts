import type { ClientRequest, IncomingMessage } from 'node:http';

import WebSocket, { type RawData } from 'ws';

import { CLIENT_NAME, CloseCode, HttpCode, TUNNEL_PATH } from '../common/consts.js';
import { getErrorMessage, logJsonl } from '../common/logger.js';
import { decodeEnvelope, encodeEnvelope } from './codec.js';
import { ClientVersionRejectedError, HandshakeError, RelayUnreachableError, TunnelClosedError } from './errors.js';
import { startLivenessLoop, type LivenessLoop } from './liveness.js';
import { MessageMultiplexer, type ClientConnectedListener } from './multiplexer.js';
import type { protocol } from './protocol.js';
import { WriteGate } from './write-gate.js';

/**
 * Tunnel tuning options.
 */
export interface TunnelOptions {
  /**
   * Interval of WebSocket ping frames sent to the relay.
   */
  pingIntervalMs: number;
  /**
   * Upper bound for dialing the relay and receiving the `registered` frame.
   */
  handshakeTimeoutMs: number;
}

export function resolveTunnelOptions(overrides: Partial<TunnelOptions> = {}): TunnelOptions {
  return {
    pingIntervalMs: overrides.pingIntervalMs ?? 30_000,
    handshakeTimeoutMs: overrides.handshakeTimeoutMs ?? 10_000,
  };
}

export interface TunnelSessionConfig extends Partial<TunnelOptions> {
  /**
   * Relay base address, e.g. `wss://relay.example.com`.
   */
  relayUrl: string;
  handler: protocol.RequestHandler;
  clientVersion: string;
  /**
   * Number of tools declared to the relay for its compatibility check.
   */
  actionCount: number;
}

export type TunnelStatus = 'idle' | 'connecting' | 'open' | 'closed';

export interface TunnelSnapshot {
  status: TunnelStatus;
  url?: string;
  inflight: number;
  pendingWrites: number;
  livenessRunning: boolean;
}

interface PendingHandshake {
  resolve: (tunnelUrl: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export function buildTunnelEndpoint(relayUrl: string): string {
  return `${relayUrl.replace(/\/+$/, '')}${TUNNEL_PATH}`;
}

/**
 * One connection attempt to the relay. A session connects at most once; reconnecting means creating a new
 * session. The session owns its socket and is the only party closing it.
 */
export class TunnelSession {
  private readonly relayUrl: string;

  private readonly clientVersion: string;

  private readonly actionCount: number;

  private readonly options: TunnelOptions;

  private readonly gate = new WriteGate();

  private readonly multiplexer: MessageMultiplexer;

  private socket: WebSocket | undefined;

  private status: TunnelStatus = 'idle';

  private tunnelUrl: string | undefined;

  private liveness: LivenessLoop | undefined;

  private pendingHandshake: PendingHandshake | undefined;

  /**
   * Set once the WebSocket upgrade has succeeded.
   */
  private opened = false;

  /**
   * HTTP status of a refused upgrade.
   */
  private rejectedStatus: number | undefined;

  private closingLocally = false;

  /**
   * Error that ended the read loop, if any.
   */
  private failure: Error | undefined;

  private lastSocketError: Error | undefined;

  /**
   * Settles with the termination error, or `undefined` for a normal close.
   */
  private readonly closed: Promise<Error | undefined>;

  private settleClosed: (error: Error | undefined) => void = () => {};

  constructor(config: TunnelSessionConfig) {
    this.relayUrl = config.relayUrl;
    this.clientVersion = config.clientVersion;
    this.actionCount = config.actionCount;
    this.options = resolveTunnelOptions(config);
    this.multiplexer = new MessageMultiplexer({
      handler: config.handler,
      writer: {
        write: (envelope) => this.writeEnvelope(envelope),
      },
    });
    this.closed = new Promise<Error | undefined>((resolve) => {
      this.settleClosed = resolve;
    });
  }

  /**
   * Public URL assigned by the relay.
   */
  get url(): string | undefined {
    return this.tunnelUrl;
  }

  onClientConnected(listener: ClientConnectedListener): void {
    this.multiplexer.setClientConnectedListener(listener);
  }

  /**
   * Dials the relay and waits for the `registered` frame. Resolves with the public tunnel URL; the read loop and
   * the liveness loop keep running in the background afterwards.
   */
  async connect(): Promise<string> {
    if (this.status !== 'idle') {
      throw new Error(`tunnel session cannot connect from status "${this.status}"; create a new session`);
    }

    this.status = 'connecting';

    const endpoint = buildTunnelEndpoint(this.relayUrl);
    logJsonl('INFO', 'tunnel_connecting', { endpoint, clientVersion: this.clientVersion });

    let socket: WebSocket;

    try {
      socket = new WebSocket(endpoint, {
        headers: {
          'User-Agent': `${CLIENT_NAME}/${this.clientVersion}`,
          'X-Client-Version': this.clientVersion,
          'X-Tool-Count': String(this.actionCount),
        },
        handshakeTimeout: this.options.handshakeTimeoutMs,
        perMessageDeflate: false,
      });
    } catch (error) {
      // Malformed relay addresses are rejected before any socket exists.
      this.status = 'closed';
      this.settleClosed(undefined);
      logJsonl('WARN', 'tunnel_dial_failed', { endpoint, error: getErrorMessage(error) });
      throw new RelayUnreachableError(`dial relay: ${getErrorMessage(error)}`, { cause: error });
    }

    const registration = new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.rejectHandshake(
          new HandshakeError(`no registration from relay within ${this.options.handshakeTimeoutMs}ms`),
        );
      }, this.options.handshakeTimeoutMs);

      this.pendingHandshake = { resolve, reject, timer };
    });

    this.socket = socket;
    this.attachSocket(socket);

    let tunnelUrl: string;

    try {
      tunnelUrl = await registration;
    } catch (error) {
      this.abort();
      throw error;
    }

    if (this.status === 'open') {
      this.liveness = startLivenessLoop(() => this.writePing(), this.options.pingIntervalMs);
    }

    logJsonl('INFO', 'tunnel_registered', { tunnelUrl });
    return tunnelUrl;
  }

  /**
   * Resolves when the read loop ends normally. Rejects with the reason when the connection was lost or the relay
   * broke the protocol.
   */
  async wait(): Promise<void> {
    const error = await this.closed;

    if (error !== undefined) {
      throw error;
    }
  }

  /**
   * Closes the connection. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.status === 'idle') {
      this.status = 'closed';
      this.settleClosed(undefined);
      return;
    }

    this.closingLocally = true;
    this.liveness?.stop();

    const socket = this.socket;
    if (socket !== undefined) {
      if (socket.readyState === WebSocket.OPEN) {
        socket.close(CloseCode.Normal, 'client closing');
      } else if (socket.readyState === WebSocket.CONNECTING) {
        socket.terminate();
      }
    }

    await this.closed;
  }

  getSnapshot(): TunnelSnapshot {
    return {
      status: this.status,
      url: this.tunnelUrl,
      inflight: this.multiplexer.inflightCount,
      pendingWrites: this.gate.size,
      livenessRunning: this.liveness?.running ?? false,
    };
  }

  private attachSocket(socket: WebSocket): void {
    socket.on('open', () => {
      this.opened = true;
    });

    socket.on('unexpected-response', (_req: ClientRequest, res: IncomingMessage) => {
      this.rejectedStatus = res.statusCode;
      res.resume();
      socket.terminate();
    });

    socket.on('message', (data: RawData) => {
      this.handleMessage(data);
    });

    socket.on('error', (error: Error) => {
      this.lastSocketError = error;
      this.rejectHandshake(this.describeDialFailure(error));
    });

    socket.on('close', (code: number, reason: Buffer) => {
      this.handleClose(code, reason.toString('utf8'));
    });
  }

  private describeDialFailure(error: Error): Error {
    if (this.rejectedStatus === HttpCode.UpgradeRequired) {
      return new ClientVersionRejectedError(this.clientVersion);
    }

    if (this.rejectedStatus !== undefined) {
      return new RelayUnreachableError(`relay refused the connection with HTTP ${this.rejectedStatus}`, {
        statusCode: this.rejectedStatus,
        cause: error,
      });
    }

    if (!this.opened) {
      return new RelayUnreachableError(`dial relay: ${error.message}`, { cause: error });
    }

    return new HandshakeError(`read registration: ${error.message}`, { cause: error });
  }

  private handleMessage(data: RawData): void {
    if (this.pendingHandshake !== undefined) {
      this.completeHandshake(data);
      return;
    }

    if (this.status !== 'open' || this.failure !== undefined) {
      return;
    }

    try {
      this.multiplexer.handleFrame(data);
    } catch (error) {
      this.failReadLoop(error instanceof Error ? error : new Error(getErrorMessage(error)));
    }
  }

  private completeHandshake(data: RawData): void {
    let envelope: protocol.Envelope;

    try {
      envelope = decodeEnvelope(data);
    } catch (error) {
      this.rejectHandshake(new HandshakeError(`read registration: ${getErrorMessage(error)}`, { cause: error }));
      return;
    }

    if (envelope.type !== 'registered') {
      const detail = envelope.error ? ` (${envelope.error})` : '';
      this.rejectHandshake(new HandshakeError(`unexpected message type: ${envelope.type}${detail}`));
      return;
    }

    const pending = this.pendingHandshake;
    if (pending === undefined) {
      return;
    }

    this.pendingHandshake = undefined;
    clearTimeout(pending.timer);

    // Frames following `registered` may be delivered before connect() resumes.
    this.tunnelUrl = envelope.tunnel_url ?? '';
    this.status = 'open';
    pending.resolve(this.tunnelUrl);
  }

  private rejectHandshake(error: Error): void {
    const pending = this.pendingHandshake;
    if (pending === undefined) {
      return;
    }

    this.pendingHandshake = undefined;
    clearTimeout(pending.timer);
    pending.reject(error);
  }

  /**
   * Tears the connection down after a failed handshake.
   */
  private abort(): void {
    this.closingLocally = true;

    const socket = this.socket;
    if (socket !== undefined && socket.readyState !== WebSocket.CLOSED) {
      socket.terminate();
    }
  }

  private failReadLoop(error: Error): void {
    if (this.failure !== undefined) {
      return;
    }

    this.failure = error;
    this.liveness?.stop();

    logJsonl('ERROR', 'tunnel_read_failed', { error: error.message });

    const socket = this.socket;
    if (socket !== undefined && socket.readyState === WebSocket.OPEN) {
      socket.close(CloseCode.InvalidPayload, 'invalid frame');
    }
  }

  private handleClose(code: number, reason: string): void {
    this.rejectHandshake(
      this.lastSocketError !== undefined
        ? this.describeDialFailure(this.lastSocketError)
        : new HandshakeError(`connection closed before registration (code ${code})`),
    );

    const wasOpen = this.status === 'open';
    this.status = 'closed';
    this.liveness?.stop();

    const normal = code === CloseCode.Normal || code === CloseCode.GoingAway;
    let error = this.failure;

    if (error === undefined && wasOpen && !normal && !this.closingLocally) {
      error = new TunnelClosedError(code, reason, this.lastSocketError);
    }

    logJsonl(error === undefined ? 'INFO' : 'WARN', 'tunnel_closed', {
      code,
      reason,
      error: error?.message ?? null,
    });

    this.settleClosed(error);
  }

  private writeEnvelope(envelope: protocol.Envelope): Promise<void> {
    const text = encodeEnvelope(envelope);

    return this.gate.run(
      () =>
        new Promise<void>((resolve, reject) => {
          const socket = this.openSocket();
          socket.send(text, (error) => {
            if (error) {
              reject(error);
              return;
            }

            resolve();
          });
        }),
    );
  }

  private writePing(): Promise<void> {
    return this.gate.run(
      () =>
        new Promise<void>((resolve, reject) => {
          const socket = this.openSocket();
          socket.ping(undefined, undefined, (error) => {
            if (error) {
              reject(error);
              return;
            }

            resolve();
          });
        }),
    );
  }

  private openSocket(): WebSocket {
    const socket = this.socket;

    if (socket === undefined || socket.readyState !== WebSocket.OPEN) {
      throw new Error('tunnel connection is not open');
    }

    return socket;
  }
}
