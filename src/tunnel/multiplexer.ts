import type { RawData } from 'ws';

import { RpcErrorCode } from '../common/consts.js';
import { getErrorMessage, logJsonl } from '../common/logger.js';
import { decodeEnvelope, decodeRpcRequest, rpcError } from './codec.js';
import type { protocol } from './protocol.js';

export type ClientConnectedListener = (clientIp: string) => void;

/**
 * Sink for outbound envelopes. Implementations serialize writes onto the connection.
 */
export interface EnvelopeWriter {
  write(envelope: protocol.Envelope): Promise<void>;
}

export interface MessageMultiplexerOptions {
  handler: protocol.RequestHandler;
  writer: EnvelopeWriter;
  onClientConnected?: ClientConnectedListener;
}

/**
 * Routes inbound relay frames. Control frames are answered inline; every `request` runs as its own task and
 * writes its `response` whenever it completes, tagged with the originating `request_id`.
 */
export class MessageMultiplexer {
  private readonly handler: protocol.RequestHandler;

  private readonly writer: EnvelopeWriter;

  private clientConnectedListener: ClientConnectedListener | undefined;

  /**
   * Request tasks that have not written their response yet.
   */
  private readonly inflight = new Set<Promise<void>>();

  constructor(options: MessageMultiplexerOptions) {
    this.handler = options.handler;
    this.writer = options.writer;
    this.clientConnectedListener = options.onClientConnected;
  }

  get inflightCount(): number {
    return this.inflight.size;
  }

  setClientConnectedListener(listener: ClientConnectedListener | undefined): void {
    this.clientConnectedListener = listener;
  }

  /**
   * Handles one inbound frame. Throws `EnvelopeDecodeError` for frames that cannot be decoded.
   */
  handleFrame(data: RawData | string): void {
    this.handleEnvelope(decodeEnvelope(data));
  }

  handleEnvelope(envelope: protocol.Envelope): void {
    switch (envelope.type) {
      case 'request':
        this.spawnRequest(envelope);
        return;
      case 'ping':
        this.writeDetached({ type: 'pong' }, 'pong');
        return;
      case 'client_connected':
        this.notifyClientConnected(envelope.client_ip);
        return;
      default:
        logJsonl('DEBUG', 'tunnel_frame_ignored', { type: envelope.type });
        return;
    }
  }

  /**
   * Resolves once every request task started so far has finished.
   */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(Array.from(this.inflight));
    }
  }

  private spawnRequest(envelope: protocol.Envelope): void {
    const task = this.processRequest(envelope)
      .catch((error) => {
        logJsonl('ERROR', 'tunnel_response_write_failed', {
          requestId: envelope.request_id ?? null,
          error: getErrorMessage(error),
        });
      })
      .finally(() => {
        this.inflight.delete(task);
      });

    this.inflight.add(task);
  }

  private async processRequest(envelope: protocol.Envelope): Promise<void> {
    const response = await this.buildResponse(envelope.payload);

    await this.writer.write({
      type: 'response',
      request_id: envelope.request_id,
      payload: response,
    });
  }

  private async buildResponse(payload: unknown): Promise<protocol.RpcResponse> {
    let request: protocol.RpcRequest;

    try {
      request = decodeRpcRequest(payload);
    } catch (error) {
      logJsonl('WARN', 'rpc_parse_failed', { error: getErrorMessage(error) });
      return rpcError(undefined, RpcErrorCode.ParseError, 'Parse error');
    }

    try {
      return await this.handler.handleRequest(request);
    } catch (error) {
      logJsonl('ERROR', 'rpc_handler_failed', {
        method: request.method,
        error: getErrorMessage(error),
      });
      return rpcError(request.id, RpcErrorCode.InternalError, getErrorMessage(error));
    }
  }

  private notifyClientConnected(clientIp: string | undefined): void {
    const listener = this.clientConnectedListener;
    if (listener === undefined || !clientIp) {
      return;
    }

    try {
      listener(clientIp);
    } catch (error) {
      logJsonl('WARN', 'client_connected_listener_failed', {
        clientIp,
        error: getErrorMessage(error),
      });
    }
  }

  private writeDetached(envelope: protocol.Envelope, label: string): void {
    void this.writer.write(envelope).catch((error) => {
      logJsonl('WARN', 'tunnel_write_failed', {
        frame: label,
        error: getErrorMessage(error),
      });
    });
  }
}
