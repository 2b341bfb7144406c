import { once } from 'node:events';
import http from 'node:http';

import createRouter from 'find-my-way';

import {
  HttpCode,
  LOCAL_RPC_PATH,
  LOCAL_SSE_PATH,
  MAX_LOCAL_BODY_BYTES,
} from '../common/consts.js';
import { getErrorMessage, log, logJsonl } from '../common/logger.js';
import { decodeRpcRequest } from '../tunnel/codec.js';
import type { protocol } from '../tunnel/protocol.js';
import { sendHttpError, sendRpcResponse } from './utils/send-json.js';

export interface LocalServerOptions {
  host: string;
  /**
   * `0` picks a free port.
   */
  port: number;
  handler: protocol.RequestHandler;
}

export interface LocalServer {
  server: http.Server;
  port: number;
  baseUrl: string;
  close: () => Promise<void>;
}

class PayloadTooLargeError extends Error {
  constructor(maxBytes: number) {
    super(`Payload too large (>${maxBytes} bytes)`);
    this.name = 'PayloadTooLargeError';
  }
}

async function readRequestBody(req: http.IncomingMessage, maxBytes: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of req) {
    const bufferChunk = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    totalBytes += bufferChunk.length;

    if (totalBytes > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }

    chunks.push(bufferChunk);
  }

  return Buffer.concat(chunks);
}

function createLocalRouter(handler: protocol.RequestHandler) {
  const router = createRouter({
    defaultRoute(req, res) {
      sendHttpError(res, HttpCode.NotFound, 'Route not found', {
        method: req.method,
        url: req.url ?? null,
      });
    },
  });

  const handleRpc = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    let request: protocol.RpcRequest;

    try {
      const body = await readRequestBody(req, MAX_LOCAL_BODY_BYTES);
      request = decodeRpcRequest(JSON.parse(body.toString('utf8')));
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        sendHttpError(res, HttpCode.PayloadTooLarge, error.message);
        return;
      }

      sendHttpError(res, HttpCode.BadRequest, 'Invalid JSON');
      return;
    }

    try {
      const response = await handler.handleRequest(request);
      sendRpcResponse(res, response);
    } catch (error) {
      logJsonl('ERROR', 'local_rpc_failed', {
        method: request.method,
        error: getErrorMessage(error),
      });
      sendHttpError(res, HttpCode.InternalServerError, 'Internal Server Error');
    }
  };

  router.on('POST', LOCAL_RPC_PATH, (req, res) => {
    void handleRpc(req, res);
  });

  router.on(['GET', 'PUT', 'PATCH', 'DELETE'], LOCAL_RPC_PATH, (_req, res) => {
    sendHttpError(res, HttpCode.MethodNotAllowed, 'Method not allowed');
  });

  router.on('GET', LOCAL_SSE_PATH, (req, res) => {
    res.writeHead(HttpCode.Ok, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.write(`event: endpoint\ndata: ${LOCAL_RPC_PATH}\n\n`);

    req.once('close', () => {
      res.end();
    });
  });

  return router;
}

/**
 * Serves the request handler over plain HTTP, without a relay.
 */
export async function startLocalServer(options: LocalServerOptions): Promise<LocalServer> {
  const router = createLocalRouter(options.handler);

  const server = http.createServer((req, res) => {
    router.lookup(req, res);
  });

  server.listen(options.port, options.host);
  await once(server, 'listening');

  const address = server.address();
  if (address === null || typeof address === 'string') {
    server.close();
    throw new Error('Failed to resolve server address');
  }

  const baseUrl = `http://${options.host}:${address.port}`;
  logJsonl('INFO', 'local_server_started', { host: options.host, port: address.port });
  log('INFO', `Serving JSON-RPC at ${baseUrl}${LOCAL_RPC_PATH}`);

  return {
    server,
    port: address.port,
    baseUrl,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error !== undefined) {
            reject(error);
            return;
          }

          resolve();
        });
        // SSE streams never end on their own.
        server.closeAllConnections();
      }),
  };
}
