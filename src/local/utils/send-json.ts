import type { ServerResponse } from 'node:http';

import { HttpCode } from '../../common/consts.js';
import type { protocol } from '../../tunnel/protocol.js';

function writeJson(res: ServerResponse, statusCode: HttpCode, payload: unknown): void {
  if (res.writableEnded) {
    return;
  }

  if (res.headersSent) {
    res.end();
    return;
  }

  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  res.end(JSON.stringify(payload));
}

/**
 * JSON-RPC answers always go out as 200; protocol errors travel inside the body.
 */
export function sendRpcResponse(res: ServerResponse, response: protocol.RpcResponse): void {
  writeJson(res, HttpCode.Ok, response);
}

/**
 * Failure of the local endpoint itself, as `{ message, ...details }`.
 */
export function sendHttpError(
  res: ServerResponse,
  statusCode: HttpCode,
  message: string,
  details: Record<string, unknown> = {},
): void {
  writeJson(res, statusCode, { message, ...details });
}
