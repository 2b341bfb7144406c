import type { RawData } from 'ws';
import { z } from 'zod';

import { JSONRPC_VERSION } from '../common/consts.js';
import { getErrorMessage } from '../common/logger.js';
import type { protocol } from './protocol.js';

export class EnvelopeDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EnvelopeDecodeError';
  }
}

export class RpcDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RpcDecodeError';
  }
}

const envelopeSchema = z.object({
  type: z.string(),
  tunnel_id: z.string().optional(),
  tunnel_url: z.string().optional(),
  request_id: z.string().optional(),
  payload: z.unknown().optional(),
  error: z.string().optional(),
  client_ip: z.string().optional(),
});

const rpcRequestSchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.unknown().optional(),
  method: z.string().default(''),
  params: z.unknown().optional(),
});

function rawDataToText(data: RawData | string): string {
  if (typeof data === 'string') {
    return data;
  }

  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }

  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }

  return data.toString('utf8');
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Decodes one relay frame. Any failure is fatal to the read loop.
 */
export function decodeEnvelope(data: RawData | string): protocol.Envelope {
  let parsed: unknown;

  try {
    parsed = JSON.parse(rawDataToText(data));
  } catch (error) {
    throw new EnvelopeDecodeError(`malformed frame: ${getErrorMessage(error)}`, { cause: error });
  }

  const result = envelopeSchema.safeParse(parsed);
  if (!result.success) {
    throw new EnvelopeDecodeError(`invalid envelope: ${describeIssues(result.error)}`);
  }

  return result.data;
}

export function encodeEnvelope(envelope: protocol.Envelope): string {
  return JSON.stringify(envelope);
}

/**
 * Decodes the JSON-RPC request embedded in a `request` envelope.
 */
export function decodeRpcRequest(payload: unknown): protocol.RpcRequest {
  if (payload === undefined) {
    throw new RpcDecodeError('payload is missing');
  }

  const result = rpcRequestSchema.safeParse(payload);
  if (!result.success) {
    throw new RpcDecodeError(describeIssues(result.error));
  }

  return result.data;
}

export function rpcError(id: protocol.RpcId | undefined, code: number, message: string): protocol.RpcResponse {
  const response: protocol.RpcResponse = {
    jsonrpc: JSONRPC_VERSION,
    error: { code, message },
  };

  if (id !== undefined) {
    response.id = id;
  }

  return response;
}

export function rpcResult(id: protocol.RpcId | undefined, result: unknown): protocol.RpcResponse {
  const response: protocol.RpcResponse = {
    jsonrpc: JSONRPC_VERSION,
    result,
  };

  if (id !== undefined) {
    response.id = id;
  }

  return response;
}
