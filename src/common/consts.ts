export const CLIENT_NAME = 'tooltunnel';
export const CLIENT_VERSION = '0.3.0';

export const DEFAULT_CONFIG_FILE = 'tooltunnel.yaml';
export const DEFAULT_RELAY_URL = 'ws://127.0.0.1:8080';
export const TUNNEL_PATH = '/tunnel';

export const JSONRPC_VERSION = '2.0';
export const MCP_PROTOCOL_VERSION = '2024-11-05';

/**
 * Prefix of the environment variables carrying call arguments into processes.
 */
export const ARG_ENV_PREFIX = 'TOOLTUNNEL_ARG_';

export const DEFAULT_ACTION_TIMEOUT_MS = 30_000;

export const DEFAULT_LOCAL_HOST = '127.0.0.1';
export const LOCAL_RPC_PATH = '/mcp';
export const LOCAL_SSE_PATH = '/sse';
export const MAX_LOCAL_BODY_BYTES = 1024 * 1024;

export const enum HttpCode {
  Ok = 200,
  BadRequest = 400,
  NotFound = 404,
  MethodNotAllowed = 405,
  PayloadTooLarge = 413,
  UpgradeRequired = 426,
  InternalServerError = 500,
}

export const enum RpcErrorCode {
  ParseError = -32700,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,
}

export const enum CloseCode {
  Normal = 1000,
  GoingAway = 1001,
  InvalidPayload = 1007,
}
