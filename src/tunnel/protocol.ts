/**
 * Wire types exchanged with the relay, and the JSON-RPC messages carried inside them.
 */
export namespace protocol {
  /**
   * Envelope types this client understands. Others are decoded and ignored.
   */
  export type EnvelopeType = 'registered' | 'request' | 'response' | 'ping' | 'pong' | 'client_connected';

  /**
   * One WebSocket text message.
   */
  export interface Envelope {
    type: EnvelopeType | (string & {});
    /**
     * Relay-assigned tunnel id, sent with `registered`.
     */
    tunnel_id?: string;
    /**
     * Public URL callers use to reach this tunnel, sent with `registered`.
     */
    tunnel_url?: string;
    /**
     * Correlation key between a `request` and its `response`.
     */
    request_id?: string;
    /**
     * Embedded JSON-RPC message.
     */
    payload?: unknown;
    error?: string;
    /**
     * Caller address, sent with `client_connected`.
     */
    client_ip?: string;
  }

  /**
   * JSON-RPC request id. Any JSON value the caller chose; echoed verbatim in the response.
   */
  export type RpcId = unknown;

  export interface RpcRequest {
    jsonrpc?: string;
    id?: RpcId;
    method: string;
    params?: unknown;
  }

  export interface RpcError {
    code: number;
    message: string;
    data?: unknown;
  }

  export interface RpcResponse {
    jsonrpc: string;
    id?: RpcId;
    result?: unknown;
    error?: RpcError;
  }

  /**
   * Anything able to answer a JSON-RPC request. Rejections are reported to the caller as internal errors.
   */
  export interface RequestHandler {
    handleRequest(request: RpcRequest): Promise<RpcResponse>;
  }
}
