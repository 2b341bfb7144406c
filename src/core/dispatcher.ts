import { z } from 'zod';

import { MCP_PROTOCOL_VERSION, RpcErrorCode } from '../common/consts.js';
import { logJsonl } from '../common/logger.js';
import type { ActionRegistry } from '../config/registry.js';
import type { ActionInvoker, InvocationResult } from '../executors/types.js';
import { rpcError, rpcResult } from '../tunnel/codec.js';
import type { protocol } from '../tunnel/protocol.js';
import type { Action } from '../types/action.js';
import { RegistrySwapGate } from './registry-gate.js';

export interface ToolDispatcherOptions {
  registry: ActionRegistry;
  invoker: ActionInvoker;
}

interface PropertySchema {
  type: string;
  description: string;
  default?: string;
}

export interface InputSchema {
  type: 'object';
  properties: Record<string, PropertySchema>;
  required?: string[];
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: InputSchema;
}

export interface ToolCallResult {
  content: { type: 'text'; text: string }[];
  isError: boolean;
}

const toolCallParamsSchema = z.object({
  name: z.string().default(''),
  arguments: z.record(z.unknown()).nullish(),
});

export function describeAction(action: Action): ToolDescriptor {
  const properties: Record<string, PropertySchema> = {};
  const required: string[] = [];

  for (const parameter of action.parameters) {
    const property: PropertySchema = {
      type: parameter.type,
      description: parameter.description,
    };

    if (parameter.default) {
      property.default = parameter.default;
    }

    properties[parameter.name] = property;

    if (parameter.required) {
      required.push(parameter.name);
    }
  }

  const inputSchema: InputSchema = { type: 'object', properties };
  if (required.length > 0) {
    inputSchema.required = required;
  }

  return {
    name: action.name,
    description: action.description,
    inputSchema,
  };
}

export function mapInvocationResult(result: InvocationResult): ToolCallResult {
  const text =
    result.error !== undefined && result.output === '' ? `Error: ${result.error.message}` : result.output.trim();

  return {
    content: [{ type: 'text', text }],
    isError: result.exitCode !== 0,
  };
}

/**
 * Answers the MCP subset of JSON-RPC against the live action registry. Protocol problems become error responses;
 * the returned promise only rejects when the invoker itself throws.
 */
export class ToolDispatcher implements protocol.RequestHandler {
  private readonly gate: RegistrySwapGate;

  private readonly invoker: ActionInvoker;

  constructor(options: ToolDispatcherOptions) {
    this.gate = new RegistrySwapGate(options.registry);
    this.invoker = options.invoker;
  }

  get registry(): ActionRegistry {
    return this.gate.current();
  }

  updateRegistry(registry: ActionRegistry): void {
    this.gate.replace(registry);
    logJsonl('INFO', 'registry_updated', {
      tools: registry.size,
      generation: this.gate.version,
    });
  }

  async handleRequest(request: protocol.RpcRequest): Promise<protocol.RpcResponse> {
    switch (request.method) {
      case 'initialize':
        return this.initialize(request);
      case 'tools/list':
        return this.listTools(request);
      case 'tools/call':
        return this.callTool(request);
      case 'ping':
        return rpcResult(request.id, {});
      default:
        return rpcError(request.id, RpcErrorCode.MethodNotFound, `Method not found: ${request.method}`);
    }
  }

  private initialize(request: protocol.RpcRequest): protocol.RpcResponse {
    const { info } = this.gate.current();

    return rpcResult(request.id, {
      protocolVersion: MCP_PROTOCOL_VERSION,
      serverInfo: {
        name: info.name,
        version: info.version,
      },
      capabilities: {
        tools: {},
      },
    });
  }

  private listTools(request: protocol.RpcRequest): protocol.RpcResponse {
    const registry = this.gate.current();

    return rpcResult(request.id, {
      tools: registry.actions.map((action) => describeAction(action)),
    });
  }

  private async callTool(request: protocol.RpcRequest): Promise<protocol.RpcResponse> {
    const parsed = toolCallParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return rpcError(request.id, RpcErrorCode.InvalidParams, 'Invalid params');
    }

    const { name } = parsed.data;
    const action = this.gate.current().get(name);
    if (action === undefined) {
      return rpcError(request.id, RpcErrorCode.InvalidParams, `Tool not found: ${name}`);
    }

    logJsonl('INFO', 'tool_call_started', { tool: name });

    const result = await this.invoker.invoke(action, parsed.data.arguments ?? {});

    logJsonl(result.exitCode === 0 ? 'INFO' : 'WARN', 'tool_call_finished', {
      tool: name,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
    });

    return rpcResult(request.id, mapInvocationResult(result));
  }
}
