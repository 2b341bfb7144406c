export { CLIENT_VERSION, MCP_PROTOCOL_VERSION } from './common/consts.js';
export { logJsonl, log, getErrorMessage } from './common/logger.js';
export type { LogLevel } from './common/logger.js';

export { loadConfig, parseConfig, ConfigValidationError } from './config/config.js';
export type { ToolConfig } from './config/config.js';
export { ActionRegistry, buildRegistry } from './config/registry.js';
export type { RegistryInfo } from './config/registry.js';

export { ToolDispatcher, describeAction, mapInvocationResult } from './core/dispatcher.js';
export type { ToolDescriptor, ToolCallResult, InputSchema } from './core/dispatcher.js';
export { RegistrySwapGate } from './core/registry-gate.js';
export { reloadDispatcherConfig } from './core/reload.js';
export { watchConfigFile } from './core/watcher.js';
export type { ConfigWatcher } from './core/watcher.js';

export { createActionInvoker, applyDefaults } from './executors/invoker.js';
export { createProcessExecutor } from './executors/process-executor.js';
export { createHttpExecutor } from './executors/http-executor.js';
export type { ActionExecutor, ActionInvoker, InvocationResult } from './executors/types.js';

export { startLocalServer } from './local/server.js';
export type { LocalServer, LocalServerOptions } from './local/server.js';

export { TunnelSession, resolveTunnelOptions, buildTunnelEndpoint } from './tunnel/session.js';
export type { TunnelOptions, TunnelSessionConfig, TunnelSnapshot, TunnelStatus } from './tunnel/session.js';
export { MessageMultiplexer } from './tunnel/multiplexer.js';
export {
  ClientVersionRejectedError,
  HandshakeError,
  RelayUnreachableError,
  TunnelClosedError,
} from './tunnel/errors.js';
export { EnvelopeDecodeError } from './tunnel/codec.js';
export type { protocol } from './tunnel/protocol.js';

export type { Action, ActionExecution, ActionParameter, HttpExecution, ProcessExecution } from './types/action.js';
