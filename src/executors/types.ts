import type { ToolArguments } from '../common/template.js';
import type { Action, ActionExecution } from '../types/action.js';

/**
 * Uniform outcome of running an action. Failures are reported here, never thrown.
 */
export interface InvocationResult {
  /**
   * Trimmed textual output.
   */
  output: string;
  /**
   * Zero on success. `-1` when the action could not run to completion (spawn failure, timeout, transport error).
   */
  exitCode: number;
  durationMs: number;
  error?: Error;
}

/**
 * Runs one execution kind. `deadline` is an epoch timestamp in milliseconds.
 */
export interface ActionExecutor<E extends ActionExecution> {
  execute(action: Action, execution: E, args: ToolArguments, deadline: number): Promise<InvocationResult>;
}

export interface ActionInvoker {
  invoke(action: Action, args: ToolArguments): Promise<InvocationResult>;
}
