import type { ToolArguments } from '../common/template.js';
import type { Action, ActionParameter, HttpExecution, ProcessExecution } from '../types/action.js';
import { createHttpExecutor } from './http-executor.js';
import { createProcessExecutor } from './process-executor.js';
import type { ActionExecutor, ActionInvoker } from './types.js';

export interface ActionInvokerOptions {
  process?: ActionExecutor<ProcessExecution>;
  http?: ActionExecutor<HttpExecution>;
  /**
   * Clock used to compute deadlines.
   */
  now?: () => number;
}

function coerceDefault(parameter: ActionParameter, text: string): unknown {
  switch (parameter.type) {
    case 'number': {
      const value = Number(text);
      return Number.isFinite(value) ? value : text;
    }
    case 'boolean':
      if (text === 'true' || text === 'false') {
        return text === 'true';
      }
      return text;
    case 'array':
    case 'object':
      try {
        return JSON.parse(text);
      } catch {
        return text;
      }
    default:
      return text;
  }
}

/**
 * Fills in declared defaults for parameters the caller left out.
 */
export function applyDefaults(parameters: readonly ActionParameter[], args: ToolArguments): ToolArguments {
  const result: ToolArguments = { ...args };

  for (const parameter of parameters) {
    if (parameter.default === undefined || parameter.default === '') {
      continue;
    }

    if (result[parameter.name] === undefined) {
      result[parameter.name] = coerceDefault(parameter, parameter.default);
    }
  }

  return result;
}

export function createActionInvoker(options: ActionInvokerOptions = {}): ActionInvoker {
  const processExecutor = options.process ?? createProcessExecutor();
  const httpExecutor = options.http ?? createHttpExecutor();
  const now = options.now ?? Date.now;

  return {
    invoke(action: Action, args: ToolArguments) {
      const resolved = applyDefaults(action.parameters, args);
      const execution = action.execution;
      const deadline = now() + execution.timeoutMs;

      switch (execution.kind) {
        case 'process':
          return processExecutor.execute(action, execution, resolved, deadline);
        case 'http':
          return httpExecutor.execute(action, execution, resolved, deadline);
      }
    },
  };
}
