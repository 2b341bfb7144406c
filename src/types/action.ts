export type ParameterType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface ActionParameter {
  name: string;
  type: ParameterType;
  description: string;
  required: boolean;
  /**
   * Declared default, kept as text. Empty means "no default".
   */
  default?: string;
}

/**
 * Runs a local program, either an inline shell script or a command with arguments.
 */
export interface ProcessExecution {
  kind: 'process';
  command?: string;
  args: readonly string[];
  shell?: string;
  workingDir?: string;
  timeoutMs: number;
}

/**
 * Calls an HTTP endpoint.
 */
export interface HttpExecution {
  kind: 'http';
  method: string;
  url: string;
  headers: Readonly<Record<string, string>>;
  body?: string;
  timeoutMs: number;
  /**
   * Dot/index path (`data.items[0].name`) selecting part of a JSON response.
   */
  extractJson?: string;
}

export type ActionExecution = ProcessExecution | HttpExecution;

export interface Action {
  name: string;
  description: string;
  parameters: readonly ActionParameter[];
  execution: ActionExecution;
  environment: Readonly<Record<string, string>>;
}
