import axios, { type AxiosInstance } from 'axios';

import { getErrorMessage, logJsonl } from '../common/logger.js';
import { expandArgs, expandEnv, type ToolArguments } from '../common/template.js';
import type { HttpExecution } from '../types/action.js';
import { extractJsonPath } from './json-path.js';
import type { ActionExecutor } from './types.js';

export interface HttpExecutorOptions {
  client?: AxiosInstance;
  env?: NodeJS.ProcessEnv;
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

export function createHttpExecutor(options: HttpExecutorOptions = {}): ActionExecutor<HttpExecution> {
  const client = options.client ?? axios.create();
  const env = options.env ?? process.env;

  const render = (template: string, args: ToolArguments): string => expandEnv(expandArgs(template, args), env);

  return {
    async execute(action, execution, args, deadline) {
      const startedAt = Date.now();

      const url = render(execution.url, args);
      const headers: Record<string, string> = {};
      for (const [key, value] of Object.entries(execution.headers)) {
        headers[key] = render(value, args);
      }

      const body = execution.body ? render(execution.body, args) : undefined;
      if (body !== undefined && !hasHeader(headers, 'Content-Type')) {
        headers['Content-Type'] = 'application/json';
      }

      try {
        const response = await client.request<string>({
          method: execution.method,
          url,
          headers,
          data: body,
          timeout: Math.max(1, deadline - startedAt),
          responseType: 'text',
          transformResponse: [(data: unknown) => data],
          validateStatus: () => true,
          maxRedirects: 10,
        });

        const text = typeof response.data === 'string' ? response.data : String(response.data ?? '');
        let output = text;

        if (execution.extractJson && text.length > 0) {
          try {
            output = extractJsonPath(text, execution.extractJson);
          } catch (error) {
            logJsonl('WARN', 'extract_json_failed', {
              tool: action.name,
              path: execution.extractJson,
              error: getErrorMessage(error),
            });
          }
        }

        return {
          output: output.trim(),
          exitCode: response.status >= 400 ? 1 : 0,
          durationMs: Date.now() - startedAt,
        };
      } catch (error) {
        const message = getErrorMessage(error);
        return {
          output: `Request failed: ${message}`,
          exitCode: -1,
          durationMs: Date.now() - startedAt,
          error: error instanceof Error ? error : new Error(message),
        };
      }
    },
  };
}
