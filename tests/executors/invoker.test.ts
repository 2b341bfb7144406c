import { describe, expect, it, vi } from 'vitest';

import { applyDefaults, createActionInvoker } from '@/executors/invoker.js';
import type { ActionExecutor } from '@/executors/types.js';
import type { Action, HttpExecution, ProcessExecution } from '@/types/action.js';

import { shellAction, stringParameter } from '../helpers/test-utils.js';

describe('invoker', () => {
  it('fills in typed defaults for omitted arguments only', () => {
    const parameters = [
      stringParameter('path', { default: '.' }),
      stringParameter('limit', { type: 'number', default: '10' }),
      stringParameter('verbose', { type: 'boolean', default: 'true' }),
      stringParameter('tags', { type: 'array', default: '["a"]' }),
      stringParameter('broken', { type: 'object', default: '{oops' }),
      stringParameter('plain'),
    ];

    expect(applyDefaults(parameters, { path: '/srv' })).toEqual({
      path: '/srv',
      limit: 10,
      verbose: true,
      tags: ['a'],
      broken: '{oops',
    });
  });

  it('routes by execution kind with a deadline from the action timeout', async () => {
    const processExecutor: ActionExecutor<ProcessExecution> = {
      execute: vi.fn(async () => ({ output: 'from process', exitCode: 0, durationMs: 1 })),
    };
    const httpExecutor: ActionExecutor<HttpExecution> = {
      execute: vi.fn(async () => ({ output: 'from http', exitCode: 0, durationMs: 1 })),
    };

    const invoker = createActionInvoker({ process: processExecutor, http: httpExecutor, now: () => 1_000 });

    const script = shellAction('script', 'true', [stringParameter('who', { default: 'World' })], 2_500);
    const request: Action = {
      name: 'request',
      description: '',
      parameters: [],
      execution: { kind: 'http', method: 'GET', url: 'http://127.0.0.1:1/x', headers: {}, timeoutMs: 500 },
      environment: {},
    };

    expect((await invoker.invoke(script, {})).output).toBe('from process');
    expect((await invoker.invoke(request, { q: 1 })).output).toBe('from http');

    expect(processExecutor.execute).toHaveBeenCalledWith(script, script.execution, { who: 'World' }, 3_500);
    expect(httpExecutor.execute).toHaveBeenCalledWith(request, request.execution, { q: 1 }, 1_500);
  });
});
