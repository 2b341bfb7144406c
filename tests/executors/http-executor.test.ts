import http from 'node:http';

import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';

import { createHttpExecutor } from '@/executors/http-executor.js';
import type { Action, HttpExecution } from '@/types/action.js';

import { closeServer, listenEphemeral, loggedEvents } from '../helpers/test-utils.js';

interface RecordedRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

describe('http executor', () => {
  const requests: RecordedRequest[] = [];
  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];

    req.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });

    req.on('end', () => {
      requests.push({
        method: req.method ?? '',
        url: req.url ?? '',
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf8'),
      });

      if (req.url?.startsWith('/missing')) {
        res.statusCode = 404;
        res.end('  no such thing  ');
        return;
      }

      if (req.url?.startsWith('/slow')) {
        setTimeout(() => res.end('late'), 1000);
        return;
      }

      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify({ data: { temp: 21.5, city: 'Oslo' } }));
    });
  });

  let baseUrl = '';

  beforeAll(async () => {
    ({ baseUrl } = await listenEphemeral(server));
  });

  afterAll(async () => {
    await closeServer(server);
  });

  beforeEach(() => {
    requests.splice(0);
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function httpAction(execution: Partial<HttpExecution>): Action {
    return {
      name: 'weather',
      description: '',
      parameters: [],
      execution: { kind: 'http', method: 'GET', url: `${baseUrl}/weather`, headers: {}, timeoutMs: 5000, ...execution },
      environment: {},
    };
  }

  async function call(action: Action, args: Record<string, unknown> = {}) {
    const executor = createHttpExecutor({ env: { TEST_TOKEN: 'test-secret' } });

    if (action.execution.kind !== 'http') {
      throw new Error('expected an http action');
    }

    return executor.execute(action, action.execution, args, Date.now() + action.execution.timeoutMs);
  }

  it('substitutes arguments and environment into the request', async () => {
    const result = await call(
      httpAction({
        method: 'POST',
        url: `${baseUrl}/weather?city={{city}}`,
        headers: { Authorization: 'Bearer ${TEST_TOKEN}' },
        body: '{"city":"{{city}}"}',
      }),
      { city: 'Oslo' },
    );

    expect(result.exitCode).toBe(0);
    expect(result.output).toBe('{"data":{"temp":21.5,"city":"Oslo"}}');
    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('POST');
    expect(requests[0].url).toBe('/weather?city=Oslo');
    expect(requests[0].headers.authorization).toBe('Bearer test-secret');
    expect(requests[0].headers['content-type']).toBe('application/json');
    expect(requests[0].body).toBe('{"city":"Oslo"}');
  });

  it('keeps an explicit content type', async () => {
    await call(httpAction({ method: 'PUT', headers: { 'content-type': 'text/plain' }, body: 'raw' }));

    expect(requests[0].headers['content-type']).toBe('text/plain');
  });

  it('extracts a JSON path from the response', async () => {
    expect((await call(httpAction({ extractJson: 'data.temp' }))).output).toBe('21.5');
    expect((await call(httpAction({ extractJson: 'data.city' }))).output).toBe('Oslo');
  });

  it('keeps the whole body when extraction fails', async () => {
    const result = await call(httpAction({ extractJson: 'data.wind' }));

    expect(result.output).toBe('{"data":{"temp":21.5,"city":"Oslo"}}');
    expect(loggedEvents(vi.mocked(console.log).mock.calls)).toContainEqual(
      expect.objectContaining({ level: 'WARN', event: 'extract_json_failed', error: 'key not found: wind' }),
    );
  });

  it('maps error statuses to exit code 1', async () => {
    const result = await call(httpAction({ url: `${baseUrl}/missing` }));

    expect(result.exitCode).toBe(1);
    expect(result.output).toBe('no such thing');
    expect(result.error).toBeUndefined();
  });

  it('reports transport failures', async () => {
    const result = await call(httpAction({ url: `${baseUrl}/slow`, timeoutMs: 100 }));

    expect(result.exitCode).toBe(-1);
    expect(result.output.startsWith('Request failed: ')).toBe(true);
    expect(result.error).toBeInstanceOf(Error);
  });
});
