import http from 'node:http';

import axios from 'axios';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';

import { ActionRegistry } from '@/config/registry.js';
import { ToolDispatcher } from '@/core/dispatcher.js';
import { startLocalServer, type LocalServer } from '@/local/server.js';

import { greetingInvoker, shellAction, stringParameter } from '../helpers/test-utils.js';

function readFirstEvent(url: string): Promise<{ contentType: string | undefined; chunk: string }> {
  return new Promise((resolve, reject) => {
    const req = http.get(url, (res) => {
      res.setEncoding('utf8');
      res.once('data', (chunk: string) => {
        resolve({ contentType: res.headers['content-type'], chunk });
        res.destroy();
        req.destroy();
      });
    });

    req.on('error', (error) => {
      if (!req.destroyed) {
        reject(error);
      }
    });
  });
}

describe('local server', () => {
  let local: LocalServer;

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    const dispatcher = new ToolDispatcher({
      registry: new ActionRegistry({ name: 'demo', version: '1.0.0', description: '' }, [
        shellAction('hello', 'echo "Hello, {{name}}!"', [stringParameter('name', { required: true })]),
      ]),
      invoker: greetingInvoker(),
    });

    local = await startLocalServer({ host: '127.0.0.1', port: 0, handler: dispatcher });
  });

  afterAll(async () => {
    await local.close();
    vi.restoreAllMocks();
  });

  it('answers JSON-RPC posted to /mcp', async () => {
    const response = await axios.post(`${local.baseUrl}/mcp`, {
      jsonrpc: '2.0',
      id: 1,
      method: 'tools/call',
      params: { name: 'hello', arguments: { name: 'World' } },
    });

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(response.data).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: { content: [{ type: 'text', text: 'Hello, World!' }], isError: false },
    });
  });

  it('returns protocol errors as JSON-RPC responses', async () => {
    const response = await axios.post(`${local.baseUrl}/mcp`, { jsonrpc: '2.0', id: 2, method: 'sampling/create' });

    expect(response.data).toEqual({
      jsonrpc: '2.0',
      id: 2,
      error: { code: -32601, message: 'Method not found: sampling/create' },
    });
  });

  it('rejects bodies that are not JSON-RPC requests', async () => {
    const invalid = await axios.post(`${local.baseUrl}/mcp`, '{oops', {
      headers: { 'Content-Type': 'application/json' },
      transformRequest: [(data: unknown) => data],
      validateStatus: () => true,
    });

    expect(invalid.status).toBe(400);
    expect(invalid.data).toEqual({ message: 'Invalid JSON' });
  });

  it('rejects other methods on /mcp', async () => {
    const response = await axios.get(`${local.baseUrl}/mcp`, { validateStatus: () => true });

    expect(response.status).toBe(405);
    expect(response.data).toEqual({ message: 'Method not allowed' });
  });

  it('returns 404 for unknown routes', async () => {
    const response = await axios.get(`${local.baseUrl}/nope`, { validateStatus: () => true });

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ message: 'Route not found', method: 'GET', url: '/nope' });
  });

  it('announces the RPC endpoint on /sse', async () => {
    const event = await readFirstEvent(`${local.baseUrl}/sse`);

    expect(event.contentType).toBe('text/event-stream');
    expect(event.chunk).toBe('event: endpoint\ndata: /mcp\n\n');
  });

  it('answers handler failures with a JSON 500', async () => {
    const failing = await startLocalServer({
      host: '127.0.0.1',
      port: 0,
      handler: {
        handleRequest: async () => {
          throw new Error('handler exploded');
        },
      },
    });

    try {
      const response = await axios.post(
        `${failing.baseUrl}/mcp`,
        { jsonrpc: '2.0', id: 1, method: 'ping' },
        { validateStatus: () => true },
      );

      expect(response.status).toBe(500);
      expect(response.headers['content-type']).toBe('application/json; charset=utf-8');
      expect(response.data).toEqual({ message: 'Internal Server Error' });
    } finally {
      await failing.close();
    }
  });
});
