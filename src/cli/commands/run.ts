import path from 'node:path';

import { object } from '@optique/core/constructs';
import { message } from '@optique/core/message';
import { optional, withDefault } from '@optique/core/modifiers';
import { constant, option } from '@optique/core/primitives';
import { integer, string } from '@optique/core/valueparser';
import { print, printError } from '@optique/run';

import { CLIENT_VERSION, DEFAULT_LOCAL_HOST } from '../../common/consts.js';
import { getErrorMessage, logJsonl } from '../../common/logger.js';
import { loadConfig, type ToolConfig } from '../../config/config.js';
import { buildRegistry } from '../../config/registry.js';
import { ToolDispatcher } from '../../core/dispatcher.js';
import { reloadDispatcherConfig } from '../../core/reload.js';
import { watchConfigFile } from '../../core/watcher.js';
import { createActionInvoker } from '../../executors/invoker.js';
import { startLocalServer } from '../../local/server.js';
import { TunnelSession } from '../../tunnel/session.js';
import { configOption, resolveConfigPath, resolveRelayUrl } from '../options.js';

export const runCommand = object({
  cmd: constant('run' as const),
  config: configOption,
  relay: optional(option('--relay', string({ metavar: 'URL' }), { description: message`Relay base URL` })),
  local: option('--local', { description: message`Serve JSON-RPC over local HTTP instead of a relay tunnel` }),
  host: withDefault(
    option('--host', string({ metavar: 'HOST' }), { description: message`Local mode bind address` }),
    DEFAULT_LOCAL_HOST,
  ),
  port: optional(
    option('-p', '--port', integer({ min: 0, max: 65535 }), {
      description: message`Local mode port (defaults to server.port)`,
    }),
  ),
});

function describeTools(config: ToolConfig, configPath: string): void {
  print(message`Tools (${path.basename(configPath)})`);

  for (const tool of config.tools) {
    print(message`  • ${tool.name} (${tool.execution.kind === 'http' ? 'http' : 'script'})`);
  }
}

/**
 * Resolves on the first SIGINT or SIGTERM.
 */
function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };

    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  });
}

export async function handleRun(opts: {
  config?: string;
  relay?: string;
  local: boolean;
  host: string;
  port?: number;
}): Promise<void> {
  const configPath = resolveConfigPath(opts.config);

  let config: ToolConfig;
  try {
    config = await loadConfig(configPath);
  } catch (error) {
    printError(message`load config: ${getErrorMessage(error)}`, { exitCode: 1 });
  }

  const dispatcher = new ToolDispatcher({
    registry: buildRegistry(config),
    invoker: createActionInvoker(),
  });

  const watcher = watchConfigFile(configPath, () => {
    void reloadDispatcherConfig(configPath, dispatcher);
  });

  try {
    if (opts.local) {
      const server = await startLocalServer({
        host: opts.host,
        port: opts.port ?? config.server.port,
        handler: dispatcher,
      });

      print(message`Local server listening on ${server.baseUrl}`);
      describeTools(config, configPath);
      print(message`v${CLIENT_VERSION}  Hot-reload enabled  Ctrl+C to stop`);

      const signal = await waitForShutdownSignal();
      logJsonl('INFO', 'shutdown_requested', { signal });
      await server.close();
      return;
    }

    const session = new TunnelSession({
      relayUrl: resolveRelayUrl(opts.relay),
      handler: dispatcher,
      clientVersion: CLIENT_VERSION,
      actionCount: dispatcher.registry.size,
    });

    session.onClientConnected((clientIp) => {
      print(message`Client connected ${clientIp}`);
    });

    print(message`Connecting to relay...`);

    let tunnelUrl: string;
    try {
      tunnelUrl = await session.connect();
    } catch (error) {
      printError(message`connect tunnel: ${getErrorMessage(error)}`, { exitCode: 1 });
    }

    print(message`Server URL ${tunnelUrl}`);
    describeTools(config, configPath);
    print(message`v${CLIENT_VERSION}  Hot-reload enabled  Ctrl+C to stop`);

    const signal = await Promise.race([session.wait().then(() => undefined), waitForShutdownSignal()]);

    if (signal !== undefined) {
      logJsonl('INFO', 'shutdown_requested', { signal });
      await session.close();
    }
  } finally {
    watcher.close();
  }
}
