import { getErrorMessage, log, logJsonl } from '../common/logger.js';
import { loadConfig } from '../config/config.js';
import { buildRegistry } from '../config/registry.js';
import type { ToolDispatcher } from './dispatcher.js';

/**
 * Re-reads the configuration and swaps the dispatcher's registry. On failure the previous registry stays live.
 * Resolves to whether the swap happened.
 */
export async function reloadDispatcherConfig(
  configPath: string,
  dispatcher: ToolDispatcher,
  env: NodeJS.ProcessEnv = process.env,
): Promise<boolean> {
  try {
    const config = await loadConfig(configPath, env);
    dispatcher.updateRegistry(buildRegistry(config));
    log('INFO', `Reloaded ${config.tools.length} tool(s) from ${configPath}`);
    return true;
  } catch (error) {
    logJsonl('ERROR', 'config_reload_failed', {
      configPath,
      error: getErrorMessage(error),
    });
    return false;
  }
}
