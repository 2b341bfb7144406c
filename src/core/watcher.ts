import fs from 'node:fs';
import path from 'node:path';

import { getErrorMessage, logJsonl } from '../common/logger.js';

export interface ConfigWatcher {
  close: () => void;
}

/**
 * Watches the directory holding `configPath` and calls `onChange` once a burst of events on that file has settled.
 * Watching the directory keeps working across editors that save by rename.
 */
export function watchConfigFile(configPath: string, onChange: () => void, debounceMs = 100): ConfigWatcher {
  const absolutePath = path.resolve(configPath);
  const directory = path.dirname(absolutePath);
  const fileName = path.basename(absolutePath);

  let reloadTimer: NodeJS.Timeout | undefined;

  const watcher = fs.watch(directory, (_eventType, changed) => {
    if (changed !== null && changed.toString() !== fileName) {
      return;
    }

    if (reloadTimer !== undefined) {
      clearTimeout(reloadTimer);
    }

    reloadTimer = setTimeout(() => {
      reloadTimer = undefined;
      onChange();
    }, debounceMs);
  });

  watcher.on('error', (error) => {
    logJsonl('WARN', 'config_watch_failed', { directory, error: getErrorMessage(error) });
  });

  return {
    close() {
      watcher.close();

      if (reloadTimer !== undefined) {
        clearTimeout(reloadTimer);
        reloadTimer = undefined;
      }
    },
  };
}
