import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { object } from '@optique/core/constructs';
import { message } from '@optique/core/message';
import { withDefault } from '@optique/core/modifiers';
import { argument, constant } from '@optique/core/primitives';
import { string } from '@optique/core/valueparser';
import { print, printError } from '@optique/run';

import { CLIENT_NAME, DEFAULT_CONFIG_FILE } from '../../common/consts.js';
import { getErrorMessage } from '../../common/logger.js';

const packageDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../..');

export const SAMPLE_CONFIG_PATH = path.join(packageDir, 'templates', DEFAULT_CONFIG_FILE);

export const initCommand = object({
  cmd: constant('init' as const),
  directory: withDefault(argument(string({ metavar: 'DIR' }), { description: message`Directory to write into` }), '.'),
});

/**
 * Copies the sample config into `directory`. Throws if a config file is already there.
 */
export async function writeSampleConfig(directory: string): Promise<string> {
  const target = path.join(directory, DEFAULT_CONFIG_FILE);
  const sample = await fs.readFile(SAMPLE_CONFIG_PATH, 'utf8');

  await fs.mkdir(directory, { recursive: true });
  // 'wx' fails with EEXIST instead of overwriting.
  await fs.writeFile(target, sample, { encoding: 'utf8', flag: 'wx' });

  return target;
}

export async function handleInit(opts: { directory: string }): Promise<void> {
  let target: string;

  try {
    target = await writeSampleConfig(opts.directory);
  } catch (error) {
    printError(
      message`${getErrorMessage(error)}. Remove the existing ${DEFAULT_CONFIG_FILE} or use a different directory.`,
      { exitCode: 1 },
    );
  }

  print(message`✓ Created ${target}`);
  print(message`
Next steps:
  1. Edit ${DEFAULT_CONFIG_FILE} to add your tools
  2. Run ${CLIENT_NAME} run to start the server`);
}
