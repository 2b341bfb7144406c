import { message } from '@optique/core/message';
import { optional } from '@optique/core/modifiers';
import { option } from '@optique/core/primitives';
import { string } from '@optique/core/valueparser';

import { DEFAULT_CONFIG_FILE, DEFAULT_RELAY_URL } from '../common/consts.js';

export const CONFIG_ENV = 'TOOLTUNNEL_CONFIG';
export const RELAY_URL_ENV = 'TOOLTUNNEL_RELAY_URL';

export const configOption = optional(
  option('-c', '--config', string({ metavar: 'FILE' }), {
    description: message`Config file path (default: tooltunnel.yaml)`,
  }),
);

/**
 * Flag, then environment, then the default file name.
 */
export function resolveConfigPath(flag: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  return flag || env[CONFIG_ENV] || DEFAULT_CONFIG_FILE;
}

export function resolveRelayUrl(flag: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  return flag || env[RELAY_URL_ENV] || DEFAULT_RELAY_URL;
}
