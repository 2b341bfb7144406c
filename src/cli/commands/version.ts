import { object } from '@optique/core/constructs';
import { constant } from '@optique/core/primitives';

import { CLIENT_NAME, CLIENT_VERSION, MCP_PROTOCOL_VERSION } from '../../common/consts.js';

export const versionCommand = object({
  cmd: constant('version' as const),
});

export function handleVersion(): void {
  console.log(`${CLIENT_NAME} v${CLIENT_VERSION} (MCP ${MCP_PROTOCOL_VERSION})`);
}
