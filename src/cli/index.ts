#!/usr/bin/env node
import { or } from '@optique/core/constructs';
import { message } from '@optique/core/message';
import { command } from '@optique/core/primitives';
import { run } from '@optique/run';

import { CLIENT_NAME } from '../common/consts.js';
import { getErrorMessage, logJsonl } from '../common/logger.js';
import { handleInit, initCommand } from './commands/init.js';
import { handleRun, runCommand } from './commands/run.js';
import { handleValidate, validateCommand } from './commands/validate.js';
import { handleVersion, versionCommand } from './commands/version.js';

const parser = or(
  command('run', runCommand, { description: message`Expose the configured tools through a relay tunnel` }),
  command('init', initCommand, { description: message`Create a sample tooltunnel.yaml` }),
  command('validate', validateCommand, { description: message`Check a config file for errors` }),
  command('version', versionCommand, { description: message`Print version information` }),
);

const result = run(parser, {
  programName: CLIENT_NAME,
  description: message`Expose local scripts and HTTP calls as MCP tools`,
  help: 'both',
});

async function main(): Promise<void> {
  switch (result.cmd) {
    case 'run':
      await handleRun(result);
      break;
    case 'init':
      await handleInit(result);
      break;
    case 'validate':
      await handleValidate(result);
      break;
    case 'version':
      handleVersion();
      break;
  }
}

main().catch((error: unknown) => {
  logJsonl('ERROR', 'command_failed', { command: result.cmd, error: getErrorMessage(error) });
  console.error(error instanceof Error ? error.message : 'Command failed');
  process.exit(1);
});
