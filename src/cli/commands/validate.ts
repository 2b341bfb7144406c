import { object } from '@optique/core/constructs';
import { message } from '@optique/core/message';
import { constant } from '@optique/core/primitives';
import { print, printError } from '@optique/run';

import { getErrorMessage } from '../../common/logger.js';
import { loadConfig, type ToolConfig } from '../../config/config.js';
import { configOption, resolveConfigPath } from '../options.js';

export const validateCommand = object({
  cmd: constant('validate' as const),
  config: configOption,
});

export async function handleValidate(opts: { config?: string }): Promise<void> {
  const configPath = resolveConfigPath(opts.config);
  print(message`Validating ${configPath}...`);

  let config: ToolConfig;
  try {
    config = await loadConfig(configPath);
  } catch (error) {
    printError(message`✗ ${getErrorMessage(error)}`, { exitCode: 1 });
  }

  print(message`✓ Config file is valid`);
  print(message`  Name: ${config.name}`);
  print(message`  Version: ${config.version}`);
  print(message`  Tools: ${String(config.tools.length)}`);

  config.tools.forEach((tool, index) => {
    const kind = tool.execution.kind === 'http' ? 'http' : 'script';
    print(message`  ${String(index + 1)}. ${tool.name} (${kind})`);

    if (tool.description) {
      print(message`     ${tool.description}`);
    }
  });
}
