export type ToolArguments = Record<string, unknown>;

const ENV_PATTERN = /\$\{([^}]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Expands `${VAR}` and `$VAR` references. Unset variables expand to an empty string.
 */
export function expandEnv(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(ENV_PATTERN, (_match, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare ?? '';
    return env[name] ?? '';
  });
}

export function formatArgument(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  if (value === null || value === undefined) {
    return '';
  }

  if (typeof value === 'object') {
    return JSON.stringify(value);
  }

  return String(value);
}

/**
 * Replaces `{{name}}` placeholders with call arguments. Unknown placeholders are left untouched.
 */
export function expandArgs(template: string, args: ToolArguments): string {
  let result = template;

  for (const [key, value] of Object.entries(args)) {
    result = result.split(`{{${key}}}`).join(formatArgument(value));
  }

  return result;
}
