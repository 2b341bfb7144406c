import fs from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { DEFAULT_ACTION_TIMEOUT_MS } from '../common/consts.js';
import { parseDuration } from '../common/duration.js';
import { getErrorMessage } from '../common/logger.js';
import { expandEnv } from '../common/template.js';
import type { Action, ActionExecution, ActionParameter } from '../types/action.js';

export const DEFAULT_CONFIG_NAME = 'tooltunnel-local';
export const DEFAULT_CONFIG_VERSION = '1.0.0';
export const DEFAULT_LOCAL_PORT = 3000;

export class ConfigValidationError extends Error {
  /**
   * Individual problems found in the file.
   */
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(issues.join('; '));
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

const scalarText = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

function listOf<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((value) => value ?? []);
}

function textMap() {
  return z
    .record(scalarText)
    .nullish()
    .transform((value) => value ?? {});
}

const parameterSchema = z.object({
  name: z.string().nullish(),
  type: z
    .enum(['string', 'number', 'boolean', 'array', 'object'])
    .nullish()
    .transform((value) => value ?? 'string'),
  description: z.string().nullish(),
  required: z.boolean().nullish(),
  default: scalarText.nullish(),
});

const scriptSchema = z.object({
  command: z.string().nullish(),
  args: listOf(scalarText),
  shell: z.string().nullish(),
  working_dir: z.string().nullish(),
  timeout: z.string().nullish(),
});

const httpSchema = z.object({
  method: z.string().nullish(),
  url: z.string().nullish(),
  headers: textMap(),
  body: z.string().nullish(),
  timeout: z.string().nullish(),
  extract_json: z.string().nullish(),
});

const toolSchema = z.object({
  name: z.string().nullish(),
  description: z.string().nullish(),
  parameters: listOf(parameterSchema),
  script: scriptSchema.nullish(),
  http: httpSchema.nullish(),
  environment: textMap(),
});

const configSchema = z.object({
  name: z.string().nullish(),
  description: z.string().nullish(),
  version: scalarText.nullish(),
  server: z
    .object({
      port: z.number().int().nonnegative().nullish(),
    })
    .nullish(),
  tools: listOf(toolSchema),
});

type RawTool = z.infer<typeof toolSchema>;

export interface ToolConfig {
  name: string;
  description: string;
  version: string;
  server: {
    port: number;
  };
  tools: Action[];
}

function resolveTimeout(raw: string | null | undefined): number {
  if (!raw) {
    return DEFAULT_ACTION_TIMEOUT_MS;
  }

  return parseDuration(raw) ?? DEFAULT_ACTION_TIMEOUT_MS;
}

function toParameters(tool: RawTool, label: string, issues: string[]): ActionParameter[] {
  const seen = new Set<string>();
  const parameters: ActionParameter[] = [];

  tool.parameters.forEach((raw, index) => {
    if (!raw.name) {
      issues.push(`tool ${label}: parameter ${index}: name is required`);
      return;
    }

    if (seen.has(raw.name)) {
      issues.push(`tool ${label}: duplicate parameter "${raw.name}"`);
      return;
    }

    seen.add(raw.name);
    parameters.push({
      name: raw.name,
      type: raw.type,
      description: raw.description ?? '',
      required: raw.required ?? false,
      default: raw.default || undefined,
    });
  });

  return parameters;
}

function toExecution(tool: RawTool, label: string, issues: string[]): ActionExecution | undefined {
  const { script, http } = tool;

  if (script && http) {
    issues.push(`tool ${label}: only one of script or http may be set`);
    return undefined;
  }

  if (http) {
    if (!http.url) {
      issues.push(`tool ${label}: http.url is required`);
      return undefined;
    }

    return {
      kind: 'http',
      method: (http.method || 'GET').toUpperCase(),
      url: http.url,
      headers: http.headers,
      body: http.body || undefined,
      timeoutMs: resolveTimeout(http.timeout),
      extractJson: http.extract_json || undefined,
    };
  }

  if (!script || (!script.command && !script.shell)) {
    issues.push(`tool ${label}: script.command or script.shell is required`);
    return undefined;
  }

  return {
    kind: 'process',
    command: script.command || undefined,
    args: script.args,
    shell: script.shell || undefined,
    workingDir: script.working_dir || undefined,
    timeoutMs: resolveTimeout(script.timeout),
  };
}

/**
 * Validates parsed YAML and applies defaults. Throws `ConfigValidationError` listing every problem found.
 */
export function parseConfig(document: unknown): ToolConfig {
  const parsed = configSchema.safeParse(document ?? {});

  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map((issue) => {
        const location = issue.path.length > 0 ? issue.path.join('.') : 'config';
        return `${location}: ${issue.message}`;
      }),
    );
  }

  const raw = parsed.data;
  const issues: string[] = [];
  const tools: Action[] = [];
  const names = new Set<string>();

  raw.tools.forEach((tool, index) => {
    if (!tool.name) {
      issues.push(`tool ${index}: name is required`);
      return;
    }

    if (names.has(tool.name)) {
      issues.push(`tool ${tool.name}: duplicate tool name`);
      return;
    }

    names.add(tool.name);

    const parameters = toParameters(tool, tool.name, issues);
    const execution = toExecution(tool, tool.name, issues);

    if (execution === undefined) {
      return;
    }

    tools.push({
      name: tool.name,
      description: tool.description ?? '',
      parameters,
      execution,
      environment: tool.environment,
    });
  });

  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }

  return {
    name: raw.name || DEFAULT_CONFIG_NAME,
    description: raw.description ?? '',
    version: raw.version || DEFAULT_CONFIG_VERSION,
    server: {
      port: raw.server?.port || DEFAULT_LOCAL_PORT,
    },
    tools,
  };
}

/**
 * Reads a YAML config file, expanding environment references over the raw text before parsing.
 */
export async function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<ToolConfig> {
  let text: string;

  try {
    text = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    throw new Error(`read file: ${getErrorMessage(error)}`, { cause: error });
  }

  let document: unknown;

  try {
    document = parseYaml(expandEnv(text, env));
  } catch (error) {
    throw new ConfigValidationError([`parse yaml: ${getErrorMessage(error)}`]);
  }

  return parseConfig(document);
}
