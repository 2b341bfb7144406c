import { spawn } from 'node:child_process';

import { ARG_ENV_PREFIX } from '../common/consts.js';
import { expandArgs, expandEnv, formatArgument, type ToolArguments } from '../common/template.js';
import type { ProcessExecution } from '../types/action.js';
import type { ActionExecutor, InvocationResult } from './types.js';

export interface ProcessExecutorOptions {
  /**
   * Base environment handed to every child. Defaults to `process.env`.
   */
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

/**
 * Shell used for inline scripts: the user's `$SHELL`, `/bin/sh` as fallback, `cmd /c` on Windows.
 */
export function resolveShell(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): [string, string] {
  if (platform === 'win32') {
    return ['cmd', '/c'];
  }

  return [env.SHELL || '/bin/sh', '-c'];
}

export function buildProcessEnvironment(
  base: NodeJS.ProcessEnv,
  overrides: Readonly<Record<string, string>>,
  args: ToolArguments,
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base };

  for (const [key, value] of Object.entries(overrides)) {
    env[key] = expandEnv(value, base);
  }

  for (const [key, value] of Object.entries(args)) {
    env[`${ARG_ENV_PREFIX}${key.toUpperCase()}`] = formatArgument(value);
  }

  return env;
}

function combineOutput(stdout: string, stderr: string): string {
  if (stderr.length === 0) {
    return stdout.trim();
  }

  if (stdout.length === 0) {
    return stderr.trim();
  }

  return `${stdout}\n${stderr}`.trim();
}

export function createProcessExecutor(options: ProcessExecutorOptions = {}): ActionExecutor<ProcessExecution> {
  const baseEnv = options.env ?? process.env;
  const platform = options.platform ?? process.platform;

  return {
    execute(action, execution, args, deadline) {
      const startedAt = Date.now();

      let file: string;
      let argv: string[];

      if (execution.shell !== undefined) {
        const [shell, flag] = resolveShell(platform, baseEnv);
        file = shell;
        argv = [flag, expandArgs(execution.shell, args)];
      } else if (execution.command !== undefined) {
        file = execution.command;
        argv = execution.args.map((arg) => expandArgs(arg, args));
      } else {
        return Promise.resolve({
          output: '',
          exitCode: -1,
          durationMs: 0,
          error: new Error(`action ${action.name} has neither a shell script nor a command`),
        });
      }

      const cwd = execution.workingDir === undefined ? undefined : expandEnv(execution.workingDir, baseEnv);
      const env = buildProcessEnvironment(baseEnv, action.environment, args);
      const timeoutMs = Math.max(0, deadline - startedAt);

      return new Promise<InvocationResult>((resolve) => {
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let timedOut = false;
        let spawnError: Error | undefined;
        let settled = false;

        const child = spawn(file, argv, {
          cwd,
          env,
          stdio: ['ignore', 'pipe', 'pipe'],
          windowsHide: true,
        });

        const timer = setTimeout(() => {
          timedOut = true;
          child.kill('SIGKILL');
        }, timeoutMs);

        const finish = (code: number | null, signal: NodeJS.Signals | null): void => {
          if (settled) {
            return;
          }

          settled = true;
          clearTimeout(timer);

          const output = combineOutput(Buffer.concat(stdout).toString('utf8'), Buffer.concat(stderr).toString('utf8'));
          const result: InvocationResult = {
            output,
            exitCode: code ?? -1,
            durationMs: Date.now() - startedAt,
          };

          if (timedOut) {
            result.exitCode = -1;
            result.error = new Error(`timed out after ${timeoutMs}ms`);
          } else if (spawnError !== undefined) {
            result.exitCode = -1;
            result.error = spawnError;
          } else if (code === null) {
            result.error = new Error(`terminated by signal ${signal ?? 'unknown'}`);
          } else if (code !== 0) {
            result.error = new Error(`exit status ${code}`);
          }

          resolve(result);
        };

        child.stdout.on('data', (chunk: Buffer) => {
          stdout.push(chunk);
        });

        child.stderr.on('data', (chunk: Buffer) => {
          stderr.push(chunk);
        });

        child.once('error', (error) => {
          spawnError = error;

          if (child.pid === undefined) {
            finish(null, null);
          }
        });

        child.once('exit', (code, signal) => {
          if (!timedOut) {
            return;
          }

          // Grandchildren may still hold the pipes open.
          child.stdout.destroy();
          child.stderr.destroy();
          finish(code, signal);
        });

        child.once('close', (code, signal) => {
          finish(code, signal);
        });
      });
    },
  };
}
