import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import {
  buildProcessEnvironment,
  createProcessExecutor,
  resolveShell,
} from '@/executors/process-executor.js';
import type { Action, ProcessExecution } from '@/types/action.js';

import { createTempDirectory, removeDirectory, writeFile } from '../helpers/test-utils.js';

const baseEnv = { PATH: process.env.PATH, SHELL: '/bin/sh' };

function processAction(execution: Partial<ProcessExecution>, environment: Record<string, string> = {}): Action {
  return {
    name: 'probe',
    description: '',
    parameters: [],
    execution: { kind: 'process', args: [], timeoutMs: 5000, ...execution },
    environment,
  };
}

async function runAction(action: Action, args: Record<string, unknown> = {}, timeoutMs = 5000) {
  const executor = createProcessExecutor({ env: { ...baseEnv, USER_NAME: 'sam' }, platform: 'linux' });

  if (action.execution.kind !== 'process') {
    throw new Error('expected a process action');
  }

  return executor.execute(action, action.execution, args, Date.now() + timeoutMs);
}

describe.skipIf(process.platform === 'win32')('process executor', () => {
  const tempDirectories: string[] = [];

  afterEach(async () => {
    for (const tempDirectory of tempDirectories.splice(0)) {
      await removeDirectory(tempDirectory);
    }
  });

  it('runs inline scripts with placeholder substitution', async () => {
    const result = await runAction(processAction({ shell: 'echo "Hello, {{name}}!"' }), { name: 'World' });

    expect(result.output).toBe('Hello, World!');
    expect(result.exitCode).toBe(0);
    expect(result.error).toBeUndefined();
  });

  it('joins stdout and stderr', async () => {
    const result = await runAction(processAction({ shell: 'echo out; echo err 1>&2' }));

    expect(result.output).toBe('out\n\nerr');
  });

  it('reports non-zero exit codes', async () => {
    const result = await runAction(processAction({ shell: 'echo failing; exit 3' }));

    expect(result.output).toBe('failing');
    expect(result.exitCode).toBe(3);
    expect(result.error?.message).toBe('exit status 3');
  });

  it('exports arguments and action environment', async () => {
    const result = await runAction(
      processAction({ shell: 'printf "%s/%s" "$TOOLTUNNEL_ARG_CITY" "$GREETING"' }, { GREETING: 'hi ${USER_NAME}' }),
      { city: 'Oslo' },
    );

    expect(result.output).toBe('Oslo/hi sam');
  });

  it('runs commands with substituted arguments in the working directory', async () => {
    const root = await createTempDirectory('tooltunnel-process-');
    tempDirectories.push(root);
    await writeFile(path.join(root, 'marker.txt'), 'marker-content');

    const result = await runAction(
      processAction({ command: '/bin/sh', args: ['-c', 'cat {{file}}'], workingDir: root }),
      { file: 'marker.txt' },
    );

    expect(result.output).toBe('marker-content');
    expect(result.exitCode).toBe(0);
  });

  it('kills the process at the deadline', async () => {
    const result = await runAction(processAction({ shell: 'sleep 5' }), {}, 100);

    expect(result.exitCode).toBe(-1);
    expect(result.error?.message).toMatch(/^timed out after \d+ms$/);
    expect(result.durationMs).toBeLessThan(4000);
  });

  it('reports spawn failures with exit code -1', async () => {
    const result = await runAction(processAction({ command: '/nonexistent/tooltunnel-probe' }));

    expect(result.exitCode).toBe(-1);
    expect(result.output).toBe('');
    expect(result.error?.message).toContain('ENOENT');
  });
});

describe('process environment', () => {
  it('picks the shell per platform', () => {
    expect(resolveShell('win32', { SHELL: '/bin/zsh' })).toEqual(['cmd', '/c']);
    expect(resolveShell('linux', {})).toEqual(['/bin/sh', '-c']);
    expect(resolveShell('darwin', { SHELL: '/bin/zsh' })).toEqual(['/bin/zsh', '-c']);
  });

  it('layers action variables and arguments over the base environment', () => {
    expect(buildProcessEnvironment({ A: '1' }, { B: '$A-x' }, { city: 'Oslo', n: 2 })).toEqual({
      A: '1',
      B: '1-x',
      TOOLTUNNEL_ARG_CITY: 'Oslo',
      TOOLTUNNEL_ARG_N: '2',
    });
  });
});
