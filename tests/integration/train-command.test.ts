/**
 * Integration tests for the training launcher
 */

import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { runTrainCommand } from '../../src/commands/train';
import { getTrainUsageText } from '../../src/cli/help';
import { CONFIG_FILE_NAME } from '../../src/config/resolve-config';
import { createTestHarness } from '../utils/command-harness';
import type { TestHarness } from '../utils/command-harness';

describe('train-multigpu', () => {
  let h: TestHarness;

  beforeEach(() => {
    h = createTestHarness();
  });

  afterEach(() => {
    h.cleanup();
  });

  it('should launch mpirun with the forwarded arguments', async () => {
    const exitCode = await runTrainCommand(['-np', '4', '--epochs', '10'], h.deps);

    expect(exitCode).toBe(0);
    const calls = h.runner.getCallHistory();
    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe('mpirun');
    expect(calls[0].options.args).toEqual([
      '-np', '4',
      '--oversubscribe', '--allow-run-as-root', '--bind-to', 'none',
      'python', path.join(h.dir.path, 'train.py'),
      '--epochs', '10',
    ]);
    expect(calls[0].options.cwd).toBe(h.dir.path);
    expect(h.stderr()).toBe('');
  });

  it('should print usage and exit 2 without -np', async () => {
    const exitCode = await runTrainCommand([], h.deps);

    expect(exitCode).toBe(2);
    expect(h.stderr()).toBe(`Error: -np <count> is required\n\n${getTrainUsageText()}\n`);
    expect(h.runner.getCallHistory()).toEqual([]);
  });

  it('should reject a count that is not a positive integer', async () => {
    const exitCode = await runTrainCommand(['-np', '0', 'train.yaml'], h.deps);

    expect(exitCode).toBe(2);
    expect(h.stderr().split('\n')[0]).toBe('Error: -np must be a positive integer (got "0")');
    expect(h.runner.getCallHistory()).toEqual([]);
  });

  it('should report a missing -np before reading a broken environment', async () => {
    h.deps.env = { LAUNCHROUTE_LOG_LEVEL: 'loud' };

    const exitCode = await runTrainCommand(['--epochs', '10'], h.deps);

    expect(exitCode).toBe(2);
    expect(h.stderr()).toBe(`Error: -np <count> is required\n\n${getTrainUsageText()}\n`);
    expect(h.runner.getCallHistory()).toEqual([]);
  });

  it('should report a bad -np before reading a broken config file', async () => {
    h.dir.writeFile(CONFIG_FILE_NAME, '{ "train": ');

    const exitCode = await runTrainCommand(['-np', 'x'], h.deps);

    expect(exitCode).toBe(2);
    expect(h.stderr().split('\n')[0]).toBe('Error: -np must be a positive integer (got "x")');
  });

  it('should report a trailing -np as a missing value', async () => {
    const exitCode = await runTrainCommand(['--epochs', '10', '-np'], h.deps);

    expect(exitCode).toBe(2);
    expect(h.stderr().split('\n')[0]).toBe('Error: -np requires a value');
  });

  it('should exit with the training process exit code', async () => {
    h.runner.setCommandConfig('mpirun', { exitCode: 3 });

    const exitCode = await runTrainCommand(['-np', '2'], h.deps);

    expect(exitCode).toBe(3);
    expect(h.logger.getEventsByType('error').map((e) => e.message)).toEqual(['mpirun exited with code 3']);
  });

  it('should exit 127 when mpirun is not installed', async () => {
    h.runner.setCommandConfig('mpirun', {
      throwError: Object.assign(new Error('spawn mpirun ENOENT'), { code: 'ENOENT' }),
    });

    const exitCode = await runTrainCommand(['-np', '2'], h.deps);

    expect(exitCode).toBe(127);
    expect(h.logger.getMessages()).toContain('mpirun: command not found');
  });

  it('should forward SIGINT to mpirun and exit 130', async () => {
    h.runner.setCommandConfig('mpirun', { holdUntilKilled: {} });

    const pending = runTrainCommand(['-np', '2'], h.deps);
    for (let i = 0; i < 10 && h.runner.runningCount() === 0; i++) {
      await new Promise((resolve) => setImmediate(resolve));
    }
    h.signals.emit('SIGINT');

    expect(await pending).toBe(130);
    expect(h.runner.getSignalsSent()).toEqual(['SIGINT']);
  });

  it('should use the profile chosen in the environment', async () => {
    h.deps.env = { LAUNCHROUTE_TRAIN_PROFILE: 'classification-bazel' };

    await runTrainCommand(['-np', '8', '--gpus', '8'], h.deps);

    expect(h.runner.getCommandLines()).toEqual([
      'mpirun -np 8 --oversubscribe --bind-to none bazel-bin/classification/train --gpus 8',
    ]);
  });

  it('should hand the environment to the training process', async () => {
    h.deps.env = { CUDA_VISIBLE_DEVICES: '0,1' };

    await runTrainCommand(['-np', '2'], h.deps);

    expect(h.runner.getCallHistory()[0].options.env).toEqual({ CUDA_VISIBLE_DEVICES: '0,1' });
  });

  it('should only log the command in a dry run', async () => {
    h.deps.env = { LAUNCHROUTE_DRY_RUN: 'true' };

    const exitCode = await runTrainCommand(['-np', '2', 'x'], h.deps);

    expect(exitCode).toBe(0);
    expect(h.runner.getCallHistory()).toEqual([]);
    expect(h.logger.getEventsByType('dry_run_step').map((e) => e.message)).toEqual([
      `mpirun -np 2 --oversubscribe --allow-run-as-root --bind-to none python ${path.join(h.dir.path, 'train.py')} x`,
    ]);
  });

  it('should exit 3 for an invalid config file', async () => {
    h.dir.writeFile(CONFIG_FILE_NAME, JSON.stringify({ train: { profile: 'unknown' } }));

    const exitCode = await runTrainCommand(['-np', '2'], h.deps);

    expect(exitCode).toBe(3);
    expect(h.runner.getCallHistory()).toEqual([]);
    expect(h.logger.getEventsByType('error')[0].message).toMatch(/^Invalid configuration in .*launchroute\.config\.json:\n  - train\.profile: /);
  });
});
