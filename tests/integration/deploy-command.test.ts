/**
 * Integration tests for the image launcher
 */

import * as path from 'node:path';
import { describe, it, expect, afterEach } from 'vitest';
import { runDeployCommand } from '../../src/commands/deploy';
import { getDeployUsageText } from '../../src/cli/help';
import { createTestHarness } from '../utils/command-harness';
import type { TestHarness, TestHarnessOptions } from '../utils/command-harness';

const IMAGE = 'registry.local/ml-toolkit/tf2:v4.0.0-tf2.9.1-py3-01';

describe('image-deploy', () => {
  let h: TestHarness;

  function setup(options: TestHarnessOptions = {}): TestHarness {
    h = createTestHarness(options);
    return h;
  }

  afterEach(() => {
    h.cleanup();
  });

  function dockerBuild(...extra: string[]): string {
    const root = h.dir.path;
    return [
      'docker build --pull -f',
      path.join(root, 'release', 'docker', 'Dockerfile.release'),
      '-t',
      IMAGE,
      ...extra,
      '--network=host',
      root,
    ].join(' ');
  }

  it('should print usage and exit 2 when no action is given', async () => {
    setup();
    const exitCode = await runDeployCommand([], h.deps);

    expect(exitCode).toBe(2);
    expect(h.stderr()).toBe(`Error: No action selected: pass --build, --run or --default\n\n${getDeployUsageText()}\n`);
    expect(h.runner.getCallHistory()).toEqual([]);
  });

  it('should report a missing action before reading a broken config file', async () => {
    setup();
    h.dir.writeFile('launchroute.config.json', '{ "deploy": ');

    const exitCode = await runDeployCommand([], h.deps);

    expect(exitCode).toBe(2);
    expect(h.stderr()).toBe(`Error: No action selected: pass --build, --run or --default\n\n${getDeployUsageText()}\n`);
    expect(h.logger.getEventsByType('error')).toEqual([]);
  });

  it('should still exit 3 for a broken config file once an action is given', async () => {
    setup();
    h.dir.writeFile('launchroute.config.json', '{ "deploy": ');

    const exitCode = await runDeployCommand(['--run'], h.deps);

    expect(exitCode).toBe(3);
    expect(h.stderr()).toBe('');
    expect(h.runner.getCallHistory()).toEqual([]);
  });

  it('should print usage to stdout for --help', async () => {
    setup();
    const exitCode = await runDeployCommand(['--build', '--help'], h.deps);

    expect(exitCode).toBe(0);
    expect(h.stdout()).toBe(`${getDeployUsageText()}\n`);
    expect(h.runner.getCallHistory()).toEqual([]);
  });

  it('should build then push after confirmation', async () => {
    setup({ answers: [true] });
    const exitCode = await runDeployCommand(['--build', '--push'], h.deps);

    expect(exitCode).toBe(0);
    expect(h.prompter.asked).toEqual([{ message: `Push ${IMAGE} to registry.local?`, default: true }]);
    expect(h.runner.getCommandLines()).toEqual([dockerBuild(), `docker push ${IMAGE}`]);
  });

  it('should skip only the push when it is declined', async () => {
    setup({ answers: [false] });
    const exitCode = await runDeployCommand(['--build', '--push'], h.deps);

    expect(exitCode).toBe(0);
    expect(h.runner.getCommandLines()).toEqual([dockerBuild()]);
    expect(h.logger.getEventsByType('info').map((e) => e.message)).toEqual([
      'Skipping wheel build',
      'Skipping image push',
    ]);
  });

  it('should not ask with --yes', async () => {
    setup();
    const exitCode = await runDeployCommand(['-b', '-p', '-y'], h.deps);

    expect(exitCode).toBe(0);
    expect(h.prompter.asked).toEqual([]);
    expect(h.runner.getCommandLines()).toEqual([dockerBuild(), `docker push ${IMAGE}`]);
  });

  it('should exit 130 and launch nothing when the prompt is cancelled', async () => {
    setup({ answers: ['CANCELLED'] });
    const exitCode = await runDeployCommand(['--build', '--push'], h.deps);

    expect(exitCode).toBe(130);
    expect(h.runner.getCallHistory()).toEqual([]);
    expect(h.logger.getEventsByType('warn').map((e) => e.message)).toEqual(['Cancelled by user']);
  });

  it('should wrap the build in wheel build and clean', async () => {
    setup();
    const exitCode = await runDeployCommand(['--build', '--wheel', '--force'], h.deps);

    expect(exitCode).toBe(0);
    expect(h.runner.getCommandLines()).toEqual(['make build', dockerBuild('--no-cache'), 'make clean']);
  });

  it('should stop before pushing when the build fails', async () => {
    setup();
    h.runner.setMatchConfig((call) => call.options.args[0] === 'build', { exitCode: 1 });

    const exitCode = await runDeployCommand(['--build', '--push', '--yes'], h.deps);

    expect(exitCode).toBe(1);
    expect(h.runner.getCommandLines()).toEqual([dockerBuild()]);
  });

  it('should run the image with the forwarded command', async () => {
    setup();
    const exitCode = await runDeployCommand(['--run', 'python', '-c', 'import sys'], h.deps);

    expect(exitCode).toBe(0);
    const calls = h.runner.getCallHistory();
    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe('docker');
    expect(calls[0].options.args).toEqual([
      'run', '--gpus', 'all',
      '-v', `${h.dir.path}:/workspace`,
      '--net=host', '--shm-size=30g',
      '--ulimit', 'memlock=-1', '--ulimit', 'stack=67108864',
      '--rm', '-it',
      IMAGE,
      'python', '-c', 'import sys',
    ]);
  });

  it('should open a shell when no command is given and warn about --push', async () => {
    setup();
    const exitCode = await runDeployCommand(['--push', '--run'], h.deps);

    expect(exitCode).toBe(0);
    expect(h.runner.getCallHistory()[0].options.args.slice(-2)).toEqual([IMAGE, '/bin/bash']);
    expect(h.logger.getEventsByType('warn').map((e) => e.message)).toEqual(['--push has no effect without --build']);
  });

  it('should propagate the container exit code', async () => {
    setup();
    h.runner.setCommandConfig('docker', { exitCode: 42 });

    expect(await runDeployCommand(['--default'], h.deps)).toBe(42);
  });

  it('should exit 127 when docker is not installed', async () => {
    setup();
    h.runner.setCommandConfig('docker', {
      throwError: Object.assign(new Error('spawn docker ENOENT'), { code: 'ENOENT' }),
    });

    expect(await runDeployCommand(['--run'], h.deps)).toBe(127);
  });

  it('should neither ask nor launch in a dry run', async () => {
    setup();
    const exitCode = await runDeployCommand(['--build', '--push', '--dry-run'], h.deps);

    expect(exitCode).toBe(0);
    expect(h.prompter.asked).toEqual([]);
    expect(h.runner.getCallHistory()).toEqual([]);
    expect(h.logger.getEventsByType('dry_run_step').map((e) => e.message)).toEqual([
      dockerBuild(),
      `docker push ${IMAGE}`,
    ]);
  });

  it('should use the registry from the environment', async () => {
    setup({ env: { LAUNCHROUTE_REGISTRY: 'registry.test', LAUNCHROUTE_IMAGE_TAG: 'dev' } });

    await runDeployCommand(['--build', '--push', '--yes'], h.deps);

    expect(h.runner.getCommandLines()[1]).toBe('docker push registry.test/ml-toolkit/tf2:dev');
  });
});
