/**
 * Tests for step execution
 */

import { EventEmitter } from 'node:events';
import { describe, it, expect, beforeEach } from 'vitest';
import { executePlan } from './step-executor';
import type { LaunchPlan } from './launch-plan';
import { MockProcessRunner } from '../process/mock-process-runner';
import { BufferLogger } from '../logging/buffer-logger';
import { StatusService } from '../ui/status-service';
import { createCapturedStream } from '../../tests/utils/capture-stream';

const buildAndPush: LaunchPlan = {
  steps: [
    { id: 'image-build', label: 'Building image', command: 'docker', args: ['build', '.'] },
    { id: 'image-push', label: 'Pushing image', command: 'docker', args: ['push', 'img'] },
  ],
  notices: [],
  warnings: [],
};

describe('executePlan', () => {
  let runner: MockProcessRunner;
  let logger: BufferLogger;
  let signals: EventEmitter;
  let statusOutput: () => string;
  let status: StatusService;

  beforeEach(() => {
    runner = new MockProcessRunner({ durationMs: 250 });
    logger = new BufferLogger();
    signals = new EventEmitter();
    const captured = createCapturedStream();
    statusOutput = captured.text;
    status = new StatusService({ isTTY: false, stream: captured.stream });
  });

  function deps() {
    return { runner, logger, status, signalSource: signals };
  }

  it('should run every step in order', async () => {
    const result = await executePlan(buildAndPush, { cwd: '/work', dryRun: false }, deps());

    expect(result).toEqual({ ok: true, value: { completedSteps: ['image-build', 'image-push'], durationMs: 500 } });
    expect(runner.getCommandLines()).toEqual(['docker build .', 'docker push img']);
    expect(runner.getCallHistory()[0].options.cwd).toBe('/work');
    expect(statusOutput()).toBe(
      '> Building image\n✔ Building image (250ms)\n> Pushing image\n✔ Pushing image (250ms)\n'
    );
    expect(logger.getEventsByType('step_completed')).toHaveLength(2);
  });

  it('should stop at the first failing step and keep its exit code', async () => {
    runner.setMatchConfig((call) => call.options.args[0] === 'build', { exitCode: 3 });

    const result = await executePlan(buildAndPush, { cwd: '/work', dryRun: false }, deps());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ code: 'DownstreamFailure', exitCode: 3 });
      expect(result.error.message).toBe('docker exited with code 3');
    }
    expect(runner.getCommandLines()).toEqual(['docker build .']);
    expect(statusOutput()).toBe('> Building image\n✖ Building image (docker exited with code 3)\n');
  });

  it('should report a command that cannot be started as LaunchFailed', async () => {
    const missing = Object.assign(new Error('spawn docker ENOENT'), { code: 'ENOENT' });
    runner.setCommandConfig('docker', { throwError: missing });

    const result = await executePlan(buildAndPush, { cwd: '/work', dryRun: false }, deps());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('LaunchFailed');
      expect(result.error.message).toBe('docker: command not found');
    }
    expect(statusOutput()).toContain('✖ Building image: docker: command not found\n');
  });

  it('should log the commands without spawning in a dry run', async () => {
    const result = await executePlan(buildAndPush, { cwd: '/work', dryRun: true }, deps());

    expect(result).toEqual({ ok: true, value: { completedSteps: [], durationMs: 0 } });
    expect(runner.getCallHistory()).toEqual([]);
    expect(logger.getEventsByType('dry_run_step').map((e) => e.message)).toEqual([
      'docker build .',
      'docker push img',
    ]);
    expect(statusOutput()).toBe('');
  });

  it('should forward SIGINT to the running child and stop the sequence', async () => {
    runner.setMatchConfig((call) => call.options.args[0] === 'build', { holdUntilKilled: {} });

    const pending = executePlan(buildAndPush, { cwd: '/work', dryRun: false }, deps());
    await Promise.resolve();
    expect(runner.runningCount()).toBe(1);
    signals.emit('SIGINT');

    const result = await pending;
    expect(runner.getSignalsSent()).toEqual(['SIGINT']);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ code: 'DownstreamFailure', exitCode: 130, signal: 'SIGINT' });
    }
    expect(runner.getCommandLines()).toEqual(['docker build .']);
    expect(logger.hasEventType('signal_forwarded')).toBe(true);
  });

  it('should leave SIGINT to the terminal when it shares one with the child', async () => {
    runner.setMatchConfig((call) => call.options.args[0] === 'build', { holdUntilKilled: { exitCode: 130 } });

    const pending = executePlan(
      buildAndPush,
      { cwd: '/work', dryRun: false },
      { ...deps(), terminalDeliversInterrupt: true }
    );
    await Promise.resolve();
    signals.emit('SIGINT');
    expect(runner.getSignalsSent()).toEqual([]);
    expect(runner.runningCount()).toBe(1);
    signals.emit('SIGTERM');

    const result = await pending;
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ code: 'DownstreamFailure', exitCode: 130 });
    }
    expect(runner.getSignalsSent()).toEqual(['SIGTERM']);
    expect(logger.getEventsByType('signal_forwarded').map((e) => e.message)).toEqual([
      'SIGINT reached the running command from the terminal',
      'Forwarded SIGTERM to the running command',
    ]);
    expect(runner.getCommandLines()).toEqual(['docker build .']);
  });

  it('should stop after a child that traps the signal and exits 0', async () => {
    runner.setMatchConfig((call) => call.options.args[0] === 'build', { holdUntilKilled: { exitCode: 0 } });

    const pending = executePlan(buildAndPush, { cwd: '/work', dryRun: false }, deps());
    await Promise.resolve();
    signals.emit('SIGTERM');

    const result = await pending;
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ code: 'DownstreamFailure', exitCode: 143, signal: 'SIGTERM' });
    }
    expect(runner.getCommandLines()).toEqual(['docker build .']);
  });

  it('should remove its signal handlers when done', async () => {
    await executePlan(buildAndPush, { cwd: '/work', dryRun: false }, deps());
    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signals.listenerCount('SIGTERM')).toBe(0);
    expect(signals.listenerCount('SIGHUP')).toBe(0);
  });
});
