/**
 * Step execution
 *
 * Runs a LaunchPlan's steps one after another; the first step that does
 * not exit 0 ends the sequence.
 */

import type { LaunchPlan } from './launch-plan';
import { formatCommandLine } from './launch-plan';
import type { SignalSource } from './signal-forwarding';
import { forwardSignals } from './signal-forwarding';
import type { ProcessRunner, SpawnResult } from '../types/process-runner';
import type { Logger } from '../types/logger';
import { exitCodeForSignal } from '../types/exit-codes';
import type { RouterError } from '../types/router-error';
import { launchFailed, downstreamFailure } from '../types/router-error';
import type { Result } from '../types/result';
import { ok, err } from '../types/result';
import { StatusService } from '../ui/status-service';

export interface ExecutePlanOptions {
  cwd: string;
  /** Environment handed to every child (default: the router's) */
  env?: NodeJS.ProcessEnv;
  /** Log the commands instead of running them */
  dryRun: boolean;
}

export interface ExecutorDeps {
  runner: ProcessRunner;
  logger: Logger;
  status: StatusService;
  /** Where termination signals come from (default: process) */
  signalSource?: SignalSource;
  /** Ctrl+C on the shared terminal already reaches the child */
  terminalDeliversInterrupt?: boolean;
}

export interface ExecutionOutcome {
  /** Ids of the steps that completed successfully, in order */
  completedSteps: string[];
  /** Total time spent in child processes */
  durationMs: number;
}

function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

export async function executePlan(
  plan: LaunchPlan,
  options: ExecutePlanOptions,
  deps: ExecutorDeps
): Promise<Result<ExecutionOutcome, RouterError>> {
  const { runner, logger, status } = deps;

  if (options.dryRun) {
    for (const step of plan.steps) {
      logger.event('dry_run_step', formatCommandLine(step), { step: step.id });
    }
    return ok({ completedSteps: [], durationMs: 0 });
  }

  const forwarder = forwardSignals(runner, {
    source: deps.signalSource,
    terminalDeliversInterrupt: deps.terminalDeliversInterrupt,
    onSignal: (signal, forwarded) =>
      logger.event(
        'signal_forwarded',
        forwarded
          ? `Forwarded ${signal} to the running command`
          : `${signal} reached the running command from the terminal`
      ),
  });

  const completedSteps: string[] = [];
  let durationMs = 0;

  try {
    for (const step of plan.steps) {
      const line = status.create({ text: step.label });
      line.announce();
      logger.event('step_started', formatCommandLine(step), { step: step.id });

      let result: SpawnResult;
      try {
        result = await runner.spawn(step.command, { args: step.args, cwd: options.cwd, env: options.env });
      } catch (error) {
        const failure = launchFailed(step.command, error instanceof Error ? error : new Error(String(error)));
        line.fail(`${step.label}: ${failure.message}`);
        logger.event('step_failed', failure.message, { step: step.id });
        return err(failure);
      }
      durationMs += result.durationMs;

      const interruptedBy = forwarder.received();
      if (result.exitCode !== 0 || interruptedBy !== null) {
        // A child that traps the forwarded signal and exits 0 still ends the sequence
        const exitCode =
          result.exitCode !== 0 ? result.exitCode : exitCodeForSignal(interruptedBy ?? 'SIGTERM');
        const failure = downstreamFailure(step.command, exitCode, result.signal ?? interruptedBy ?? undefined);
        line.fail(`${step.label} (${failure.message})`);
        logger.event('step_failed', failure.message, { step: step.id, exitCode });
        return err(failure);
      }

      line.succeed(`${step.label} (${formatDuration(result.durationMs)})`);
      logger.event('step_completed', `${step.id} finished`, { step: step.id, exitCode: 0 });
      completedSteps.push(step.id);
    }
  } finally {
    forwarder.dispose();
  }

  return ok({ completedSteps, durationMs });
}
