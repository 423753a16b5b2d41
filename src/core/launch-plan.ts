/**
 * Launch planning
 *
 * Turns a routed InvocationRequest into the ordered commands to run. Pure:
 * nothing is spawned here.
 */

import type { InvocationRequest } from '../cli/types';
import type { TrainConfig, DeployConfig } from '../config/resolve-config';
import { renderTemplate } from './command-template';
import type { RouterError } from '../types/router-error';
import { invalidProcessCount, noModeSelected } from '../types/router-error';
import type { Result } from '../types/result';
import { ok, err } from '../types/result';

export type LaunchStepId = 'train' | 'wheel-build' | 'image-build' | 'image-push' | 'wheel-clean' | 'image-run';

export interface LaunchStep {
  id: LaunchStepId;
  /** Status line shown while the step runs */
  label: string;
  command: string;
  args: string[];
}

export interface LaunchPlan {
  steps: LaunchStep[];
  /** Informational lines announced before the steps run */
  notices: string[];
  /** Arguments or flags that had no effect */
  warnings: string[];
}

function toStep(id: LaunchStepId, label: string, argv: readonly string[]): LaunchStep {
  const [command, ...args] = argv;
  return { id, label, command, args };
}

export function imageReference(deploy: DeployConfig): string {
  return `${deploy.registry}/${deploy.repository}:${deploy.tag}`;
}

/**
 * Usage checks that need only argv; commands run them before reading
 * configuration
 */
export function checkTrainRequest(request: InvocationRequest): Result<InvocationRequest, RouterError> {
  if (request.processCount < 1) {
    return err(invalidProcessCount(request.processCountInput));
  }
  return ok(request);
}

export function checkDeployRequest(request: InvocationRequest): Result<InvocationRequest, RouterError> {
  if (!request.mode.build && !request.mode.run) {
    return err(noModeSelected());
  }
  return ok(request);
}

/**
 * Training launch: reject a missing or non-positive process count, otherwise
 * render the configured mpirun template.
 */
export function planTrainLaunch(
  request: InvocationRequest,
  train: TrainConfig,
  cwd: string
): Result<LaunchPlan, RouterError> {
  const checked = checkTrainRequest(request);
  if (!checked.ok) {
    return checked;
  }

  const argv = renderTemplate(train.template, {
    processCount: request.processCount,
    cwd,
    passthrough: request.passthroughArgs,
  });

  return ok({
    steps: [toStep('train', `Launching ${request.processCount} training process(es)`, argv)],
    notices: [],
    warnings: [],
  });
}

function planBuild(request: InvocationRequest, deploy: DeployConfig): LaunchPlan {
  const image = imageReference(deploy);
  const { wheel, push, force } = request.mode;
  const steps: LaunchStep[] = [];
  const notices: string[] = [];
  const warnings: string[] = [];

  if (request.passthroughArgs.length > 0) {
    warnings.push(`Ignoring arguments with no effect on --build: ${request.passthroughArgs.join(' ')}`);
  }

  if (wheel) {
    steps.push(toStep('wheel-build', 'Building source wheel', deploy.wheelBuild));
  } else {
    notices.push('Skipping wheel build');
  }

  if (force) {
    notices.push('Building without layer cache');
  }
  steps.push(
    toStep('image-build', `Building image ${image}`, [
      'docker',
      'build',
      '--pull',
      '-f',
      deploy.dockerfile,
      '-t',
      image,
      ...(force ? ['--no-cache'] : []),
      '--network=host',
      deploy.sourceRoot,
    ])
  );

  if (push) {
    steps.push(toStep('image-push', `Pushing image ${image}`, ['docker', 'push', image]));
  } else {
    notices.push('Skipping image push');
  }

  if (wheel) {
    steps.push(toStep('wheel-clean', 'Cleaning source wheel', deploy.wheelClean));
  }

  return { steps, notices, warnings };
}

function planRun(request: InvocationRequest, deploy: DeployConfig): LaunchPlan {
  const image = imageReference(deploy);
  const warnings: string[] = [];
  const { wheel, push, force } = request.mode;
  if (wheel) {
    warnings.push('--wheel has no effect without --build');
  }
  if (push) {
    warnings.push('--push has no effect without --build');
  }
  if (force) {
    warnings.push('--force has no effect without --build');
  }

  const command = request.passthroughArgs.length > 0 ? [...request.passthroughArgs] : [deploy.shell];
  const argv = [
    'docker',
    'run',
    '--gpus',
    'all',
    ...deploy.mounts.flatMap((mount) => ['-v', mount]),
    '--net=host',
    `--shm-size=${deploy.shmSize}`,
    '--ulimit',
    'memlock=-1',
    '--ulimit',
    'stack=67108864',
    '--rm',
    '-it',
    image,
    ...command,
  ];

  return {
    steps: [toStep('image-run', `Running image ${image} interactively`, argv)],
    notices: [],
    warnings,
  };
}

/**
 * Image launch decision table, by priority: build, then run, otherwise
 * NoModeSelected. `--help` is answered before planning.
 */
export function planDeploy(request: InvocationRequest, deploy: DeployConfig): Result<LaunchPlan, RouterError> {
  if (request.mode.build) {
    return ok(planBuild(request, deploy));
  }
  if (request.mode.run) {
    return ok(planRun(request, deploy));
  }
  return err(noModeSelected());
}

/**
 * Drop a step (e.g. a push the operator declined)
 */
export function withoutStep(plan: LaunchPlan, id: LaunchStepId): LaunchPlan {
  return { ...plan, steps: plan.steps.filter((step) => step.id !== id) };
}

export function hasStep(plan: LaunchPlan, id: LaunchStepId): boolean {
  return plan.steps.some((step) => step.id === id);
}

/**
 * Display form of a step's command line; tokens with spaces or quotes are
 * shown JSON-quoted
 */
export function formatCommandLine(step: LaunchStep): string {
  return [step.command, ...step.args]
    .map((token) => (token === '' || /[\s"'$`\\]/.test(token) ? JSON.stringify(token) : token))
    .join(' ');
}
