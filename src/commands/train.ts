/**
 * train-multigpu: route `-np <count>` and launch the training command
 * under mpirun with the rest of the arguments.
 */

import type { CommandDeps } from './command-deps';
import { reportRouterError } from './report-error';
import { routeArgs } from '../cli/arg-parser';
import { TRAIN_FLAGS } from '../cli/flag-tables';
import { getTrainUsageText } from '../cli/help';
import { resolveConfig } from '../config/resolve-config';
import { checkTrainRequest, planTrainLaunch } from '../core/launch-plan';
import { executePlan } from '../core/step-executor';
import { ExitCode } from '../types/exit-codes';

/**
 * @param argv - arguments after the script path
 * @returns the exit code for the router process
 */
export async function runTrainCommand(argv: readonly string[], deps: CommandDeps): Promise<number> {
  const { logger } = deps;
  logger.setContext({ variant: 'train' });
  const usage = getTrainUsageText();

  const routed = routeArgs(argv, TRAIN_FLAGS);
  if (!routed.ok) {
    return reportRouterError(routed.error, deps, usage);
  }
  const request = routed.value;
  const checked = checkTrainRequest(request);
  if (!checked.ok) {
    return reportRouterError(checked.error, deps, usage);
  }
  logger.event('request_parsed', `-np ${request.processCountInput ?? '(unset)'}`, {
    passthroughArgs: [...request.passthroughArgs],
  });

  const configured = resolveConfig({ env: deps.env, cwd: deps.cwd });
  if (!configured.ok) {
    return reportRouterError(configured.error, deps, usage);
  }
  const config = configured.value;
  logger.configure({ minLevel: config.logLevel, jsonOutput: config.jsonLogs });
  logger.event('config_resolved', `train profile ${config.train.profile}`, {
    configPath: config.configPath,
    sources: config.sources,
  });

  const planned = planTrainLaunch(request, config.train, deps.cwd);
  if (!planned.ok) {
    return reportRouterError(planned.error, deps, usage);
  }

  const plan = planned.value;
  logger.event('plan_created', `${plan.steps.length} step(s): ${plan.steps.map((s) => s.id).join(', ')}`);

  const executed = await executePlan(
    plan,
    { cwd: deps.cwd, env: deps.env, dryRun: config.dryRun },
    deps
  );
  if (!executed.ok) {
    return reportRouterError(executed.error, deps, usage);
  }
  return ExitCode.SUCCESS;
}
