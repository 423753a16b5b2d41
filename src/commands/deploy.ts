/**
 * image-deploy: build, push or run the toolkit container image
 */

import type { CommandDeps } from './command-deps';
import { reportRouterError } from './report-error';
import { routeArgs } from '../cli/arg-parser';
import { DEPLOY_FLAGS } from '../cli/flag-tables';
import { getDeployUsageText } from '../cli/help';
import type { DeployConfig } from '../config/resolve-config';
import { resolveConfig } from '../config/resolve-config';
import type { LaunchPlan } from '../core/launch-plan';
import { checkDeployRequest, planDeploy, hasStep, withoutStep, imageReference } from '../core/launch-plan';
import { executePlan } from '../core/step-executor';
import { ExitCode } from '../types/exit-codes';
import { promptCancelled } from '../types/router-error';
import type { Result } from '../types/result';
import { ok, err } from '../types/result';

/**
 * Ask before publishing the image. Declining drops only the push step.
 */
async function confirmPush(
  plan: LaunchPlan,
  deploy: DeployConfig,
  deps: CommandDeps
): Promise<Result<LaunchPlan, number>> {
  const answer = await deps.prompter.confirm({
    message: `Push ${imageReference(deploy)} to ${deploy.registry}?`,
    default: true,
  });

  if (!answer.ok) {
    if (answer.error.code === 'CANCELLED') {
      return err(reportRouterError(promptCancelled(), deps, getDeployUsageText()));
    }
    deps.logger.error(answer.error.message);
    return err(ExitCode.UNEXPECTED_ERROR);
  }

  if (answer.value) {
    return ok(plan);
  }
  const declined = withoutStep(plan, 'image-push');
  return ok({ ...declined, notices: [...declined.notices, 'Skipping image push'] });
}

/**
 * @param argv - arguments after the script path
 * @returns the exit code for the router process
 */
export async function runDeployCommand(argv: readonly string[], deps: CommandDeps): Promise<number> {
  const { logger } = deps;
  logger.setContext({ variant: 'deploy' });
  const usage = getDeployUsageText();

  const routed = routeArgs(argv, DEPLOY_FLAGS);
  if (!routed.ok) {
    return reportRouterError(routed.error, deps, usage);
  }
  const request = routed.value;

  if (request.help) {
    deps.output.stdout(`${usage}\n`);
    return ExitCode.SUCCESS;
  }
  const checked = checkDeployRequest(request);
  if (!checked.ok) {
    return reportRouterError(checked.error, deps, usage);
  }
  logger.event('request_parsed', 'deploy flags routed', {
    mode: { ...request.mode },
    passthroughArgs: [...request.passthroughArgs],
  });

  const configured = resolveConfig({ env: deps.env, cwd: deps.cwd });
  if (!configured.ok) {
    return reportRouterError(configured.error, deps, usage);
  }
  const config = configured.value;
  logger.configure({ minLevel: config.logLevel, jsonOutput: config.jsonLogs });
  logger.event('config_resolved', `image ${imageReference(config.deploy)}`, {
    configPath: config.configPath,
    sources: config.sources,
  });

  const planned = planDeploy(request, config.deploy);
  if (!planned.ok) {
    return reportRouterError(planned.error, deps, usage);
  }
  let plan = planned.value;
  const dryRun = request.dryRun || config.dryRun;

  if (hasStep(plan, 'image-push') && !request.assumeYes && !dryRun) {
    const confirmed = await confirmPush(plan, config.deploy, deps);
    if (!confirmed.ok) {
      return confirmed.error;
    }
    plan = confirmed.value;
  }

  for (const warning of plan.warnings) {
    logger.warn(warning);
  }
  for (const notice of plan.notices) {
    logger.info(notice);
  }
  logger.event('plan_created', `${plan.steps.length} step(s): ${plan.steps.map((s) => s.id).join(', ')}`);

  const executed = await executePlan(plan, { cwd: deps.cwd, env: deps.env, dryRun }, deps);
  if (!executed.ok) {
    return reportRouterError(executed.error, deps, usage);
  }
  return ExitCode.SUCCESS;
}
