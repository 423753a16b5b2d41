/**
 * Core module - launch planning and execution
 */

export type { LaunchPlan, LaunchStep, LaunchStepId } from './launch-plan';
export {
  checkTrainRequest,
  checkDeployRequest,
  planTrainLaunch,
  planDeploy,
  imageReference,
  withoutStep,
  hasStep,
  formatCommandLine,
} from './launch-plan';

export type { TemplateValues } from './command-template';
export {
  PASSTHROUGH_PLACEHOLDER,
  PROCESS_COUNT_PLACEHOLDER,
  CWD_PLACEHOLDER,
  validateTemplate,
  renderTemplate,
} from './command-template';

export type { ExecutePlanOptions, ExecutorDeps, ExecutionOutcome } from './step-executor';
export { executePlan } from './step-executor';

export type { SignalSource, SignalForwarder, ForwardSignalsOptions } from './signal-forwarding';
export { FORWARDED_SIGNALS, forwardSignals } from './signal-forwarding';
