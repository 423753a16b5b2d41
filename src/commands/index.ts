/**
 * Commands - the two launcher entry points
 */

export { runTrainCommand } from './train';
export { runDeployCommand } from './deploy';
export { reportRouterError } from './report-error';
export type { CommandDeps, TerminalOutput } from './command-deps';
export { createRealCommandDeps } from './command-deps';
