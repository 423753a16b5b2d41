/**
 * CLI Module
 *
 * Exports for the argument routing module
 */

export { routeArgs } from './arg-parser';
export { TRAIN_FLAGS, DEPLOY_FLAGS, parseProcessCount } from './flag-tables';
export { getTrainUsageText, getDeployUsageText, formatFlagTable } from './help';
export type { InvocationRequest, ModeFlags, FlagSpec, FlagTable, DraftRequest } from './types';
export { createDraftRequest } from './types';
