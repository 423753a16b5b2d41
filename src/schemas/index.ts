/**
 * Export launch config schemas
 */
export type { RepoConfig, EnvConfig } from './launch-config.schema';
export { repoConfigSchema, envConfigSchema } from './launch-config.schema';

/**
 * Export validators
 */
export type { ValidationResult } from './validators';
export { validateRepoConfig, parseRepoConfig, validateEnvConfig } from './validators';
