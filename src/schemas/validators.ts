/**
 * Schema Validation with Zod
 * Runtime validation for the config file and environment
 */

import { z } from 'zod';
import type { RepoConfig, EnvConfig } from './launch-config.schema';
import { repoConfigSchema, envConfigSchema } from './launch-config.schema';

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}

export function validateRepoConfig(data: unknown): ValidationResult<RepoConfig> {
  const result = repoConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

/**
 * Parse repo config from its JSON text
 */
export function parseRepoConfig(json: string): ValidationResult<RepoConfig> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (e) {
    return {
      success: false,
      errors: [`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`],
    };
  }
  return validateRepoConfig(data);
}

/**
 * Validate the process environment. Empty variables count as unset.
 */
export function validateEnvConfig(env: NodeJS.ProcessEnv): ValidationResult<EnvConfig> {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('LAUNCHROUTE_') && value !== undefined && value !== '') {
      present[key] = value;
    }
  }

  const result = envConfigSchema.safeParse(present);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}
