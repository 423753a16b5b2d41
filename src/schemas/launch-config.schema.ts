/**
 * Launch configuration schemas (zod)
 * Shapes of the repo config file and of the LAUNCHROUTE_* environment.
 */

import { z } from 'zod';
import { TRAIN_PROFILE_NAMES } from '../config/train-profiles';
import { validateTemplate } from '../core/command-template';
import { LOG_LEVELS } from '../types/logger';

const logLevelSchema = z.enum(LOG_LEVELS, {
  errorMap: () => ({ message: `must be one of: ${LOG_LEVELS.join(', ')}` }),
});

const nonEmpty = z.string().trim().min(1, 'must not be empty');

/** A command line as an argv array, e.g. ["make", "build"] */
const commandSchema = z.array(nonEmpty).min(1, 'must name a command');

const templateSchema = z.array(z.string()).superRefine((template, ctx) => {
  for (const issue of validateTemplate(template)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue });
  }
});

/** `host-path:container-path[:options]` */
const mountSchema = z
  .string()
  .regex(/^[^:]+:[^:]+(:[^:]+)?$/, 'must look like <host-path>:<container-path>[:<options>]');

const trainSectionSchema = z
  .object({
    profile: z.enum(TRAIN_PROFILE_NAMES).optional(),
    template: templateSchema.optional(),
  })
  .strict();

const deploySectionSchema = z
  .object({
    registry: nonEmpty.optional(),
    repository: nonEmpty.optional(),
    toolkitVersion: nonEmpty.optional(),
    frameworkVersion: nonEmpty.optional(),
    buildId: nonEmpty.optional(),
    tag: nonEmpty.optional(),
    sourceRoot: nonEmpty.optional(),
    dockerfile: nonEmpty.optional(),
    mounts: z.array(mountSchema).optional(),
    shmSize: z
      .string()
      .regex(/^[0-9]+[bkmg]?$/, 'must be a size such as 30g')
      .optional(),
    shell: nonEmpty.optional(),
    wheelBuild: commandSchema.optional(),
    wheelClean: commandSchema.optional(),
  })
  .strict();

/**
 * launchroute.config.json
 */
export const repoConfigSchema = z
  .object({
    train: trainSectionSchema.optional(),
    deploy: deploySectionSchema.optional(),
    logLevel: logLevelSchema.optional(),
    jsonLogs: z.boolean().optional(),
    dryRun: z.boolean().optional(),
  })
  .strict();

export type RepoConfig = z.infer<typeof repoConfigSchema>;

const booleanFlag = z
  .enum(['1', '0', 'true', 'false'], {
    errorMap: () => ({ message: 'must be 1, 0, true or false' }),
  })
  .transform((value) => value === '1' || value === 'true');

/**
 * LAUNCHROUTE_* variables; unknown variables are ignored
 */
export const envConfigSchema = z.object({
  LAUNCHROUTE_CONFIG: nonEmpty.optional(),
  LAUNCHROUTE_TRAIN_PROFILE: z.enum(TRAIN_PROFILE_NAMES).optional(),
  LAUNCHROUTE_REGISTRY: nonEmpty.optional(),
  LAUNCHROUTE_REPOSITORY: nonEmpty.optional(),
  LAUNCHROUTE_TOOLKIT_VERSION: nonEmpty.optional(),
  LAUNCHROUTE_FRAMEWORK_VERSION: nonEmpty.optional(),
  LAUNCHROUTE_BUILD_ID: nonEmpty.optional(),
  LAUNCHROUTE_IMAGE_TAG: nonEmpty.optional(),
  LAUNCHROUTE_SOURCE_ROOT: nonEmpty.optional(),
  LAUNCHROUTE_LOG_LEVEL: logLevelSchema.optional(),
  LAUNCHROUTE_LOG_JSON: booleanFlag.optional(),
  LAUNCHROUTE_DRY_RUN: booleanFlag.optional(),
});

export type EnvConfig = z.infer<typeof envConfigSchema>;
