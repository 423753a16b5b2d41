/**
 * Configuration Resolution
 * Single-pass config resolution with explicit precedence
 * environment > repo config file > defaults
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join, resolve } from 'path';
import type { RepoConfig, EnvConfig } from '../schemas/launch-config.schema';
import { parseRepoConfig, validateEnvConfig } from '../schemas/validators';
import type { TrainProfileName } from './train-profiles';
import { TRAIN_PROFILES, DEFAULT_TRAIN_PROFILE } from './train-profiles';
import type { LogLevel } from '../types/logger';
import type { RouterError } from '../types/router-error';
import { configInvalid } from '../types/router-error';
import type { Result } from '../types/result';
import { ok, err } from '../types/result';

export const CONFIG_FILE_NAME = 'launchroute.config.json';

export type ConfigSource = 'env' | 'file' | 'default';

export interface TrainConfig {
  profile: TrainProfileName;
  /** Command template (profile's unless the config file overrides it) */
  template: readonly string[];
}

export interface DeployConfig {
  registry: string;
  repository: string;
  tag: string;
  /** Build context and default mount source */
  sourceRoot: string;
  dockerfile: string;
  /** `host:container[:options]` volume mounts for `--run` */
  mounts: string[];
  shmSize: string;
  /** Container command when `--run` gets no extra arguments */
  shell: string;
  wheelBuild: string[];
  wheelClean: string[];
}

export interface EffectiveConfig {
  workingDirectory: string;
  /** Config file that was read, null when there was none */
  configPath: string | null;
  train: TrainConfig;
  deploy: DeployConfig;
  logLevel: LogLevel;
  jsonLogs: boolean;
  dryRun: boolean;
  /** Where each setting came from, for debug logging */
  sources: Record<string, ConfigSource>;
}

export const DEFAULT_DEPLOY = {
  registry: 'registry.local',
  repository: 'ml-toolkit/tf2',
  toolkitVersion: '4.0.0',
  frameworkVersion: '2.9.1',
  buildId: '01',
  shmSize: '30g',
  shell: '/bin/bash',
  wheelBuild: ['make', 'build'],
  wheelClean: ['make', 'clean'],
} as const;

export interface ResolveConfigOptions {
  /** Environment to read LAUNCHROUTE_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Working directory (default: process.cwd()) */
  cwd?: string;
}

/**
 * Image tag derived from toolkit and framework versions
 */
export function defaultImageTag(toolkitVersion: string, frameworkVersion: string, buildId: string): string {
  return `v${toolkitVersion}-tf${frameworkVersion}-py3-${buildId}`;
}

/**
 * Load and validate the repo config file. A missing file is not an error.
 */
export function loadRepoConfig(path: string): Result<RepoConfig | null, RouterError> {
  if (!existsSync(path)) {
    return ok(null);
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    return err(configInvalid(path, [`could not be read: ${e instanceof Error ? e.message : String(e)}`]));
  }

  const parsed = parseRepoConfig(content);
  if (!parsed.success || !parsed.data) {
    return err(configInvalid(path, parsed.errors ?? []));
  }
  return ok(parsed.data);
}

/**
 * Resolve configuration from all sources with explicit precedence
 */
export function resolveConfig(options: ResolveConfigOptions = {}): Result<EffectiveConfig, RouterError> {
  const cwd = options.cwd ?? process.cwd();

  const envResult = validateEnvConfig(options.env ?? process.env);
  if (!envResult.success || !envResult.data) {
    return err(configInvalid('environment', envResult.errors ?? []));
  }
  const env: EnvConfig = envResult.data;

  const requestedPath = env.LAUNCHROUTE_CONFIG ?? CONFIG_FILE_NAME;
  const configPath = isAbsolute(requestedPath) ? requestedPath : resolve(cwd, requestedPath);
  // An explicitly named file has to exist; the default one is optional
  if (env.LAUNCHROUTE_CONFIG !== undefined && !existsSync(configPath)) {
    return err(configInvalid(configPath, ['file not found (set by LAUNCHROUTE_CONFIG)']));
  }
  const fileResult = loadRepoConfig(configPath);
  if (!fileResult.ok) {
    return fileResult;
  }
  const file = fileResult.value;

  const sources: Record<string, ConfigSource> = {};

  function resolveValue<T>(key: string, fromEnv: T | undefined, fromFile: T | undefined, defaultVal: T): T {
    if (fromEnv !== undefined) {
      sources[key] = 'env';
      return fromEnv;
    }
    if (fromFile !== undefined) {
      sources[key] = 'file';
      return fromFile;
    }
    sources[key] = 'default';
    return defaultVal;
  }

  const profile = resolveValue<TrainProfileName>(
    'train.profile',
    env.LAUNCHROUTE_TRAIN_PROFILE,
    file?.train?.profile,
    DEFAULT_TRAIN_PROFILE
  );
  const template = resolveValue<readonly string[]>(
    'train.template',
    undefined,
    file?.train?.template,
    TRAIN_PROFILES[profile]
  );

  const deployFile = file?.deploy;
  const sourceRoot = resolve(
    cwd,
    resolveValue('deploy.sourceRoot', env.LAUNCHROUTE_SOURCE_ROOT, deployFile?.sourceRoot, cwd)
  );
  const toolkitVersion = resolveValue(
    'deploy.toolkitVersion',
    env.LAUNCHROUTE_TOOLKIT_VERSION,
    deployFile?.toolkitVersion,
    DEFAULT_DEPLOY.toolkitVersion
  );
  const frameworkVersion = resolveValue(
    'deploy.frameworkVersion',
    env.LAUNCHROUTE_FRAMEWORK_VERSION,
    deployFile?.frameworkVersion,
    DEFAULT_DEPLOY.frameworkVersion
  );
  const buildId = resolveValue('deploy.buildId', env.LAUNCHROUTE_BUILD_ID, deployFile?.buildId, DEFAULT_DEPLOY.buildId);

  const dockerfile = resolveValue<string>(
    'deploy.dockerfile',
    undefined,
    deployFile?.dockerfile,
    join(sourceRoot, 'release', 'docker', 'Dockerfile.release')
  );

  const deploy: DeployConfig = {
    registry: resolveValue('deploy.registry', env.LAUNCHROUTE_REGISTRY, deployFile?.registry, DEFAULT_DEPLOY.registry),
    repository: resolveValue(
      'deploy.repository',
      env.LAUNCHROUTE_REPOSITORY,
      deployFile?.repository,
      DEFAULT_DEPLOY.repository
    ),
    tag: resolveValue(
      'deploy.tag',
      env.LAUNCHROUTE_IMAGE_TAG,
      deployFile?.tag,
      defaultImageTag(toolkitVersion, frameworkVersion, buildId)
    ),
    sourceRoot,
    dockerfile: resolve(sourceRoot, dockerfile),
    mounts: resolveValue('deploy.mounts', undefined, deployFile?.mounts, [`${sourceRoot}:/workspace`]),
    shmSize: resolveValue('deploy.shmSize', undefined, deployFile?.shmSize, DEFAULT_DEPLOY.shmSize),
    shell: resolveValue('deploy.shell', undefined, deployFile?.shell, DEFAULT_DEPLOY.shell),
    wheelBuild: resolveValue('deploy.wheelBuild', undefined, deployFile?.wheelBuild, [...DEFAULT_DEPLOY.wheelBuild]),
    wheelClean: resolveValue('deploy.wheelClean', undefined, deployFile?.wheelClean, [...DEFAULT_DEPLOY.wheelClean]),
  };

  return ok({
    workingDirectory: cwd,
    configPath: file ? configPath : null,
    train: { profile, template },
    deploy,
    logLevel: resolveValue<LogLevel>('logLevel', env.LAUNCHROUTE_LOG_LEVEL, file?.logLevel, 'info'),
    jsonLogs: resolveValue('jsonLogs', env.LAUNCHROUTE_LOG_JSON, file?.jsonLogs, false),
    dryRun: resolveValue('dryRun', env.LAUNCHROUTE_DRY_RUN, file?.dryRun, false),
    sources,
  });
}
