/**
 * Config module - configuration resolution
 */

export type {
  ConfigSource,
  TrainConfig,
  DeployConfig,
  EffectiveConfig,
  ResolveConfigOptions,
} from './resolve-config';
export {
  CONFIG_FILE_NAME,
  DEFAULT_DEPLOY,
  defaultImageTag,
  loadRepoConfig,
  resolveConfig,
} from './resolve-config';

export type { TrainProfileName } from './train-profiles';
export { TRAIN_PROFILE_NAMES, TRAIN_PROFILES, DEFAULT_TRAIN_PROFILE } from './train-profiles';
