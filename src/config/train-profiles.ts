/**
 * Built-in mpirun command templates, one per training deployment
 */

export const TRAIN_PROFILE_NAMES = ['classification', 'classification-bazel', 'detection'] as const;

export type TrainProfileName = (typeof TRAIN_PROFILE_NAMES)[number];

export const DEFAULT_TRAIN_PROFILE: TrainProfileName = 'classification';

export const TRAIN_PROFILES: Readonly<Record<TrainProfileName, readonly string[]>> = {
  // train.py next to where the launcher is started
  classification: [
    'mpirun', '-np', '{processCount}',
    '--oversubscribe', '--allow-run-as-root', '--bind-to', 'none',
    'python', '{cwd}/train.py',
    '{passthrough}',
  ],
  // Bazel-built training binary instead of train.py
  'classification-bazel': [
    'mpirun', '-np', '{processCount}',
    '--oversubscribe', '--bind-to', 'none',
    'bazel-bin/classification/train',
    '{passthrough}',
  ],
  detection: [
    'mpirun', '-np', '{processCount}',
    '--allow-run-as-root', '--bind-to', 'none', '-map-by', 'slot',
    '-x', 'LD_LIBRARY_PATH', '-x', 'PATH',
    '-mca', 'pml', 'ob1', '-mca', 'btl', '^openib',
    'python', '/workspace/cv/efficientdet/scripts/train.py',
    '{passthrough}',
  ],
};
