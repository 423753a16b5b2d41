/**
 * Flag tables for the two launchers
 */

import type { FlagTable, FlagSpec } from './types';

const PROCESS_COUNT_PATTERN = /^[0-9]+$/;

/**
 * Parse a process count; anything but a plain decimal integer yields 0,
 * which dispatch rejects.
 */
export function parseProcessCount(value: string): number {
  if (!PROCESS_COUNT_PATTERN.test(value)) {
    return 0;
  }
  const parsed = parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : 0;
}

/**
 * Training launcher: only `-np` belongs to the router, everything else
 * (including -h and --help) goes to the training script.
 */
export const TRAIN_FLAGS: FlagTable = {
  '-np': {
    takesValue: true,
    valueName: '<count>',
    description: 'Number of parallel training processes (required, >= 1)',
    apply: (draft, value) => {
      draft.processCountInput = value;
      draft.processCount = parseProcessCount(value);
    },
  },
};

const build: FlagSpec = {
  takesValue: false,
  description: 'Build the container image',
  apply: (draft) => {
    draft.mode.build = true;
    draft.mode.run = false;
  },
};

const wheel: FlagSpec = {
  takesValue: false,
  description: 'Build the source wheel before the image (with --build)',
  apply: (draft) => {
    draft.mode.wheel = true;
    draft.mode.run = false;
  },
};

const push: FlagSpec = {
  takesValue: false,
  description: 'Push the built image to the registry (with --build)',
  apply: (draft) => {
    draft.mode.push = true;
  },
};

const force: FlagSpec = {
  takesValue: false,
  description: 'Build without the layer cache',
  apply: (draft) => {
    draft.mode.force = true;
  },
};

const run: FlagSpec = {
  takesValue: false,
  description: 'Run the image interactively; extra arguments become the container command',
  apply: (draft) => {
    draft.mode.run = true;
    draft.mode.build = false;
  },
};

const defaults: FlagSpec = {
  takesValue: false,
  description: 'Same as --run with --push and --force cleared',
  apply: (draft) => {
    draft.mode.build = false;
    draft.mode.run = true;
    draft.mode.force = false;
    draft.mode.push = false;
  },
};

const dryRun: FlagSpec = {
  takesValue: false,
  description: 'Print the commands without running them',
  apply: (draft) => {
    draft.dryRun = true;
  },
};

const yes: FlagSpec = {
  takesValue: false,
  description: 'Do not ask before pushing',
  apply: (draft) => {
    draft.assumeYes = true;
  },
};

const help: FlagSpec = {
  takesValue: false,
  description: 'Show this help message',
  apply: (draft) => {
    draft.help = true;
  },
};

/**
 * Image launcher. `--build` and `--run` clear each other, so the later one
 * in argv decides the mode.
 */
export const DEPLOY_FLAGS: FlagTable = {
  '-b': build,
  '--build': build,
  '-w': wheel,
  '--wheel': wheel,
  '-p': push,
  '--push': push,
  '-f': force,
  '--force': force,
  '-r': run,
  '--run': run,
  '--default': defaults,
  '-n': dryRun,
  '--dry-run': dryRun,
  '-y': yes,
  '--yes': yes,
  '-h': help,
  '--help': help,
};
