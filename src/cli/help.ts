/**
 * CLI Help Text
 *
 * Usage text for both launchers, generated from their flag tables
 */

import type { FlagTable, FlagSpec } from './types';
import { TRAIN_FLAGS, DEPLOY_FLAGS } from './flag-tables';

/**
 * One option line per distinct flag, with its spellings joined (`-b, --build`)
 */
export function formatFlagTable(table: FlagTable): string[] {
  const grouped = new Map<FlagSpec, string[]>();
  for (const [spelling, spec] of Object.entries(table)) {
    const spellings = grouped.get(spec) ?? [];
    spellings.push(spelling);
    grouped.set(spec, spellings);
  }

  const rows = [...grouped].map(([spec, spellings]) => {
    const name = spellings.join(', ') + (spec.takesValue ? ` ${spec.valueName}` : '');
    return { name, description: spec.description };
  });
  const width = Math.max(...rows.map((row) => row.name.length)) + 2;
  return rows.map((row) => `  ${row.name.padEnd(width)}${row.description}`);
}

export function getTrainUsageText(): string {
  return [
    'Usage: train-multigpu -np <count> [training arguments]',
    '',
    'Options:',
    ...formatFlagTable(TRAIN_FLAGS),
    '',
    'All other arguments are passed to the training command unchanged.',
    '',
    'Examples:',
    '  train-multigpu -np 4 -e experiment.yaml -r results/',
    '  LAUNCHROUTE_TRAIN_PROFILE=detection train-multigpu -np 8 --epochs 10',
  ].join('\n');
}

export function getDeployUsageText(): string {
  return [
    'Usage: image-deploy [--build [--wheel] [--force] [--push]] [--run [command...]] [--default]',
    '',
    'Options:',
    ...formatFlagTable(DEPLOY_FLAGS),
    '',
    'Examples:',
    '  image-deploy --build --push',
    '  image-deploy --build --wheel --force',
    '  image-deploy --run',
    '  image-deploy --run python -c "import tensorflow"',
  ].join('\n');
}
