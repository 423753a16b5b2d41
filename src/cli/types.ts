/**
 * CLI Types
 *
 * Type definitions for argument routing
 */

/**
 * Build/run/push modifiers for the image launcher.
 * Independent booleans; `build` and `run` clear each other (last wins).
 */
export interface ModeFlags {
  build: boolean;
  wheel: boolean;
  push: boolean;
  force: boolean;
  run: boolean;
}

/** Result of routing argv: orchestration directives plus pass-through tokens */
export interface InvocationRequest {
  /** Number of parallel workers; 0 means unset or unparsable */
  readonly processCount: number;

  /** Raw value of the last `-np`, kept to report a bad value */
  readonly processCountInput: string | null;

  readonly mode: Readonly<ModeFlags>;

  /** Tokens not recognized as orchestration flags, in input order */
  readonly passthroughArgs: readonly string[];

  /** Print usage and exit successfully */
  readonly help: boolean;

  /** Log the launch steps without spawning anything */
  readonly dryRun: boolean;

  /** Skip confirmation prompts */
  readonly assumeYes: boolean;
}

/** Mutable request that flag effects write to during the scan */
export type DraftRequest = {
  -readonly [K in keyof InvocationRequest]: K extends 'mode'
    ? ModeFlags
    : K extends 'passthroughArgs'
      ? string[]
      : InvocationRequest[K];
};

/** A recognized flag spelling and its effect */
export type FlagSpec =
  | {
      takesValue: false;
      description: string;
      apply: (draft: DraftRequest) => void;
    }
  | {
      takesValue: true;
      /** Placeholder shown in usage text, e.g. `<count>` */
      valueName: string;
      description: string;
      apply: (draft: DraftRequest, value: string) => void;
    };

/** Flag spelling (`-b`, `--build`) to spec; matched exactly */
export type FlagTable = Readonly<Record<string, FlagSpec>>;

export function createDraftRequest(): DraftRequest {
  return {
    processCount: 0,
    processCountInput: null,
    mode: { build: false, wheel: false, push: false, force: false, run: false },
    passthroughArgs: [],
    help: false,
    dryRun: false,
    assumeYes: false,
  };
}
