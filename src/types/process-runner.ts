/**
 * ProcessRunner interface
 * Abstracts launching the downstream command (mpirun, docker, make) so the
 * launchers can be tested without spawning anything.
 */

/**
 * Options for spawning a downstream process
 */
export interface SpawnOptions {
  /** Arguments to pass to the command, forwarded verbatim */
  args: string[];
  /** Working directory for the subprocess */
  cwd: string;
  /** Environment for the child; defaults to the router's own environment */
  env?: NodeJS.ProcessEnv;
}

/**
 * Outcome of a downstream process that was started
 */
export interface SpawnResult {
  /** Exit code; 128 + signal number when the child was killed by a signal */
  exitCode: number;
  /** Duration of execution in milliseconds */
  durationMs: number;
  /** Signal that terminated the process, if any */
  signal?: NodeJS.Signals;
}

/**
 * Interface for running subprocesses
 * Implementations can be real (child_process) or mock (for testing)
 */
export interface ProcessRunner {
  /**
   * Spawn a subprocess attached to the router's standard streams and wait
   * for it to exit. Rejects only when the process could not be started.
   */
  spawn(command: string, options: SpawnOptions): Promise<SpawnResult>;

  /**
   * Send a signal to every process this runner has started and not yet reaped
   */
  killAll(signal: NodeJS.Signals): void;
}
