/**
 * Forward termination signals received by the router to the running child,
 * so a killed launcher never leaves mpirun or docker orphaned.
 */

import type { ProcessRunner } from '../types/process-runner';

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * The part of `process` used to listen for signals
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface SignalForwarder {
  /** First signal received since installation, null if none */
  received(): NodeJS.Signals | null;
  /** Remove the handlers; safe to call more than once */
  dispose(): void;
}

export interface ForwardSignalsOptions {
  source?: SignalSource;
  /**
   * The router shares a terminal with the child, so Ctrl+C already reaches
   * the child's process group. SIGINT is then recorded but not sent again.
   */
  terminalDeliversInterrupt?: boolean;
  onSignal?: (signal: NodeJS.Signals, forwarded: boolean) => void;
}

/**
 * Install handlers that pass SIGINT/SIGTERM/SIGHUP on to the runner's
 * children. While installed, these signals no longer terminate the router
 * itself: it waits for the child and exits with the child's status.
 */
export function forwardSignals(runner: ProcessRunner, options: ForwardSignalsOptions = {}): SignalForwarder {
  const source: SignalSource = options.source ?? process;
  let first: NodeJS.Signals | null = null;
  let disposed = false;

  const listeners = FORWARDED_SIGNALS.map((signal) => {
    const listener = (): void => {
      if (first === null) {
        first = signal;
      }
      const forwarded = !(signal === 'SIGINT' && options.terminalDeliversInterrupt);
      if (forwarded) {
        runner.killAll(signal);
      }
      options.onSignal?.(signal, forwarded);
    };
    source.on(signal, listener);
    return { signal, listener };
  });

  return {
    received: () => first,
    dispose: () => {
      if (disposed) return;
      disposed = true;
      for (const { signal, listener } of listeners) {
        source.off(signal, listener);
      }
    },
  };
}
