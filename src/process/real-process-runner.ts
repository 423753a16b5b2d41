/**
 * Real ProcessRunner implementation
 * Uses child_process.spawn with inherited stdio, so mpirun and docker talk
 * to the operator's terminal directly.
 */

import { spawn, ChildProcess } from 'child_process';
import type { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';
import { exitCodeForSignal } from '../types/exit-codes';

export class RealProcessRunner implements ProcessRunner {
  private runningProcesses: Map<number, ChildProcess> = new Map();
  private processIdCounter = 0;

  spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      // shell: false keeps forwarded arguments verbatim (no word splitting or globbing)
      const child = spawn(command, options.args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: 'inherit',
        shell: false,
      });

      const processId = ++this.processIdCounter;
      this.runningProcesses.set(processId, child);

      // A failed spawn emits 'error' and may still emit 'close'
      let settled = false;

      child.on('close', (code, sig) => {
        this.runningProcesses.delete(processId);
        if (settled) return;
        settled = true;

        const signal = sig ?? undefined;
        resolve({
          exitCode: code ?? (signal ? exitCodeForSignal(signal) : 1),
          durationMs: Date.now() - startTime,
          signal,
        });
      });

      child.on('error', (error) => {
        this.runningProcesses.delete(processId);
        if (settled) return;
        settled = true;
        reject(error);
      });
    });
  }

  killAll(signal: NodeJS.Signals): void {
    for (const [, child] of this.runningProcesses) {
      // Already-exited children are reaped by 'close'
      if (child.exitCode === null && child.signalCode === null) {
        child.kill(signal);
      }
    }
  }
}

export function createRealProcessRunner(): ProcessRunner {
  return new RealProcessRunner();
}
