/**
 * Mock ProcessRunner implementation
 * For testing - returns predefined results without spawning real processes
 */

import type { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';
import { exitCodeForSignal } from '../types/exit-codes';

/**
 * Configuration for mock process behavior
 */
export interface MockProcessConfig {
  /** Exit code to return (default: 0) */
  exitCode?: number;
  /** Duration to report in milliseconds (default: 100) */
  durationMs?: number;
  /** Signal that terminated the process */
  signal?: NodeJS.Signals;
  /** Error to reject with (simulates spawn failure) */
  throwError?: Error;
  /**
   * Keep the process "running" until killAll is called; it then exits
   * with this code, or 128 + signal number when undefined
   */
  holdUntilKilled?: { exitCode?: number };
}

export interface MockSpawnCall {
  command: string;
  options: SpawnOptions;
}

interface HeldProcess {
  finish(signal: NodeJS.Signals): void;
}

export class MockProcessRunner implements ProcessRunner {
  private readonly defaultConfig: MockProcessConfig;
  private readonly commandConfigs: Map<string, MockProcessConfig> = new Map();
  private readonly argumentConfigs: Array<{ match: (call: MockSpawnCall) => boolean; config: MockProcessConfig }> = [];
  private callHistory: MockSpawnCall[] = [];
  private readonly held: Set<HeldProcess> = new Set();
  private readonly signalsSent: NodeJS.Signals[] = [];

  constructor(defaultConfig: MockProcessConfig = {}) {
    this.defaultConfig = {
      exitCode: 0,
      durationMs: 100,
      ...defaultConfig,
    };
  }

  /**
   * Configure behavior for a specific command
   */
  setCommandConfig(command: string, config: MockProcessConfig): void {
    this.commandConfigs.set(command, config);
  }

  /**
   * Configure behavior for calls matching a predicate (e.g. `docker push`)
   */
  setMatchConfig(match: (call: MockSpawnCall) => boolean, config: MockProcessConfig): void {
    this.argumentConfigs.push({ match, config });
  }

  getCallHistory(): MockSpawnCall[] {
    return [...this.callHistory];
  }

  /**
   * Command lines of every call, as `command arg1 arg2`
   */
  getCommandLines(): string[] {
    return this.callHistory.map((call) => [call.command, ...call.options.args].join(' '));
  }

  getSignalsSent(): NodeJS.Signals[] {
    return [...this.signalsSent];
  }

  spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    const call: MockSpawnCall = { command, options };
    this.callHistory.push(call);

    const matched = this.argumentConfigs.find((entry) => entry.match(call))?.config;
    const config: MockProcessConfig = {
      ...this.defaultConfig,
      ...(matched ?? this.commandConfigs.get(command)),
    };

    if (config.throwError) {
      return Promise.reject(config.throwError);
    }

    const hold = config.holdUntilKilled;
    if (hold) {
      return new Promise((resolve) => {
        const entry: HeldProcess = {
          finish: (signal) => {
            this.held.delete(entry);
            resolve({
              exitCode: hold.exitCode ?? exitCodeForSignal(signal),
              durationMs: config.durationMs ?? 100,
              signal: hold.exitCode === undefined ? signal : undefined,
            });
          },
        };
        this.held.add(entry);
      });
    }

    return Promise.resolve({
      exitCode: config.exitCode ?? 0,
      durationMs: config.durationMs ?? 100,
      signal: config.signal,
    });
  }

  killAll(signal: NodeJS.Signals): void {
    this.signalsSent.push(signal);
    for (const entry of [...this.held]) {
      entry.finish(signal);
    }
  }

  /**
   * Number of spawned processes still waiting for a signal
   */
  runningCount(): number {
    return this.held.size;
  }
}

export function createMockProcessRunner(config?: MockProcessConfig): MockProcessRunner {
  return new MockProcessRunner(config);
}
