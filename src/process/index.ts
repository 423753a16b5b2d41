/**
 * Process module - ProcessRunner implementations
 */

export { RealProcessRunner, createRealProcessRunner } from './real-process-runner';
export type { MockProcessConfig, MockSpawnCall } from './mock-process-runner';
export { MockProcessRunner, createMockProcessRunner } from './mock-process-runner';
