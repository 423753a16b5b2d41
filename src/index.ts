/**
 * launchroute - argument routing for distributed training and image deploys
 *
 * Library entry point; the executables live in ./bin.
 */

export * from './cli';
export * from './core';
export * from './config';
export * from './commands';
export * from './types';
export * from './schemas';

export { ConsoleLogger, BufferLogger, createConsoleLogger, createBufferLogger } from './logging';
export { RealProcessRunner, MockProcessRunner, createRealProcessRunner, createMockProcessRunner } from './process';
export { StatusService, createStatusService, InquirerPrompter, createInquirerPrompter } from './ui';
