/**
 * @perfsweep/cli - command-line interface
 *
 * Public API exports for the CLI package
 */

export * from './core/command-registry.js';
export * from './core/argument-parser.js';
export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export * from './core/command-context.js';
export * from './core/config-loader.js';
export * from './core/results-writer.js';
export * from './core/run-meta.js';
export * from './core/resume-state.js';
export * from './command-defs/sweep.js';
export * from './types/index.js';
export { createProgram, CLI_VERSION } from './program.js';
