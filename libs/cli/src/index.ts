/**
 * shrine CLI library
 *
 * The commander program plus the pieces commands are built from, for
 * embedding or extending the CLI.
 *
 * @packageDocumentation
 */

export { VERSION } from '@shrine/ipc';
export { createProgram, runCli } from './program.js';
export { CliContext, processEnvironment } from './context.js';
export type { CliEnvironment, OutputStream } from './context.js';
export * from './access/index.js';
export * from './commands/index.js';
export { formatInfo, formatList } from './utils/format.js';
export { promptHidden, readStdin } from './utils/prompt.js';
export { findAgentCommand, startAgentProcess } from './utils/agent-process.js';
