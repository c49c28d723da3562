/**
 * Command exports
 */

export { createInitCommand } from './init.js';
export { createSetCommand } from './set.js';
export { createGetCommand, encodeSecret } from './get.js';
export { createLsCommand } from './ls.js';
export { createRmCommand } from './rm.js';
export { createConvertCommand } from './convert.js';
export { createImportCommand } from './import.js';
export { createConfigCommand } from './config.js';
export { createInfoCommand } from './info.js';
export { createDumpCommand } from './dump.js';
export { createAgentCommand } from './agent.js';
