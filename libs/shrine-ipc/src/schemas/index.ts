export * from './config.schema.js';
export * from './agent.schema.js';
export * from './env.schema.js';
export * from './agent-result.schema.js';
