export * from './secret.js';
export * from './agent.js';
