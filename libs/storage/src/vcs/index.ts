export * from './types.js';
export * from './git-runner.js';
export * from './git.js';
