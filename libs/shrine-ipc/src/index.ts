/**
 * Shrine IPC Library
 *
 * Shared types, schemas, errors and constants for the storage engine, the
 * agent daemon and the CLI.
 *
 * @packageDocumentation
 */

export * from './constants.js';
export * from './errors.js';
export * from './logger.js';
export * from './types/index.js';
export * from './schemas/index.js';
