/**
 * @shrine/agent
 *
 * Session-caching agent for shrine: holds an unlocked key for a fixed time
 * and serves get/set/list over an owner-only Unix socket.
 */

export { ShrineAgent } from './agent.js';
export type { ShrineAgentOptions } from './agent.js';

export { AgentServer } from './server.js';
export type { AgentServerOptions } from './server.js';

export { SessionManager } from './session.js';
export type { ClearReason, Session } from './session.js';

export { AuditLogger } from './audit/logger.js';
export type { AuditEntry, AuditLoggerOptions } from './audit/logger.js';

export { AgentClient } from './client/index.js';
export type { AgentClientOptions } from './client/index.js';

export { loadAgentConfig } from './config.js';
export type { AgentConfig, AgentConfigOverrides } from './config.js';
export { ensureRuntimeDir, getLogPath, getPidPath, getRuntimeDir, getSocketPath } from './paths.js';

export * from './handlers/index.js';
