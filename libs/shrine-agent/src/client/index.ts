export { AgentClient } from './agent-client.js';
export type { AgentClientOptions } from './agent-client.js';
