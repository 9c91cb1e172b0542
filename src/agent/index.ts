export { AgentChecker, SshAddAgent } from './checker.js';
export type { AgentCheck, KeyAgent } from './checker.js';
