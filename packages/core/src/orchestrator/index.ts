export { RoundOrchestrator, DEFAULT_POLL_INTERVAL_MS } from './round-orchestrator.js';
export type { RoundOrchestratorOptions, RoundOrchestratorEvents, PullResult } from './round-orchestrator.js';
export { ShutdownBroadcaster } from './shutdown-broadcaster.js';
