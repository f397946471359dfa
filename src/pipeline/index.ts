/**
 * Topic Radar — Pipeline Module
 */

export { Orchestrator, type OrchestratorDeps, type RunOptions } from './orchestrator';
export { RunSummaryBuilder, formatRunSummary } from './summary';
export { EXIT_CODES, exitCodeFor, type ExitCode } from './exit-codes';
