/**
 * Central export point for orchestrator modules
 */

export {
  CollectionAbortedError,
  CollectionOrchestrator,
  DEFAULT_CONCURRENCY,
  DEFAULT_SOFT_TIMEOUT_MS,
  type EntityTaskRunner,
  type OrchestratorOptions
} from './collection-orchestrator';
