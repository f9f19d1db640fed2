export { KeyedMutex, type Release } from './lock'
export {
  SyncOrchestrator,
  type OrchestratorStats,
  type SignalOptions,
  type SyncAllEntry,
  type SyncOrchestratorConfig,
  type SyncOrchestratorDeps,
} from './orchestrator'
