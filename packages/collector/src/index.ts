export { planQueries, toTimeWindow, type QueryPlanInput, type DateRange } from './planner.js';
export { RecordMerger, mergeRecords } from './merger.js';
export {
  PaginationCollector,
  type PaginationOptions,
  type UnitResult,
  type UnitStatus,
  type StopReason,
} from './paginator.js';
export {
  DetailEnricher,
  applyDetail,
  type DetailEnricherOptions,
  type EnrichmentSummary,
} from './enricher.js';
export {
  CollectionOrchestrator,
  type CollectionOrchestratorOptions,
  type CollectionResult,
  type UnitSummary,
} from './orchestrator.js';
