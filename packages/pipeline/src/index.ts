export { BATCH, PACKAGING, QUALITY_SCORER } from './config/constants';
export {
  loadSettings,
  type DocmillSettings,
  type FallbackStrategy,
  type OutputMode,
} from './config/settings';
export { PackagingError } from './errors';
export {
  QualityScorer,
  tablesAreBalanced,
  type QualityScorerOptions,
  type ScoreBreakdown,
  type ScoringWeights,
} from './scoring/quality-scorer';
export {
  LoggerTelemetry,
  safeRecord,
  type BatchCompletedEvent,
  type ConversionTelemetry,
  type DocumentFailedEvent,
  type TelemetryEvent,
  type VariantAcceptedEvent,
  type VariantAttemptedEvent,
  type VariantCompletedEvent,
} from './telemetry/conversion-telemetry';
export {
  FallbackOrchestrator,
  type FallbackOrchestratorOptions,
} from './orchestration/fallback-orchestrator';
export { FileEnumerator } from './batch/file-enumerator';
export {
  BatchCoordinator,
  type BatchCoordinatorOptions,
  type BatchRunOptions,
} from './batch/batch-coordinator';
export { assignOutputStems } from './packaging/output-names';
export {
  planOutput,
  type Manifest,
  type ManifestEntry,
  type ManifestStatus,
  type OutputPlan,
  type PackagerInput,
  type PlannedFile,
} from './packaging/output-plan';
export type {
  OutputPackager,
  PackagedOutput,
} from './packaging/output-packager';
export { DirectoryPackager } from './packaging/directory-packager';
export { ArchivePackager } from './packaging/archive-packager';
export {
  DocumentConverterService,
  type DirectoryConversion,
  type DocumentConversion,
  type DocumentConverterServiceOptions,
  type EngineLifecycle,
} from './service/document-converter-service';
