/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  InputConfig,
  OutputConfig,
  TemplatesConfig,
  GeneratorConfig,
  ValidationConfig,
  IdConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "./config";

// Programs
export type {
  ProgramDescriptor,
  CopybookDescriptor,
  Division,
  InferredType,
  DataItem,
  ProcedureRef,
  FileControlEntry,
  StructuralModel,
  GeneratedArtifact,
  TestArtifact,
  ArtifactMap,
  TestArtifactMap,
  ValidationResult,
  FieldTemplateContext,
  MethodTemplateContext,
  ClassTemplateContext,
  TestTemplateContext,
} from "./program";
export { DIVISIONS, INFERRED_TYPES } from "./program";

// Jobs
export type {
  JobStatus,
  PipelineStage,
  JobMetrics,
  JobState,
  JobTransition,
  JobListener,
} from "./job";
export { JOB_STATUSES, PIPELINE_STAGES, STAGE_CHECKPOINTS } from "./job";

// Pipeline
export type {
  StageContext,
  StageResult,
  DiscoveryPayload,
  ExtractionPayload,
  GenerationPayload,
  TestGenerationPayload,
  ValidationSummary,
  ValidationPayload,
  JobRequest,
  ProgramDiscovery,
  TestGenerator,
  ArtifactEnhancer,
  JobOutcome,
} from "./pipeline";

// Tracker
export type {
  Issue,
  IssueType,
  ProgramIssue,
  ResourceIssue,
  ProgramIssueReason,
  ResourceIssueReason,
  ProcessingStats,
  RepositoryRef,
} from "./context";
