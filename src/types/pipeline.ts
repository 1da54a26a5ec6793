/**
 * Pipeline stage data types
 */

import type { ConversionConfig } from "./config";
import type {
  ArtifactMap,
  CopybookDescriptor,
  GeneratedArtifact,
  ProgramDescriptor,
  StructuralModel,
  TestArtifactMap,
  ValidationResult,
} from "./program";
import type { ProcessingStats, RepositoryRef } from "./context";
import type { JobState } from "./job";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

/**
 * Everything a stage needs besides its upstream payload.
 * One instance per job; nothing here is shared between jobs.
 */
export interface StageContext {
  jobId: string;
  config: Readonly<ConversionConfig>;
  tracker: Tracker;
  logger: Logger;
  outputDir: string; // <output.directory>/<jobId>
}

export type StageResult<T> =
  | { success: true; payload: T }
  | { success: false; error: string; payload?: T };

// ============================================================================
// Stage payloads
// ============================================================================

export interface DiscoveryPayload {
  repoPath: string;
  programs: ProgramDescriptor[];
  copybooks: CopybookDescriptor[];
}

export interface ExtractionPayload {
  // Keyed by resolved program name
  models: Map<string, StructuralModel>;
  programsParsed: number;
}

export interface GenerationPayload {
  artifacts: ArtifactMap;
  sourceDir: string;
  translatedCount: number;
  skippedCount: number;
}

export interface TestGenerationPayload {
  tests: TestArtifactMap;
  testsGenerated: number;
}

export interface ValidationSummary {
  totalPrograms: number;
  passed: number;
  failed: number;
  passRate: number; // Percentage
}

export interface ValidationPayload {
  results: Map<string, ValidationResult>;
  passed: number;
  failed: number;
  summary: ValidationSummary;
}

// ============================================================================
// External collaborators
// ============================================================================

export interface JobRequest {
  jobId?: string;
  repoPath: string; // Already materialised on disk
  branch?: string;
  commitHash?: string;
  targetStack?: string;
}

/**
 * Produces the program list for a job. The built-in implementation walks the
 * repository on disk.
 */
export interface ProgramDiscovery {
  discover(
    ctx: StageContext,
    request: JobRequest,
  ): Promise<StageResult<DiscoveryPayload>>;
}

/**
 * Produces a paired test for each generated class. `models` is keyed by
 * program name, like the artifact map.
 */
export interface TestGenerator {
  generate(
    ctx: StageContext,
    artifacts: ArtifactMap,
    models: Map<string, StructuralModel>,
  ): Promise<StageResult<TestGenerationPayload>>;
}

/**
 * Best-effort post-generation step. Returning a string replaces the
 * generated source; returning undefined leaves it untouched.
 * Failures are recorded and never affect the job.
 */
export interface ArtifactEnhancer {
  name: string;
  enhance(
    artifact: GeneratedArtifact,
    source: string,
  ): Promise<string | undefined>;
}

export interface JobOutcome {
  jobId: string;
  success: boolean;
  error?: string;
  state: JobState; // Final snapshot
  repository: RepositoryRef;
  outputDir: string;
  artifacts: ArtifactMap;
  tests: TestArtifactMap;
  validation: Map<string, ValidationResult>;
  stats: ProcessingStats;
}
