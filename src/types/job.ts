/**
 * Job lifecycle type definitions
 */

export const JOB_STATUSES = [
  "pending",
  "running",
  "completed",
  "failed",
  "cancelled",
  "reviewing",
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const PIPELINE_STAGES = [
  "discovery",
  "extraction",
  "generation",
  "test-generation",
  "validation",
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

/**
 * Progress published just before each stage starts.
 * Consumers poll on these values, so order and values are fixed.
 */
export const STAGE_CHECKPOINTS: Readonly<Record<PipelineStage, number>> = {
  discovery: 10,
  extraction: 30,
  generation: 50,
  "test-generation": 70,
  validation: 85,
};

export interface JobMetrics {
  programsDiscovered: number;
  programsTranslated: number;
  programsSkipped: number;
  testsGenerated: number;
  validationPassed: number;
  validationFailed: number;
  validationSuccess: boolean;
}

/**
 * Snapshot of a job. Every transition produces a new frozen snapshot.
 */
export interface JobState {
  readonly jobId: string;
  readonly status: JobStatus;
  readonly progress: number; // 0-100
  readonly currentStage: PipelineStage | null;
  readonly metrics: Readonly<JobMetrics> | null;
  readonly errorMessage: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly startedAt: Date | null; // Write-once
  readonly completedAt: Date | null; // Write-once
}

/**
 * Requested change to a job. Omitted fields keep their current value.
 */
export interface JobTransition {
  status: JobStatus;
  progress?: number;
  currentStage?: PipelineStage | null;
  metrics?: JobMetrics;
  errorMessage?: string;
}

export type JobListener = (state: JobState) => void;
