/**
 * Error types raised by the pipeline
 */

import type { JobStatus, PipelineStage } from "./types";

/**
 * Error thrown when a stage reports failure. Fatal for the job.
 */
export class StageError extends Error {
  constructor(
    public readonly stage: PipelineStage,
    message: string,
  ) {
    super(message);
    this.name = "StageError";
  }
}

/**
 * Error thrown when a job transition is illegal or moves progress backwards
 */
export class JobTransitionError extends Error {
  constructor(
    message: string,
    public readonly jobId: string,
    public readonly from: JobStatus,
    public readonly to: JobStatus,
  ) {
    super(message);
    this.name = "JobTransitionError";
  }
}
