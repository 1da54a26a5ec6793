/**
 * Job state machine
 *
 *   pending → running → completed ⇄ reviewing
 *
 * with failed and cancelled reachable from pending and running. Failed and
 * cancelled are terminal. Every change goes through `applyTransition`.
 */

import { JobTransitionError } from "../errors";
import type { JobState, JobStatus, JobTransition } from "../types";

/** Valid transitions per status */
export const TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  pending: ["running", "failed", "cancelled"],
  // running → running publishes a progress checkpoint
  running: ["running", "completed", "failed", "cancelled"],
  completed: ["reviewing"],
  reviewing: ["completed"],
  failed: [],
  cancelled: [],
};

const TERMINAL: ReadonlySet<JobStatus> = new Set<JobStatus>(["completed", "failed", "cancelled"]);

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Whether entering this status stamps `completedAt`
 */
export function isTerminal(status: JobStatus): boolean {
  return TERMINAL.has(status);
}

export function createJobState(jobId: string, now: Date = new Date()): JobState {
  const state: JobState = {
    jobId,
    status: "pending",
    progress: 0,
    currentStage: null,
    metrics: null,
    errorMessage: null,
    createdAt: now,
    updatedAt: now,
    startedAt: null,
    completedAt: null,
  };
  return Object.freeze(state);
}

/**
 * Compute the snapshot that follows `state` under `change`.
 * Pure: `state` is left untouched and the result is frozen.
 *
 * @throws JobTransitionError on an illegal status change, on a progress
 * regression, or on progress outside 0-100
 */
export function applyTransition(
  state: JobState,
  change: JobTransition,
  now: Date = new Date(),
): JobState {
  const { jobId, status: from } = state;
  const to = change.status;

  if (!canTransition(from, to)) {
    throw new JobTransitionError(
      `Invalid job transition for ${jobId}: ${from} → ${to}`,
      jobId,
      from,
      to,
    );
  }

  const progress = change.progress ?? state.progress;
  if (progress < 0 || progress > 100) {
    throw new JobTransitionError(
      `Progress out of range for ${jobId}: ${progress}`,
      jobId,
      from,
      to,
    );
  }
  if (progress < state.progress) {
    throw new JobTransitionError(
      `Progress regression for ${jobId}: ${state.progress} → ${progress}`,
      jobId,
      from,
      to,
    );
  }

  const next: JobState = {
    jobId,
    status: to,
    progress,
    currentStage:
      change.currentStage !== undefined ? change.currentStage : state.currentStage,
    metrics: change.metrics ? Object.freeze({ ...change.metrics }) : state.metrics,
    errorMessage: change.errorMessage ?? state.errorMessage,
    createdAt: state.createdAt,
    updatedAt: now,
    startedAt: state.startedAt ?? (to === "running" ? now : null),
    completedAt: state.completedAt ?? (isTerminal(to) ? now : null),
  };
  return Object.freeze(next);
}
