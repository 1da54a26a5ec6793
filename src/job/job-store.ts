/**
 * Job store
 * Holds the authoritative state of every job
 */

import { applyTransition, createJobState } from "./state-machine";
import type { JobListener, JobState, JobTransition } from "../types";

export interface JobStore {
  create(jobId: string): JobState;
  get(jobId: string): JobState | undefined;
  /**
   * Apply a transition and return the new snapshot
   * @throws JobTransitionError when the transition is illegal
   */
  apply(jobId: string, change: JobTransition): JobState;
  /**
   * Listen to every snapshot written for a job, in write order.
   * Returns an unsubscribe function.
   */
  subscribe(jobId: string, listener: JobListener): () => void;
}

/**
 * Process-local store. Snapshots are frozen and replaced whole, so a reader
 * never sees fields from two different transitions.
 */
export class InMemoryJobStore implements JobStore {
  private states = new Map<string, JobState>();
  private listeners = new Map<string, Set<JobListener>>();

  create(jobId: string): JobState {
    if (this.states.has(jobId)) {
      throw new Error(`Job already exists: ${jobId}`);
    }

    const state = createJobState(jobId);
    this.states.set(jobId, state);
    this.notify(state);
    return state;
  }

  get(jobId: string): JobState | undefined {
    return this.states.get(jobId);
  }

  apply(jobId: string, change: JobTransition): JobState {
    const current = this.states.get(jobId);
    if (!current) {
      throw new Error(`Unknown job: ${jobId}`);
    }

    const next = applyTransition(current, change);
    this.states.set(jobId, next);
    this.notify(next);
    return next;
  }

  subscribe(jobId: string, listener: JobListener): () => void {
    const set = this.listeners.get(jobId) ?? new Set<JobListener>();
    this.listeners.set(jobId, set);
    set.add(listener);

    return () => {
      set.delete(listener);
    };
  }

  /** IDs of all known jobs, in creation order */
  jobIds(): string[] {
    return [...this.states.keys()];
  }

  private notify(state: JobState): void {
    for (const listener of this.listeners.get(state.jobId) ?? []) {
      listener(state);
    }
  }
}
