/**
 * Library entry point
 */

export { Orchestrator, REPORT_FILE } from "./orchestrator";
export type { OrchestratorOptions } from "./orchestrator";
export { StageError, JobTransitionError } from "./errors";
export { InMemoryJobStore } from "./job/job-store";
export type { JobStore } from "./job/job-store";
export {
  TRANSITIONS,
  applyTransition,
  canTransition,
  createJobState,
  isTerminal,
} from "./job/state-machine";
export {
  analyzeSource,
  placeholderModel,
  buildClassContext,
  validateSource,
  checkSource,
  recoverArtifacts,
  recoverTestArtifacts,
  fileSystemDiscovery,
  junitTestGenerator,
} from "./modules";
export { inferType, mapIdentifier, loadConfig, Logger, Tracker } from "./utils";
export { loadClassTemplate, loadTestTemplate } from "./templates";
export * from "./types";
