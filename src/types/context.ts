/**
 * Tracker types - issues and statistics collected during one job
 */

export type ProgramIssueReason =
  | "unresolved-name"
  | "read-error"
  | "no-model"
  | "generation-error"
  | "test-generation-error"
  | "missing-artifact"
  | "syntax-invalid"
  | "enhancer-error";

export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

export interface ProgramIssue {
  type: "program";
  path: string; // Source path, or program name when no path is known
  reason: ProgramIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = ProgramIssue | ResourceIssue;
export type IssueType = Issue["type"];

/**
 * Where a job's sources came from, as supplied with the job request
 */
export interface RepositoryRef {
  path: string;
  branch?: string;
  commitHash?: string;
}

export interface ProcessingStats {
  totalPrograms: number;
  totalCopybooks: number;
  parsedPrograms: number;
  placeholderModels: number;
  translatedPrograms: number;
  skippedPrograms: number;
  generatedTests: number;
  validationPassed: number;
  validationFailed: number;
  repository?: RepositoryRef;
  issues: Issue[];
  duration: number;
}
