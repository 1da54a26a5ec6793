/**
 * Job Tracker
 * Unified tracking for per-job counters and issues
 */

import { ZodError } from "zod";
import { saveJson } from "./fs";
import type {
  Issue,
  IssueType,
  ProgramIssue,
  ProgramIssueReason,
  ResourceIssue,
  ResourceIssueReason,
  ProcessingStats,
  RepositoryRef,
  ValidationResult,
} from "../types";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => (e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message))
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  return { reason: "read-error", details: describe(error) };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalPrograms = 0;
  private totalCopybooks = 0;
  private parsedPrograms = 0;
  private placeholderModels = 0;
  private translatedPrograms = 0;
  private skippedPrograms = 0;
  private generatedTests = 0;
  private validationPassed = 0;
  private validationFailed = 0;
  private repository?: RepositoryRef;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalPrograms(count: number): void {
    this.totalPrograms = count;
  }

  setTotalCopybooks(count: number): void {
    this.totalCopybooks = count;
  }

  setRepository(repository: RepositoryRef): void {
    this.repository = { ...repository };
  }

  incrementParsed(): void {
    this.parsedPrograms++;
  }

  incrementPlaceholders(): void {
    this.placeholderModels++;
  }

  incrementTranslated(): void {
    this.translatedPrograms++;
  }

  incrementSkipped(): void {
    this.skippedPrograms++;
  }

  incrementTests(): void {
    this.generatedTests++;
  }

  incrementValidationPassed(): void {
    this.validationPassed++;
  }

  incrementValidationFailed(): void {
    this.validationFailed++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Record a per-program problem. `error` may be a thrown value or a
   * plain description.
   */
  trackProgramIssue(
    path: string,
    reason: ProgramIssueReason,
    error?: unknown,
  ): void {
    if (error === undefined) {
      this.issues.push({ type: "program", path, reason });
      return;
    }
    this.issues.push({ type: "program", path, reason, details: describe(error) });
  }

  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues(type: "program"): ProgramIssue[];
  getIssues(type: "resource"): ResourceIssue[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return [...this.issues];
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      totalPrograms: this.totalPrograms,
      totalCopybooks: this.totalCopybooks,
      parsedPrograms: this.parsedPrograms,
      placeholderModels: this.placeholderModels,
      translatedPrograms: this.translatedPrograms,
      skippedPrograms: this.skippedPrograms,
      generatedTests: this.generatedTests,
      validationPassed: this.validationPassed,
      validationFailed: this.validationFailed,
      repository: this.repository,
      issues: [...this.issues],
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  /**
   * Write the job report (summary, grouped issues, validation results)
   */
  async exportReport(
    outputPath: string,
    validation: Map<string, ValidationResult> = new Map(),
  ): Promise<void> {
    const { issues, ...summary } = this.getStats();

    await saveJson(outputPath, {
      summary,
      issues: this.groupIssuesByTypeAndReason(issues),
      validation: Object.fromEntries(validation),
    });
  }

  private groupIssuesByTypeAndReason(issues: Issue[]): {
    program: Record<string, ProgramIssue[]>;
    resource: Record<string, ResourceIssue[]>;
  } {
    const grouped: {
      program: Record<string, ProgramIssue[]>;
      resource: Record<string, ResourceIssue[]>;
    } = {
      program: {},
      resource: {},
    };

    for (const issue of issues) {
      switch (issue.type) {
        case "program": {
          (grouped.program[issue.reason] ??= []).push(issue);
          break;
        }
        case "resource": {
          (grouped.resource[issue.reason] ??= []).push(issue);
          break;
        }
      }
    }

    return grouped;
  }
}
