/**
 * Stats Module
 * Displays job statistics and issues with chalk formatting
 */

import chalk from "chalk";
import type { Issue, JobOutcome, ProcessingStats } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display the outcome of one job
 */
export function stats(outcome: JobOutcome, verbose?: boolean): void {
  const { state, stats } = outcome;
  const metrics = state.metrics;

  console.log("");

  if (!outcome.success) {
    console.log(
      `  ${chalk.red("✖")} ${chalk.bold("Migration Failed")} ${chalk.dim("·")} ${chalk.dim(outcome.jobId)}`,
    );
    if (state.errorMessage) {
      console.log(`   ${chalk.red(state.errorMessage)}`);
    }
  } else {
    const statusIcon = metrics?.validationSuccess ? chalk.green("✔") : chalk.yellow("◆");
    console.log(
      `  ${statusIcon} ${chalk.bold("Migration Complete")} ${chalk.dim("·")} ${chalk.dim(outcome.jobId)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
    );
  }

  displayProgramsSection(stats);
  displayValidationSection(stats);
  displayIssuesSection(stats.issues, verbose);

  const { repository } = outcome;
  const revision = [repository.branch, repository.commitHash].filter(Boolean).join(" @ ");
  console.log(
    `\n   ${chalk.dim("Source:")} ${repository.path}${revision ? chalk.dim(` (${revision})`) : ""}`,
  );
  console.log(`   ${chalk.dim("Output:")} ${outcome.outputDir}`);
  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayProgramsSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Programs"));
  console.log(`   ${progressBar(stats.translatedPrograms, stats.totalPrograms)}`);

  console.log(statRow(chalk.cyan("◉"), "Discovered", stats.totalPrograms, chalk.cyan));
  console.log(statRow(chalk.green("◉"), "Translated", stats.translatedPrograms, chalk.green));

  if (stats.placeholderModels > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Placeholders", stats.placeholderModels, chalk.yellow),
    );
  }

  if (stats.skippedPrograms > 0) {
    console.log(statRow(chalk.yellow("◉"), "Skipped", stats.skippedPrograms, chalk.yellow));
  }

  if (stats.totalCopybooks > 0) {
    console.log(statRow(chalk.dim("◉"), "Copybooks", stats.totalCopybooks));
  }

  console.log(statRow(chalk.cyan("◉"), "Tests", stats.generatedTests, chalk.cyan));
}

function displayValidationSection(stats: ProcessingStats): void {
  const total = stats.validationPassed + stats.validationFailed;
  if (total === 0) {
    return;
  }

  console.log(sectionHeader("Validation"));
  console.log(`   ${progressBar(stats.validationPassed, total)}`);
  console.log(statRow(chalk.green("◉"), "Passed", stats.validationPassed, chalk.green));

  if (stats.validationFailed > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", stats.validationFailed, chalk.red));
  }
}

function displayIssuesSection(issues: Issue[], verbose?: boolean): void {
  if (issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.yellow("Issues")));

  const byReason = new Map<string, Issue[]>();
  for (const issue of issues) {
    const list = byReason.get(issue.reason) ?? [];
    list.push(issue);
    byReason.set(issue.reason, list);
  }

  for (const [reason, list] of byReason) {
    console.log(statRow(chalk.yellow("✖"), reason, list.length, chalk.yellow));
    if (!verbose) continue;

    for (const issue of list.slice(0, 5)) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
    if (list.length > 5) {
      console.log(`      ${chalk.dim(`  +${list.length - 5} more`)}`);
    }
  }
}
