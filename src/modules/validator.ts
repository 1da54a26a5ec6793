/**
 * Validator Module
 * Structural sanity checks on generated Java sources
 *
 * Not a compiler: counts are textual, so brackets inside literals or
 * comments are counted too.
 */

import { readSourceText } from "../utils";
import type {
  ArtifactMap,
  StageContext,
  StageResult,
  TestArtifactMap,
  ValidationPayload,
  ValidationResult,
} from "../types";

interface SourceCheck {
  description: string;
  test: (source: string) => boolean;
}

function count(source: string, ch: string): number {
  return source.split(ch).length - 1;
}

const SOURCE_CHECKS: SourceCheck[] = [
  {
    description: "missing class declaration",
    test: (source) => /\b(?:class|interface|enum|record)\s+[A-Za-z_$][\w$]*/.test(source),
  },
  {
    description: "unbalanced braces",
    test: (source) => count(source, "{") === count(source, "}"),
  },
  {
    description: "unbalanced parentheses",
    test: (source) => count(source, "(") === count(source, ")"),
  },
  {
    description: "missing package declaration",
    test: (source) => /^\s*package\s+[\w.]+\s*;/m.test(source),
  },
];

/**
 * Run every structural check against a source text
 *
 * @returns descriptions of the failed checks; empty when the source is valid
 */
export function checkSource(source: string): string[] {
  return SOURCE_CHECKS.filter((check) => !check.test(source)).map(
    (check) => check.description,
  );
}

export function validateSource(source: string): boolean {
  return checkSource(source).length === 0;
}

const MISSING_ARTIFACT = "no generated class";

async function checkFile(path: string): Promise<string[]> {
  try {
    return checkSource(await readSourceText(path));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return [`cannot read ${path}: ${message}`];
  }
}

/**
 * Validation stage. A program passes when both its class and its paired
 * test pass; the stage succeeds when at least `validation.minPassed`
 * programs pass.
 *
 * Names in `expected` without an artifact count as failed.
 */
export async function validate(
  ctx: StageContext,
  artifacts: ArtifactMap,
  tests: TestArtifactMap,
  expected: readonly string[] = [],
): Promise<StageResult<ValidationPayload>> {
  const { config, tracker, logger } = ctx;
  const results = new Map<string, ValidationResult>();
  let passed = 0;
  let failed = 0;

  logger.info(`Validating ${artifacts.size} generated classes`);

  for (const [programName, artifact] of artifacts) {
    const sourceErrors = await checkFile(artifact.path);
    const syntaxValid = sourceErrors.length === 0;

    const test = tests.get(programName);
    const testErrors = test
      ? (await checkFile(test.path)).map((e) => `test: ${e}`)
      : ["no paired test"];
    const pairedTestSyntaxValid = testErrors.length === 0;

    const ok = syntaxValid && pairedTestSyntaxValid;
    results.set(programName, {
      syntaxValid,
      pairedTestSyntaxValid,
      compilable: syntaxValid,
      testResults: {
        passed: ok,
        failed: !ok,
        errors: [...sourceErrors, ...testErrors],
      },
    });

    if (ok) {
      passed++;
      tracker.incrementValidationPassed();
    } else {
      failed++;
      tracker.incrementValidationFailed();
      tracker.trackProgramIssue(
        artifact.path,
        "syntax-invalid",
        [...sourceErrors, ...testErrors].join("; "),
      );
    }

    logger.debug(
      `Validation for ${programName}: syntax=${syntaxValid ? "valid" : "invalid"}, test_syntax=${pairedTestSyntaxValid ? "valid" : "invalid"}`,
    );
  }

  for (const programName of new Set(expected)) {
    if (artifacts.has(programName)) continue;

    logger.warn(`No generated class for ${programName}; counted as failed`);
    results.set(programName, {
      syntaxValid: false,
      pairedTestSyntaxValid: false,
      compilable: false,
      testResults: { passed: false, failed: true, errors: [MISSING_ARTIFACT] },
    });
    failed++;
    tracker.incrementValidationFailed();
    tracker.trackProgramIssue(programName, "missing-artifact");
  }

  const total = results.size;
  const payload: ValidationPayload = {
    results,
    passed,
    failed,
    summary: {
      totalPrograms: total,
      passed,
      failed,
      passRate: total > 0 ? (passed / total) * 100 : 0,
    },
  };

  if (passed < config.validation.minPassed) {
    return {
      success: false,
      error: `${passed} of ${total} programs passed validation (minimum ${config.validation.minPassed})`,
      payload,
    };
  }

  return { success: true, payload };
}
