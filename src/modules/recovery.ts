/**
 * Recovery Module
 * Rebuilds artifact maps from a job's output directory
 */

import glob from "fast-glob";
import path from "node:path";
import type {
  ArtifactMap,
  ConversionConfig,
  TestArtifactMap,
} from "../types";

async function listByExtension(directory: string, extension: string): Promise<string[]> {
  const files = await glob(`*${extension}`, {
    cwd: directory,
    absolute: true,
    onlyFiles: true,
  });
  return files.sort();
}

/**
 * Re-scan the generated source directory. Class name and program name are
 * the file stem; files ending in the test suffix are left out.
 */
export async function recoverArtifacts(
  jobOutputDir: string,
  config: Pick<ConversionConfig, "output" | "generator">,
): Promise<ArtifactMap> {
  const { sourceDirectory, extension, testSuffix } = config.output;
  const artifacts: ArtifactMap = new Map();

  const files = await listByExtension(path.join(jobOutputDir, sourceDirectory), extension);

  for (const file of files) {
    const className = path.basename(file, extension);
    if (testSuffix && className.endsWith(testSuffix)) continue;

    artifacts.set(className, {
      programName: className,
      path: file,
      className,
      packageName: config.generator.packageName,
      recovered: true,
    });
  }

  return artifacts;
}

/**
 * Re-scan the generated test directory, keyed by the class under test
 */
export async function recoverTestArtifacts(
  jobOutputDir: string,
  config: Pick<ConversionConfig, "output">,
): Promise<TestArtifactMap> {
  const { testDirectory, extension, testSuffix } = config.output;
  const tests: TestArtifactMap = new Map();

  const files = await listByExtension(path.join(jobOutputDir, testDirectory), extension);

  for (const file of files) {
    const className = path.basename(file, extension);
    if (!className.endsWith(testSuffix)) continue;

    const programName = className.slice(0, className.length - testSuffix.length);
    if (!programName) continue;

    tests.set(programName, { programName, path: file, className });
  }

  return tests;
}
