/**
 * Scanner Module
 * Discovers COBOL programs and copybooks in a checked-out repository
 */

import glob from "fast-glob";
import path from "node:path";
import { stat } from "fs/promises";
import { fileExists, readSourceText } from "../utils";
import type {
  CopybookDescriptor,
  DiscoveryPayload,
  InputConfig,
  JobRequest,
  ProgramDescriptor,
  ProgramDiscovery,
  StageContext,
  StageResult,
} from "../types";

const COPY_PATTERN = /(?:^|\s)COPY\s+([^\s.]+)/i;

function hasExtension(file: string, extensions: readonly string[]): boolean {
  const lower = file.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext.toLowerCase()));
}

/**
 * Count lines that contain anything besides whitespace
 */
export function countLines(source: string): number {
  return source.split(/\r?\n/).filter((line) => line.trim().length > 0).length;
}

/**
 * Names referenced by COPY statements, upper-cased, in order of appearance
 */
export function extractCopybooks(source: string): string[] {
  const names: string[] = [];

  for (const line of source.split(/\r?\n/)) {
    const match = line.match(COPY_PATTERN);
    if (match) {
      names.push(match[1].replace(/['"]/g, "").toUpperCase());
    }
  }

  return names;
}

/**
 * Whether a program passes the optional `selectedPrograms` allow-list
 */
export function isSelected(
  relativePath: string,
  selectedPrograms: readonly string[] | undefined,
): boolean {
  if (!selectedPrograms || selectedPrograms.length === 0) return true;

  const wanted = new Set(selectedPrograms.map((p) => p.toLowerCase()));
  return (
    wanted.has(relativePath.toLowerCase()) ||
    wanted.has(path.basename(relativePath).toLowerCase())
  );
}

async function listFiles(
  repoPath: string,
  extensions: readonly string[],
  input: Readonly<InputConfig>,
): Promise<string[]> {
  const files = await glob("**/*", {
    cwd: repoPath,
    absolute: true,
    onlyFiles: true,
    dot: false,
    ignore: [...input.ignore],
  });

  return files.filter((file) => hasExtension(file, extensions)).sort();
}

function toRelative(repoPath: string, file: string): string {
  return path.relative(repoPath, file).split(path.sep).join("/");
}

/**
 * Discovery stage: walk the repository and describe every program
 *
 * Returns a failure when the repository directory does not exist.
 */
export async function scan(
  ctx: StageContext,
  request: JobRequest,
): Promise<StageResult<DiscoveryPayload>> {
  const { config, tracker, logger } = ctx;
  const repoPath = path.resolve(request.repoPath);

  if (!(await fileExists(repoPath))) {
    return { success: false, error: `Repository path does not exist: ${repoPath}` };
  }

  const programs: ProgramDescriptor[] = [];
  for (const file of await listFiles(repoPath, config.input.extensions, config.input)) {
    const relativePath = toRelative(repoPath, file);
    if (!isSelected(relativePath, config.input.selectedPrograms)) continue;

    const extension = path.extname(file);
    const program: ProgramDescriptor = {
      path: file,
      relativePath,
      name: path.basename(file, extension),
      extension,
      sizeBytes: 0,
      linesOfCode: 0,
      copybooks: [],
    };

    // An unreadable program is still listed; analysis falls back to a placeholder
    try {
      program.sizeBytes = (await stat(file)).size;
      const source = await readSourceText(file);
      program.linesOfCode = countLines(source);
      program.copybooks = extractCopybooks(source);
    } catch (error) {
      logger.warn(`Cannot read ${relativePath}`);
      tracker.trackProgramIssue(file, "read-error", error);
    }

    programs.push(program);
  }

  const copybooks: CopybookDescriptor[] = [];
  for (const file of await listFiles(repoPath, config.input.copybookExtensions, config.input)) {
    const info = await stat(file);
    copybooks.push({
      path: file,
      relativePath: toRelative(repoPath, file),
      name: path.basename(file, path.extname(file)),
      sizeBytes: info.size,
    });
  }

  programs.sort((a, b) => a.relativePath.localeCompare(b.relativePath));

  logger.info(`Found ${programs.length} programs and ${copybooks.length} copybooks`);

  return {
    success: true,
    payload: { repoPath, programs, copybooks },
  };
}

export const fileSystemDiscovery: ProgramDiscovery = { discover: scan };
