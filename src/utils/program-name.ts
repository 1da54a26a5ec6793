import path from "node:path";
import type { ProgramDescriptor } from "../types";

/**
 * Resolve the name used for a program's class and output file:
 * declared name, then relative path stem, then absolute path stem
 *
 * @returns null when none of them yields a non-empty name
 */
export function resolveProgramName(
  program: Pick<ProgramDescriptor, "name" | "relativePath" | "path">,
): string | null {
  if (program.name) {
    return program.name;
  }

  for (const candidate of [program.relativePath, program.path]) {
    if (candidate) {
      const stem = path.parse(candidate).name;
      if (stem) return stem;
    }
  }

  return null;
}

/**
 * All keys a structural model may have been stored under for a program
 */
export function programLookupKeys(program: ProgramDescriptor): string[] {
  const keys = new Set<string>();

  const add = (value: string | undefined): void => {
    if (value) keys.add(value);
  };

  add(program.name);
  add(program.name?.toUpperCase());
  add(program.name?.toLowerCase());
  add(program.relativePath);
  if (program.relativePath) {
    add(path.basename(program.relativePath));
    add(path.parse(program.relativePath).name);
  }
  add(program.path);
  if (program.path) {
    add(path.basename(program.path));
    add(path.parse(program.path).name);
  }

  return [...keys];
}
