/**
 * Enhancers Module
 * Runs optional post-generation enhancers over every generated class
 */

import { readSourceText, writeTextFile } from "../utils";
import type { ArtifactEnhancer, ArtifactMap, StageContext } from "../types";

/**
 * Apply each enhancer, in order, to each artifact. A returned string
 * replaces the file on disk and is what the next enhancer sees.
 *
 * Failures are recorded on the tracker and never propagate.
 */
export async function enhance(
  ctx: StageContext,
  artifacts: ArtifactMap,
  enhancers: readonly ArtifactEnhancer[],
): Promise<void> {
  if (enhancers.length === 0) return;

  const { tracker, logger } = ctx;

  for (const artifact of artifacts.values()) {
    let source: string;
    try {
      source = await readSourceText(artifact.path);
    } catch (error) {
      tracker.trackProgramIssue(artifact.path, "enhancer-error", error);
      continue;
    }

    for (const enhancer of enhancers) {
      try {
        const updated = await enhancer.enhance(artifact, source);
        if (updated === undefined || updated === source) continue;

        await writeTextFile(artifact.path, updated);
        source = updated;
        logger.debug(`${enhancer.name} updated ${artifact.programName}`);
      } catch (error) {
        logger.warn(`${enhancer.name} failed for ${artifact.programName}`);
        tracker.trackProgramIssue(artifact.path, "enhancer-error", error);
      }
    }
  }
}
