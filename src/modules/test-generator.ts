/**
 * Test Generator Module
 * Renders a JUnit 5 test class paired with every generated class
 */

import { join } from "path";
import { placeholderModel } from "./analyzer";
import { buildFields } from "./generator";
import { loadTestTemplate } from "../templates";
import { writeTextFile } from "../utils";
import type {
  ArtifactMap,
  StageContext,
  StageResult,
  StructuralModel,
  TestArtifactMap,
  TestGenerationPayload,
  TestGenerator,
  TestTemplateContext,
} from "../types";

export async function generateTests(
  ctx: StageContext,
  artifacts: ArtifactMap,
  models: Map<string, StructuralModel>,
): Promise<StageResult<TestGenerationPayload>> {
  const { config, tracker, logger } = ctx;
  const testDir = join(ctx.outputDir, config.output.testDirectory);
  const tests: TestArtifactMap = new Map();

  const template = await loadTestTemplate(config.generator.templates);

  for (const [programName, artifact] of artifacts) {
    const model = models.get(programName) ?? placeholderModel(programName);
    const testClassName = `${artifact.className}${config.output.testSuffix}`;

    try {
      const context: TestTemplateContext = {
        packageName: artifact.packageName,
        className: artifact.className,
        testClassName,
        fields: buildFields(model, config.generator.reservedPrefixes),
      };
      const outputPath = join(testDir, `${testClassName}${config.output.extension}`);

      await writeTextFile(outputPath, template(context));

      tests.set(programName, { programName, path: outputPath, className: testClassName });
      tracker.incrementTests();
    } catch (error) {
      logger.error(`Failed to generate tests for ${programName}`, error);
      tracker.trackProgramIssue(
        artifact.sourcePath ?? programName,
        "test-generation-error",
        error,
      );
    }
  }

  logger.info(`Generated ${tests.size} test classes`);

  return {
    success: true,
    payload: { tests, testsGenerated: tests.size },
  };
}

export const junitTestGenerator: TestGenerator = { generate: generateTests };
