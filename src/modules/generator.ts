/**
 * Generator Module
 * Renders one Java class per program from its structural model
 */

import { join } from "path";
import { placeholderModel } from "./analyzer";
import { loadClassTemplate } from "../templates";
import {
  capitalize,
  fieldInitializer,
  javaType,
  mapIdentifier,
  programLookupKeys,
  resolveProgramName,
  sampleValue,
  saveJson,
  toJavaIdentifier,
  writeTextFile,
} from "../utils";
import type {
  ArtifactMap,
  ClassTemplateContext,
  ConversionConfig,
  FieldTemplateContext,
  GeneratedArtifact,
  GenerationPayload,
  MethodTemplateContext,
  ProgramDescriptor,
  StageContext,
  StageResult,
  StructuralModel,
} from "../types";

// Members of the generated skeleton; data items and procedures never take these names
const SKELETON_MEMBERS = ["main", "execute", "mainLogic", "logger"];

export const ARTIFACTS_FILE = "artifacts.json";

/**
 * Return `name`, or `name2`, `name3`... when already taken
 */
function claimName(name: string, used: Set<string>): string {
  let candidate = name;
  let counter = 2;
  while (used.has(candidate)) {
    candidate = `${name}${counter++}`;
  }
  used.add(candidate);
  return candidate;
}

export function buildFields(
  model: StructuralModel,
  reservedPrefixes: readonly string[],
): FieldTemplateContext[] {
  const used = new Set<string>(SKELETON_MEMBERS);

  return model.dataItems.map((item) => {
    const name = claimName(mapIdentifier(item.name, reservedPrefixes), used);
    return {
      sourceName: item.name,
      level: item.level,
      name,
      type: javaType(item.inferredType),
      initializer: fieldInitializer(item),
      accessorSuffix: capitalize(name),
      sample: sampleValue(item.inferredType),
    };
  });
}

/**
 * Stub methods share a namespace with the skeleton and with `taken`
 * (the accessor names)
 */
export function buildMethods(
  model: StructuralModel,
  reservedPrefixes: readonly string[],
  taken: Iterable<string> = [],
): MethodTemplateContext[] {
  const used = new Set<string>([...SKELETON_MEMBERS, ...taken]);

  return model.procedures.map((procedure) => ({
    sourceName: procedure.name,
    name: claimName(mapIdentifier(procedure.name, reservedPrefixes), used),
  }));
}

/**
 * Assemble everything the class template needs for one program
 */
export function buildClassContext(
  className: string,
  model: StructuralModel,
  config: Pick<ConversionConfig, "generator">,
  program?: Pick<ProgramDescriptor, "relativePath">,
): ClassTemplateContext {
  const { packageName, reservedPrefixes, targetStack } = config.generator;
  const fields = buildFields(model, reservedPrefixes);
  const accessors = fields.flatMap((f) => [`get${f.accessorSuffix}`, `set${f.accessorSuffix}`]);

  return {
    packageName,
    className,
    programId: model.programId,
    sourceRelativePath: program?.relativePath || undefined,
    targetStack,
    divisions: model.divisions,
    fields,
    methods: buildMethods(model, reservedPrefixes, accessors),
    procedureNames: model.procedures.map((p) => p.name),
    fileControls: model.fileControls,
  };
}

function findModel(
  program: ProgramDescriptor,
  models: Map<string, StructuralModel>,
): StructuralModel | undefined {
  for (const key of programLookupKeys(program)) {
    const model = models.get(key);
    if (model) return model;
  }
  return undefined;
}

/**
 * Generation stage: write `<outputDir>/<sourceDirectory>/<program><extension>`
 * for every program with a resolvable name.
 */
export async function generate(
  ctx: StageContext,
  programs: ProgramDescriptor[],
  models: Map<string, StructuralModel>,
): Promise<StageResult<GenerationPayload>> {
  const { config, tracker, logger } = ctx;
  const sourceDir = join(ctx.outputDir, config.output.sourceDirectory);
  const artifacts: ArtifactMap = new Map();
  let skippedCount = 0;

  // A broken user template is fatal for the stage
  const template = await loadClassTemplate(config.generator.templates);

  for (const program of programs) {
    const programName = resolveProgramName(program);

    if (!programName) {
      logger.warn("Skipping program with no resolvable name");
      tracker.trackProgramIssue("(unnamed)", "unresolved-name");
      tracker.incrementSkipped();
      skippedCount++;
      continue;
    }

    let model = findModel(program, models);
    if (!model) {
      logger.warn(`No structural data for ${programName}; generating placeholder structure`);
      tracker.trackProgramIssue(program.path || programName, "no-model");
      tracker.incrementPlaceholders();
      model = placeholderModel(programName);
    }

    // A legal Java identifier passes through unchanged
    const className = toJavaIdentifier(programName);

    try {
      const context = buildClassContext(className, model, config, program);
      const outputPath = join(sourceDir, `${className}${config.output.extension}`);

      await writeTextFile(outputPath, template(context));

      const artifact: GeneratedArtifact = {
        programName,
        path: outputPath,
        className,
        packageName: config.generator.packageName,
        sourcePath: program.path || undefined,
        sourceRelativePath: program.relativePath || undefined,
        recordId: program.recordId,
      };
      artifacts.set(programName, artifact);
      tracker.incrementTranslated();

      logger.debug(`Translated ${programName} -> ${outputPath}`);
    } catch (error) {
      logger.error(`Failed to translate ${programName}`, error);
      tracker.trackProgramIssue(program.path || programName, "generation-error", error);
    }
  }

  await saveJson(
    join(ctx.outputDir, ARTIFACTS_FILE),
    Object.fromEntries(artifacts),
  );

  logger.info(`Generated ${artifacts.size} classes (${skippedCount} skipped)`);

  return {
    success: true,
    payload: {
      artifacts,
      sourceDir,
      translatedCount: artifacts.size,
      skippedCount,
    },
  };
}
