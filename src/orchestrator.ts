/**
 * Orchestrator - Pipeline driver and job state machine owner
 * Runs the stages in sequence and publishes progress with zero business logic
 */

import { join } from "path";
import { StageError } from "./errors";
import { InMemoryJobStore, type JobStore } from "./job/job-store";
import { canTransition } from "./job/state-machine";
import { IdGenerator, Logger, Tracker, resolveProgramName } from "./utils";
import * as modules from "./modules";
import { STAGE_CHECKPOINTS } from "./types";
import type {
  ArtifactEnhancer,
  ArtifactMap,
  ConfigError,
  ConversionConfig,
  JobMetrics,
  JobOutcome,
  JobRequest,
  PipelineStage,
  ProgramDiscovery,
  RepositoryRef,
  StageContext,
  StageResult,
  TestArtifactMap,
  TestGenerator,
  ValidationResult,
} from "./types";

export const REPORT_FILE = "report.json";

export interface OrchestratorOptions {
  store?: JobStore;
  discovery?: ProgramDiscovery;
  testGenerator?: TestGenerator;
  enhancers?: ArtifactEnhancer[];
  logger?: Logger;
  idGenerator?: IdGenerator;
  // Recorded as resource issues on every job's report
  configErrors?: ConfigError[];
}

export class Orchestrator {
  readonly store: JobStore;
  private discovery: ProgramDiscovery;
  private testGenerator: TestGenerator;
  private enhancers: ArtifactEnhancer[];
  private logger: Logger;
  private idGenerator: IdGenerator;
  private configErrors: ConfigError[];

  constructor(
    private config: Readonly<ConversionConfig>,
    options: OrchestratorOptions = {},
  ) {
    this.store = options.store ?? new InMemoryJobStore();
    this.discovery = options.discovery ?? modules.fileSystemDiscovery;
    this.testGenerator = options.testGenerator ?? modules.junitTestGenerator;
    this.enhancers = options.enhancers ?? [];
    this.logger = options.logger ?? new Logger(config.logging.level);
    this.idGenerator = options.idGenerator ?? new IdGenerator(config.ids.length);
    this.configErrors = options.configErrors ?? [];
  }

  /**
   * Register a pending job so callers can subscribe before it runs
   */
  createJob(jobId?: string): string {
    const id = jobId ?? this.idGenerator.generate();
    this.idGenerator.register(id);
    this.store.create(id);
    return id;
  }

  /**
   * Run one job end to end. Stage failures never throw: they end in a
   * failed job, reported in the outcome.
   *
   * Throws when `request.jobId` names a job that is no longer pending.
   */
  async run(request: JobRequest): Promise<JobOutcome> {
    const existing = request.jobId ? this.store.get(request.jobId) : undefined;
    if (existing && existing.status !== "pending") {
      throw new Error(`Job ${existing.jobId} has already run (status: ${existing.status})`);
    }
    const jobId = existing ? existing.jobId : this.createJob(request.jobId);

    const repository: RepositoryRef = { path: request.repoPath };
    if (request.branch) repository.branch = request.branch;
    if (request.commitHash) repository.commitHash = request.commitHash;

    const tracker = new Tracker();
    tracker.setRepository(repository);
    for (const err of this.configErrors) {
      tracker.trackResourceError(err.path, err.error);
    }

    const ctx: StageContext = {
      jobId,
      config: this.withStack(request.targetStack),
      tracker,
      logger: this.logger.child(jobId),
      outputDir: join(this.config.output.directory, jobId),
    };

    let artifacts: ArtifactMap = new Map();
    let tests: TestArtifactMap = new Map();
    let validation = new Map<string, ValidationResult>();

    try {
      this.store.apply(jobId, { status: "running", progress: 0 });
      ctx.logger.info(
        `Starting migration of ${request.repoPath}` +
          (repository.branch ? ` (${repository.branch})` : "") +
          (repository.commitHash ? ` at ${repository.commitHash}` : ""),
      );

      this.checkpoint(jobId, "discovery");
      const discovery = this.expect(
        "discovery",
        await this.discovery.discover(ctx, request),
      );
      tracker.setTotalPrograms(discovery.programs.length);
      tracker.setTotalCopybooks(discovery.copybooks.length);

      this.checkpoint(jobId, "extraction");
      const extraction = this.expect(
        "extraction",
        await modules.extract(ctx, discovery.programs),
      );

      this.checkpoint(jobId, "generation");
      const generation = this.expect(
        "generation",
        await modules.generate(ctx, discovery.programs, extraction.models),
      );
      artifacts = generation.artifacts;

      await modules.enhance(ctx, artifacts, this.enhancers);

      this.checkpoint(jobId, "test-generation");
      if (artifacts.size === 0) {
        artifacts = await modules.recoverArtifacts(ctx.outputDir, ctx.config);
        if (artifacts.size > 0) {
          ctx.logger.warn(`Recovered ${artifacts.size} artifacts from ${ctx.outputDir}`);
        }
      }
      const testing = this.expect(
        "test-generation",
        await this.testGenerator.generate(ctx, artifacts, extraction.models),
      );
      tests = testing.tests;
      if (tests.size === 0 && artifacts.size > 0) {
        tests = await this.recoverTests(ctx, artifacts);
      }

      this.checkpoint(jobId, "validation");
      const expected = discovery.programs.flatMap((program) => {
        const name = resolveProgramName(program);
        return name ? [name] : [];
      });
      const validated = await modules.validate(ctx, artifacts, tests, expected);
      if (!validated.success) {
        // Advisory: reported, never fatal
        ctx.logger.warn(`Validation did not pass: ${validated.error}`);
      }
      validation = validated.payload?.results ?? new Map();

      const metrics: JobMetrics = {
        programsDiscovered: discovery.programs.length,
        programsTranslated: generation.translatedCount,
        programsSkipped: generation.skippedCount,
        testsGenerated: testing.testsGenerated,
        validationPassed: validated.payload?.passed ?? 0,
        validationFailed: validated.payload?.failed ?? 0,
        validationSuccess: validated.success,
      };

      this.store.apply(jobId, {
        status: "completed",
        progress: 100,
        currentStage: null,
        metrics,
      });
      ctx.logger.info("Migration completed");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      ctx.logger.error(`Migration failed: ${message}`, error);

      const current = this.store.get(jobId);
      if (!current || !canTransition(current.status, "failed")) {
        throw error;
      }
      this.store.apply(jobId, {
        status: "failed",
        errorMessage: message || "Unknown error",
      });
    }

    await this.writeReport(ctx, validation);

    const state = this.store.get(jobId);
    if (!state) {
      throw new Error(`Unknown job: ${jobId}`);
    }

    return {
      jobId,
      success: state.status === "completed",
      error: state.errorMessage ?? undefined,
      state,
      repository,
      outputDir: ctx.outputDir,
      artifacts,
      tests,
      validation,
      stats: tracker.getStats(),
    };
  }

  private checkpoint(jobId: string, stage: PipelineStage): void {
    this.store.apply(jobId, {
      status: "running",
      progress: STAGE_CHECKPOINTS[stage],
      currentStage: stage,
    });
  }

  private expect<T>(stage: PipelineStage, result: StageResult<T>): T {
    if (!result.success) {
      throw new StageError(stage, result.error);
    }
    return result.payload;
  }

  /**
   * Rebuild the test map from the job's test directory, paired with
   * artifacts by class name
   */
  private async recoverTests(
    ctx: StageContext,
    artifacts: ArtifactMap,
  ): Promise<TestArtifactMap> {
    const recovered = await modules.recoverTestArtifacts(ctx.outputDir, ctx.config);
    const tests: TestArtifactMap = new Map();

    for (const [programName, artifact] of artifacts) {
      const test = recovered.get(artifact.className);
      if (test) tests.set(programName, { ...test, programName });
    }

    if (tests.size > 0) {
      ctx.logger.warn(`Recovered ${tests.size} test artifacts from ${ctx.outputDir}`);
    }
    return tests;
  }

  private withStack(targetStack?: string): Readonly<ConversionConfig> {
    if (!targetStack || targetStack === this.config.generator.targetStack) {
      return this.config;
    }
    return Object.freeze({
      ...this.config,
      generator: Object.freeze({ ...this.config.generator, targetStack }),
    });
  }

  private async writeReport(
    ctx: StageContext,
    validation: Map<string, ValidationResult>,
  ): Promise<void> {
    const reportPath = join(ctx.outputDir, REPORT_FILE);
    try {
      await ctx.tracker.exportReport(reportPath, validation);
    } catch (error) {
      ctx.logger.warn(`Could not write job report to ${reportPath}`);
      ctx.logger.debug(String(error));
    }
  }
}
