/**
 * Migrate command - Loads config and runs one migration job
 */

import ora from "ora";
import { z } from "zod";
import { Orchestrator } from "../../orchestrator";
import { loadConfig, Logger } from "../../utils";
import * as modules from "../../modules";
import type { PartialConversionConfig, PipelineStage } from "../../types";

const MigrateOptionsSchema = z.object({
  output: z.string().optional(),
  config: z.string().optional(),
  stack: z.string().optional(),
  package: z.string().optional(),
  jobId: z.string().optional(),
  select: z.array(z.string()).optional(),
  branch: z.string().optional(),
  commit: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof MigrateOptionsSchema>;

const STAGE_LABELS: Record<PipelineStage, string> = {
  discovery: "Discovering programs...",
  extraction: "Analyzing programs...",
  generation: "Generating Java classes...",
  "test-generation": "Generating tests...",
  validation: "Validating output...",
};

function toOverrides(options: Options): PartialConversionConfig {
  const overrides: PartialConversionConfig = {};

  if (options.output) {
    overrides.output = { directory: options.output };
  }
  if (options.stack || options.package) {
    overrides.generator = {
      ...(options.stack ? { targetStack: options.stack } : {}),
      ...(options.package ? { packageName: options.package } : {}),
    };
  }
  if (options.select && options.select.length > 0) {
    overrides.input = { selectedPrograms: options.select };
  }
  if (options.verbose) {
    overrides.logging = { level: "debug" };
  }

  return overrides;
}

export async function migrateCommand(repo: string, opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = MigrateOptionsSchema.parse(opts);

    // Load configuration (default → user → custom → CLI)
    const { config, errors } = await loadConfig(options.config, toOverrides(options));

    // Log lines would tear the spinner; keep only warnings unless verbose
    const logger = new Logger(options.verbose ? config.logging.level : "warn");

    const orchestrator = new Orchestrator(config, { logger, configErrors: errors });
    const jobId = orchestrator.createJob(options.jobId);

    // Follow the job's stage on the spinner
    const unsubscribe = orchestrator.store.subscribe(jobId, (state) => {
      if (state.currentStage) {
        spinner.text = `${STAGE_LABELS[state.currentStage]} ${state.progress}%`;
      }
    });

    const outcome = await orchestrator.run({
      jobId,
      repoPath: repo,
      branch: options.branch,
      commitHash: options.commit,
      targetStack: options.stack,
    });
    unsubscribe();

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    modules.stats(outcome, options.verbose);

    if (!outcome.success) {
      process.exit(1);
    }
  } catch (error) {
    spinner.fail("Migration failed");
    console.error(error);
    process.exit(1);
  }
}
