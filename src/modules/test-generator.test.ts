import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { analyzeSource } from "./analyzer";
import { generateTests } from "./test-generator";
import { validateSource } from "./validator";
import { Logger, Tracker, loadDefaultConfig } from "../utils";
import type { ArtifactMap, StageContext } from "../types";

const CALC_SOURCE = [
  "       PROGRAM-ID. CALC.",
  "       WORKING-STORAGE SECTION.",
  "       01 WS-RESULT PIC 9(6) VALUE ZERO.",
  "       01 WS-RATE PIC 9V99.",
].join("\n");

describe("generateTests", () => {
  let dir: string;
  let tracker: Tracker;
  let ctx: StageContext;
  let artifacts: ArtifactMap;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "test-generator-"));
    tracker = new Tracker();
    ctx = {
      jobId: "job-1",
      config: await loadDefaultConfig(),
      tracker,
      logger: new Logger("silent"),
      outputDir: dir,
    };
    artifacts = new Map([
      [
        "CALC",
        {
          programName: "CALC",
          path: join(dir, "java", "CALC.java"),
          className: "CALC",
          packageName: "com.example.migration.cobol",
        },
      ],
    ]);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes a paired test class per artifact", async () => {
    const models = new Map([["CALC", analyzeSource(CALC_SOURCE)]]);
    const result = await generateTests(ctx, artifacts, models);

    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.payload.testsGenerated).toBe(1);
    expect(result.payload.tests.get("CALC")).toEqual({
      programName: "CALC",
      path: join(dir, "tests", "CALCTest.java"),
      className: "CALCTest",
    });
    expect(tracker.getStats().generatedTests).toBe(1);
  });

  it("round-trips every field through its accessors", async () => {
    const models = new Map([["CALC", analyzeSource(CALC_SOURCE)]]);
    await generateTests(ctx, artifacts, models);

    const output = await readFile(join(dir, "tests", "CALCTest.java"), "utf-8");
    const lines = output.split("\n");

    expect(lines).toContain("public class CALCTest {");
    expect(lines).toContain("        program.setWsResult(1);");
    expect(lines).toContain("        assertEquals(1, program.getWsResult());");
    expect(lines).toContain('        program.setWsRate(new BigDecimal("1"));');
    expect(validateSource(output)).toBe(true);
  });

  it("writes an execute-only test when no model exists", async () => {
    await generateTests(ctx, artifacts, new Map());

    const output = await readFile(join(dir, "tests", "CALCTest.java"), "utf-8");
    expect(output).toContain("    public void executeRunsWithoutErrors() {");
    expect(output).not.toContain("AccessorsRoundTrip");
    expect(validateSource(output)).toBe(true);
  });
});
