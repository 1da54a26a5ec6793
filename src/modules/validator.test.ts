import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { checkSource, validate, validateSource } from "./validator";
import { Logger, Tracker, loadDefaultConfig } from "../utils";
import type { ArtifactMap, StageContext, TestArtifactMap } from "../types";

const VALID_CLASS = [
  "package com.example;",
  "",
  "public class Calc {",
  "    public void run() {",
  '        System.out.println("ok");',
  "    }",
  "}",
].join("\n");

const VALID_TEST = [
  "package com.example;",
  "",
  "public class CalcTest {",
  "    public void runs() {",
  "        new Calc().run();",
  "    }",
  "}",
].join("\n");

describe("checkSource", () => {
  it("accepts a well-formed class", () => {
    expect(checkSource(VALID_CLASS)).toEqual([]);
    expect(validateSource(VALID_CLASS)).toBe(true);
  });

  it("reports a missing package declaration", () => {
    expect(checkSource("public class Calc {}")).toEqual(["missing package declaration"]);
  });

  it("reports a missing class declaration", () => {
    expect(checkSource("package a;\n")).toEqual(["missing class declaration"]);
  });

  it("reports unbalanced brackets", () => {
    expect(checkSource("package a;\nclass A {")).toEqual(["unbalanced braces"]);
    expect(checkSource("package a;\nclass A { void f( {} }")).toEqual([
      "unbalanced parentheses",
    ]);
  });
});

describe("validate", () => {
  let dir: string;
  let tracker: Tracker;
  let ctx: StageContext;

  async function artifact(name: string, content: string): Promise<string> {
    const path = join(dir, `${name}.java`);
    await writeFile(path, content);
    return path;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "validator-"));
    tracker = new Tracker();
    ctx = {
      jobId: "job-1",
      config: await loadDefaultConfig(),
      tracker,
      logger: new Logger("silent"),
      outputDir: dir,
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("passes a program whose class and test are both valid", async () => {
    const artifacts: ArtifactMap = new Map([
      [
        "CALC",
        {
          programName: "CALC",
          path: await artifact("Calc", VALID_CLASS),
          className: "Calc",
          packageName: "com.example",
        },
      ],
    ]);
    const tests: TestArtifactMap = new Map([
      [
        "CALC",
        { programName: "CALC", path: await artifact("CalcTest", VALID_TEST), className: "CalcTest" },
      ],
    ]);

    const result = await validate(ctx, artifacts, tests);

    expect(result.success).toBe(true);
    expect(result.payload?.results.get("CALC")).toEqual({
      syntaxValid: true,
      pairedTestSyntaxValid: true,
      compilable: true,
      testResults: { passed: true, failed: false, errors: [] },
    });
    expect(result.payload?.summary).toEqual({
      totalPrograms: 1,
      passed: 1,
      failed: 0,
      passRate: 100,
    });
  });

  it("fails the only program when its package is missing", async () => {
    const artifacts: ArtifactMap = new Map([
      [
        "CALC",
        {
          programName: "CALC",
          path: await artifact("Calc", "public class Calc {}"),
          className: "Calc",
          packageName: "com.example",
        },
      ],
    ]);
    const tests: TestArtifactMap = new Map([
      [
        "CALC",
        { programName: "CALC", path: await artifact("CalcTest", VALID_TEST), className: "CalcTest" },
      ],
    ]);

    const result = await validate(ctx, artifacts, tests);

    expect(result.success).toBe(false);
    const calc = result.payload?.results.get("CALC");
    expect(calc?.syntaxValid).toBe(false);
    expect(calc?.compilable).toBe(false);
    expect(calc?.pairedTestSyntaxValid).toBe(true);
    expect(calc?.testResults.errors).toEqual(["missing package declaration"]);
    expect(tracker.getStats().validationFailed).toBe(1);
  });

  it("fails a program without a paired test", async () => {
    const artifacts: ArtifactMap = new Map([
      [
        "CALC",
        {
          programName: "CALC",
          path: await artifact("Calc", VALID_CLASS),
          className: "Calc",
          packageName: "com.example",
        },
      ],
    ]);

    const result = await validate(ctx, artifacts, new Map());

    const calc = result.payload?.results.get("CALC");
    expect(calc?.syntaxValid).toBe(true);
    expect(calc?.pairedTestSyntaxValid).toBe(false);
    expect(calc?.testResults.passed).toBe(false);
    expect(result.success).toBe(false);
  });

  it("succeeds once one program passes", async () => {
    const artifacts: ArtifactMap = new Map([
      [
        "GOOD",
        {
          programName: "GOOD",
          path: await artifact("Good", VALID_CLASS),
          className: "Good",
          packageName: "com.example",
        },
      ],
      [
        "BAD",
        {
          programName: "BAD",
          path: join(dir, "Missing.java"),
          className: "Bad",
          packageName: "com.example",
        },
      ],
    ]);
    const tests: TestArtifactMap = new Map([
      [
        "GOOD",
        { programName: "GOOD", path: await artifact("GoodTest", VALID_TEST), className: "GoodTest" },
      ],
    ]);

    const result = await validate(ctx, artifacts, tests);

    expect(result.success).toBe(true);
    expect(result.payload?.passed).toBe(1);
    expect(result.payload?.failed).toBe(1);
    expect(result.payload?.summary.passRate).toBe(50);
    expect(result.payload?.results.get("BAD")?.syntaxValid).toBe(false);
  });

  it("counts an expected program without an artifact as failed", async () => {
    const artifacts: ArtifactMap = new Map([
      [
        "CALC",
        {
          programName: "CALC",
          path: await artifact("Calc", VALID_CLASS),
          className: "Calc",
          packageName: "com.example",
        },
      ],
    ]);
    const tests: TestArtifactMap = new Map([
      [
        "CALC",
        { programName: "CALC", path: await artifact("CalcTest", VALID_TEST), className: "CalcTest" },
      ],
    ]);

    const result = await validate(ctx, artifacts, tests, ["CALC", "PAY"]);

    expect(result.success).toBe(true);
    expect(result.payload?.summary).toEqual({
      totalPrograms: 2,
      passed: 1,
      failed: 1,
      passRate: 50,
    });
    expect(result.payload?.results.get("PAY")).toEqual({
      syntaxValid: false,
      pairedTestSyntaxValid: false,
      compilable: false,
      testResults: { passed: false, failed: true, errors: ["no generated class"] },
    });
    expect(tracker.getIssues("program")).toEqual([
      { type: "program", path: "PAY", reason: "missing-artifact" },
    ]);
    expect(tracker.getStats().validationFailed).toBe(1);
  });

  it("reports zero programs as a failure", async () => {
    const result = await validate(ctx, new Map(), new Map());

    expect(result.success).toBe(false);
    expect(result.payload?.summary.passRate).toBe(0);
  });
});
