import { describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  analyzeSource,
  extract,
  extractDataItems,
  extractDivisions,
  extractFileControls,
  extractProcedures,
  extractProgramId,
  normalizeSource,
  placeholderModel,
} from "./analyzer";
import { Logger, Tracker, loadDefaultConfig } from "../utils";
import type { ProgramDescriptor, StageContext } from "../types";

const CALC_SOURCE = [
  "       IDENTIFICATION DIVISION.",
  "       PROGRAM-ID. CALC.",
  "       DATA DIVISION.",
  "       WORKING-STORAGE SECTION.",
  "       01 WS-RESULT PIC 9(6) VALUE ZERO.",
  "       PROCEDURE DIVISION.",
  "       MAIN-PARA.",
  "           DISPLAY 'HELLO'.",
  "           STOP RUN.",
].join("\n");

function descriptor(path: string, name: string): ProgramDescriptor {
  return {
    path,
    relativePath: `${name}.cbl`,
    name,
    extension: ".cbl",
    sizeBytes: 0,
    linesOfCode: 0,
    copybooks: [],
  };
}

describe("analyzeSource", () => {
  it("extracts the structural model of a small program", () => {
    const model = analyzeSource(CALC_SOURCE);

    expect(model.programId).toBe("CALC");
    expect(model.divisions).toEqual(["IDENTIFICATION", "DATA", "PROCEDURE"]);
    expect(model.dataItems).toEqual([
      {
        level: "01",
        name: "WS-RESULT",
        picture: "9(6)",
        value: "ZERO",
        inferredType: "integer",
      },
    ]);
    expect(model.procedures).toEqual([{ name: "MAIN-PARA", kind: "paragraph" }]);
    expect(model.fileControls).toEqual([]);
  });

  it("falls back to the given name, then UNKNOWN", () => {
    expect(analyzeSource("", "PAYROLL").programId).toBe("PAYROLL");
    expect(analyzeSource("").programId).toBe("UNKNOWN");
  });

  it("returns a frozen model", () => {
    const model = analyzeSource(CALC_SOURCE);
    expect(Object.isFrozen(model)).toBe(true);
    expect(Object.isFrozen(model.dataItems[0])).toBe(true);
  });
});

describe("normalizeSource", () => {
  it("drops comment lines and inline comments", () => {
    const source = ["      * a comment", "       MOVE 1 TO X. *> inline"].join("\n");
    expect(normalizeSource(source)).toBe(["", "       MOVE 1 TO X. "].join("\n"));
  });

  it("blanks sequence numbers", () => {
    expect(normalizeSource("000100 PROGRAM-ID. SEQ.")).toBe("       PROGRAM-ID. SEQ.");
  });
});

describe("extractProgramId", () => {
  it("reads quoted identifiers", () => {
    expect(extractProgramId("PROGRAM-ID. 'BILLING'.")).toBe("BILLING");
  });

  it("returns null without a declaration", () => {
    expect(extractProgramId("IDENTIFICATION DIVISION.")).toBeNull();
  });
});

describe("extractDivisions", () => {
  it("maps the ID abbreviation", () => {
    expect(extractDivisions("ID DIVISION.\nPROCEDURE DIVISION.")).toEqual([
      "IDENTIFICATION",
      "PROCEDURE",
    ]);
  });
});

describe("extractDataItems", () => {
  it("reads string, decimal and usage clauses", () => {
    const source = [
      "       WORKING-STORAGE SECTION.",
      "       01 WS-NAME PIC X(10) VALUE 'JOHN DOE'.",
      "       01 WS-RATE PIC 9(3)V99 VALUE 12.50.",
      "       01 WS-COUNT PIC S9(4) COMP VALUE 0.",
    ].join("\n");

    expect(extractDataItems(source)).toEqual([
      {
        level: "01",
        name: "WS-NAME",
        picture: "X(10)",
        value: "'JOHN DOE'",
        inferredType: "string",
      },
      {
        level: "01",
        name: "WS-RATE",
        picture: "9(3)V99",
        value: "12.50",
        inferredType: "decimal",
      },
      {
        level: "01",
        name: "WS-COUNT",
        picture: "S9(4)",
        value: "0",
        inferredType: "shortInteger",
      },
    ]);
  });

  it("only reads the working-storage section", () => {
    const source = [
      "       WORKING-STORAGE SECTION.",
      "       01 WS-A PIC X(5).",
      "       LINKAGE SECTION.",
      "       01 LK-B PIC 9(3).",
    ].join("\n");

    expect(extractDataItems(source)).toEqual([
      { level: "01", name: "WS-A", picture: "X(5)", inferredType: "string" },
    ]);
  });

  it("ignores group items and returns nothing without the section", () => {
    const source = [
      "       WORKING-STORAGE SECTION.",
      "       01 WS-GROUP.",
      "          05 WS-CHILD PIC 99.",
    ].join("\n");

    expect(extractDataItems(source).map((item) => item.name)).toEqual(["WS-CHILD"]);
    expect(extractDataItems("       01 WS-A PIC X.")).toEqual([]);
  });
});

describe("extractProcedures", () => {
  it("keeps paragraphs in order and skips statement keywords", () => {
    const source = [
      "       PROCEDURE DIVISION.",
      "       0100-INIT.",
      "           DISPLAY 'START'.",
      "       CALC-TOTAL.",
      "           EXIT.",
      "       9999-END.",
      "           GOBACK.",
    ].join("\n");

    expect(extractProcedures(source).map((p) => p.name)).toEqual([
      "0100-INIT",
      "CALC-TOTAL",
      "9999-END",
    ]);
  });

  it("ignores bare numbers", () => {
    const source = ["       PROCEDURE DIVISION.", "       100."].join("\n");
    expect(extractProcedures(source)).toEqual([]);
  });
});

describe("extractFileControls", () => {
  it("reads SELECT ... ASSIGN entries", () => {
    const source = [
      "       ENVIRONMENT DIVISION.",
      "       INPUT-OUTPUT SECTION.",
      "       FILE-CONTROL.",
      "           SELECT CUSTOMER-FILE ASSIGN TO 'CUSTFILE'.",
      "           SELECT OPTIONAL REPORT-FILE ASSIGN TO RPTOUT.",
      "       DATA DIVISION.",
    ].join("\n");

    expect(extractFileControls(source)).toEqual([
      { logicalFileName: "CUSTOMER-FILE", assignedTarget: "CUSTFILE" },
      { logicalFileName: "REPORT-FILE", assignedTarget: "RPTOUT" },
    ]);
  });
});

describe("placeholderModel", () => {
  it("has empty collections and the program name", () => {
    expect(placeholderModel("ORPHAN")).toEqual({
      programId: "ORPHAN",
      divisions: [],
      dataItems: [],
      procedures: [],
      fileControls: [],
    });
  });
});

describe("extract", () => {
  it("models readable programs and records unreadable ones", async () => {
    const dir = await mkdtemp(join(tmpdir(), "analyzer-"));
    try {
      const calcPath = join(dir, "CALC.cbl");
      await writeFile(calcPath, CALC_SOURCE);

      const tracker = new Tracker();
      const ctx: StageContext = {
        jobId: "job-1",
        config: await loadDefaultConfig(),
        tracker,
        logger: new Logger("silent"),
        outputDir: dir,
      };

      const result = await extract(ctx, [
        descriptor(calcPath, "CALC"),
        descriptor(join(dir, "MISSING.cbl"), "MISSING"),
      ]);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect([...result.payload.models.keys()]).toEqual(["CALC"]);
      expect(result.payload.programsParsed).toBe(1);
      expect(tracker.getIssues("program").map((i) => i.reason)).toEqual(["read-error"]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
