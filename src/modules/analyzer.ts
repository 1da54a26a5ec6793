/**
 * Analyzer Module
 * Extracts a structural model from COBOL source text
 *
 * This is a best-effort pattern scanner, not a parser: anything that does
 * not match the expected line shapes is ignored.
 */

import statementKeywords from "../config/statement-keywords.json";
import { deepFreeze, inferType, readSourceText, resolveProgramName } from "../utils";
import type {
  DataItem,
  Division,
  ExtractionPayload,
  FileControlEntry,
  ProcedureRef,
  ProgramDescriptor,
  StageContext,
  StageResult,
  StructuralModel,
} from "../types";

const UNKNOWN_PROGRAM_ID = "UNKNOWN";

// Statements that look like "WORD." on their own line but are not paragraphs
const STATEMENT_KEYWORDS = new Set<string>(statementKeywords);

const PROGRAM_ID_PATTERN = /PROGRAM-ID\.?\s+['"]?([^\s.'"]+)/i;

const DIVISION_PATTERN =
  /\b(IDENTIFICATION|ID|ENVIRONMENT|DATA|PROCEDURE)\s+DIVISION\b/gi;

const DIVISION_KEYWORDS: Record<string, Division> = {
  IDENTIFICATION: "IDENTIFICATION",
  ID: "IDENTIFICATION",
  ENVIRONMENT: "ENVIRONMENT",
  DATA: "DATA",
  PROCEDURE: "PROCEDURE",
};

const WORKING_STORAGE_PATTERN =
  /WORKING-STORAGE\s+SECTION\s*\.([\s\S]*?)(?=\b(?:LOCAL-STORAGE|LINKAGE|REPORT|SCREEN)\s+SECTION\b|\bPROCEDURE\s+DIVISION\b|$)/i;

// <level> <name> PIC <picture> [usage] [VALUE <literal>]
const DATA_ITEM_PATTERN =
  /^\s*(\d{2})\s+([^\s.]+)\s+PIC(?:TURE)?\s+(?:IS\s+)?((?:[^\s.]|\.(?=\S))+)(?:\s+(?:USAGE\s+)?(?:IS\s+)?(?:COMP(?:UTATIONAL)?(?:-[1-5])?|BINARY|PACKED-DECIMAL|DISPLAY))?(?:\s+VALUE\s+(?:IS\s+)?((?:'[^']*'|"[^"]*"|[^.'"]|\.(?=\d))+))?/i;

const PROCEDURE_DIVISION_PATTERN = /PROCEDURE\s+DIVISION\b[^.]*\.([\s\S]*)$/i;

const PARAGRAPH_PATTERN = /^\s*([A-Z0-9][A-Z0-9-]*)\.(?:\s|$)/i;

const FILE_CONTROL_PATTERN =
  /FILE-CONTROL\s*\.([\s\S]*?)(?=\bDATA\s+DIVISION\b|$)/i;

const SELECT_PATTERN =
  /SELECT\s+(?:OPTIONAL\s+)?([^\s.]+)\s+ASSIGN\s+(?:TO\s+)?(\S+)/gi;

// ============================================================================
// Source normalisation
// ============================================================================

/**
 * Drop fixed-format sequence areas and comment lines, and strip
 * inline "*>" comments
 */
export function normalizeSource(source: string): string {
  return source
    .split(/\r?\n/)
    .map((line) => {
      let text = line;
      // Fixed format: columns 1-6 sequence area, column 7 indicator
      if (/^[0-9 ]{6}[*/]/.test(text)) return "";
      if (/^[0-9]{6} /.test(text)) text = `      ${text.slice(6)}`;

      const inline = text.indexOf("*>");
      if (inline !== -1) text = text.slice(0, inline);

      return text;
    })
    .join("\n");
}

// ============================================================================
// Extractors
// ============================================================================

export function extractProgramId(source: string): string | null {
  const match = source.match(PROGRAM_ID_PATTERN);
  return match ? match[1] : null;
}

export function extractDivisions(source: string): Division[] {
  const found = new Set<Division>();

  for (const match of source.matchAll(DIVISION_PATTERN)) {
    const division = DIVISION_KEYWORDS[match[1].toUpperCase()];
    if (division) found.add(division);
  }

  return [...found];
}

export function extractDataItems(source: string): DataItem[] {
  const section = source.match(WORKING_STORAGE_PATTERN);
  if (!section) {
    return [];
  }

  const items: DataItem[] = [];

  for (const line of section[1].split("\n")) {
    const match = line.match(DATA_ITEM_PATTERN);
    if (!match) continue;

    const [, level, name, picture, rawValue] = match;
    const item: DataItem = {
      level,
      name,
      picture,
      inferredType: inferType(picture),
    };

    const value = rawValue?.trim();
    if (value) {
      item.value = value;
    }

    items.push(item);
  }

  return items;
}

export function extractProcedures(source: string): ProcedureRef[] {
  const section = source.match(PROCEDURE_DIVISION_PATTERN);
  if (!section) {
    return [];
  }

  const procedures: ProcedureRef[] = [];

  for (const line of section[1].split("\n")) {
    const match = line.match(PARAGRAPH_PATTERN);
    if (!match) continue;

    const name = match[1];
    if (!/[A-Z]/i.test(name) || STATEMENT_KEYWORDS.has(name.toUpperCase())) {
      continue;
    }

    procedures.push({ name, kind: "paragraph" });
  }

  return procedures;
}

export function extractFileControls(source: string): FileControlEntry[] {
  const section = source.match(FILE_CONTROL_PATTERN);
  if (!section) {
    return [];
  }

  const entries: FileControlEntry[] = [];

  for (const match of section[1].matchAll(SELECT_PATTERN)) {
    entries.push({
      logicalFileName: match[1],
      assignedTarget: match[2].replace(/\.$/, "").replace(/^['"]|['"]$/g, ""),
    });
  }

  return entries;
}

// ============================================================================
// Model construction
// ============================================================================

/**
 * Build the structural model of one program.
 * `fallbackName` is used when the source declares no PROGRAM-ID.
 */
export function analyzeSource(
  source: string,
  fallbackName?: string,
): StructuralModel {
  const text = normalizeSource(source);

  const model: StructuralModel = {
    programId: extractProgramId(text) || fallbackName || UNKNOWN_PROGRAM_ID,
    divisions: extractDivisions(text),
    dataItems: extractDataItems(text),
    procedures: extractProcedures(text),
    fileControls: extractFileControls(text),
  };

  return deepFreeze(model);
}

/**
 * Model used when a program has no usable structural data
 */
export function placeholderModel(programName: string): StructuralModel {
  return deepFreeze({
    programId: programName || UNKNOWN_PROGRAM_ID,
    divisions: [],
    dataItems: [],
    procedures: [],
    fileControls: [],
  });
}

// ============================================================================
// Stage
// ============================================================================

/**
 * Extraction stage: analyze every discovered program.
 * Unreadable programs get no model; the generator substitutes a placeholder.
 */
export async function extract(
  ctx: StageContext,
  programs: ProgramDescriptor[],
): Promise<StageResult<ExtractionPayload>> {
  const { tracker, logger } = ctx;
  const models = new Map<string, StructuralModel>();

  logger.info(`Analyzing ${programs.length} programs`);

  for (const program of programs) {
    const programName = resolveProgramName(program);
    if (!programName) {
      logger.debug("Skipping analysis of a program without a resolvable name");
      continue;
    }

    let source: string;
    try {
      source = await readSourceText(program.path);
    } catch (error) {
      logger.warn(`Cannot read ${program.path || programName}; no model produced`);
      tracker.trackProgramIssue(program.path || programName, "read-error", error);
      continue;
    }

    const model = analyzeSource(source, programName);
    models.set(programName, model);
    tracker.incrementParsed();

    logger.debug(
      `Parsed ${programName}: ${model.dataItems.length} data items, ${model.procedures.length} procedures`,
    );
  }

  return {
    success: true,
    payload: { models, programsParsed: models.size },
  };
}
