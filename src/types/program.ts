/**
 * Program-related type definitions
 */

/**
 * One discovered source file. Produced by discovery, never modified afterwards.
 */
export interface ProgramDescriptor {
  path: string; // Absolute path to the source file
  relativePath: string; // Relative path from repository root
  name: string; // Program name inferred from the file name
  extension: string; // e.g. ".cbl"
  sizeBytes: number;
  linesOfCode: number; // Non-blank lines
  copybooks: string[]; // Names referenced by COPY statements
  recordId?: string; // Stable identifier assigned once the program is persisted
}

export interface CopybookDescriptor {
  path: string;
  relativePath: string;
  name: string;
  sizeBytes: number;
}

// ============================================================================
// Structural Model
// ============================================================================

export const DIVISIONS = [
  "IDENTIFICATION",
  "ENVIRONMENT",
  "DATA",
  "PROCEDURE",
] as const;

export type Division = (typeof DIVISIONS)[number];

export const INFERRED_TYPES = [
  "string",
  "shortInteger",
  "integer",
  "longInteger",
  "decimal",
] as const;

export type InferredType = (typeof INFERRED_TYPES)[number];

export interface DataItem {
  level: string; // 2-digit level number, e.g. "01"
  name: string; // e.g. "WS-CUSTOMER-NAME"
  picture: string; // Raw PIC clause, e.g. "9(6)"
  value?: string; // Raw VALUE literal, e.g. "ZERO" or "'ABC'"
  inferredType: InferredType; // Computed once at extraction time
}

export interface ProcedureRef {
  name: string;
  kind: "paragraph";
}

export interface FileControlEntry {
  logicalFileName: string;
  assignedTarget: string;
}

/**
 * Extracted shape of one program. Read-only once created.
 */
export interface StructuralModel {
  readonly programId: string;
  readonly divisions: readonly Division[];
  readonly dataItems: readonly DataItem[];
  readonly procedures: readonly ProcedureRef[];
  readonly fileControls: readonly FileControlEntry[];
}

// ============================================================================
// Generated Output
// ============================================================================

export interface GeneratedArtifact {
  programName: string; // Key of the artifact map
  path: string; // Output file path
  className: string;
  packageName: string;
  sourcePath?: string; // Originating ProgramDescriptor path
  sourceRelativePath?: string;
  recordId?: string; // ProgramDescriptor.recordId, when persisted
  recovered?: boolean; // Rebuilt from the output directory instead of the generator
}

export interface TestArtifact {
  programName: string;
  path: string;
  className: string; // e.g. "CALCTest"
}

export type ArtifactMap = Map<string, GeneratedArtifact>;
export type TestArtifactMap = Map<string, TestArtifact>;

export interface ValidationResult {
  syntaxValid: boolean;
  pairedTestSyntaxValid: boolean;
  compilable: boolean; // Same as syntaxValid at this fidelity level
  testResults: {
    passed: boolean;
    failed: boolean;
    errors: string[];
  };
}

// ============================================================================
// Template Context Types
// ============================================================================

export interface FieldTemplateContext {
  sourceName: string; // Original data item name
  level: string;
  name: string; // Target field name
  type: string; // Target type
  initializer: string; // Target expression
  accessorSuffix: string; // Capitalised field name used by get/set
  sample: string; // Sample value used by generated tests
}

export interface MethodTemplateContext {
  sourceName: string; // Original procedure name
  name: string;
}

/**
 * Context passed to class templates
 */
export interface ClassTemplateContext {
  packageName: string;
  className: string;
  programId: string;
  sourceRelativePath?: string;
  targetStack: string;
  divisions: readonly Division[];
  fields: FieldTemplateContext[];
  methods: MethodTemplateContext[];
  procedureNames: string[];
  fileControls: readonly FileControlEntry[];
}

/**
 * Context passed to test templates
 */
export interface TestTemplateContext {
  packageName: string;
  className: string;
  testClassName: string;
  fields: FieldTemplateContext[];
}
