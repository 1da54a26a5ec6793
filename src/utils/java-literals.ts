/**
 * Java literal and type helpers used by the class and test generators
 */

import type { DataItem, InferredType } from "../types";

const JAVA_TYPES: Record<InferredType, string> = {
  string: "String",
  shortInteger: "short",
  integer: "int",
  longInteger: "long",
  decimal: "BigDecimal",
};

const UNICODE_ESCAPES: Record<string, string> = {
  "(": "\\u0028",
  ")": "\\u0029",
  "{": "\\u007b",
  "}": "\\u007d",
};

export function javaType(type: InferredType): string {
  return JAVA_TYPES[type];
}

/**
 * Quote a value as a Java string literal.
 * Brackets are written as unicode escapes so a literal never
 * unbalances the surrounding source.
 */
export function javaString(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\r/g, "\\r")
    .replace(/\n/g, "\\n")
    .replace(/[(){}]/g, (ch) => UNICODE_ESCAPES[ch] ?? ch);
  return `"${escaped}"`;
}

/**
 * Make text safe inside a Java comment
 */
export function commentText(value: string): string {
  return value.replace(/\*\//g, "").replace(/[(){}\r\n]/g, "");
}

function stripQuotes(value: string): string {
  return value.trim().replace(/^['"]+|['"]+$/g, "");
}

/**
 * Build the initializer expression for a generated field.
 * Numeric literals keep only digits (plus the point for decimals),
 * so figurative constants such as ZERO fall back to the zero value.
 *
 * @example
 * fieldInitializer({ inferredType: "integer", value: "ZERO", ... }) // "0"
 * fieldInitializer({ inferredType: "string", value: "'ABC'", ... }) // "\"ABC\""
 */
export function fieldInitializer(item: Pick<DataItem, "inferredType" | "value">): string {
  const raw = item.value !== undefined ? stripQuotes(item.value) : undefined;

  switch (item.inferredType) {
    case "string":
      return javaString(raw ?? "");
    case "shortInteger":
    case "integer":
    case "longInteger": {
      const digits = (raw ?? "").replace(/[^0-9]/g, "") || "0";
      return item.inferredType === "longInteger" ? `${digits}L` : digits;
    }
    case "decimal": {
      if (raw === undefined) return "BigDecimal.ZERO";
      const numeric = raw.replace(/[^0-9.]/g, "") || "0";
      return `new BigDecimal(${javaString(numeric)})`;
    }
  }
}

/**
 * Sample value used by generated accessor tests
 */
export function sampleValue(type: InferredType): string {
  switch (type) {
    case "string":
      return javaString("test");
    case "shortInteger":
      return "(short) 1";
    case "integer":
      return "1";
    case "longInteger":
      return "1L";
    case "decimal":
      return 'new BigDecimal("1")';
  }
}
