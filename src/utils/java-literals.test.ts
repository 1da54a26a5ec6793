import { describe, it, expect } from "vitest";
import {
  commentText,
  fieldInitializer,
  javaString,
  javaType,
  sampleValue,
} from "./java-literals";

describe("javaType", () => {
  it("maps every inferred type", () => {
    expect(javaType("string")).toBe("String");
    expect(javaType("shortInteger")).toBe("short");
    expect(javaType("integer")).toBe("int");
    expect(javaType("longInteger")).toBe("long");
    expect(javaType("decimal")).toBe("BigDecimal");
  });
});

describe("javaString", () => {
  it("quotes plain text", () => {
    expect(javaString("HELLO")).toBe('"HELLO"');
  });

  it("escapes backslashes, quotes and newlines", () => {
    expect(javaString('a\\b"c\nd')).toBe('"a\\\\b\\"c\\nd"');
  });

  it("writes brackets as unicode escapes", () => {
    expect(javaString("f(x){}")).toBe('"f\\u0028x\\u0029\\u007b\\u007d"');
  });
});

describe("commentText", () => {
  it("removes comment terminators, brackets and line breaks", () => {
    expect(commentText("A (B) */ {C}\nD")).toBe("A B  CD");
  });
});

describe("fieldInitializer", () => {
  it("strips non-digits from integer literals", () => {
    expect(fieldInitializer({ inferredType: "integer", value: "ZERO" })).toBe("0");
    expect(fieldInitializer({ inferredType: "integer", value: "+123" })).toBe("123");
    expect(fieldInitializer({ inferredType: "shortInteger", value: "7" })).toBe("7");
  });

  it("suffixes long literals", () => {
    expect(fieldInitializer({ inferredType: "longInteger", value: "1234567890" })).toBe(
      "1234567890L",
    );
    expect(fieldInitializer({ inferredType: "longInteger" })).toBe("0L");
  });

  it("uses zero values without a literal", () => {
    expect(fieldInitializer({ inferredType: "integer" })).toBe("0");
    expect(fieldInitializer({ inferredType: "string" })).toBe('""');
    expect(fieldInitializer({ inferredType: "decimal" })).toBe("BigDecimal.ZERO");
  });

  it("strips quotes from string literals", () => {
    expect(fieldInitializer({ inferredType: "string", value: "'JOHN DOE'" })).toBe(
      '"JOHN DOE"',
    );
    expect(fieldInitializer({ inferredType: "string", value: '"ABC"' })).toBe('"ABC"');
  });

  it("keeps digits and the point for decimals", () => {
    expect(fieldInitializer({ inferredType: "decimal", value: "12.50" })).toBe(
      'new BigDecimal("12.50")',
    );
    expect(fieldInitializer({ inferredType: "decimal", value: "ZERO" })).toBe(
      'new BigDecimal("0")',
    );
  });
});

describe("sampleValue", () => {
  it("returns a literal of the matching type", () => {
    expect(sampleValue("string")).toBe('"test"');
    expect(sampleValue("shortInteger")).toBe("(short) 1");
    expect(sampleValue("longInteger")).toBe("1L");
    expect(sampleValue("decimal")).toBe('new BigDecimal("1")');
  });
});
