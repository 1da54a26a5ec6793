import reservedWords from "../config/java-reserved-words.json";

const RESERVED = new Set<string>(reservedWords);

const SEPARATOR = "-";

/**
 * Upper-case the first character of a string
 *
 * @example
 * capitalize("customerName") // "CustomerName"
 */
export function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Make a string a legal Java identifier: drop illegal characters,
 * prefix a leading digit, suffix reserved words
 */
export function toJavaIdentifier(text: string): string {
  const cleaned = text.replace(/[^A-Za-z0-9_$]/g, "");

  if (cleaned.length === 0) return "unnamed";
  if (/^[0-9]/.test(cleaned)) return `_${cleaned}`;
  if (RESERVED.has(cleaned)) return `${cleaned}_`;
  return cleaned;
}

/**
 * Convert a COBOL name to a Java camelCase identifier.
 * A reserved prefix (e.g. "WS-") is stripped first when configured.
 *
 * @example
 * mapIdentifier("WS-CUSTOMER-NAME")          // "wsCustomerName"
 * mapIdentifier("WS-CUSTOMER-NAME", ["WS-"]) // "customerName"
 * mapIdentifier("0100-READ-INPUT")           // "_0100ReadInput"
 */
export function mapIdentifier(
  name: string,
  reservedPrefixes: readonly string[] = [],
): string {
  let text = name;

  for (const prefix of reservedPrefixes) {
    if (prefix && text.toUpperCase().startsWith(prefix.toUpperCase())) {
      text = text.slice(prefix.length);
      break;
    }
  }

  const [first = "", ...rest] = text.toLowerCase().split(SEPARATOR);
  return toJavaIdentifier(first + rest.map(capitalize).join(""));
}
