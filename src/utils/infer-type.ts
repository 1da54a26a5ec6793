import type { InferredType } from "../types";

/**
 * Count digit positions in a picture clause, expanding repetition
 * factors: "9(6)" is 6 positions, "999" is 3, "99(3)" is 4
 */
export function countDigitPositions(picture: string): number {
  let count = 0;
  for (const match of picture.matchAll(/9(?:\((\d+)\))?/g)) {
    count += match[1] !== undefined ? parseInt(match[1], 10) : 1;
  }
  return count;
}

/**
 * Infer the target type of a data item from its picture clause.
 * Rules apply in order, so an alphanumeric marker wins over digits.
 *
 * @example
 * inferType("X(10)")   // "string"
 * inferType("9(6)")    // "integer"
 * inferType("S9(5)V99") // "decimal"
 */
export function inferType(picture: string): InferredType {
  const pic = picture.toUpperCase();

  if (pic.includes("X")) {
    return "string";
  }

  if (pic.includes("9")) {
    if (pic.includes("V") || pic.includes(".")) {
      return "decimal";
    }
    const digits = countDigitPositions(pic);
    if (digits <= 4) return "shortInteger";
    if (digits <= 9) return "integer";
    return "longInteger";
  }

  // Signed numeric without explicit digit markers
  if (pic.includes("S")) {
    return "integer";
  }

  return "string";
}
