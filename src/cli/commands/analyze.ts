/**
 * Analyze command - Print the structural model of one source file
 */

import path from "node:path";
import { analyzeSource } from "../../modules";
import { readSourceText } from "../../utils";

export async function analyzeCommand(file: string): Promise<void> {
  try {
    const source = await readSourceText(file);
    const model = analyzeSource(source, path.parse(file).name);
    console.log(JSON.stringify(model, null, 2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
