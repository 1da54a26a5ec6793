import Handlebars from "handlebars";
import { readFile } from "fs/promises";
import { capitalize } from "./map-identifier";
import { commentText, javaString } from "./java-literals";

// Every helper receives the Handlebars options object as its last argument
function withoutOptions(args: unknown[]): unknown[] {
  return args.slice(0, -1);
}

function text(value: unknown): string {
  return value === undefined || value === null ? "" : String(value);
}

// Register string helpers
// Usage: {{join "Executing " name}}
Handlebars.registerHelper("join", (...args: unknown[]) =>
  withoutOptions(args).map(text).join(""),
);

// Usage: {{joinList procedureNames ", "}}
Handlebars.registerHelper("joinList", (list: unknown, separator: unknown) => {
  if (!Array.isArray(list)) return "";
  return list.map(text).join(typeof separator === "string" ? separator : ", ");
});

Handlebars.registerHelper("capitalize", (str: unknown) => capitalize(text(str)));

// Register Java helpers
Handlebars.registerHelper("javaString", (str: unknown) => javaString(text(str)));

Handlebars.registerHelper("comment", (str: unknown) => commentText(text(str)));

/**
 * Load and compile a template from file path or use default
 * Throws error if custom template fails to load
 *
 * Output is Java source, so HTML escaping is disabled.
 */
export async function loadTemplate(
  templatePath: string | null,
  defaultTemplate: string,
): Promise<HandlebarsTemplateDelegate> {
  if (templatePath === null) {
    return Handlebars.compile(defaultTemplate, { noEscape: true });
  }

  const templateContent = await readFile(templatePath, "utf-8");
  return Handlebars.compile(templateContent, { noEscape: true });
}
