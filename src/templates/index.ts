/**
 * Template utilities for Handlebars template rendering
 */

import { loadTemplate } from "../utils/load-template";
import { getDefaultClassTemplate, getDefaultTestTemplate } from "./defaults";
import type { TemplatesConfig } from "../types";

// Re-export default template functions for module-level error handling
export { getDefaultClassTemplate, getDefaultTestTemplate };

/**
 * Load the Java class template (configured path or default)
 */
export async function loadClassTemplate(
  templates: TemplatesConfig,
): Promise<HandlebarsTemplateDelegate> {
  return loadTemplate(templates.class, getDefaultClassTemplate());
}

/**
 * Load the paired test template (configured path or default)
 */
export async function loadTestTemplate(
  templates: TemplatesConfig,
): Promise<HandlebarsTemplateDelegate> {
  return loadTemplate(templates.test, getDefaultTestTemplate());
}
