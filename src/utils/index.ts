/**
 * Utility exports
 */

// Type inference and naming
export { inferType, countDigitPositions } from "./infer-type";
export { mapIdentifier, toJavaIdentifier, capitalize } from "./map-identifier";
export {
  javaType,
  javaString,
  commentText,
  fieldInitializer,
  sampleValue,
} from "./java-literals";
export { resolveProgramName, programLookupKeys } from "./program-name";

// Filesystem utilities
export { fileExists, readSourceText, writeTextFile, saveJson } from "./fs";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";
export { deepFreeze } from "./freeze";

// Classes
export { IdGenerator } from "./id-generator";
export { Tracker } from "./tracker";
export { Logger } from "./logger";
