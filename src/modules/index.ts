/**
 * Pipeline modules export
 */

export { scan, fileSystemDiscovery } from "./scanner";
export { extract, analyzeSource, placeholderModel } from "./analyzer";
export { generate, buildClassContext, ARTIFACTS_FILE } from "./generator";
export { enhance } from "./enhancers";
export { generateTests, junitTestGenerator } from "./test-generator";
export { validate, validateSource, checkSource } from "./validator";
export { recoverArtifacts, recoverTestArtifacts } from "./recovery";
export { stats } from "./stats";
