export { UsageError, ConfigError, GitCommandError } from "./errors.js";
export {
  MIN_FEATURE_NUMBER,
  MAX_FEATURE_NUMBER,
  parseFeaturePrefix,
  nextFeatureNumber,
  formatFeatureNumber,
  parseFeatureNumberOption,
} from "./numbering.js";
export { DEFAULT_SLUG_WORDS, slugifyDescription, buildBranchName } from "./slug.js";
export {
  PROJECT_CONFIG_FILENAME,
  DEFAULT_SPECS_ROOT,
  DEFAULT_SPEC_TEMPLATE,
  defaultProjectConfig,
  parseProjectConfig,
  loadProjectConfig,
} from "./config.js";
export type { ProjectConfig, ResolvedProjectConfig } from "./config.js";
export { resolveFallbackRoot, listFeatureDirectories } from "./workspace.js";
export { createGitVersionControl, createNoopVersionControl } from "./vcs.js";
export type { VersionControl, GitRunner, GitVersionControlOptions } from "./vcs.js";
export { SPEC_FILENAME, createFeature } from "./feature.js";
export type { CreateFeatureOptions, FeatureResult, FeatureLogEvent, FeatureLogListener } from "./feature.js";
