export { createCli, BINARY_NAME, BINARY_VERSION } from "./app.js";
export {
  CreateFeatureCommand,
  CREATE_FEATURE_USAGE,
  formatFeatureResult,
  parseCreateFeatureArgs,
} from "./commands/create-feature.js";
export type { CreateFeatureArgs } from "./commands/create-feature.js";
export { SpecflowCommand, LOG_TAG } from "./commands/base.js";
