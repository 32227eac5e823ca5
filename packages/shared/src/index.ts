export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { generateId } from "./utils/uuid.js";
export { formatZodError } from "./utils/validation.js";

export {
  AppConfigSchema,
  GlobalOptionSchema,
  GlobalOptionTypeSchema,
  PluginDescriptorSchema,
  CommandSegmentSchema,
} from "./utils/config-schema.js";
export type { ValidatedAppConfig } from "./utils/config-schema.js";

export { editDistance, findSimilar } from "./utils/similarity.js";
