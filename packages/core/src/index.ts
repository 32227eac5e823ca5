// App
export { createApp, describeFailure } from "./app.js";
export type { CliApp, RunResult } from "./app.js";

// Registry
export { createRegistry, buildRegistry } from "./registry/builder.js";
export type {
  AppConfig,
  CommandRegistration,
  RegistryInput,
  CommandRegistry,
  RegistryBuilder,
} from "./registry/builder.js";
export { sortPlugins, pluginPriority } from "./registry/plugin-order.js";

// Matching
export { createCommandMatcher } from "./matcher/command-matcher.js";
export type { CommandEntry, CommandMatcher, MatchResult } from "./matcher/command-matcher.js";

// Schema & parsing
export { compileCommand, toFieldInfo, toFlagName } from "./schema/field-spec.js";
export type { FieldSpec, CompiledSchema, CompileResult } from "./schema/field-spec.js";
export { bindCommandLine } from "./parser/binder.js";
export type { BoundCommandLine } from "./parser/binder.js";
export { isNegativeNumber, looksLikeOption } from "./parser/tokens.js";

// Execution
export { runPipeline, applyArgTransforms } from "./execution/pipeline.js";
export type { InvocationOptions, TransformOutcome } from "./execution/pipeline.js";
export { defaultGlobalValues, extractGlobalOptions } from "./execution/global-options.js";
export type { GlobalExtraction, GlobalOptionMatch } from "./execution/global-options.js";
export { createInvocationContext } from "./execution/context.js";
export type { InvocationContext, InvocationContextOptions } from "./execution/context.js";
