// Types
export type {
  Awaitable,
  ArgumentMeta,
  OptionMeta,
  CommandMeta,
  CommandDefinition,
  AnyCommand,
  FieldKind,
  FieldInfo,
  CommandInfo,
} from "./types/command.js";

export { defineCommand, NoFields } from "./types/command.js";

export type {
  AppInfo,
  OutputStream,
  CommandIO,
  ContextLogger,
  DataStore,
  ExecutionContext,
} from "./types/context.js";

export type {
  GlobalOptionType,
  GlobalOptionValue,
  GlobalOption,
  GlobalOptionInfo,
  ParsedArgs,
  TransformResult,
  ErrorHandlingResult,
  CliPlugin,
} from "./types/plugin.js";

export { option, ErrorHandling, DEFAULT_PLUGIN_PRIORITY } from "./types/plugin.js";

// Errors
export {
  DispatchError,
  CommandNotFoundError,
  CommandNotImplementedError,
  ArgumentMissingError,
  TooManyArgumentsError,
  ArgumentValueError,
  UnknownOptionError,
  OptionMissingValueError,
  OptionValueError,
  RegistryValidationError,
  isDispatchError,
} from "./errors/base.js";

export { ErrorCode, exitCodeFor } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
