/**
 * Plugin SPI: every hook is optional; the pipeline probes for each one.
 */

import type { AnyCommand, Awaitable } from "./command.js";
import type { ExecutionContext } from "./context.js";

export type GlobalOptionType = "boolean" | "integer" | "unsigned" | "float" | "string";
export type GlobalOptionValue = boolean | number | string;

/** Option recognized before routing, available to every command. */
export interface GlobalOption {
  name: string;
  /** Single character, e.g. "h" for -h */
  short?: string;
  type: GlobalOptionType;
  default: GlobalOptionValue;
  description: string;
  category?: string;
}

/** GlobalOption plus the name of the plugin that declared it. */
export interface GlobalOptionInfo extends GlobalOption {
  plugin: string;
}

const ZERO_VALUES: Record<GlobalOptionType, GlobalOptionValue> = {
  boolean: false,
  integer: 0,
  unsigned: 0,
  float: 0,
  string: "",
};

/**
 * Build a GlobalOption, filling in the zero value of its type when no default is given.
 *
 * @example
 * option("verbose", "boolean", { short: "v", description: "Verbose output" })
 */
export function option(
  name: string,
  type: GlobalOptionType,
  config: { short?: string; default?: GlobalOptionValue; description?: string; category?: string } = {},
): GlobalOption {
  return {
    name,
    short: config.short,
    type,
    default: config.default ?? ZERO_VALUES[type],
    description: config.description ?? "",
    category: config.category,
  };
}

/** Positional-token view handed to PostParse/PreExecute, before typed binding. */
export interface ParsedArgs {
  positional: string[];
}

export interface TransformResult {
  args: string[];
  /** Indices into `args` the plugin consumed; they are dropped before the next plugin runs. */
  consumedIndices?: number[];
  /** false ends the invocation successfully without running later phases. Default: true */
  continueProcessing?: boolean;
}

export const ErrorHandling = {
  Handled: "handled",
  Unhandled: "unhandled",
} as const;

export type ErrorHandlingResult = (typeof ErrorHandling)[keyof typeof ErrorHandling];

export interface CliPlugin {
  name: string;
  /** Higher runs first. Default: 50 */
  priority?: number;
  globalOptions?: readonly GlobalOption[];
  /** Single-segment commands contributed by the plugin, keyed by name. */
  commands?: Readonly<Record<string, AnyCommand>>;

  preParse?(ctx: ExecutionContext, args: readonly string[]): Awaitable<string[]>;
  handleGlobalOption?(ctx: ExecutionContext, name: string, value: GlobalOptionValue): Awaitable<void>;
  transformArgs?(ctx: ExecutionContext, args: readonly string[]): Awaitable<TransformResult>;
  /** Return a replacement view, or undefined to keep the current one. */
  postParse?(ctx: ExecutionContext, parsed: ParsedArgs): Awaitable<ParsedArgs | undefined>;
  /** Return the (possibly replaced) view to continue, or null to veto execution. */
  preExecute?(ctx: ExecutionContext, parsed: ParsedArgs): Awaitable<ParsedArgs | null>;
  postExecute?(ctx: ExecutionContext, success: boolean): Awaitable<void>;
  onError?(ctx: ExecutionContext, error: Error): Awaitable<ErrorHandlingResult>;
}

export const DEFAULT_PLUGIN_PRIORITY = 50;
