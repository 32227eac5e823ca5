/**
 * Command definitions: the per-command Args/Options contract.
 */

import { z, type AnyZodObject } from "zod";
import type { ExecutionContext } from "./context.js";

export type Awaitable<T> = T | Promise<T>;

/** Schema used when a command declares no positional arguments or no options. */
export const NoFields = z.object({});
export type NoFields = typeof NoFields;

export interface ArgumentMeta {
  description?: string;
}

export interface OptionMeta {
  /** Single-character short flag, e.g. "v" for -v */
  short?: string;
  description?: string;
}

export interface CommandMeta<A extends AnyZodObject = AnyZodObject, O extends AnyZodObject = AnyZodObject> {
  description?: string;
  examples?: string[];
  args?: Partial<Record<keyof A["shape"] & string, ArgumentMeta>>;
  options?: Partial<Record<keyof O["shape"] & string, OptionMeta>>;
}

/**
 * A command handler with declared Args and Options schemas.
 *
 * `args` keys bind positionals in declaration order; `options` keys bind
 * `--kebab-case` flags. A definition without `execute` is a metadata-only
 * group and raises CommandNotImplemented when invoked directly.
 */
export interface CommandDefinition<A extends AnyZodObject = AnyZodObject, O extends AnyZodObject = AnyZodObject> {
  args?: A;
  options?: O;
  meta?: CommandMeta<A, O>;
  execute?(args: z.output<A>, options: z.output<O>, ctx: ExecutionContext): Awaitable<void>;
}

/** Type-erased definition stored in the registry. */
export type AnyCommand = CommandDefinition<AnyZodObject, AnyZodObject>;

/** Identity helper that infers Args/Options types for `execute`. */
export function defineCommand<A extends AnyZodObject = NoFields, O extends AnyZodObject = NoFields>(
  definition: CommandDefinition<A, O>,
): CommandDefinition<A, O> {
  return definition;
}

/** Value kinds a field can be coerced into. */
export type FieldKind = "boolean" | "integer" | "float" | "string" | "enum";

/** Runtime description of a single Args or Options field, exposed to plugins. */
export interface FieldInfo {
  name: string;
  kind: FieldKind;
  /** Sequence-typed: variadic positional or repeatable option */
  array: boolean;
  /** May be omitted (optional, nullable or defaulted) */
  optional: boolean;
  /** Long flag without leading dashes (options only) */
  flag?: string;
  short?: string;
  description?: string;
  defaultValue?: unknown;
  choices?: readonly string[];
}

/** Introspection record for a registered command. */
export interface CommandInfo {
  path: readonly string[];
  description?: string;
  examples?: readonly string[];
  args: readonly FieldInfo[];
  options: readonly FieldInfo[];
  /** "core" or the name of the contributing plugin */
  source: string;
  /** True when another registered path strictly extends this one */
  isGroup: boolean;
  executable: boolean;
}
