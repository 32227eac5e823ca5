/**
 * Schema compiler: turns a command's zod Args/Options objects into FieldSpecs
 * the binder can walk, and collects shape violations for registry validation.
 *
 * Supported field types: boolean, number (int or float), string, enum, and
 * arrays of those, optionally wrapped in optional / nullable / default.
 */

import { z, type AnyZodObject, type ZodTypeAny } from "zod";
import type { AnyCommand, FieldInfo, FieldKind } from "@clidispatch/sdk";

export interface FieldSpec extends FieldInfo {
  /** Schema each coerced scalar is checked against (the array element for arrays) */
  schema: ZodTypeAny;
  hasDefault: boolean;
  nullable: boolean;
  /** Human description of accepted input, used in error messages */
  expected: string;
}

export interface CompiledSchema {
  args: FieldSpec[];
  options: FieldSpec[];
}

export interface CompileResult {
  schema: CompiledSchema;
  violations: string[];
}

interface Unwrapped {
  inner: ZodTypeAny;
  optional: boolean;
  nullable: boolean;
  hasDefault: boolean;
  defaultValue?: unknown;
}

function unwrap(schema: ZodTypeAny): Unwrapped {
  const result: Unwrapped = { inner: schema, optional: false, nullable: false, hasDefault: false };
  for (;;) {
    const current = result.inner;
    if (current instanceof z.ZodOptional) {
      result.optional = true;
      result.inner = current.unwrap();
    } else if (current instanceof z.ZodNullable) {
      result.optional = true;
      result.nullable = true;
      result.inner = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      result.optional = true;
      result.hasDefault = true;
      result.defaultValue = current._def.defaultValue();
      result.inner = current.removeDefault();
    } else {
      return result;
    }
  }
}

interface Scalar {
  kind: FieldKind;
  expected: string;
  choices?: readonly string[];
}

function scalarOf(schema: ZodTypeAny): Scalar | undefined {
  if (schema instanceof z.ZodBoolean) {
    return { kind: "boolean", expected: "true or false" };
  }
  if (schema instanceof z.ZodNumber) {
    if (!schema.isInt) return { kind: "float", expected: "number" };
    const unsigned = schema.minValue !== null && schema.minValue >= 0;
    return { kind: "integer", expected: unsigned ? "unsigned integer" : "integer" };
  }
  if (schema instanceof z.ZodString) {
    return { kind: "string", expected: "string" };
  }
  if (schema instanceof z.ZodEnum) {
    const choices: string[] = [...schema.options];
    return { kind: "enum", expected: `one of ${choices.join(", ")}`, choices };
  }
  return undefined;
}

/** camelCase / snake_case field name → kebab-case long flag. */
export function toFlagName(field: string): string {
  return field
    .replace(/([a-z0-9])([A-Z])/g, "$1-$2")
    .replace(/_/g, "-")
    .toLowerCase();
}

function compileField(
  name: string,
  schema: ZodTypeAny,
  where: string,
  violations: string[],
): FieldSpec | undefined {
  const outer = unwrap(schema);
  let array = false;
  let element = outer.inner;

  if (outer.inner instanceof z.ZodArray) {
    array = true;
    const inner = unwrap(outer.inner.element);
    if (inner.optional) {
      violations.push(`${where} "${name}": array elements cannot be optional`);
      return undefined;
    }
    element = inner.inner;
  }

  const scalar = scalarOf(element);
  if (!scalar) {
    violations.push(`${where} "${name}": unsupported field type ${element.constructor.name}`);
    return undefined;
  }

  return {
    name,
    kind: scalar.kind,
    array,
    optional: outer.optional,
    description: schema.description,
    defaultValue: outer.hasDefault ? outer.defaultValue : undefined,
    choices: scalar.choices,
    schema: element,
    hasDefault: outer.hasDefault,
    nullable: outer.nullable,
    expected: scalar.expected,
  };
}

function compileArgs(label: string, args: AnyZodObject | undefined, violations: string[]): FieldSpec[] {
  const where = `Command "${label}" argument`;
  const fields: FieldSpec[] = [];
  for (const [name, schema] of Object.entries<ZodTypeAny>(args?.shape ?? {})) {
    const field = compileField(name, schema, where, violations);
    if (field) fields.push(field);
  }

  fields.forEach((field, index) => {
    if (field.array && index !== fields.length - 1) {
      violations.push(`${where} "${field.name}": a variadic argument must be the last argument`);
    }
    const previous = fields[index - 1];
    if (previous && previous.optional && !field.optional && !field.array) {
      violations.push(`${where} "${field.name}": a required argument cannot follow optional "${previous.name}"`);
    }
  });
  return fields;
}

function compileOptions(label: string, options: AnyZodObject | undefined, violations: string[]): FieldSpec[] {
  const where = `Command "${label}" option`;
  const fields: FieldSpec[] = [];
  // Both the field name and its kebab-case flag are accepted after "--".
  const longs = new Map<string, string>();

  for (const [name, schema] of Object.entries<ZodTypeAny>(options?.shape ?? {})) {
    const field = compileField(name, schema, where, violations);
    if (!field) continue;

    if (!field.optional && !field.array && field.kind !== "boolean") {
      violations.push(`${where} "${name}": options must be optional or have a default`);
    }

    field.flag = toFlagName(name);
    for (const long of new Set([name, field.flag])) {
      const owner = longs.get(long);
      if (owner !== undefined) {
        violations.push(`Command "${label}": long flag "--${long}" is used by both "${owner}" and "${name}"`);
      } else {
        longs.set(long, name);
      }
    }
    fields.push(field);
  }
  return fields;
}

/**
 * Compile a command definition. Never throws; shape problems are returned
 * as violations and the offending fields are left out of the schema.
 */
export function compileCommand(path: readonly string[], definition: AnyCommand): CompileResult {
  const label = path.length === 0 ? "<root>" : path.join(" ");
  const violations: string[] = [];
  const args = compileArgs(label, definition.args, violations);
  const options = compileOptions(label, definition.options, violations);

  const shorts = new Map<string, string>();
  for (const field of args) {
    field.description = definition.meta?.args?.[field.name]?.description ?? field.description;
  }
  for (const field of options) {
    const meta = definition.meta?.options?.[field.name];
    field.description = meta?.description ?? field.description;
    if (meta?.short === undefined) continue;
    if (!/^[A-Za-z0-9?]$/.test(meta.short)) {
      violations.push(`Command "${label}" option "${field.name}": short flag "${meta.short}" must be a single character`);
      continue;
    }
    const owner = shorts.get(meta.short);
    if (owner !== undefined) {
      violations.push(`Command "${label}": short flag "-${meta.short}" is used by both "${owner}" and "${field.name}"`);
      continue;
    }
    shorts.set(meta.short, field.name);
    field.short = meta.short;
  }

  return { schema: { args, options }, violations };
}

/** Strip runtime-only members, leaving the plugin-facing FieldInfo. */
export function toFieldInfo(field: FieldSpec): FieldInfo {
  return {
    name: field.name,
    kind: field.kind,
    array: field.array,
    optional: field.optional,
    flag: field.flag,
    short: field.short,
    description: field.description,
    defaultValue: field.defaultValue,
    choices: field.choices,
  };
}
