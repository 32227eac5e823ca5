/**
 * String → typed value coercion for command fields and global options.
 */

import type { GlobalOptionType, GlobalOptionValue } from "@clidispatch/sdk";
import { formatZodError } from "@clidispatch/shared";
import type { FieldSpec } from "../schema/field-spec.js";

export type Coerced<T> = { ok: true; value: T } | { ok: false; expected: string };

const TRUE_TOKENS = new Set(["true", "1"]);
const FALSE_TOKENS = new Set(["false", "0"]);

export function parseBoolean(raw: string): boolean | undefined {
  if (TRUE_TOKENS.has(raw)) return true;
  if (FALSE_TOKENS.has(raw)) return false;
  return undefined;
}

export function parseInteger(raw: string): number | undefined {
  if (!/^[+-]?\d+$/.test(raw)) return undefined;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : undefined;
}

export function parseFloatToken(raw: string): number | undefined {
  if (raw.trim() === "") return undefined;
  const value = Number(raw);
  return Number.isNaN(value) ? undefined : value;
}

/** Coerce one token for a command field, then check it against the field's zod schema. */
export function coerceField(field: FieldSpec, raw: string): Coerced<unknown> {
  let value: unknown;
  switch (field.kind) {
    case "boolean":
      value = parseBoolean(raw);
      break;
    case "integer":
      value = parseInteger(raw);
      break;
    case "float":
      value = parseFloatToken(raw);
      break;
    case "string":
    case "enum":
      value = raw;
      break;
  }
  if (value === undefined) return { ok: false, expected: field.expected };

  const checked = field.schema.safeParse(value);
  if (!checked.success) {
    return { ok: false, expected: field.kind === "enum" ? field.expected : formatZodError(checked.error) };
  }
  return { ok: true, value: checked.data };
}

const GLOBAL_EXPECTATIONS: Record<GlobalOptionType, string> = {
  boolean: "true or false",
  integer: "integer",
  unsigned: "unsigned integer",
  float: "number",
  string: "string",
};

/** Coerce one token for a global option of the given type. */
export function coerceGlobal(type: GlobalOptionType, raw: string): Coerced<GlobalOptionValue> {
  let value: GlobalOptionValue | undefined;
  switch (type) {
    case "boolean":
      value = parseBoolean(raw);
      break;
    case "integer":
      value = parseInteger(raw);
      break;
    case "unsigned": {
      const parsed = parseInteger(raw);
      value = parsed !== undefined && parsed >= 0 ? parsed : undefined;
      break;
    }
    case "float":
      value = parseFloatToken(raw);
      break;
    case "string":
      value = raw;
      break;
  }
  if (value === undefined) return { ok: false, expected: GLOBAL_EXPECTATIONS[type] };
  return { ok: true, value };
}
