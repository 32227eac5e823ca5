/**
 * Binder: scans a command's remaining tokens and binds them to its
 * compiled Args and Options fields.
 *
 * Scan rules:
 * - "--" makes every later token positional
 * - "-5", "-0.5" (negative-number shape) and a lone "-" are positional
 * - --name / --name=value; non-boolean long options take the next token
 * - -abc is a cluster of boolean flags; only its last flag may take a value
 *
 * The first error stops binding.
 */

import {
  ArgumentMissingError,
  ArgumentValueError,
  OptionMissingValueError,
  OptionValueError,
  TooManyArgumentsError,
  UnknownOptionError,
} from "@clidispatch/sdk";
import type { CompiledSchema, FieldSpec } from "../schema/field-spec.js";
import { coerceField } from "./coerce.js";
import { END_OF_OPTIONS, isNegativeNumber, splitLongOption } from "./tokens.js";

export interface BoundCommandLine {
  args: Record<string, unknown>;
  options: Record<string, unknown>;
  /** Positional tokens in encounter order, before binding to args */
  positionals: string[];
}

function initialOptionValue(field: FieldSpec): unknown {
  if (field.hasDefault) {
    return Array.isArray(field.defaultValue) ? [...field.defaultValue] : field.defaultValue;
  }
  if (field.array) return [];
  if (field.kind === "boolean" && !field.optional) return false;
  return field.nullable ? null : undefined;
}

function missingArgValue(field: FieldSpec): unknown {
  if (field.hasDefault) {
    return Array.isArray(field.defaultValue) ? [...field.defaultValue] : field.defaultValue;
  }
  if (field.array) return [];
  return field.nullable ? null : undefined;
}

export function bindCommandLine(schema: CompiledSchema, tokens: readonly string[]): BoundCommandLine {
  const byLong = new Map<string, FieldSpec>();
  const byShort = new Map<string, FieldSpec>();
  for (const field of schema.options) {
    byLong.set(field.name, field);
    if (field.flag) byLong.set(field.flag, field);
    if (field.short) byShort.set(field.short, field);
  }

  const options: Record<string, unknown> = {};
  for (const field of schema.options) {
    options[field.name] = initialOptionValue(field);
  }

  // First occurrence of an array option replaces its default instead of appending to it.
  const touched = new Set<string>();

  function assign(field: FieldSpec, raw: string, display: string, isShort: boolean): void {
    const coerced = coerceField(field, raw);
    if (!coerced.ok) throw new OptionValueError(display, raw, coerced.expected, isShort);

    if (!field.array) {
      options[field.name] = coerced.value;
      return;
    }
    const current = options[field.name];
    const list = touched.has(field.name) && Array.isArray(current) ? current : [];
    list.push(coerced.value);
    options[field.name] = list;
    touched.add(field.name);
  }

  const positionals: string[] = [];
  let i = 0;

  while (i < tokens.length) {
    const token = tokens[i];
    i++;

    if (token === END_OF_OPTIONS) {
      positionals.push(...tokens.slice(i));
      break;
    }

    if (token.startsWith("--")) {
      const { name, inline } = splitLongOption(token);
      const field = byLong.get(name);
      if (!field) throw new UnknownOptionError(name);

      if (inline !== undefined) {
        assign(field, inline, name, false);
      } else if (field.kind === "boolean") {
        assign(field, "true", name, false);
      } else {
        if (i >= tokens.length) throw new OptionMissingValueError(name);
        assign(field, tokens[i], name, false);
        i++;
      }
      continue;
    }

    if (token.startsWith("-") && token !== "-" && !isNegativeNumber(token)) {
      const chars = [...token.slice(1)];
      for (const [index, ch] of chars.entries()) {
        const field = byShort.get(ch);
        if (!field) throw new UnknownOptionError(ch, true);

        if (field.kind === "boolean") {
          assign(field, "true", ch, true);
          continue;
        }
        if (index !== chars.length - 1 || i >= tokens.length) {
          throw new OptionMissingValueError(ch, true);
        }
        assign(field, tokens[i], ch, true);
        i++;
      }
      continue;
    }

    positionals.push(token);
  }

  const args: Record<string, unknown> = {};
  let cursor = 0;

  for (const [position, field] of schema.args.entries()) {
    if (field.array) {
      const rest = positionals.slice(cursor);
      cursor = positionals.length;
      if (rest.length === 0) {
        args[field.name] = missingArgValue(field);
        continue;
      }
      args[field.name] = rest.map((raw) => {
        const coerced = coerceField(field, raw);
        if (!coerced.ok) throw new ArgumentValueError(field.name, raw, coerced.expected);
        return coerced.value;
      });
      continue;
    }

    if (cursor < positionals.length) {
      const raw = positionals[cursor];
      cursor++;
      const coerced = coerceField(field, raw);
      if (!coerced.ok) throw new ArgumentValueError(field.name, raw, coerced.expected);
      args[field.name] = coerced.value;
      continue;
    }

    if (!field.optional) throw new ArgumentMissingError(field.name, position);
    args[field.name] = missingArgValue(field);
  }

  if (cursor < positionals.length) {
    throw new TooManyArgumentsError(schema.args.length, positionals.length);
  }

  return { args, options, positionals };
}
