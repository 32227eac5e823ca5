/**
 * Registry validation passes.
 *
 * Each pass returns a list of violations; the builder runs them all and
 * throws a single RegistryValidationError carrying everything found.
 */

import type { CliPlugin, GlobalOptionInfo } from "@clidispatch/sdk";
import {
  CommandSegmentSchema,
  GlobalOptionSchema,
  PluginDescriptorSchema,
  formatZodError,
} from "@clidispatch/shared";

export interface PathRecord {
  path: readonly string[];
  /** "core" or the contributing plugin's name */
  source: string;
  argCount: number;
}

const key = (path: readonly string[]): string => path.join(" ");

const origin = (source: string): string => (source === "core" ? "core" : `plugin "${source}"`);

export function checkPathSegments(records: readonly PathRecord[]): string[] {
  const violations: string[] = [];
  for (const record of records) {
    if (record.path.length === 0) {
      violations.push(`Command registered by ${origin(record.source)} has an empty path; use root() for the root command`);
      continue;
    }
    for (const segment of record.path) {
      const result = CommandSegmentSchema.safeParse(segment);
      if (!result.success) {
        violations.push(`Command "${key(record.path)}": ${formatZodError(result.error)}`);
      }
    }
  }
  return violations;
}

export function checkDuplicatePaths(records: readonly PathRecord[]): string[] {
  const violations: string[] = [];
  const seen = new Map<string, string>();
  for (const record of records) {
    const path = key(record.path);
    const owner = seen.get(path);
    if (owner === undefined) {
      seen.set(path, record.source);
    } else if (owner === "core" && record.source === "core") {
      violations.push(`Duplicate command path "${path}"`);
    } else {
      violations.push(`Command "${path}" from ${origin(record.source)} conflicts with the one from ${origin(owner)}`);
    }
  }
  return violations;
}

/** A path that another path strictly extends is an optional group and must not take positionals. */
export function checkGroupArguments(records: readonly PathRecord[]): string[] {
  const violations: string[] = [];
  for (const record of records) {
    if (record.argCount === 0) continue;
    const isGroup = records.some(
      (other) =>
        other.path.length > record.path.length &&
        record.path.every((segment, i) => other.path[i] === segment),
    );
    if (isGroup) {
      violations.push(`Command group "${key(record.path)}" has subcommands and cannot declare positional arguments`);
    }
  }
  return violations;
}

export function checkPlugins(plugins: readonly CliPlugin[]): string[] {
  const violations: string[] = [];
  const names = new Set<string>();
  for (const plugin of plugins) {
    const result = PluginDescriptorSchema.safeParse({ name: plugin.name, priority: plugin.priority });
    if (!result.success) {
      violations.push(`Plugin "${plugin.name}": ${formatZodError(result.error)}`);
    }
    if (names.has(plugin.name)) {
      violations.push(`Plugin "${plugin.name}" is registered more than once`);
    }
    names.add(plugin.name);
  }
  return violations;
}

export function checkGlobalOptions(options: readonly GlobalOptionInfo[]): string[] {
  const violations: string[] = [];
  const names = new Map<string, string>();
  const shorts = new Map<string, string>();

  for (const option of options) {
    const { plugin, ...descriptor } = option;
    const result = GlobalOptionSchema.safeParse(descriptor);
    if (!result.success) {
      violations.push(`Global option "${option.name}" from ${plugin}: ${formatZodError(result.error)}`);
    }

    const nameOwner = names.get(option.name);
    if (nameOwner !== undefined) {
      violations.push(`Global option "--${option.name}" is declared by both ${nameOwner} and ${plugin}`);
    } else {
      names.set(option.name, plugin);
    }

    if (option.short === undefined) continue;
    const shortOwner = shorts.get(option.short);
    if (shortOwner !== undefined) {
      violations.push(`Global short flag "-${option.short}" is declared by both ${shortOwner} and ${plugin}`);
    } else {
      shorts.set(option.short, plugin);
    }
  }
  return violations;
}
