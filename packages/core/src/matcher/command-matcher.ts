/**
 * CommandMatcher: longest-prefix routing of tokens onto registered paths.
 *
 * Entries are tried longest path first (stable for equal lengths), so
 * "container run" wins over "container" for `container run alpine`.
 */

import type { AnyCommand, CommandInfo } from "@clidispatch/sdk";
import type { CompiledSchema } from "../schema/field-spec.js";
import { looksLikeOption } from "../parser/tokens.js";

export interface CommandEntry {
  path: readonly string[];
  definition: AnyCommand;
  schema: CompiledSchema;
  info: CommandInfo;
}

export type MatchResult =
  | { kind: "command"; entry: CommandEntry; remaining: string[] }
  | { kind: "root"; entry: CommandEntry; remaining: string[] }
  /** No tokens and no root command */
  | { kind: "empty" }
  | { kind: "not-found"; attempted: string[]; groupPath?: string[] };

export interface CommandMatcher {
  match(tokens: readonly string[]): MatchResult;
  /** Longest prefix of `path` that some registered path strictly extends. */
  groupPrefix(path: readonly string[]): string[] | undefined;
}

function startsWith(tokens: readonly string[], prefix: readonly string[]): boolean {
  if (tokens.length < prefix.length) return false;
  return prefix.every((segment, i) => tokens[i] === segment);
}

export function createCommandMatcher(entries: readonly CommandEntry[], root?: CommandEntry): CommandMatcher {
  const sorted = [...entries].sort((a, b) => b.path.length - a.path.length);

  function groupPrefix(path: readonly string[]): string[] | undefined {
    for (let length = path.length; length > 0; length--) {
      const prefix = path.slice(0, length);
      if (sorted.some((entry) => entry.path.length > length && startsWith(entry.path, prefix))) {
        return prefix;
      }
    }
    return undefined;
  }

  return {
    match(tokens: readonly string[]): MatchResult {
      // Anything starting with "-" belongs to the root: options, "--", negative numbers.
      if (root && (tokens.length === 0 || tokens[0].startsWith("-"))) {
        return { kind: "root", entry: root, remaining: [...tokens] };
      }
      if (tokens.length === 0) return { kind: "empty" };

      for (const entry of sorted) {
        if (startsWith(tokens, entry.path)) {
          return { kind: "command", entry, remaining: tokens.slice(entry.path.length) };
        }
      }

      const firstOption = tokens.findIndex(looksLikeOption);
      const leading = firstOption === -1 ? [...tokens] : tokens.slice(0, firstOption);
      const group = groupPrefix(leading);
      if (!group) return { kind: "not-found", attempted: [tokens[0]] };
      // Report the group plus the first segment that failed to resolve under it.
      const attempted = leading.slice(0, Math.min(group.length + 1, leading.length));
      return { kind: "not-found", attempted, groupPath: group };
    },

    groupPrefix,
  };
}
