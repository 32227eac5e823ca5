/**
 * Not-found plugin: "did you mean" suggestions for unknown commands.
 *
 * Writes suggestions and the command list to stderr, then leaves the error
 * unhandled so the invocation still fails.
 */

import { CommandNotFoundError, ErrorHandling, type CliPlugin } from "@clidispatch/sdk";
import { findSimilar } from "@clidispatch/shared";

export interface NotFoundOptions {
  /** Default: 3 */
  maxSuggestions?: number;
  /** Default: 3 */
  maxDistance?: number;
}

export function createNotFoundPlugin(options: NotFoundOptions = {}): CliPlugin {
  const limit = options.maxSuggestions ?? 3;
  const maxDistance = options.maxDistance ?? 3;

  return {
    name: "not-found",
    priority: 10,

    onError(ctx, error) {
      if (!(error instanceof CommandNotFoundError) || error.attempted.length === 0) {
        return ErrorHandling.Unhandled;
      }

      const attempted = error.attempted.join(" ");
      const available = ctx.availableCommands.map((command) => command.path.join(" "));
      const lines = [`Unknown command '${attempted}'`, ""];

      const suggestions = findSimilar(attempted, available, { maxDistance, limit });
      if (suggestions.length === 1) {
        lines.push(`Did you mean '${suggestions[0]}'?`, "");
      } else if (suggestions.length > 1) {
        lines.push("Did you mean one of these?", ...suggestions.map((s) => `    ${s}`), "");
      }

      if (available.length > 0) {
        lines.push("Available commands:", ...available.map((name) => `    ${name}`), "");
      }
      lines.push(`Run '${ctx.app.name} --help' to see all available commands.`);

      ctx.io.stderr.write(`${lines.join("\n")}\n`);
      return ErrorHandling.Unhandled;
    },
  };
}
