/**
 * Alias plugin: rewrites a leading shorthand (e.g. `ps`) into a full
 * command path before routing.
 */

import { createLogger } from "@clidispatch/shared";
import type { CliPlugin } from "@clidispatch/sdk";

const logger = createLogger("Aliases");

export function createAliasPlugin(aliases: Readonly<Record<string, readonly string[]>>): CliPlugin {
  const table = new Map(Object.entries(aliases));

  return {
    name: "aliases",

    transformArgs(_ctx, args) {
      const [first, ...rest] = args;
      const target = first === undefined ? undefined : table.get(first);
      if (!target) return { args: [...args] };

      logger.debug("Expanding alias", { alias: first, target: target.join(" ") });
      return { args: [...target, ...rest] };
    },
  };
}
