/**
 * Version plugin: `--version/-V` prints "<name> v<version>" and skips the command.
 */

import { option, type CliPlugin } from "@clidispatch/sdk";

export const VERSION_REQUESTED = "version.requested";

export function createVersionPlugin(): CliPlugin {
  return {
    name: "version",
    priority: 90,
    globalOptions: [option("version", "boolean", { short: "V", description: "Show version information" })],

    handleGlobalOption(ctx, name, value) {
      if (name === "version" && value === true) ctx.data.set(VERSION_REQUESTED, true);
    },

    preExecute(ctx, parsed) {
      if (ctx.data.get(VERSION_REQUESTED) !== true) return parsed;
      ctx.io.stdout.write(`${ctx.app.name} v${ctx.app.version}\n`);
      return null;
    },
  };
}
