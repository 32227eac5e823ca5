import { defineCommand } from "@clidispatch/sdk";
import { renderGroupHelp } from "@clidispatch/plugins";

/** `container` on its own lists its subcommands. */
export const containerCommand = defineCommand({
  meta: {
    description: "Manage containers",
  },
  execute(_args, _options, ctx) {
    ctx.io.stdout.write(renderGroupHelp(ctx, ctx.commandPath));
  },
});
