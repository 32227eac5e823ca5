import { z } from "zod";
import { defineCommand } from "@clidispatch/sdk";

/** Runs when the demo is invoked with no command. */
export const rootCommand = defineCommand({
  options: z.object({
    json: z.boolean().default(false),
  }),
  meta: {
    description: "Show a welcome message",
    options: { json: { description: "Print app information as JSON" } },
  },
  execute(_args, options, ctx) {
    const { name, version } = ctx.app;
    if (options.json) {
      const info = { name, version, commands: ctx.availableCommands.map((c) => c.path.join(" ")) };
      ctx.io.stdout.write(`${JSON.stringify(info)}\n`);
      return;
    }
    ctx.io.stdout.write(
      [
        `Welcome to ${name} v${version}`,
        "",
        `Run '${name} --help' to see available commands.`,
        "",
      ].join("\n"),
    );
  },
});
