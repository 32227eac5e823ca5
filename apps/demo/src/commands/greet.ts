import { z } from "zod";
import { defineCommand } from "@clidispatch/sdk";

export const greetCommand = defineCommand({
  args: z.object({
    name: z.string().optional(),
  }),
  options: z.object({
    greeting: z.string().default("Hello"),
    shout: z.boolean().default(false),
    times: z.number().int().positive().default(1),
  }),
  meta: {
    description: "Print a greeting",
    examples: ["greet", "greet ada --shout", "greet ada -n 3 --greeting Hi"],
    args: { name: { description: "Who to greet (default: $DEMO_USER or World)" } },
    options: {
      greeting: { description: "Greeting word" },
      shout: { short: "s", description: "Print in capitals" },
      times: { short: "n", description: "Repeat the greeting" },
    },
  },
  execute(args, options, ctx) {
    const name = args.name ?? ctx.env.DEMO_USER ?? "World";
    let line = `${options.greeting}, ${name}!`;
    if (options.shout) line = line.toUpperCase();
    ctx.logger.debug("Greeting", { name, times: options.times });
    for (let i = 0; i < options.times; i++) {
      ctx.io.stdout.write(`${line}\n`);
    }
  },
});
