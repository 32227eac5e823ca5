import { z } from "zod";
import { defineCommand } from "@clidispatch/sdk";

export const sumCommand = defineCommand({
  args: z.object({
    values: z.array(z.number()),
  }),
  options: z.object({
    precision: z.number().int().nonnegative().optional(),
  }),
  meta: {
    description: "Add numbers together",
    examples: ["math sum 1 2 3", "math sum -p 2 1.5 -0.25"],
    args: { values: { description: "Numbers to add" } },
    options: { precision: { short: "p", description: "Digits after the decimal point" } },
  },
  execute(args, options, ctx) {
    const total = args.values.reduce((sum, value) => sum + value, 0);
    const text = options.precision === undefined ? String(total) : total.toFixed(options.precision);
    ctx.io.stdout.write(`${text}\n`);
  },
});
