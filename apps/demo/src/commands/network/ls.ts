import { z } from "zod";
import { defineCommand } from "@clidispatch/sdk";
import { formatRow, SAMPLE_NETWORKS } from "../../sample-data.js";

export const networkLsCommand = defineCommand({
  options: z.object({
    quiet: z.boolean().default(false),
  }),
  meta: {
    description: "List networks",
    options: { quiet: { short: "q", description: "Only display network IDs" } },
  },
  execute(_args, options, ctx) {
    const lines = options.quiet
      ? SAMPLE_NETWORKS.map((n) => n.id)
      : [
          formatRow(["NETWORK ID", "NAME", "DRIVER"], [14, 10]),
          ...SAMPLE_NETWORKS.map((n) => formatRow([n.id, n.name, n.driver], [14, 10])),
        ];
    ctx.io.stdout.write(`${lines.join("\n")}\n`);
  },
});
