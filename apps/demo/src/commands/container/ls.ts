import { z } from "zod";
import { defineCommand, OptionValueError } from "@clidispatch/sdk";
import { formatRow, SAMPLE_CONTAINERS, type Container } from "../../sample-data.js";

const FILTER_KEYS = ["name", "status", "image"] as const;
type FilterKey = (typeof FILTER_KEYS)[number];

interface Filter {
  key: FilterKey;
  value: string;
}

function isFilterKey(key: string): key is FilterKey {
  return FILTER_KEYS.some((k) => k === key);
}

function parseFilter(raw: string): Filter {
  const eq = raw.indexOf("=");
  const key = eq > 0 ? raw.slice(0, eq) : "";
  if (!isFilterKey(key)) {
    throw new OptionValueError("filter", raw, `KEY=VALUE with KEY one of ${FILTER_KEYS.join(", ")}`);
  }
  return { key, value: raw.slice(eq + 1) };
}

const COLUMN_WIDTHS = [14, 14, 10];

export const lsCommand = defineCommand({
  options: z.object({
    all: z.boolean().default(false),
    quiet: z.boolean().default(false),
    filter: z.array(z.string()).default([]),
    format: z.enum(["table", "json"]).default("table"),
    last: z.number().int().nonnegative().optional(),
  }),
  meta: {
    description: "List containers",
    examples: ["container ls", "container ls -a", "container ls -aq --filter status=exited"],
    options: {
      all: { short: "a", description: "Show all containers (default shows running)" },
      quiet: { short: "q", description: "Only display container IDs" },
      filter: { short: "f", description: "Filter by name, status or image (repeatable)" },
      format: { description: "Output format" },
      last: { short: "n", description: "Show the n most recently created containers" },
    },
  },
  execute(_args, options, ctx) {
    const filters = options.filter.map(parseFilter);
    let containers: Container[] = SAMPLE_CONTAINERS.filter(
      (c) => (options.all || c.status === "running") && filters.every((f) => c[f.key] === f.value),
    );
    if (options.last !== undefined) containers = containers.slice(0, options.last);

    if (options.quiet) {
      ctx.io.stdout.write(containers.map((c) => `${c.id}\n`).join(""));
      return;
    }
    if (options.format === "json") {
      ctx.io.stdout.write(`${JSON.stringify(containers, null, 2)}\n`);
      return;
    }

    const rows = [
      formatRow(["CONTAINER ID", "IMAGE", "STATUS", "NAME"], COLUMN_WIDTHS),
      ...containers.map((c) => formatRow([c.id, c.image, c.status, c.name], COLUMN_WIDTHS)),
    ];
    ctx.io.stdout.write(`${rows.join("\n")}\n`);
  },
});
