import { z } from "zod";
import { defineCommand } from "@clidispatch/sdk";

export const RESTART_POLICIES = ["no", "always", "on-failure", "unless-stopped"] as const;

export const runCommand = defineCommand({
  args: z.object({
    image: z.string(),
    command: z.array(z.string()),
  }),
  options: z.object({
    detach: z.boolean().default(false),
    name: z.string().optional(),
    env: z.array(z.string().regex(/^[^=]+=/, "KEY=VALUE")).default([]),
    restart: z.enum(RESTART_POLICIES).default("no"),
    cpus: z.number().positive().optional(),
    memory: z.string().optional(),
  }),
  meta: {
    description: "Run a new container",
    examples: ["container run alpine echo hello", "container run -d --name web -e PORT=80 nginx:latest"],
    args: {
      image: { description: "Image to start from" },
      command: { description: "Command to run inside the container" },
    },
    options: {
      detach: { short: "d", description: "Run in the background" },
      name: { description: "Assign a name to the container" },
      env: { short: "e", description: "Set an environment variable (repeatable)" },
      restart: { description: "Restart policy" },
      cpus: { description: "Number of CPUs" },
      memory: { short: "m", description: "Memory limit, e.g. 512m" },
    },
  },
  execute(args, options, ctx) {
    const lines = [`Running container from image: ${args.image}`];
    if (args.command.length > 0) lines.push(`Command: ${args.command.join(" ")}`);
    if (options.name !== undefined) lines.push(`Container name: ${options.name}`);
    if (options.env.length > 0) {
      lines.push("Environment:", ...options.env.map((entry) => `    ${entry}`));
    }
    lines.push(`Restart policy: ${options.restart}`);
    if (options.cpus !== undefined) lines.push(`CPUs: ${options.cpus}`);
    if (options.memory !== undefined) lines.push(`Memory: ${options.memory}`);
    lines.push(`Mode: ${options.detach ? "detached" : "attached"}`);

    ctx.io.stdout.write(`${lines.join("\n")}\n`);
  },
});
