import { describe, it, expect } from "vitest";
import { z } from "zod";
import { defineCommand, option, RegistryValidationError } from "@clidispatch/sdk";
import type { CliPlugin } from "@clidispatch/sdk";
import { buildRegistry, createRegistry } from "./builder.js";
import { sortPlugins } from "./plugin-order.js";

const app = { name: "tool", version: "1.0.0" };
const noop = defineCommand({ execute() {} });
const withFile = defineCommand({ args: z.object({ file: z.string() }), execute() {} });

function violationsOf(build: () => unknown): readonly string[] {
  try {
    build();
  } catch (err) {
    if (err instanceof RegistryValidationError) return err.violations;
    throw err;
  }
  throw new Error("expected build to fail");
}

describe("sortPlugins", () => {
  it("orders by descending priority and keeps registration order for ties", () => {
    const plugins: CliPlugin[] = [
      { name: "a" },
      { name: "b", priority: 100 },
      { name: "c" },
      { name: "d", priority: 10 },
      { name: "e", priority: 100 },
    ];
    expect(sortPlugins(plugins).map((p) => p.name)).toEqual(["b", "e", "a", "c", "d"]);
  });
});

describe("createRegistry", () => {
  it("builds commands with introspection info", () => {
    const registry = createRegistry(app)
      .command("container", noop)
      .command("container run", withFile)
      .command(["container", "ls"], defineCommand({ meta: { description: "List containers" } }))
      .build();

    expect(registry.app).toEqual({ name: "tool", version: "1.0.0", description: "" });
    expect(registry.commandInfo.map((info) => info.path.join(" "))).toEqual([
      "container",
      "container run",
      "container ls",
    ]);
    expect(registry.findCommand(["container"])?.info.isGroup).toBe(true);
    expect(registry.findCommand(["container", "run"])?.info.args.map((f) => f.name)).toEqual(["file"]);

    const ls = registry.findCommand(["container", "ls"]);
    expect(ls?.info.description).toBe("List containers");
    expect(ls?.info.executable).toBe(false);
    expect(registry.findCommand(["missing"])).toBeUndefined();
  });

  it("keeps the root command out of the command list", () => {
    const registry = createRegistry(app).root(noop).command("greet", noop).build();
    expect(registry.commandInfo.map((info) => info.path)).toEqual([["greet"]]);
    expect(registry.findCommand([])).toBe(registry.root);
  });

  it("merges plugin commands and global options in priority order", () => {
    const low: CliPlugin = {
      name: "low",
      priority: 10,
      globalOptions: [option("quiet", "boolean", { short: "q" })],
    };
    const high: CliPlugin = {
      name: "high",
      priority: 90,
      commands: { status: noop },
      globalOptions: [option("verbose", "boolean", { short: "v" })],
    };
    const registry = createRegistry(app).plugin(low).plugin(high).build();

    expect(registry.plugins.map((p) => p.name)).toEqual(["high", "low"]);
    expect(registry.globalOptions.map((o) => [o.name, o.plugin])).toEqual([
      ["verbose", "high"],
      ["quiet", "low"],
    ]);
    expect(registry.findCommand(["status"])?.info.source).toBe("high");
  });
});

describe("registry validation", () => {
  it("rejects duplicate command paths", () => {
    expect(violationsOf(() => createRegistry(app).command("greet", noop).command("greet", noop).build())).toEqual([
      'Duplicate command path "greet"',
    ]);
  });

  it("rejects a command group that declares positional arguments", () => {
    const violations = violationsOf(() =>
      createRegistry(app).command("container", withFile).command("container run", noop).build(),
    );
    expect(violations).toEqual([
      'Command group "container" has subcommands and cannot declare positional arguments',
    ]);
  });

  it("rejects plugin commands that collide with core commands", () => {
    const plugin: CliPlugin = { name: "helper", commands: { help: noop } };
    expect(violationsOf(() => createRegistry(app).command("help", noop).plugin(plugin).build())).toEqual([
      'Command "help" from plugin "helper" conflicts with the one from core',
    ]);
  });

  it("rejects global option name and short flag collisions", () => {
    const first: CliPlugin = { name: "first", globalOptions: [option("verbose", "boolean", { short: "v" })] };
    const second: CliPlugin = {
      name: "second",
      globalOptions: [option("verbose", "boolean"), option("version", "boolean", { short: "v" })],
    };
    expect(violationsOf(() => createRegistry(app).plugin(first).plugin(second).build())).toEqual([
      'Global option "--verbose" is declared by both first and second',
      'Global short flag "-v" is declared by both first and second',
    ]);
  });

  it("rejects invalid global option descriptors", () => {
    const plugin: CliPlugin = {
      name: "jobs",
      globalOptions: [{ name: "jobs", type: "unsigned", default: -1, description: "" }],
    };
    expect(violationsOf(() => createRegistry(app).plugin(plugin).build())).toEqual([
      'Global option "jobs" from jobs: default: Default must not be negative',
    ]);
  });

  it("rejects invalid path segments", () => {
    expect(violationsOf(() => createRegistry(app).command(["--bad"], noop).build())).toEqual([
      `Command "--bad": Command path segments must be non-empty, contain no whitespace and not start with '-'`,
    ]);
  });

  it("reports every violation at once", () => {
    const violations = violationsOf(() =>
      buildRegistry({
        app: { name: "", version: "1.0.0" },
        commands: [
          { path: ["a"], definition: noop },
          { path: ["a"], definition: noop },
          { path: ["b"], definition: defineCommand({ options: z.object({ name: z.string() }) }) },
        ],
      }),
    );
    expect(violations).toEqual([
      "App config: name: App name must not be empty",
      'Command "b" option "name": options must be optional or have a default',
      'Duplicate command path "a"',
    ]);
  });

  it("formats all violations into the error message", () => {
    try {
      createRegistry(app).command("x", noop).command("x", noop).build();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(RegistryValidationError);
      expect(err instanceof Error ? err.message : "").toBe('Invalid command registry:\n  - Duplicate command path "x"');
    }
  });
});
