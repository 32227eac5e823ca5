/**
 * Demo CLI wiring: registers the demo commands and the stock plugins.
 */

import { createApp, createRegistry, type CliApp, type CommandRegistry, type InvocationOptions } from "@clidispatch/core";
import { createHelpPlugin, createNotFoundPlugin, createVersionPlugin } from "@clidispatch/plugins";
import { readPackageInfo } from "./package-info.js";
import { rootCommand } from "./commands/root.js";
import { greetCommand } from "./commands/greet.js";
import { containerCommand } from "./commands/container/index.js";
import { runCommand } from "./commands/container/run.js";
import { lsCommand } from "./commands/container/ls.js";
import { networkLsCommand } from "./commands/network/ls.js";
import { sumCommand } from "./commands/math/sum.js";
import { createAliasPlugin } from "./plugins/aliases.js";

export const APP_NAME = "clidispatch-demo";

export function buildDemoRegistry(): CommandRegistry {
  const pkg = readPackageInfo();

  return createRegistry({ name: APP_NAME, version: pkg.version, description: pkg.description })
    .root(rootCommand)
    .command("greet", greetCommand)
    .command("container", containerCommand)
    .command("container run", runCommand)
    .command("container ls", lsCommand)
    .command("network ls", networkLsCommand)
    .command("math sum", sumCommand)
    .plugin(createHelpPlugin())
    .plugin(createVersionPlugin())
    .plugin(createNotFoundPlugin())
    .plugin(createAliasPlugin({ ps: ["container", "ls"] }))
    .build();
}

export function createDemoApp(defaults?: InvocationOptions): CliApp {
  return createApp(buildDemoRegistry(), defaults);
}
