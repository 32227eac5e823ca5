/**
 * Help plugin: `--help/-h`, the `help [command...]` command, and help
 * for bare or unresolved command groups.
 */

import { z } from "zod";
import {
  CommandNotFoundError,
  defineCommand,
  ErrorHandling,
  option,
  type CliPlugin,
  type ExecutionContext,
} from "@clidispatch/sdk";
import { hasSubcommands, renderAppHelp, renderCommandHelp, renderGroupHelp } from "./render.js";

export const HELP_REQUESTED = "help.requested";

function showHelpFor(ctx: ExecutionContext, path: readonly string[]): void {
  if (path.length === 0) {
    ctx.io.stdout.write(renderAppHelp(ctx));
    return;
  }
  const command = ctx.findCommand(path);
  if (command) {
    ctx.io.stdout.write(renderCommandHelp(ctx, command));
    return;
  }
  if (hasSubcommands(ctx.availableCommands, path)) {
    ctx.io.stdout.write(renderGroupHelp(ctx, path));
    return;
  }
  throw new CommandNotFoundError(path);
}

const helpCommand = defineCommand({
  args: z.object({ command: z.array(z.string()) }),
  meta: {
    description: "Show help for commands",
    args: { command: { description: "Command path to describe" } },
    examples: ["help", "help container run"],
  },
  execute(args, _options, ctx) {
    showHelpFor(ctx, args.command);
  },
});

export function createHelpPlugin(): CliPlugin {
  return {
    name: "help",
    priority: 100,
    globalOptions: [option("help", "boolean", { short: "h", description: "Show help message" })],
    commands: { help: helpCommand },

    handleGlobalOption(ctx, name, value) {
      if (name === "help" && value === true) ctx.data.set(HELP_REQUESTED, true);
    },

    preExecute(ctx, parsed) {
      if (ctx.data.get(HELP_REQUESTED) !== true) return parsed;
      if (ctx.commandPath.length === 0) {
        ctx.io.stdout.write(renderAppHelp(ctx));
      } else {
        showHelpFor(ctx, ctx.commandPath);
      }
      return null;
    },

    onError(ctx, error) {
      if (!(error instanceof CommandNotFoundError)) return ErrorHandling.Unhandled;
      if (error.attempted.length === 0) {
        ctx.io.stdout.write(renderAppHelp(ctx));
        return ErrorHandling.Handled;
      }
      if (error.groupPath && error.groupPath.length > 0) {
        ctx.io.stdout.write(renderGroupHelp(ctx, error.groupPath));
        return ErrorHandling.Handled;
      }
      return ErrorHandling.Unhandled;
    },
  };
}
