/**
 * Plain-text help rendering for apps, commands and command groups.
 *
 * Every renderer returns the full text, newline-terminated; callers decide
 * which stream it goes to.
 */

import type { CommandInfo, ExecutionContext, FieldInfo, GlobalOptionInfo } from "@clidispatch/sdk";

const NAME_WIDTH = 16;
const FLAG_WIDTH = 24;

function row(label: string, description: string | undefined, width: number): string {
  return description ? `    ${label.padEnd(width)} ${description}` : `    ${label}`;
}

function startsWith(path: readonly string[], prefix: readonly string[]): boolean {
  return path.length >= prefix.length && prefix.every((segment, i) => path[i] === segment);
}

function finish(lines: string[]): string {
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return `${lines.join("\n")}\n`;
}

/** Direct children of `prefix`, in registration order. Unregistered intermediate groups have no description. */
export function childEntries(
  commands: readonly CommandInfo[],
  prefix: readonly string[],
): Array<{ name: string; description?: string }> {
  const children = new Map<string, string | undefined>();
  for (const command of commands) {
    if (command.path.length <= prefix.length || !startsWith(command.path, prefix)) continue;
    const name = command.path[prefix.length];
    if (command.path.length === prefix.length + 1) {
      children.set(name, command.description);
    } else if (!children.has(name)) {
      children.set(name, undefined);
    }
  }
  return [...children].map(([name, description]) => ({ name, description }));
}

export function hasSubcommands(commands: readonly CommandInfo[], prefix: readonly string[]): boolean {
  return commands.some((command) => command.path.length > prefix.length && startsWith(command.path, prefix));
}

function valueHint(field: FieldInfo): string {
  switch (field.kind) {
    case "boolean":
      return "";
    case "integer":
      return " <int>";
    case "float":
      return " <number>";
    case "string":
      return " <string>";
    case "enum":
      return ` <${(field.choices ?? []).join("|")}>`;
  }
}

function formatDefault(value: unknown): string | undefined {
  if (value === undefined || value === null || value === false) return undefined;
  if (Array.isArray(value)) return value.length > 0 ? value.join(",") : undefined;
  return String(value);
}

function optionRow(field: FieldInfo): string {
  const label = `--${field.flag ?? field.name}${field.short ? `, -${field.short}` : ""}${valueHint(field)}`;
  const fallback = formatDefault(field.defaultValue);
  const description = [field.description, fallback !== undefined ? `(default: ${fallback})` : undefined]
    .filter((part) => part !== undefined && part !== "")
    .join(" ");
  return row(label, description, FLAG_WIDTH);
}

function globalOptionRow(option: GlobalOptionInfo): string {
  const hint = option.type === "boolean" ? "" : ` <${option.type}>`;
  return row(`--${option.name}${option.short ? `, -${option.short}` : ""}${hint}`, option.description, FLAG_WIDTH);
}

function argPattern(field: FieldInfo): string {
  if (field.array) return `[${field.name}...]`;
  return field.optional ? `[${field.name}]` : `<${field.name}>`;
}

export function usageLine(appName: string, command: CommandInfo): string {
  const parts = [appName, ...command.path];
  if (command.options.length > 0) parts.push("[OPTIONS]");
  parts.push(...command.args.map(argPattern));
  return parts.join(" ");
}

export function renderAppHelp(ctx: ExecutionContext): string {
  const { name, version, description } = ctx.app;
  const lines = [`${name} v${version}`];
  if (description) lines.push(description);
  lines.push("", "USAGE:", `    ${name} [GLOBAL OPTIONS] <COMMAND> [ARGS]`, "");

  const root = ctx.command && ctx.command.path.length === 0 ? ctx.command : undefined;
  if (root && root.options.length > 0) {
    lines.push("OPTIONS:", ...root.options.map(optionRow), "");
  }

  const commands = childEntries(ctx.availableCommands, []);
  if (commands.length > 0) {
    lines.push("COMMANDS:", ...commands.map((entry) => row(entry.name, entry.description, NAME_WIDTH)), "");
  }

  if (ctx.globalOptions.length > 0) {
    lines.push("GLOBAL OPTIONS:", ...ctx.globalOptions.map(globalOptionRow), "");
  }

  lines.push(`Run '${name} <COMMAND> --help' for more information on a command.`);
  return finish(lines);
}

export function renderCommandHelp(ctx: ExecutionContext, command: CommandInfo): string {
  const appName = ctx.app.name;
  const path = command.path.join(" ");
  const lines = [`${appName} ${path}`];
  if (command.description) lines.push(command.description);
  lines.push("", "USAGE:", `    ${usageLine(appName, command)}`);
  if (command.isGroup) lines.push(`    ${appName} ${path} <subcommand>`);
  lines.push("");

  if (command.args.length > 0) {
    lines.push("ARGUMENTS:", ...command.args.map((arg) => row(arg.name, arg.description, NAME_WIDTH)), "");
  }

  lines.push("OPTIONS:", ...command.options.map(optionRow), row("--help, -h", "Show this help message", FLAG_WIDTH), "");

  if (command.isGroup) {
    const children = childEntries(ctx.availableCommands, command.path);
    lines.push("SUBCOMMANDS:", ...children.map((child) => row(child.name, child.description, NAME_WIDTH)), "");
  }

  if (command.examples && command.examples.length > 0) {
    lines.push("EXAMPLES:", ...command.examples.map((example) => `    ${example}`), "");
  }
  return finish(lines);
}

export function renderGroupHelp(ctx: ExecutionContext, group: readonly string[]): string {
  const appName = ctx.app.name;
  const name = group.join(" ");
  const children = childEntries(ctx.availableCommands, group);
  return finish([
    `'${name}' is a command group. Available subcommands:`,
    "",
    "SUBCOMMANDS:",
    ...children.map((child) => row(child.name, child.description, NAME_WIDTH)),
    "",
    `Run '${appName} ${name} <subcommand> --help' for more information on a specific subcommand.`,
  ]);
}
