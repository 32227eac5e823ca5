/**
 * Registry builder: collects commands and plugins, validates them once, and
 * produces an immutable CommandRegistry shared by every invocation.
 */

import {
  RegistryValidationError,
  type AnyCommand,
  type AppInfo,
  type CliPlugin,
  type CommandInfo,
  type GlobalOptionInfo,
} from "@clidispatch/sdk";
import { AppConfigSchema, createLogger, formatZodError } from "@clidispatch/shared";
import { compileCommand, toFieldInfo } from "../schema/field-spec.js";
import { createCommandMatcher, type CommandEntry, type CommandMatcher } from "../matcher/command-matcher.js";
import { sortPlugins } from "./plugin-order.js";
import {
  checkDuplicatePaths,
  checkGlobalOptions,
  checkGroupArguments,
  checkPathSegments,
  checkPlugins,
  type PathRecord,
} from "./validator.js";

const logger = createLogger("Registry");

export interface AppConfig {
  name: string;
  version: string;
  description?: string;
}

export interface CommandRegistration {
  path: readonly string[];
  definition: AnyCommand;
}

/** Everything the build-time discovery step hands to the engine. */
export interface RegistryInput {
  app: AppConfig;
  commands: readonly CommandRegistration[];
  root?: AnyCommand;
  plugins?: readonly CliPlugin[];
}

export interface CommandRegistry {
  readonly app: AppInfo;
  /** Core commands in registration order, then plugin commands in priority order */
  readonly commands: readonly CommandEntry[];
  readonly root: CommandEntry | undefined;
  /** Sorted by descending priority, registration order for ties */
  readonly plugins: readonly CliPlugin[];
  readonly globalOptions: readonly GlobalOptionInfo[];
  readonly matcher: CommandMatcher;
  /** Info for every non-root command */
  readonly commandInfo: readonly CommandInfo[];
  findCommand(path: readonly string[]): CommandEntry | undefined;
}

export interface RegistryBuilder {
  /** `path` is a segment list or a space-separated string such as "container run". */
  command(path: string | readonly string[], definition: AnyCommand): RegistryBuilder;
  root(definition: AnyCommand): RegistryBuilder;
  plugin(plugin: CliPlugin): RegistryBuilder;
  build(): CommandRegistry;
}

const pathKey = (path: readonly string[]): string => path.join(" ");

function toPath(path: string | readonly string[]): string[] {
  return typeof path === "string" ? path.split(/\s+/).filter((segment) => segment.length > 0) : [...path];
}

/**
 * Validate and assemble a registry.
 *
 * @throws RegistryValidationError listing every violation found
 */
export function buildRegistry(input: RegistryInput): CommandRegistry {
  const plugins = sortPlugins(input.plugins ?? []);
  const violations: string[] = [];

  const config = AppConfigSchema.safeParse(input.app);
  if (!config.success) {
    violations.push(`App config: ${formatZodError(config.error)}`);
  }
  const app: AppInfo = config.success
    ? config.data
    : { name: input.app.name, version: input.app.version, description: input.app.description ?? "" };

  const registrations: Array<CommandRegistration & { source: string }> = [
    ...input.commands.map((registration) => ({ ...registration, source: "core" })),
    ...plugins.flatMap((plugin) =>
      Object.entries<AnyCommand>(plugin.commands ?? {}).map(([name, definition]) => ({
        path: [name],
        definition,
        source: plugin.name,
      })),
    ),
  ];

  const compiled = registrations.map((registration) => {
    const result = compileCommand(registration.path, registration.definition);
    violations.push(...result.violations);
    return { ...registration, schema: result.schema };
  });
  const compiledRoot = input.root ? compileCommand([], input.root) : undefined;
  if (compiledRoot) violations.push(...compiledRoot.violations);

  const records: PathRecord[] = compiled.map((entry) => ({
    path: entry.path,
    source: entry.source,
    argCount: entry.schema.args.length,
  }));

  const globalOptions: GlobalOptionInfo[] = plugins.flatMap((plugin) =>
    (plugin.globalOptions ?? []).map((option) => ({ ...option, plugin: plugin.name })),
  );

  violations.push(
    ...checkPlugins(plugins),
    ...checkPathSegments(records),
    ...checkDuplicatePaths(records),
    ...checkGroupArguments(records),
    ...checkGlobalOptions(globalOptions),
  );

  if (violations.length > 0) {
    logger.debug("Registry validation failed", { violations });
    throw new RegistryValidationError(violations);
  }

  const isGroup = (path: readonly string[]): boolean =>
    compiled.some(
      (other) => other.path.length > path.length && path.every((segment, i) => other.path[i] === segment),
    );

  const commands: CommandEntry[] = compiled.map(({ path, definition, schema, source }) => ({
    path,
    definition,
    schema,
    info: {
      path,
      description: definition.meta?.description,
      examples: definition.meta?.examples,
      args: schema.args.map(toFieldInfo),
      options: schema.options.map(toFieldInfo),
      source,
      isGroup: isGroup(path),
      executable: typeof definition.execute === "function",
    },
  }));

  const root: CommandEntry | undefined =
    input.root && compiledRoot
      ? {
          path: [],
          definition: input.root,
          schema: compiledRoot.schema,
          info: {
            path: [],
            description: input.root.meta?.description,
            examples: input.root.meta?.examples,
            args: compiledRoot.schema.args.map(toFieldInfo),
            options: compiledRoot.schema.options.map(toFieldInfo),
            source: "core",
            isGroup: false,
            executable: typeof input.root.execute === "function",
          },
        }
      : undefined;

  const byPath = new Map(commands.map((entry) => [pathKey(entry.path), entry]));

  logger.debug("Registry built", {
    commands: commands.length,
    root: root !== undefined,
    plugins: plugins.map((plugin) => plugin.name),
  });

  return {
    app,
    commands,
    root,
    plugins,
    globalOptions,
    matcher: createCommandMatcher(commands, root),
    commandInfo: commands.map((entry) => entry.info),
    findCommand(path: readonly string[]): CommandEntry | undefined {
      if (path.length === 0) return root;
      return byPath.get(pathKey(path));
    },
  };
}

/**
 * Fluent front end over buildRegistry().
 *
 * @example
 * const registry = createRegistry({ name: "tool", version: "1.0.0" })
 *   .command("greet", greet)
 *   .plugin(createHelpPlugin())
 *   .build();
 */
export function createRegistry(app: AppConfig): RegistryBuilder {
  const commands: CommandRegistration[] = [];
  const plugins: CliPlugin[] = [];
  let root: AnyCommand | undefined;

  const builder: RegistryBuilder = {
    command(path, definition) {
      commands.push({ path: toPath(path), definition });
      return builder;
    },
    root(definition) {
      root = definition;
      return builder;
    },
    plugin(plugin) {
      plugins.push(plugin);
      return builder;
    },
    build() {
      return buildRegistry({ app, commands, root, plugins });
    },
  };
  return builder;
}
