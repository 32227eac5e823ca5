/**
 * Execution pipeline: one `execute(argv)` call, phase by phase:
 *
 *   PreParse → GlobalOptions → ArgTransform → Match → PostParse
 *     → PreExecute → Bind+Execute → PostExecute → (OnError)
 *
 * Every phase is awaited before the next starts. Errors from Match and
 * Bind+Execute are offered to the OnError chain; anything unhandled is
 * rethrown unchanged. Plugin hook errors and global option errors propagate
 * directly. The context is disposed on every exit path.
 */

import {
  CommandNotFoundError,
  CommandNotImplementedError,
  ErrorHandling,
  type CliPlugin,
  type CommandIO,
  type ExecutionContext,
  type ParsedArgs,
} from "@clidispatch/sdk";
import { createLogger, generateId } from "@clidispatch/shared";
import type { CommandEntry } from "../matcher/command-matcher.js";
import { bindCommandLine } from "../parser/binder.js";
import { looksLikeOption } from "../parser/tokens.js";
import type { CommandRegistry } from "../registry/builder.js";
import { createInvocationContext, type InvocationContext } from "./context.js";
import { defaultGlobalValues, extractGlobalOptions } from "./global-options.js";

const logger = createLogger("Pipeline");

export interface InvocationOptions {
  io?: CommandIO;
  env?: Readonly<Record<string, string | undefined>>;
}

export interface TransformOutcome {
  args: string[];
  continueProcessing: boolean;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Run every plugin's transformArgs in order. Consumed indices are dropped
 * before the next plugin sees the list; `continueProcessing: false` stops
 * the chain.
 */
export async function applyArgTransforms(
  ctx: ExecutionContext,
  plugins: readonly CliPlugin[],
  tokens: readonly string[],
): Promise<TransformOutcome> {
  let args = [...tokens];
  for (const plugin of plugins) {
    if (!plugin.transformArgs) continue;
    const result = await plugin.transformArgs(ctx, args);
    const consumed = new Set(result.consumedIndices ?? []);
    args = result.args.filter((_, index) => !consumed.has(index));
    if (result.continueProcessing === false) {
      logger.debug(`Plugin "${plugin.name}" stopped processing in transformArgs`);
      return { args, continueProcessing: false };
    }
  }
  return { args, continueProcessing: true };
}

/** Offer an error to the OnError chain; rethrow it if nobody handles it. */
async function reportError(ctx: InvocationContext, plugins: readonly CliPlugin[], error: Error): Promise<void> {
  for (const plugin of plugins) {
    if (!plugin.onError) continue;
    const result = await plugin.onError(ctx, error);
    if (result === ErrorHandling.Handled) {
      logger.debug(`Error handled by plugin "${plugin.name}"`, { error: error.name });
      return;
    }
  }
  throw error;
}

async function runPostParse(
  ctx: InvocationContext,
  plugins: readonly CliPlugin[],
  parsed: ParsedArgs,
): Promise<ParsedArgs> {
  let current = parsed;
  for (const plugin of plugins) {
    if (!plugin.postParse) continue;
    const replaced = await plugin.postParse(ctx, current);
    if (replaced) current = replaced;
  }
  return current;
}

/** Returns null when a plugin vetoed execution. */
async function runPreExecute(
  ctx: InvocationContext,
  plugins: readonly CliPlugin[],
  parsed: ParsedArgs,
): Promise<ParsedArgs | null> {
  let current = parsed;
  for (const plugin of plugins) {
    if (!plugin.preExecute) continue;
    const next = await plugin.preExecute(ctx, current);
    if (next === null) {
      logger.debug(`Execution vetoed by plugin "${plugin.name}"`);
      return null;
    }
    current = next;
  }
  return current;
}

async function runCommand(
  ctx: InvocationContext,
  registry: CommandRegistry,
  entry: CommandEntry,
  remaining: string[],
): Promise<void> {
  const plugins = registry.plugins;
  ctx.enter(entry.path, entry.info);

  const parsed = await runPostParse(ctx, plugins, { positional: remaining });
  const approved = await runPreExecute(ctx, plugins, parsed);
  if (approved === null) return;

  let failure: Error | undefined;
  try {
    const first = approved.positional[0];
    if (entry.schema.args.length === 0 && first !== undefined && !looksLikeOption(first)) {
      // Extra word after an argument-less command: a subcommand that does not exist.
      const attempted = [...entry.path, first];
      ctx.enter(attempted, undefined);
      throw new CommandNotFoundError(attempted, registry.matcher.groupPrefix(attempted));
    }
    if (typeof entry.definition.execute !== "function") {
      throw new CommandNotImplementedError(entry.path);
    }
    const bound = bindCommandLine(entry.schema, approved.positional);
    const stop = logger.time(`execute ${entry.info.path.join(" ") || "<root>"}`);
    try {
      await entry.definition.execute(bound.args, bound.options, ctx);
    } finally {
      stop();
    }
  } catch (err) {
    failure = toError(err);
  }

  for (const plugin of plugins) {
    await plugin.postExecute?.(ctx, failure === undefined);
  }

  if (failure) await reportError(ctx, plugins, failure);
}

/** No tokens and no root command: let help-style plugins act, then report CommandNotFound. */
async function runEmpty(ctx: InvocationContext, plugins: readonly CliPlugin[]): Promise<void> {
  const parsed = await runPostParse(ctx, plugins, { positional: [] });
  const approved = await runPreExecute(ctx, plugins, parsed);
  if (approved === null) return;
  await reportError(ctx, plugins, new CommandNotFoundError([]));
}

/** Phases PreParse through OnError for one invocation; the caller owns disposal. */
async function dispatch(ctx: InvocationContext, registry: CommandRegistry, argv: readonly string[]): Promise<void> {
  const plugins = registry.plugins;
  let tokens = [...argv];

  for (const plugin of plugins) {
    if (plugin.preParse) tokens = [...(await plugin.preParse(ctx, tokens))];
  }

  const globals = extractGlobalOptions(tokens, registry.globalOptions);
  tokens = globals.remaining;
  for (const { option, value } of globals.matches) {
    ctx.setGlobalOption(option.name, value);
    const owner = plugins.find((plugin) => plugin.name === option.plugin);
    await owner?.handleGlobalOption?.(ctx, option.name, value);
  }

  const transformed = await applyArgTransforms(ctx, plugins, tokens);
  if (!transformed.continueProcessing) return;

  const match = registry.matcher.match(transformed.args);
  logger.debug("Match result", { invocationId: ctx.invocationId, kind: match.kind });

  switch (match.kind) {
    case "command":
    case "root":
      await runCommand(ctx, registry, match.entry, match.remaining);
      return;
    case "empty":
      await runEmpty(ctx, plugins);
      return;
    case "not-found":
      ctx.enter(match.attempted, undefined);
      await reportError(ctx, plugins, new CommandNotFoundError(match.attempted, match.groupPath));
      return;
  }
}

/**
 * Execute one command line against a built registry.
 *
 * Resolves when the command (or a plugin short-circuit, veto or error
 * handler) completed successfully; rejects with the original error otherwise.
 * The context is disposed on every path. A cleanup failure is reported only
 * when nothing else failed; otherwise it is logged and the original error wins.
 */
export async function runPipeline(
  registry: CommandRegistry,
  argv: readonly string[],
  options: InvocationOptions = {},
): Promise<void> {
  const invocationId = generateId();

  const ctx = createInvocationContext({
    invocationId,
    app: registry.app,
    io: options.io ?? { stdout: process.stdout, stderr: process.stderr },
    env: options.env ?? process.env,
    logger: createLogger("Invocation", undefined, { invocationId }),
    availableCommands: registry.commandInfo,
    globalOptions: registry.globalOptions,
    globalValues: defaultGlobalValues(registry.globalOptions),
    findCommand: (path) => registry.findCommand(path)?.info,
  });

  logger.debug("Invocation started", { invocationId, argc: argv.length });

  try {
    await dispatch(ctx, registry, argv);
  } catch (err) {
    try {
      await ctx.dispose();
    } catch (cleanupError) {
      logger.warn("Invocation cleanup failed while another error was propagating", {
        invocationId,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    }
    throw err;
  }

  await ctx.dispose();
  logger.debug("Invocation finished", { invocationId });
}
