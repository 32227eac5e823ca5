/**
 * InvocationContext: the per-call ExecutionContext the pipeline threads
 * through every phase, plus the engine-side controls plugins don't see.
 */

import type {
  AppInfo,
  Awaitable,
  CommandInfo,
  CommandIO,
  DataStore,
  ExecutionContext,
  GlobalOptionInfo,
  GlobalOptionValue,
} from "@clidispatch/sdk";
import type { Logger } from "@clidispatch/shared";

export interface InvocationContext extends ExecutionContext {
  readonly invocationId: string;
  /** Record the matched (or attempted) command and tag the logger with it. */
  enter(path: readonly string[], command: CommandInfo | undefined): void;
  setGlobalOption(name: string, value: GlobalOptionValue): void;
  /** Run onDispose cleanups in reverse order and clear the data store. Idempotent. */
  dispose(): Promise<void>;
}

export interface InvocationContextOptions {
  invocationId: string;
  app: AppInfo;
  io: CommandIO;
  env: Readonly<Record<string, string | undefined>>;
  logger: Logger;
  availableCommands: readonly CommandInfo[];
  globalOptions: readonly GlobalOptionInfo[];
  globalValues: ReadonlyMap<string, GlobalOptionValue>;
  findCommand(path: readonly string[]): CommandInfo | undefined;
}

export function createInvocationContext(options: InvocationContextOptions): InvocationContext {
  const store = new Map<string, unknown>();
  const globals = new Map(options.globalValues);
  let cleanups: Array<() => Awaitable<void>> = [];
  let disposed = false;
  let commandPath: readonly string[] = [];
  let command: CommandInfo | undefined;

  const data: DataStore = {
    get: (key) => store.get(key),
    set: (key, value) => {
      store.set(key, value);
    },
    has: (key) => store.has(key),
    delete: (key) => store.delete(key),
  };

  return {
    invocationId: options.invocationId,
    app: options.app,
    io: options.io,
    env: options.env,
    logger: options.logger,
    data,
    availableCommands: options.availableCommands,
    globalOptions: options.globalOptions,

    get commandPath(): readonly string[] {
      return commandPath;
    },
    get command(): CommandInfo | undefined {
      return command;
    },

    enter(path, info) {
      commandPath = [...path];
      command = info;
      options.logger.setContext({ command: path.length > 0 ? path.join(" ") : "<root>" });
    },

    getGlobalOption: (name) => globals.get(name),
    setGlobalOption(name, value) {
      globals.set(name, value);
    },
    findCommand: (path) => options.findCommand(path),

    onDispose(cleanup) {
      if (disposed) {
        throw new Error("Cannot register cleanup on a disposed invocation");
      }
      cleanups.push(cleanup);
    },

    async dispose() {
      if (disposed) return;
      disposed = true;
      const pending = cleanups.reverse();
      cleanups = [];
      const failures: unknown[] = [];
      for (const cleanup of pending) {
        try {
          await cleanup();
        } catch (err) {
          options.logger.error("Invocation cleanup failed", {
            error: err instanceof Error ? err.message : String(err),
          });
          failures.push(err);
        }
      }
      store.clear();
      if (failures.length === 1) throw failures[0];
      if (failures.length > 1) throw new AggregateError(failures, "Invocation cleanup failed");
    },
  };
}
