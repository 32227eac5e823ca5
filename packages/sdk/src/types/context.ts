/**
 * ExecutionContext: the single object threaded through every pipeline phase.
 */

import type { Awaitable, CommandInfo } from "./command.js";
import type { GlobalOptionInfo, GlobalOptionValue } from "./plugin.js";

export interface AppInfo {
  name: string;
  version: string;
  description: string;
}

/** Anything with a string `write`, e.g. process.stdout or a test buffer. */
export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CommandIO {
  stdout: OutputStream;
  stderr: OutputStream;
}

/** Logger surface exposed to commands and plugins. */
export interface ContextLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/** Invocation-scoped key/value store plugins use to pass state between phases. */
export interface DataStore {
  get(key: string): unknown;
  set(key: string, value: unknown): void;
  has(key: string): boolean;
  delete(key: string): boolean;
}

export interface ExecutionContext {
  readonly app: AppInfo;
  readonly io: CommandIO;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly logger: ContextLogger;
  readonly data: DataStore;

  /** Path of the matched command, or the attempted path on CommandNotFound. */
  readonly commandPath: readonly string[];
  /** Introspection record of the matched command. */
  readonly command: CommandInfo | undefined;
  /** Every visible command (root excluded), core and plugin-contributed. */
  readonly availableCommands: readonly CommandInfo[];
  readonly globalOptions: readonly GlobalOptionInfo[];

  /** Resolved global option value: the parsed value, or the declared default. */
  getGlobalOption(name: string): GlobalOptionValue | undefined;
  findCommand(path: readonly string[]): CommandInfo | undefined;
  /** Register cleanup that runs once when the invocation ends, on every exit path. */
  onDispose(cleanup: () => Awaitable<void>): void;
}
