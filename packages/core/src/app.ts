/**
 * CliApp: the process-facing entry point over a built registry.
 */

import { CommandNotFoundError, exitCodeFor, isDispatchError, type CommandIO } from "@clidispatch/sdk";
import { createLogger } from "@clidispatch/shared";
import type { CommandRegistry } from "./registry/builder.js";
import { runPipeline, type InvocationOptions } from "./execution/pipeline.js";

const logger = createLogger("App");

export interface RunResult {
  exitCode: number;
  /** The unhandled error, when exitCode is non-zero */
  error?: Error;
}

export interface CliApp {
  readonly registry: CommandRegistry;
  /** Resolves on success; rejects with the original, unwrapped error. */
  execute(argv: readonly string[], options?: InvocationOptions): Promise<void>;
  /** Never rejects: unhandled errors become a one-line message on stderr and an exit code. */
  run(argv?: readonly string[], options?: InvocationOptions): Promise<RunResult>;
}

/** One-line, kind-specific message for an error nobody handled. */
export function describeFailure(error: Error): string {
  if (error instanceof CommandNotFoundError && error.attempted.length === 0) {
    return "No command specified. Use --help for usage information.";
  }
  if (isDispatchError(error)) {
    return `Error: ${error.message}`;
  }
  return `Error: ${error.name}: ${error.message}`;
}

export function createApp(registry: CommandRegistry, defaults: InvocationOptions = {}): CliApp {
  function resolve(options?: InvocationOptions): InvocationOptions {
    return { ...defaults, ...options };
  }

  return {
    registry,

    execute(argv, options) {
      return runPipeline(registry, argv, resolve(options));
    },

    async run(argv = process.argv.slice(2), options) {
      const resolved = resolve(options);
      try {
        await runPipeline(registry, argv, resolved);
        return { exitCode: 0 };
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        const io: CommandIO = resolved.io ?? { stdout: process.stdout, stderr: process.stderr };
        io.stderr.write(`${describeFailure(error)}\n`);

        const exitCode = exitCodeFor(isDispatchError(error) ? error.code : undefined);
        logger.debug("Invocation failed", { error: error.name, exitCode });
        return { exitCode, error };
      }
    },
  };
}
