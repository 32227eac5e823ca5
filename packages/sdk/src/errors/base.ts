/**
 * Error hierarchy for command dispatch.
 *
 * Parse, bind and routing failures extend DispatchError and flow through the
 * OnError hook chain. RegistryValidationError is a build-time failure and is
 * never reported to an end user.
 */

import { ErrorCode, type ErrorCodeValue } from "./codes.js";

export class DispatchError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCodeValue,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "DispatchError";
  }
}

export class CommandNotFoundError extends DispatchError {
  /**
   * @param attempted - leading non-option tokens the user typed (empty when no command was given)
   * @param groupPath - deepest registered group the attempt falls under, if any
   */
  constructor(
    public readonly attempted: readonly string[],
    public readonly groupPath?: readonly string[],
  ) {
    super(
      attempted.length === 0
        ? "No command specified"
        : `Unknown command "${attempted.join(" ")}"`,
      ErrorCode.CommandNotFound,
    );
    this.name = "CommandNotFoundError";
  }
}

export class CommandNotImplementedError extends DispatchError {
  constructor(public readonly commandPath: readonly string[]) {
    super(`Command "${commandPath.join(" ")}" does not implement execute`, ErrorCode.CommandNotImplemented);
    this.name = "CommandNotImplementedError";
  }
}

export class ArgumentMissingError extends DispatchError {
  constructor(
    public readonly argumentName: string,
    public readonly position: number,
  ) {
    super(
      `Missing required argument "${argumentName}" (argument ${position + 1})`,
      ErrorCode.ArgumentMissingRequired,
    );
    this.name = "ArgumentMissingError";
  }
}

export class TooManyArgumentsError extends DispatchError {
  constructor(
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(`Too many arguments: expected ${expected}, got ${received}`, ErrorCode.ArgumentTooMany);
    this.name = "TooManyArgumentsError";
  }
}

export class ArgumentValueError extends DispatchError {
  constructor(
    public readonly argumentName: string,
    public readonly value: string,
    public readonly expected: string,
  ) {
    super(
      `Invalid value "${value}" for argument "${argumentName}": expected ${expected}`,
      ErrorCode.ArgumentInvalidValue,
    );
    this.name = "ArgumentValueError";
  }
}

/** Display form of an option token as the user typed it. */
function flag(optionName: string, short: boolean): string {
  return short ? `-${optionName}` : `--${optionName}`;
}

export class UnknownOptionError extends DispatchError {
  constructor(
    public readonly optionName: string,
    public readonly isShort = false,
  ) {
    super(`Unknown option "${flag(optionName, isShort)}"`, ErrorCode.OptionUnknown);
    this.name = "UnknownOptionError";
  }
}

export class OptionMissingValueError extends DispatchError {
  constructor(
    public readonly optionName: string,
    public readonly isShort = false,
  ) {
    super(`Option "${flag(optionName, isShort)}" requires a value`, ErrorCode.OptionMissingValue);
    this.name = "OptionMissingValueError";
  }
}

export class OptionValueError extends DispatchError {
  constructor(
    public readonly optionName: string,
    public readonly value: string,
    public readonly expected: string,
    public readonly isShort = false,
  ) {
    super(
      `Invalid value "${value}" for option "${flag(optionName, isShort)}": expected ${expected}`,
      ErrorCode.OptionInvalidValue,
    );
    this.name = "OptionValueError";
  }
}

/**
 * Thrown by RegistryBuilder.build() when commands or plugins conflict.
 * Carries every violation found, not just the first.
 */
export class RegistryValidationError extends DispatchError {
  constructor(public readonly violations: readonly string[]) {
    super(`Invalid command registry:\n  - ${violations.join("\n  - ")}`, ErrorCode.RegistryInvalid);
    this.name = "RegistryValidationError";
  }
}

/** Narrow an unknown error to a DispatchError, optionally of a specific code. */
export function isDispatchError(err: unknown, code?: ErrorCodeValue): err is DispatchError {
  return err instanceof DispatchError && (code === undefined || err.code === code);
}
