import { describe, it, expect } from "vitest";
import {
  DispatchError,
  CommandNotFoundError,
  ArgumentMissingError,
  TooManyArgumentsError,
  UnknownOptionError,
  OptionMissingValueError,
  OptionValueError,
  RegistryValidationError,
  isDispatchError,
} from "./base.js";
import { ErrorCode, exitCodeFor } from "./codes.js";

describe("Error System", () => {
  describe("DispatchError", () => {
    it("should preserve cause when provided", () => {
      const rootCause = new Error("root cause");
      const err = new DispatchError("test error", ErrorCode.CommandNotImplemented, { cause: rootCause });
      expect(err.cause).toBe(rootCause);
      expect(err.code).toBe("COMMAND_NOT_IMPLEMENTED");
      expect(err.message).toBe("test error");
    });

    it("should work without cause", () => {
      const err = new DispatchError("test error", ErrorCode.CommandNotFound);
      expect(err.cause).toBeUndefined();
    });
  });

  describe("CommandNotFoundError", () => {
    it("should describe the attempted path", () => {
      const err = new CommandNotFoundError(["container", "bogus"], ["container"]);
      expect(err.name).toBe("CommandNotFoundError");
      expect(err.code).toBe(ErrorCode.CommandNotFound);
      expect(err.message).toBe('Unknown command "container bogus"');
      expect(err.groupPath).toEqual(["container"]);
    });

    it("should report a missing command when nothing was attempted", () => {
      const err = new CommandNotFoundError([]);
      expect(err.message).toBe("No command specified");
      expect(err.groupPath).toBeUndefined();
    });

    it("should be instanceof DispatchError", () => {
      expect(new CommandNotFoundError(["x"])).toBeInstanceOf(DispatchError);
    });
  });

  describe("argument errors", () => {
    it("should number missing arguments from one", () => {
      const err = new ArgumentMissingError("file", 0);
      expect(err.message).toBe('Missing required argument "file" (argument 1)');
      expect(err.code).toBe(ErrorCode.ArgumentMissingRequired);
    });

    it("should report expected and received counts", () => {
      const err = new TooManyArgumentsError(1, 3);
      expect(err.message).toBe("Too many arguments: expected 1, got 3");
      expect(err.expected).toBe(1);
      expect(err.received).toBe(3);
    });
  });

  describe("option errors", () => {
    it("should render long and short flags", () => {
      expect(new UnknownOptionError("colour").message).toBe('Unknown option "--colour"');
      expect(new UnknownOptionError("x", true).message).toBe('Unknown option "-x"');
      expect(new OptionMissingValueError("count").message).toBe('Option "--count" requires a value');
    });

    it("should include the rejected value and expectation", () => {
      const err = new OptionValueError("count", "abc", "integer");
      expect(err.message).toBe('Invalid value "abc" for option "--count": expected integer');
      expect(err.code).toBe(ErrorCode.OptionInvalidValue);
    });
  });

  describe("RegistryValidationError", () => {
    it("should list every violation", () => {
      const err = new RegistryValidationError(["Duplicate command path: a", "Duplicate global option: v"]);
      expect(err.violations).toHaveLength(2);
      expect(err.message).toBe(
        "Invalid command registry:\n  - Duplicate command path: a\n  - Duplicate global option: v",
      );
    });
  });

  describe("isDispatchError", () => {
    it("should narrow by code", () => {
      const err: unknown = new UnknownOptionError("x");
      expect(isDispatchError(err)).toBe(true);
      expect(isDispatchError(err, ErrorCode.OptionUnknown)).toBe(true);
      expect(isDispatchError(err, ErrorCode.CommandNotFound)).toBe(false);
      expect(isDispatchError(new Error("plain"))).toBe(false);
    });
  });

  describe("exitCodeFor", () => {
    it("should map kinds to exit codes", () => {
      expect(exitCodeFor(ErrorCode.CommandNotFound)).toBe(3);
      expect(exitCodeFor(ErrorCode.ArgumentTooMany)).toBe(2);
      expect(exitCodeFor(ErrorCode.OptionUnknown)).toBe(2);
      expect(exitCodeFor(ErrorCode.CommandNotImplemented)).toBe(1);
      expect(exitCodeFor(undefined)).toBe(1);
    });
  });
});
