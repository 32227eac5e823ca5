import { describe, it, expect } from "vitest";
import { z } from "zod";
import { defineCommand, ErrorCode, isDispatchError } from "@clidispatch/sdk";
import type { AnyCommand } from "@clidispatch/sdk";
import { compileCommand } from "../schema/field-spec.js";
import { bindCommandLine } from "./binder.js";

function bind(definition: AnyCommand, tokens: string[]) {
  const { schema, violations } = compileCommand(["test"], definition);
  expect(violations).toEqual([]);
  return bindCommandLine(schema, tokens);
}

function bindError(definition: AnyCommand, tokens: string[]): unknown {
  try {
    bind(definition, tokens);
  } catch (err) {
    return err;
  }
  throw new Error("expected binding to fail");
}

const countCommand = defineCommand({
  args: z.object({ file: z.string() }),
  options: z.object({ count: z.number().int().nonnegative().default(1) }),
});

describe("bindCommandLine", () => {
  it("binds an option value and a positional", () => {
    const bound = bind(countCommand, ["--count", "5", "file.txt"]);
    expect(bound.args).toEqual({ file: "file.txt" });
    expect(bound.options).toEqual({ count: 5 });
  });

  it("applies option defaults when the option is absent", () => {
    expect(bind(countCommand, ["file.txt"]).options).toEqual({ count: 1 });
  });

  it("accepts --name=value", () => {
    expect(bind(countCommand, ["--count=7", "a"]).options.count).toBe(7);
  });

  it("keeps negative numbers positional", () => {
    const cmd = defineCommand({
      args: z.object({ threshold: z.string(), value: z.string().optional() }),
      options: z.object({ count: z.number().int().nonnegative().optional() }),
    });
    const bound = bind(cmd, ["-5", "--count", "10", "-42"]);
    expect(bound.args).toEqual({ threshold: "-5", value: "-42" });
    expect(bound.options).toEqual({ count: 10 });
  });

  it("accumulates repeated array options in encounter order", () => {
    const cmd = defineCommand({ options: z.object({ files: z.array(z.string()).default([]) }) });
    const bound = bind(cmd, ["--files", "a.txt", "--files", "b.txt"]);
    expect(bound.options.files).toEqual(["a.txt", "b.txt"]);
  });

  it("replaces a non-empty array default on first occurrence", () => {
    const cmd = defineCommand({ options: z.object({ tags: z.array(z.string()).default(["base"]) }) });
    expect(bind(cmd, ["--tags", "x"]).options.tags).toEqual(["x"]);
    expect(bind(cmd, []).options.tags).toEqual(["base"]);
  });

  it("keeps the last value of a repeated scalar option", () => {
    const cmd = defineCommand({ options: z.object({ name: z.string().optional() }) });
    expect(bind(cmd, ["--name", "a", "--name", "b"]).options.name).toBe("b");
  });

  it("fails with ArgumentMissingRequired when a required positional is absent", () => {
    const err = bindError(defineCommand({ args: z.object({ file: z.string() }) }), []);
    expect(isDispatchError(err, ErrorCode.ArgumentMissingRequired)).toBe(true);
    expect(err).toMatchObject({ argumentName: "file", position: 0 });
  });

  it("fails with ArgumentTooMany on extra positionals", () => {
    const err = bindError(defineCommand({ args: z.object({ file: z.string() }) }), ["a", "b", "c"]);
    expect(isDispatchError(err, ErrorCode.ArgumentTooMany)).toBe(true);
    expect(err).toMatchObject({ expected: 1, received: 3 });
  });

  it("fails with OptionUnknown for undeclared flags", () => {
    const err = bindError(countCommand, ["--verbose", "a"]);
    expect(isDispatchError(err, ErrorCode.OptionUnknown)).toBe(true);
    expect(err).toMatchObject({ optionName: "verbose", isShort: false });
  });

  it("fails with OptionMissingValue when the value token is absent", () => {
    const err = bindError(countCommand, ["a", "--count"]);
    expect(isDispatchError(err, ErrorCode.OptionMissingValue)).toBe(true);
  });

  it("fails with OptionInvalidValue for non-numeric input", () => {
    const err = bindError(countCommand, ["--count", "abc", "a"]);
    expect(isDispatchError(err, ErrorCode.OptionInvalidValue)).toBe(true);
    expect(err).toBeInstanceOf(Error);
    expect(err instanceof Error ? err.message : "").toBe(
      'Invalid value "abc" for option "--count": expected unsigned integer',
    );
  });

  it("applies zod bounds after coercion", () => {
    const err = bindError(countCommand, ["--count", "-3", "a"]);
    expect(isDispatchError(err, ErrorCode.OptionInvalidValue)).toBe(true);
  });

  it("fails with ArgumentInvalidValue for a bad positional", () => {
    const cmd = defineCommand({ args: z.object({ port: z.number().int() }) });
    const err = bindError(cmd, ["eighty"]);
    expect(isDispatchError(err, ErrorCode.ArgumentInvalidValue)).toBe(true);
    expect(err).toMatchObject({ argumentName: "port", value: "eighty", expected: "integer" });
  });

  it("treats everything after -- as positional", () => {
    const cmd = defineCommand({
      args: z.object({ rest: z.array(z.string()) }),
      options: z.object({ force: z.boolean() }),
    });
    const bound = bind(cmd, ["--force", "--", "--force", "-x"]);
    expect(bound.options.force).toBe(true);
    expect(bound.args.rest).toEqual(["--force", "-x"]);
  });

  it("binds a variadic positional to an empty list when nothing is left", () => {
    const cmd = defineCommand({ args: z.object({ image: z.string(), cmd: z.array(z.string()) }) });
    expect(bind(cmd, ["alpine"]).args).toEqual({ image: "alpine", cmd: [] });
  });

  it("parses float variadics", () => {
    const cmd = defineCommand({ args: z.object({ values: z.array(z.number()) }) });
    expect(bind(cmd, ["1.5", "-2", "3"]).args.values).toEqual([1.5, -2, 3]);
  });

  it("maps camelCase fields to kebab-case flags and keeps the field name", () => {
    const cmd = defineCommand({ options: z.object({ dryRun: z.boolean() }) });
    expect(bind(cmd, ["--dry-run"]).options.dryRun).toBe(true);
    expect(bind(cmd, ["--dryRun"]).options.dryRun).toBe(true);
    expect(bind(cmd, []).options.dryRun).toBe(false);
  });

  it("parses explicit boolean values", () => {
    const cmd = defineCommand({ options: z.object({ color: z.boolean().default(true) }) });
    expect(bind(cmd, ["--color=false"]).options.color).toBe(false);
    expect(bind(cmd, ["--color=1"]).options.color).toBe(true);
  });

  it("validates enum choices", () => {
    const cmd = defineCommand({ options: z.object({ format: z.enum(["json", "yaml"]).default("json") }) });
    expect(bind(cmd, ["--format", "yaml"]).options.format).toBe("yaml");
    const err = bindError(cmd, ["--format", "xml"]);
    expect(err).toMatchObject({ code: ErrorCode.OptionInvalidValue, expected: "one of json, yaml" });
  });

  it("passes the empty string through unchanged", () => {
    const cmd = defineCommand({ options: z.object({ label: z.string().optional() }) });
    expect(bind(cmd, ["--label", ""]).options.label).toBe("");
  });

  describe("short options", () => {
    const cmd = defineCommand({
      args: z.object({ target: z.string().optional() }),
      options: z.object({
        all: z.boolean(),
        long: z.boolean(),
        output: z.string().optional(),
      }),
      meta: { options: { all: { short: "a" }, long: { short: "l" }, output: { short: "o" } } },
    });

    it("expands a boolean cluster", () => {
      expect(bind(cmd, ["-al"]).options).toEqual({ all: true, long: true, output: undefined });
    });

    it("lets a value-taking short option consume the next token", () => {
      const bound = bind(cmd, ["-o", "out.txt", "src"]);
      expect(bound.options.output).toBe("out.txt");
      expect(bound.args.target).toBe("src");
    });

    it("lets the last flag of a cluster take a value", () => {
      expect(bind(cmd, ["-alo", "out.txt"]).options).toEqual({ all: true, long: true, output: "out.txt" });
    });

    it("rejects a value-taking flag in the middle of a cluster", () => {
      const err = bindError(cmd, ["-oa", "x"]);
      expect(err).toMatchObject({ code: ErrorCode.OptionMissingValue, optionName: "o", isShort: true });
    });

    it("reports unknown short flags", () => {
      expect(bindError(cmd, ["-z"])).toMatchObject({ code: ErrorCode.OptionUnknown, optionName: "z", isShort: true });
    });

    it("treats a lone dash as positional", () => {
      expect(bind(cmd, ["-"]).args.target).toBe("-");
    });
  });
});
