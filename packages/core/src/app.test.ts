import { describe, it, expect } from "vitest";
import { z } from "zod";
import { defineCommand, ErrorCode } from "@clidispatch/sdk";
import { CapturedStream } from "@clidispatch/sdk/testing";
import { createApp, describeFailure } from "./app.js";
import { createRegistry } from "./registry/builder.js";

function makeApp() {
  const stdout = new CapturedStream();
  const stderr = new CapturedStream();
  const registry = createRegistry({ name: "tool", version: "1.0.0" })
    .command(
      "add",
      defineCommand({
        args: z.object({ a: z.number().int(), b: z.number().int() }),
        execute(args, _options, ctx) {
          ctx.io.stdout.write(`${args.a + args.b}\n`);
        },
      }),
    )
    .command(
      "fail",
      defineCommand({
        execute() {
          throw new TypeError("bad state");
        },
      }),
    )
    .build();
  return { app: createApp(registry, { io: { stdout, stderr }, env: {} }), stdout, stderr };
}

describe("createApp", () => {
  it("returns exit code 0 on success", async () => {
    const { app, stdout, stderr } = makeApp();
    expect(await app.run(["add", "2", "3"])).toEqual({ exitCode: 0 });
    expect(stdout.lines()).toEqual(["5"]);
    expect(stderr.text()).toBe("");
  });

  it("maps unknown commands to exit code 3", async () => {
    const { app, stderr } = makeApp();
    const result = await app.run(["sub", "1"]);
    expect(result.exitCode).toBe(3);
    expect(result.error).toMatchObject({ code: ErrorCode.CommandNotFound });
    expect(stderr.lines()).toEqual(['Error: Unknown command "sub"']);
  });

  it("maps argument errors to exit code 2", async () => {
    const { app, stderr } = makeApp();
    const result = await app.run(["add", "2", "x"]);
    expect(result.exitCode).toBe(2);
    expect(stderr.lines()).toEqual(['Error: Invalid value "x" for argument "b": expected integer']);
  });

  it("maps other failures to exit code 1", async () => {
    const { app, stderr } = makeApp();
    const result = await app.run(["fail"]);
    expect(result.exitCode).toBe(1);
    expect(result.error).toBeInstanceOf(TypeError);
    expect(stderr.lines()).toEqual(["Error: TypeError: bad state"]);
  });

  it("prints a usage hint when no command is given", async () => {
    const { app, stderr } = makeApp();
    expect((await app.run([])).exitCode).toBe(3);
    expect(stderr.lines()).toEqual(["No command specified. Use --help for usage information."]);
  });

  it("execute() rejects with the original error", async () => {
    const { app } = makeApp();
    await expect(app.execute(["fail"])).rejects.toThrow(TypeError);
  });
});

describe("describeFailure", () => {
  it("prefixes plain errors with their name", () => {
    expect(describeFailure(new RangeError("out of range"))).toBe("Error: RangeError: out of range");
  });
});
