#!/usr/bin/env node

/**
 * clidispatch-demo entry point.
 */

import { createDemoApp } from "./app.js";

async function main(): Promise<number> {
  const result = await createDemoApp().run(process.argv.slice(2));
  return result.exitCode;
}

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
