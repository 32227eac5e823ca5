/**
 * Reads name/version metadata from the demo's package.json.
 */

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { createLogger, formatZodError } from "@clidispatch/shared";

const logger = createLogger("PackageInfo");

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const PackageJsonSchema = z.object({
  version: z.string().min(1),
  description: z.string().optional(),
});

export type PackageInfo = z.infer<typeof PackageJsonSchema>;

const FALLBACK: PackageInfo = { version: "0.0.0" };

/** Falls back to 0.0.0 when package.json is missing or malformed. */
export function readPackageInfo(path = resolve(__dirname, "../package.json")): PackageInfo {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    logger.debug("package.json not readable", { path, error: err instanceof Error ? err.message : String(err) });
    return FALLBACK;
  }

  const result = PackageJsonSchema.safeParse(raw);
  if (!result.success) {
    logger.warn("Invalid package.json", { path, issues: formatZodError(result.error) });
    return FALLBACK;
  }
  return result.data;
}
