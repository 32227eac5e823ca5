/**
 * Zod error formatting shared by registry validation and config loading.
 */

import type { ZodError } from "zod";

/** "path: message" per issue, joined with "; ". */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return `${path}${issue.message}`;
    })
    .join("; ");
}
