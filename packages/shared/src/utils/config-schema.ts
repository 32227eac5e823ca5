/**
 * Zod schemas for registry inputs: app config, plugin descriptors and global options.
 *
 * Validated once at registry build; failures become RegistryValidationError.
 */

import { z } from "zod";

export const AppConfigSchema = z.object({
  name: z.string().min(1, "App name must not be empty"),
  version: z.string().min(1, "App version must not be empty"),
  description: z.string().optional().default(""),
});

/** Option and command names: letters, digits and dashes, starting with a letter. */
const NAME_PATTERN = /^[A-Za-z][A-Za-z0-9-]*$/;

export const GlobalOptionTypeSchema = z.enum(["boolean", "integer", "unsigned", "float", "string"]);

export const GlobalOptionSchema = z
  .object({
    name: z.string().regex(NAME_PATTERN, "Option name must start with a letter and contain only letters, digits and dashes"),
    short: z
      .string()
      .regex(/^[A-Za-z0-9?]$/, "Short flag must be a single letter, digit or '?'")
      .optional(),
    type: GlobalOptionTypeSchema,
    default: z.union([z.boolean(), z.number(), z.string()]),
    description: z.string(),
    category: z.string().optional(),
  })
  .superRefine((opt, ctx) => {
    const expected = opt.type === "boolean" ? "boolean" : opt.type === "string" ? "string" : "number";
    if (typeof opt.default !== expected) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["default"],
        message: `Default for ${opt.type} option must be a ${expected}`,
      });
      return;
    }
    if (typeof opt.default === "number") {
      if ((opt.type === "integer" || opt.type === "unsigned") && !Number.isInteger(opt.default)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["default"], message: "Default must be an integer" });
      }
      if (opt.type === "unsigned" && opt.default < 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["default"], message: "Default must not be negative" });
      }
    }
  });

export const PluginDescriptorSchema = z.object({
  name: z.string().min(1, "Plugin name must not be empty"),
  priority: z.number().int("Plugin priority must be an integer").optional(),
});

export const CommandSegmentSchema = z
  .string()
  .regex(/^[^\s-][^\s]*$/, "Command path segments must be non-empty, contain no whitespace and not start with '-'");

export type ValidatedAppConfig = z.infer<typeof AppConfigSchema>;
