/**
 * Zod schemas for the target catalog file
 *
 * Provides validation for the JSON catalog that targets are loaded from, with
 * TypeScript types inferred from the schemas.
 *
 */

import { z } from "zod";
import { VARIABLE_NAME_PATTERN } from "./template.js";

/**
 * Valid target name
 *
 * @public
 */
export const TARGET_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Target names reserved for built-in pseudo-targets
 *
 * @public
 */
export const RESERVED_TARGET_NAMES: ReadonlySet<string> = new Set(["help"]);

/**
 * Category assigned to targets that do not declare one
 *
 * @public
 */
export const DEFAULT_CATEGORY = "General";

/**
 * Schema for variable names used in guards and defaults
 *
 * @public
 */
export const VariableNameSchema = z
  .string()
  .regex(
    VARIABLE_NAME_PATTERN,
    "Variable names must start with a letter or underscore and contain only letters, digits and underscores",
  );

/**
 * Schema for a step: a bare command string or a command with a working directory
 *
 * @public
 */
export const StepSchema = z.union([
  z
    .string()
    .min(1, "Step command cannot be empty")
    .transform((run): { run: string; cwd?: string } => ({ run })),
  z
    .object({
      run: z.string().min(1, "Step command cannot be empty"),
      cwd: z.string().min(1, "Step working directory cannot be empty").optional(),
    })
    .strict(),
]);

/**
 * Schema for a target definition
 *
 * @public
 */
export const TargetSchema = z
  .object({
    name: z
      .string()
      .regex(
        TARGET_NAME_PATTERN,
        "Target names must start with a letter or digit and contain only letters, digits, dots, underscores and hyphens",
      ),
    category: z.string().trim().min(1, "Category cannot be empty").default(DEFAULT_CATEGORY),
    description: z.string().min(1).optional(),
    banner: z.string().min(1).optional(),
    guards: z.array(VariableNameSchema).default([]),
    steps: z.array(StepSchema).default([]),
  })
  .strict();

/**
 * Schema for the catalog file
 *
 * @public
 */
export const CatalogSchema = z
  .object({
    name: z.string().min(1, "Catalog name cannot be empty").default("infra"),
    variables: z.record(VariableNameSchema, z.string()).default({}),
    targets: z.array(TargetSchema).min(1, "Catalog must define at least one target"),
  })
  .strict()
  .superRefine((catalog, context) => {
    const seen = new Set<string>();

    for (const [index, target] of catalog.targets.entries()) {
      if (RESERVED_TARGET_NAMES.has(target.name)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["targets", index, "name"],
          message: `Target name '${target.name}' is reserved`,
        });
      }

      if (seen.has(target.name)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["targets", index, "name"],
          message: `Duplicate target name '${target.name}'`,
        });
      }

      seen.add(target.name);
    }
  });

/**
 * Parsed catalog file
 *
 * @public
 */
export type CatalogFile = z.infer<typeof CatalogSchema>;

/**
 * Parsed target entry
 *
 * @public
 */
export type CatalogTarget = z.infer<typeof TargetSchema>;

/**
 * Format zod issues as a single line
 *
 * @param error - Validation failure
 * @returns `path: message` pairs joined by "; "
 *
 * @public
 */
export function formatCatalogIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
