import { minimatch } from "minimatch";
import { z } from "zod";

/**
 * Count unclosed brackets and braces in a pattern, respecting escapes.
 */
function countUnclosedDelimiters(pattern: string): { brackets: number; braces: number } {
  let brackets = 0;
  let braces = 0;
  for (let i = 0; i < pattern.length; i++) {
    if (pattern[i] === "\\" && i + 1 < pattern.length) {
      i++; // Skip escaped character
      continue;
    }
    switch (pattern[i]) {
      case "[":
        brackets++;
        break;
      case "]":
        if (brackets > 0) {
          brackets--;
        }
        break;
      case "{":
        braces++;
        break;
      case "}":
        if (braces > 0) {
          braces--;
        }
        break;
    }
  }
  return { brackets, braces };
}

/**
 * Validate that a string is a valid glob pattern.
 * Checks for balanced brackets/braces since minimatch is too lenient.
 */
export function isValidGlobPattern(pattern: string): { valid: boolean; error?: string } {
  if (pattern.length === 0) {
    return { valid: false, error: "empty pattern" };
  }

  const unclosed = countUnclosedDelimiters(pattern);
  if (unclosed.brackets > 0) {
    return { valid: false, error: "unclosed bracket '['" };
  }
  if (unclosed.braces > 0) {
    return { valid: false, error: "unclosed brace '{'" };
  }

  try {
    const result = minimatch.makeRe(pattern);
    return result === false ? { valid: false, error: "invalid pattern syntax" } : { valid: true };
  } catch (error) {
    const message = error instanceof Error ? error.message : "Invalid glob pattern";
    return { valid: false, error: message };
  }
}

/**
 * Zod schema for a valid glob pattern string
 */
const globPatternSchema = z.string().superRefine((pattern, ctx) => {
  const result = isValidGlobPattern(pattern);
  if (!result.valid) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid glob pattern: "${pattern}" - ${result.error}`,
    });
  }
});

/** Loose release version: digits separated by dots, optional suffix */
const versionSchema = z
  .string()
  .regex(/^v?\d+(\.\d+)*([-+.]?[0-9A-Za-z.]+)?$/, "Expected a version such as 2.31.0");

const findingKindSchema = z.enum(["unused", "missing", "conflicting", "outdated", "unparseable"]);

const sectionSchema = z.enum([
  "requirements",
  "dependencies",
  "devDependencies",
  "peerDependencies",
  "optionalDependencies",
]);

// =============================================================================
// depmend.toml schema
// =============================================================================

const scanSchema = z
  .object({
    exclude: z.array(globPatternSchema).optional(),
    max_file_bytes: z.number().int().positive().optional(),
    timeout_ms: z.number().int().positive().optional(),
  })
  .strict()
  .optional();

const assistantSchema = z
  .object({
    model: z.string().min(1).optional(),
    timeout_ms: z.number().int().positive().optional(),
  })
  .strict()
  .optional();

const ecosystemGlobsSchema = z
  .object({
    python: z.array(globPatternSchema).optional(),
    node: z.array(globPatternSchema).optional(),
  })
  .strict()
  .optional();

/**
 * Zod schema for depmend.toml configuration
 */
export const configSchema = z
  .object({
    freshness_reference: z.record(z.string(), versionSchema).optional(),
    exempt_kinds: z.array(findingKindSchema).optional(),
    exempt_packages: z.array(globPatternSchema).optional(),
    exempt_sections: z.array(sectionSchema).optional(),
    aliases: z.record(z.string(), z.string().min(1)).optional(),
    ecosystem_file_globs: ecosystemGlobsSchema,
    scan: scanSchema,
    assistant: assistantSchema,
  })
  .strict();

/**
 * Raw configuration type inferred from the schema
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Default configuration
 */
export const defaultConfig: Config = {
  exempt_kinds: [],
  exempt_packages: ["@types/*", "types-*", "*-stubs"],
  exempt_sections: ["devDependencies", "peerDependencies"],
  freshness_reference: {},
  aliases: {},
};
