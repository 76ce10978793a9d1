/**
 * Configuration Validator
 *
 * Zod schemas for the structured data moo reads from disk or from code:
 * - Project manifests (composer.json / manifest.json)
 * - Command metadata declared as `static meta` on command classes
 */

import { z } from 'zod';

/**
 * Project manifest schema
 *
 * Only the fields used for classification are kept. A field with the wrong
 * type is treated as absent instead of rejecting the whole manifest.
 */
export const ManifestSchema = z.object({
  name: z.string().optional().catch(undefined),
  type: z.string().optional().catch(undefined),
  require: z.record(z.unknown()).optional().catch(undefined),
});

export type Manifest = z.infer<typeof ManifestSchema>;

/**
 * Command metadata schema
 */
export const CommandMetaSchema = z.object({
  name: z
    .string()
    .min(1, 'Command name is required')
    .regex(/^[a-z][a-z0-9-]*(:[a-z0-9-]+)*$/, 'Command name must be lowercase words separated by ":"'),
  description: z.string().min(1, 'Command description is required'),
  usage: z.string().optional().describe('Argument synopsis shown by help'),
});

export type CommandMetaData = z.infer<typeof CommandMetaSchema>;

/**
 * Validation result
 */
export interface ValidationResult<T> {
  valid: boolean;
  data?: T;
  errors?: string[];
}

/**
 * Validate data against a Zod schema
 *
 * Logging is left to the caller, which knows whether a failure matters.
 */
export function validateConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { valid: true, data: result.data };
  }

  const errors = result.error.issues.map((issue: z.ZodIssue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return { valid: false, errors };
}

/**
 * Validate a parsed manifest
 */
export function validateManifest(data: unknown): ValidationResult<Manifest> {
  return validateConfig(ManifestSchema, data);
}

/**
 * Validate command metadata
 */
export function validateCommandMeta(data: unknown): ValidationResult<CommandMetaData> {
  return validateConfig(CommandMetaSchema, data);
}
