/**
 * Schema Validation with Zod
 * Validates parser options and the names given to arguments and commands
 */

import { z } from 'zod';

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: string[] };

function toValidationResult<I, T>(result: z.SafeParseReturnType<I, T>): ValidationResult<T> {
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((e) =>
      e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message
    ),
  };
}

// =============================================================================
// Names
// =============================================================================

const shortNameSchema = z
  .string()
  .regex(/^[^-\s=]$/, 'short flag must be a single character other than "-" or "="');

const longNameSchema = z
  .string()
  .regex(
    /^[A-Za-z0-9][A-Za-z0-9_.-]*$/,
    'long flag must start with a letter or digit and contain no spaces or "="'
  );

/** Command and required argument names; they are matched against plain tokens */
const wordNameSchema = z
  .string()
  .regex(/^[^-\s]\S*$/, 'name must be non-empty, contain no spaces and not start with "-"');

const optionalNamesSchema = z
  .object({
    short: shortNameSchema.optional(),
    long: longNameSchema.optional(),
    description: z.string(),
  })
  .refine((names) => names.short !== undefined || names.long !== undefined, {
    message: 'an optional argument needs a short or a long flag',
  });

export type OptionalNamesInput = z.infer<typeof optionalNamesSchema>;

/**
 * Validate the short/long names of an optional argument
 */
export function validateOptionalNames(data: unknown): ValidationResult<OptionalNamesInput> {
  return toValidationResult(optionalNamesSchema.safeParse(data));
}

/**
 * Validate a required argument or command name
 */
export function validateWordName(name: unknown): ValidationResult<string> {
  return toValidationResult(wordNameSchema.safeParse(name));
}

// =============================================================================
// Parser options
// =============================================================================

const parserSettingsSchema = z.object({
  programName: wordNameSchema,
  description: z.string().default(''),
  /** Register `-h/--help` on every command */
  addHelp: z.boolean().default(true),
  /** Treat argv[0] as the program name and skip it */
  skipProgramName: z.boolean().default(true),
});

export type ParserSettingsInput = z.input<typeof parserSettingsSchema>;
export type ParserSettings = z.output<typeof parserSettingsSchema>;

/**
 * Validate parser settings, filling in defaults
 */
export function validateParserSettings(data: unknown): ValidationResult<ParserSettings> {
  return toValidationResult(parserSettingsSchema.safeParse(data));
}
