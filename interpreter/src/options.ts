/**
 * Interpreter configuration.
 */

import { z } from 'zod';
import { StrataConfigError } from './errors';

export const InterpreterOptionsSchema = z
  .object({
    /** Emit runtime warnings through the context's warning sink. */
    warnings: z.boolean().default(true),
    /** Deepest method call nesting before evaluation fails. */
    maxCallDepth: z.number().int().positive().default(1000),
  })
  .strict();

export type InterpreterOptions = Readonly<z.output<typeof InterpreterOptionsSchema>>;
export type InterpreterOptionsInput = z.input<typeof InterpreterOptionsSchema>;

export const DEFAULT_OPTIONS: InterpreterOptions = resolveOptions();

/**
 * Validate options and fill in defaults.
 */
export function resolveOptions(input: unknown = {}): InterpreterOptions {
  const result = InterpreterOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new StrataConfigError(
      result.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
      }),
    );
  }
  return Object.freeze(result.data);
}
