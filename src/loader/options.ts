import { z } from 'zod';
import { ConfigurationError } from '../errors';

export const LoaderOptionsSchema = z
  .object({
    name: z.string().min(1).default('default').describe('Loader name, used in diagnostics'),
    strict: z
      .boolean()
      .default(true)
      .describe('Fail on unknown types and un-prefixed attribute keys instead of skipping them'),
    verbose: z.boolean().default(false).describe('Log per-document load statistics'),
    inferAttributeTypes: z
      .boolean()
      .default(true)
      .describe('Infer attr subTypes from literal values when no attribute requirement exists'),
    requireAttributePrefix: z
      .boolean()
      .default(true)
      .describe('JSON documents must prefix inline attributes with "@"'),
    validateOnLoad: z
      .boolean()
      .default(true)
      .describe('Check required attributes and children once loading finishes'),
  })
  .strict();

export type TLoaderOptions = z.output<typeof LoaderOptionsSchema>;
export type TLoaderOptionsInput = z.input<typeof LoaderOptionsSchema>;

/**
 * Apply defaults and reject unknown or mistyped options.
 */
export function resolveLoaderOptions(input: TLoaderOptionsInput = {}): TLoaderOptions {
  const result = LoaderOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid loader options: ${issues}`);
  }
  return result.data;
}
