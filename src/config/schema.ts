/**
 * Configuration Schema
 *
 * Defines the shape of xslt-chunk.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Named helper-pattern presets for common stylesheet generators
 */
export const HelperPresetSchema = z.enum(['mapforce', 'saxon', 'custom', 'generic']);
export type HelperPreset = z.infer<typeof HelperPresetSchema>;

/**
 * Semantic sub-chunking targets for large main templates
 */
export const SemanticConfigSchema = z.object({
  target_tokens: z
    .number()
    .int()
    .min(1)
    .describe('Preferred size of a semantic section'),
  max_tokens: z
    .number()
    .int()
    .min(1)
    .describe('Size at which a section is cut at the next boundary'),
  min_tokens: z
    .number()
    .int()
    .min(0)
    .describe('Sections are never cut below this size'),
});

const ChunkerConfigShape = z.object({
  max_tokens_per_chunk: z
    .number()
    .int()
    .min(1)
    .describe('Hard ceiling for any emitted chunk'),
  overlap_tokens: z
    .number()
    .int()
    .min(0)
    .describe('Context carried into the next piece of a split chunk'),
  main_template_split_threshold: z
    .number()
    .int()
    .min(1)
    .describe('Main templates above this size are split semantically'),
  helper_patterns: z
    .array(z.string())
    .optional()
    .describe('Regexes naming helper templates (omit for the mapforce preset, [] for none)'),
  semantic: SemanticConfigSchema,
});

/**
 * Root configuration schema, including the cross-field rules
 */
export const ChunkerConfigSchema = ChunkerConfigShape.superRefine((config, ctx) => {
  if (config.overlap_tokens >= config.max_tokens_per_chunk) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['overlap_tokens'],
      message: 'Must be less than max_tokens_per_chunk',
    });
  }

  const { target_tokens, max_tokens, min_tokens } = config.semantic;
  if (min_tokens >= target_tokens) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['semantic', 'min_tokens'],
      message: 'Must be less than semantic.target_tokens',
    });
  }
  if (target_tokens > max_tokens) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['semantic', 'target_tokens'],
      message: 'Must not exceed semantic.max_tokens',
    });
  }

  if (config.main_template_split_threshold < target_tokens) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['main_template_split_threshold'],
      message: 'Must be at least semantic.target_tokens',
    });
  }
});

/**
 * TypeScript type inferred from the schema
 */
export type ChunkerConfig = z.infer<typeof ChunkerConfigShape>;
export type SemanticConfig = z.infer<typeof SemanticConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialChunkerConfigSchema = ChunkerConfigShape.deepPartial();
export type PartialChunkerConfig = z.infer<typeof PartialChunkerConfigSchema>;

/**
 * Render zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}
