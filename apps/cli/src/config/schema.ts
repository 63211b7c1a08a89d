import { z } from 'zod';

// Which diagnostics make `check` exit non-zero
export const FailOnSchema = z.enum(['malformed', 'unsupported', 'never']);

// Output config
export const OutputConfigSchema = z.object({
  format: z.enum(['text', 'json']).default('text'),
  colors: z.boolean().default(true),
});

// Custom properties visible to every root element
export const VariablesSchema = z.record(
  z.string().startsWith('--', { message: 'Custom property names start with `--`' }),
  z.string(),
);

// Main config schema
export const StylewrightConfigSchema = z.object({
  include: z.array(z.string()).default(['**/*.css']),
  ignore: z.array(z.string()).default(['**/node_modules/**', '**/dist/**']),
  failOn: FailOnSchema.default('malformed'),
  variables: VariablesSchema.default({}),
  output: OutputConfigSchema.default({}),
});

// Types
export type FailOn = z.infer<typeof FailOnSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type StylewrightConfig = z.infer<typeof StylewrightConfigSchema>;
export type StylewrightConfigInput = z.input<typeof StylewrightConfigSchema>;

// Helper to define config (for user-facing config files)
export function defineConfig(config: StylewrightConfigInput): StylewrightConfig {
  return StylewrightConfigSchema.parse(config);
}
