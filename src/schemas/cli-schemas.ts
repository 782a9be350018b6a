import { z } from 'zod';

// Options of the analyze command; undefined means "not given on the command line"
export const ANALYZE_OPTIONS_SCHEMA = z.object({
  verbose: z.boolean().optional(),
  output: z.enum(['line', 'json']).optional(),
  configString: z.string().min(1).optional(),
});

// Options of the validate-config command
export const VALIDATE_CONFIG_OPTIONS_SCHEMA = z.object({
  output: z.enum(['line', 'json']).default('line'),
});

// Inferred types
export type AnalyzeOptions = z.infer<typeof ANALYZE_OPTIONS_SCHEMA>;
export type ValidateConfigOptions = z.infer<typeof VALIDATE_CONFIG_OPTIONS_SCHEMA>;
