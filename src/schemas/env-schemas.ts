import { z } from 'zod';

const BOOLEAN_FLAG = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .transform((v) => v === '1' || v === 'true' || v === 'yes');

// Environment variables read by the CLI; flags on the command line take precedence
export const ENV_SCHEMA = z.object({
  SYNCJOB_OUTPUT: z.enum(['line', 'json']).default('line'),
  SYNCJOB_VERBOSE: BOOLEAN_FLAG.default('false'),
});

export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
