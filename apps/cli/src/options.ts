import { z } from 'zod';
import { DEFAULT_DATE_THRESHOLD, MIN_MONTHS } from '@ledgerline/types';

export const AVAILABLE_FORMATS = ['json', 'csv'] as const;
export type OutputFormat = (typeof AVAILABLE_FORMATS)[number];

// Helper to parse boolean env vars
export const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

export const envString = (key: string): string | undefined => {
  const val = process.env[key];
  return val === undefined || val === '' ? undefined : val;
};

/**
 * Options as commander hands them over. Numbers arrive as strings from the
 * command line or the environment.
 */
export const CliOptionsSchema = z.object({
  inputDir: z.string().min(1).optional(),
  out: z.string().min(1).optional(),
  format: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(AVAILABLE_FORMATS))
    .default('json'),
  pretty: z.boolean().default(true),
  verbose: z.boolean().default(false),
  minMonths: z.coerce.number().int().min(1).default(MIN_MONTHS),
  dateThreshold: z.coerce.number().gt(0).lt(1).default(DEFAULT_DATE_THRESHOLD),
});
export type CliOptions = z.infer<typeof CliOptionsSchema>;

export function parseCliOptions(raw: unknown): CliOptions {
  const result = CliOptionsSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid options: ${details}`);
  }
  return result.data;
}
