/**
 * Configuration validation schemas using Zod
 * Provides runtime type validation for environment configuration
 */

import { z } from 'zod';

const booleanFlag = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const integerString = z.string().trim().regex(/^\d+$/, 'must be a whole number').transform(Number);

const positiveSeconds = integerString.pipe(z.number().int().min(1).max(600));

const nonNegativeMs = integerString.pipe(z.number().int().min(0).max(3_600_000));

/**
 * Environment variables read at startup
 */
export const EnvConfigSchema = z.object({
  REMINDCTL_BIN: z.string().trim().min(1).default('remindctl'),
  REMINDCTL_READ_TIMEOUT_SECS: positiveSeconds.default('10'),
  REMINDCTL_WRITE_TIMEOUT_SECS: positiveSeconds.default('20'),
  AUTH_REQUIRED: booleanFlag.optional(),
  API_KEY: z.string().min(1).optional(),
  DELETE_ALLOW_MISSING: booleanFlag.default('true'),
  HEALTH_CACHE_MS: nonNegativeMs.default('5000'),
  AUTO_ROUTE_LISTS: booleanFlag.default('true'),
});

export type ValidatedEnvConfig = z.infer<typeof EnvConfigSchema>;

export const ENV_KEYS = Object.keys(EnvConfigSchema.shape);

/**
 * Validate environment configuration
 * @returns Validation result with parsed data or error
 */
export function validateEnvConfig(env: Record<string, string>): {
  success: boolean;
  data?: ValidatedEnvConfig;
  error?: z.ZodError;
} {
  const result = EnvConfigSchema.safeParse(env);

  if (result.success) {
    return {
      success: true,
      data: result.data,
    };
  }

  return {
    success: false,
    error: result.error,
  };
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
