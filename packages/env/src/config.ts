import { z } from 'zod';

const lengthLimit = z.coerce.number().int().positive();

const envSchema = z
  .object({
    BANK_NAME_MAX_LENGTH: lengthLimit.default(32),
    BANK_NAME_MIN_LENGTH: lengthLimit.default(4),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .refine((env) => env.BANK_NAME_MIN_LENGTH <= env.BANK_NAME_MAX_LENGTH, {
    message: 'must not exceed BANK_NAME_MAX_LENGTH',
    path: ['BANK_NAME_MIN_LENGTH'],
  });

export type ValidatedEnv = z.infer<typeof envSchema>;

/**
 * Inclusive length bounds for a bank name, measured after normalization.
 */
export interface BankNameLimits {
  readonly maxLength: number;
  readonly minLength: number;
}

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates an explicit environment object without touching the cache.
 * @throws Error listing every invalid variable
 */
export function parseEnv(env: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates process.env on first access and caches the result.
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Drops the cached environment so the next accessor re-reads process.env.
 * Intended for tests that stub variables.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Get the current NODE_ENV value.
 * @returns 'development', 'production', or 'test'
 */
export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  return validateEnv().NODE_ENV;
}

export function isTest(): boolean {
  return getNodeEnv() === 'test';
}

export function isProduction(): boolean {
  return getNodeEnv() === 'production';
}

export function isDevelopment(): boolean {
  return getNodeEnv() === 'development';
}

/**
 * Bank name length bounds.
 *
 * Priority:
 * 1. BANK_NAME_MIN_LENGTH / BANK_NAME_MAX_LENGTH (if set)
 * 2. 4..32 (default)
 */
export function getBankNameLimits(): BankNameLimits {
  const env = validateEnv();
  return { maxLength: env.BANK_NAME_MAX_LENGTH, minLength: env.BANK_NAME_MIN_LENGTH };
}
