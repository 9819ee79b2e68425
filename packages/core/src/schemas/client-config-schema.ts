/**
 * Client configuration.
 *
 * Explicit values win over the environment, the environment wins over the
 * defaults.
 */

import { z } from 'zod';
import {
  describeValidationErrors,
  formatZodErrors,
  type ValidationError,
  type ValidationResult,
} from './validation';

// Verify model and region compatibility before changing the default region
export const DEFAULT_AWS_REGION = 'us-east-1';
export const DEFAULT_TIMEOUT_MS = 90000;
export const DEFAULT_CONNECTION_TIMEOUT_MS = 5000;

export const ClientConfigSchema = z.object({
  region: z.string().trim().min(1, 'region must not be empty'),
  timeout: z.number().int().positive('timeout must be a positive integer (ms)'),
  connectionTimeout: z.number().int().positive('connectionTimeout must be a positive integer (ms)'),
  maxAttempts: z.number().int().positive('maxAttempts must be a positive integer').optional(),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

/** Any subset of the config; missing fields are filled in by resolveClientConfig. */
export type ClientConfigInput = Partial<ClientConfig>;

export class ConfigurationError extends Error {
  constructor(readonly errors: ValidationError[]) {
    super(`Invalid client configuration: ${describeValidationErrors(errors)}`);
    this.name = 'ConfigurationError';
  }
}

export function validateClientConfig(config: unknown): ValidationResult<ClientConfig> {
  const parsed = ClientConfigSchema.safeParse(config);
  if (!parsed.success) {
    return { valid: false, errors: formatZodErrors(parsed.error) };
  }
  return { valid: true, data: parsed.data, errors: [] };
}

/**
 * Fill in a config from the environment (AWS_REGION, BEDROCK_TIMEOUT_MS)
 * and the defaults, then validate it.
 *
 * @throws ConfigurationError when the result does not validate
 */
export function resolveClientConfig(
  config: ClientConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  const envTimeout = env.BEDROCK_TIMEOUT_MS;

  const result = validateClientConfig({
    region: config.region ?? (env.AWS_REGION || DEFAULT_AWS_REGION),
    timeout: config.timeout ?? (envTimeout ? Number(envTimeout) : DEFAULT_TIMEOUT_MS),
    connectionTimeout: config.connectionTimeout ?? DEFAULT_CONNECTION_TIMEOUT_MS,
    maxAttempts: config.maxAttempts,
  });

  if (!result.valid) {
    throw new ConfigurationError(result.errors);
  }
  return result.data;
}
