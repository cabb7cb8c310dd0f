import { configSchema, type Config } from './schema.js';
import { ConfigurationError } from '../utils/errors.js';

type Env = Record<string, string | undefined>;

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  return parseInt(value, 10);
}

/**
 * Read settings from an environment map and validate them.
 * Unset variables fall back to the schema defaults.
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    port: parseInteger(env.PORT),
    nodeEnv: env.NODE_ENV || undefined,
    logLevel: env.LOG_LEVEL || undefined,

    // API Authentication
    jwtSecret: env.JWT_SECRET || undefined,
    jwtIssuer: env.JWT_ISSUER || undefined,
    jwtExpiresIn: env.JWT_EXPIRES_IN || undefined,

    // Guardrails
    guardrailsEnabled: parseBoolean(env.GUARDRAILS_ENABLED),
    guardrailsConfigPath: env.GUARDRAILS_CONFIG_PATH || undefined,
    maxInputLength: parseInteger(env.GUARDRAILS_MAX_INPUT),
    logBlockedRequests: parseBoolean(env.GUARDRAILS_LOG_BLOCKED),
    backendTimeoutMs: parseInteger(env.GUARDRAILS_BACKEND_TIMEOUT_MS),

    // External backend
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigurationError('Invalid configuration', result.error.flatten().fieldErrors);
  }

  return result.data;
}

export type { Config };
