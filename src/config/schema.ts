import { z } from 'zod';

export const configSchema = z.object({
  // Server
  port: z.number().min(1).max(65535).default(3000),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // API Authentication (guard endpoints answer 500 until a secret is set)
  jwtSecret: z.string().min(32).optional(),
  jwtIssuer: z.string().default('agent-safety-gateway'),
  jwtExpiresIn: z.string().default('30d'),

  // Guardrails
  guardrailsEnabled: z.boolean().default(true),
  // Directory holding backend.json for the optional external policy backend
  guardrailsConfigPath: z.string().min(1).default('guardrails_config'),
  maxInputLength: z.number().int().min(1).default(100_000),
  logBlockedRequests: z.boolean().default(true),
  backendTimeoutMs: z.number().int().min(100).max(120_000).default(10_000),

  // External backend credential (optional - enables AI-backed input checks)
  anthropicApiKey: z.string().optional(),
});

export type Config = z.infer<typeof configSchema>;
