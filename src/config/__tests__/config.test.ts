import { describe, it, expect } from 'vitest';
import { loadConfig } from '../index.js';
import { ConfigurationError } from '../../utils/errors.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      nodeEnv: 'development',
      logLevel: 'info',
      jwtIssuer: 'agent-safety-gateway',
      jwtExpiresIn: '30d',
      guardrailsEnabled: true,
      guardrailsConfigPath: 'guardrails_config',
      maxInputLength: 100_000,
      logBlockedRequests: true,
      backendTimeoutMs: 10_000,
    });
  });

  it('reads guardrail settings', () => {
    const config = loadConfig({
      GUARDRAILS_ENABLED: 'false',
      GUARDRAILS_MAX_INPUT: '500',
      GUARDRAILS_LOG_BLOCKED: '0',
      GUARDRAILS_CONFIG_PATH: '/etc/guardrails',
      GUARDRAILS_BACKEND_TIMEOUT_MS: '2500',
      ANTHROPIC_API_KEY: 'test-key',
    });

    expect(config).toMatchObject({
      guardrailsEnabled: false,
      maxInputLength: 500,
      logBlockedRequests: false,
      guardrailsConfigPath: '/etc/guardrails',
      backendTimeoutMs: 2500,
      anthropicApiKey: 'test-key',
    });
  });

  it('accepts 1 and TRUE as true', () => {
    expect(loadConfig({ GUARDRAILS_ENABLED: '1' }).guardrailsEnabled).toBe(true);
    expect(loadConfig({ GUARDRAILS_ENABLED: 'TRUE' }).guardrailsEnabled).toBe(true);
  });

  it('treats empty values as unset', () => {
    expect(loadConfig({ GUARDRAILS_MAX_INPUT: '', ANTHROPIC_API_KEY: '' })).toMatchObject({
      maxInputLength: 100_000,
    });
    expect(loadConfig({ ANTHROPIC_API_KEY: '' }).anthropicApiKey).toBeUndefined();
  });

  it('rejects a non-numeric limit', () => {
    expect(() => loadConfig({ GUARDRAILS_MAX_INPUT: 'lots' })).toThrow(ConfigurationError);
  });

  it('rejects a short JWT secret', () => {
    try {
      loadConfig({ JWT_SECRET: 'too-short' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) expect(error.issues.jwtSecret).toHaveLength(1);
    }
  });
});
