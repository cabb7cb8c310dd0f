import { startServer } from './api/server.js';
import { loadConfig, type Config } from './config/index.js';
import { getGateway, gatewayOptionsFromConfig } from './guardrail/index.js';
import { ConfigurationError } from './utils/errors.js';
import { logger } from './utils/logger.js';

function main(): void {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    logger.fatal({ issues: error.issues }, 'Invalid configuration');
    process.exitCode = 1;
    return;
  }

  logger.level = config.logLevel;
  logger.info({ nodeEnv: config.nodeEnv }, 'Safety gateway starting...');

  // Log configuration (without secrets)
  logger.info({
    port: config.port,
    guardrailsEnabled: config.guardrailsEnabled,
    maxInputLength: config.maxInputLength,
    backendConfigPath: config.guardrailsConfigPath,
    backendTimeoutMs: config.backendTimeoutMs,
    apiAuthConfigured: Boolean(config.jwtSecret),
  }, 'Configuration loaded');

  const gateway = getGateway(gatewayOptionsFromConfig(config));

  startServer(
    {
      gateway,
      auth: { secret: config.jwtSecret, issuer: config.jwtIssuer, expiresIn: config.jwtExpiresIn },
    },
    config.port
  );
}

main();
