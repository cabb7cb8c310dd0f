/**
 * Safety Gateway
 *
 * Two pipelines around a conversational code assistant:
 *   Input gate:  optional external backend, then built-in checks in order
 *                jailbreak -> injection -> path -> general, first hit wins.
 *   Output gate: secret redaction, then blocked-command sanitizing. Never rejects.
 *
 * The gateway runs WITHOUT execution rights - it only reads text.
 */

import type { CodeRisk, Finding, GatewayStatus, InputVerdict, PolicyConfig, SecretFinding } from './types.js';
import { createDefaultPolicy, policyFromSettings } from './policy.js';
import {
  detectBlockedCommandOutput,
  detectDangerousCode,
  detectInjection,
  detectJailbreak,
  detectSecret,
  detectUnsafeInput,
  detectUnsafePath,
  scanSecrets,
} from './detectors.js';
import { redact, sanitizeOutput } from './redaction.js';
import { DEFAULT_BACKEND_MESSAGE, loadPolicyBackend, type PolicyBackend } from './backend.js';
import type { Config } from '../config/index.js';
import { withTimeout } from '../utils/timeout.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'gateway' });

export const DEFAULT_BACKEND_CONFIG_PATH = 'guardrails_config';
export const DEFAULT_BACKEND_TIMEOUT_MS = 10_000;

export const REJECTION_MESSAGES = {
  jailbreak: "I cannot help with that request. I'm designed to assist with legitimate coding tasks only.",
  injection: 'Potentially dangerous command detected. Please rephrase your request without destructive operations.',
  path: 'Cannot access system directories or sensitive paths. Please specify a safe working directory.',
  input: 'Input validation failed. Please check your request and try again.',
} as const;

type BuiltinCheck = keyof typeof REJECTION_MESSAGES;

const INPUT_CHECKS: ReadonlyArray<[BuiltinCheck, (text: string, policy: PolicyConfig) => Finding | null]> = [
  ['jailbreak', detectJailbreak],
  ['injection', detectInjection],
  ['path', detectUnsafePath],
  ['input', detectUnsafeInput],
];

const PASSED: InputVerdict = { safe: true, reason: null };

export interface GatewayOptions {
  policy?: PolicyConfig;
  /** Use this backend instead of loading one; null disables the backend */
  backend?: PolicyBackend | null;
  /** Directory holding backend.json */
  backendConfigPath?: string;
  anthropicApiKey?: string;
  backendTimeoutMs?: number;
}

export interface CheckOptions {
  /** Cancels the backend call; the built-in checks still run */
  signal?: AbortSignal;
}

export class SafetyGateway {
  readonly policy: PolicyConfig;
  private readonly backend: PolicyBackend | null = null;
  private readonly backendAvailable: boolean = false;
  private readonly backendTimeoutMs: number;

  constructor(options: GatewayOptions = {}) {
    this.policy = options.policy ?? createDefaultPolicy();
    this.backendTimeoutMs = options.backendTimeoutMs ?? DEFAULT_BACKEND_TIMEOUT_MS;

    if (!this.policy.enabled) {
      log.info('Guardrails disabled - all input passes and output is returned unchanged');
      return;
    }

    if (options.backend !== undefined) {
      this.backend = options.backend;
      this.backendAvailable = options.backend !== null;
      if (options.backend) log.info({ backend: options.backend.name }, 'External policy backend attached');
      return;
    }

    const configPath = options.backendConfigPath ?? DEFAULT_BACKEND_CONFIG_PATH;
    const loaded = loadPolicyBackend(configPath, options.anthropicApiKey);

    switch (loaded.status) {
      case 'absent':
        log.info({ reason: loaded.reason }, 'No external policy backend configured - using built-in checks');
        break;
      case 'failed':
        this.backendAvailable = true;
        log.error({ err: loaded.error }, 'Failed to initialize external policy backend - using built-in checks');
        break;
      case 'ready':
        this.backendAvailable = true;
        this.backend = loaded.backend;
        log.info({ backend: loaded.backend.name }, 'External policy backend initialized');
        break;
    }
  }

  get isEnabled(): boolean {
    return this.policy.enabled;
  }

  get isBackendInitialized(): boolean {
    return this.backend !== null;
  }

  // =============================================
  // Input gate
  // =============================================

  /**
   * Check input with the built-in checks only, on the calling stack.
   * The external backend needs I/O and is consulted by checkInput() alone.
   */
  checkInputSync(text: string): InputVerdict {
    if (!this.policy.enabled) return PASSED;
    if (this.backend) {
      log.debug({ backend: this.backend.name }, 'Synchronous check - external backend not consulted');
    }
    return this.runBuiltinChecks(text);
  }

  async checkInput(text: string, options: CheckOptions = {}): Promise<InputVerdict> {
    if (!this.policy.enabled) return PASSED;

    if (this.backend) {
      const verdict = await this.consultBackend(this.backend, text, options.signal);
      if (verdict) return verdict;
    }

    return this.runBuiltinChecks(text);
  }

  private async consultBackend(
    backend: PolicyBackend,
    text: string,
    signal?: AbortSignal
  ): Promise<InputVerdict | null> {
    const startTime = Date.now();
    try {
      const result = await withTimeout(
        (backendSignal) => backend.evaluate([{ role: 'user', content: text }], { signal: backendSignal }),
        this.backendTimeoutMs,
        signal
      );

      if (!result.blocked) return null;

      const reason = result.message || DEFAULT_BACKEND_MESSAGE;
      if (this.policy.logBlockedRequests) {
        log.warn(
          { blockedBy: 'backend', backend: backend.name, durationMs: Date.now() - startTime },
          'Input blocked by guardrails'
        );
      }
      return { safe: false, reason, blockedBy: 'backend' };
    } catch (error) {
      log.warn(
        { err: error, backend: backend.name, durationMs: Date.now() - startTime },
        'External policy backend check failed - falling back to built-in checks'
      );
      return null;
    }
  }

  private runBuiltinChecks(text: string): InputVerdict {
    for (const [check, detect] of INPUT_CHECKS) {
      const finding = detect(text, this.policy);
      if (!finding) continue;

      if (this.policy.logBlockedRequests) {
        log.warn(
          { blockedBy: check, category: finding.category, pattern: finding.matchedPattern, inputLength: text.length },
          'Input blocked by guardrails'
        );
      }
      return { safe: false, reason: REJECTION_MESSAGES[check], blockedBy: check };
    }

    return PASSED;
  }

  // =============================================
  // Output gate
  // =============================================

  processOutputSync(text: string): string {
    if (!this.policy.enabled) return text;

    let result = text;

    if (detectSecret(result, this.policy)) {
      result = redact(result, this.policy);
    }

    if (detectBlockedCommandOutput(result, this.policy)) {
      result = sanitizeOutput(result, this.policy);
    }

    if (result !== text) {
      log.info({ originalLength: text.length, processedLength: result.length }, 'Output sanitized by guardrails');
    }

    return result;
  }

  async processOutput(text: string): Promise<string> {
    return this.processOutputSync(text);
  }

  // =============================================
  // Advisory
  // =============================================

  findSecrets(text: string): SecretFinding[] {
    return scanSecrets(text, this.policy);
  }

  reviewGeneratedCode(code: string): CodeRisk[] {
    return detectDangerousCode(code, this.policy);
  }

  getStatus(): GatewayStatus {
    return {
      enabled: this.policy.enabled,
      policyVersion: this.policy.version,
      externalBackendAvailable: this.backendAvailable,
      externalBackendInitialized: this.isBackendInitialized,
      backendName: this.backend?.name ?? null,
      patternCounts: {
        jailbreak: this.policy.jailbreakPatterns.length,
        injection: this.policy.injectionPatterns.length,
        traversal: this.policy.traversalPatterns.length,
        secret: this.policy.secretPatterns.length,
        dangerousCode: this.policy.dangerousCodePatterns.length,
        blockedCommands: this.policy.blockedCommands.length,
        blockedPaths: this.policy.blockedPaths.length,
        redactionRules: this.policy.redactionRules.length,
      },
    };
  }
}

// =============================================
// Shared instance
// =============================================

let sharedGateway: SafetyGateway | null = null;

/**
 * Return the shared gateway, constructing it on first use. Options are
 * only read by the call that constructs it.
 */
export function getGateway(options?: GatewayOptions): SafetyGateway {
  if (!sharedGateway) {
    sharedGateway = new SafetyGateway(options);
  } else if (options) {
    log.debug('Shared gateway already constructed - options ignored, call resetGateway() first');
  }
  return sharedGateway;
}

/** Drop the shared gateway so the next getGateway() builds a fresh one. */
export function resetGateway(): void {
  sharedGateway = null;
}

/** Build an unshared gateway, for callers that pass it around explicitly. */
export function createGateway(options?: GatewayOptions): SafetyGateway {
  return new SafetyGateway(options);
}

export function gatewayOptionsFromConfig(config: Config): GatewayOptions {
  return {
    policy: policyFromSettings(config),
    backendConfigPath: config.guardrailsConfigPath,
    anthropicApiKey: config.anthropicApiKey,
    backendTimeoutMs: config.backendTimeoutMs,
  };
}
