/**
 * Guardrail Module
 *
 * Safety gateway for a conversational code assistant: checks input before
 * it reaches the model and sanitizes output before it reaches the user.
 * Runs WITHOUT execution rights - only text analysis.
 */

export {
  SafetyGateway,
  getGateway,
  resetGateway,
  createGateway,
  gatewayOptionsFromConfig,
  REJECTION_MESSAGES,
} from './gateway.js';
export type { GatewayOptions, CheckOptions } from './gateway.js';
export { createDefaultPolicy, policyFromSettings, compilePolicy, findPattern, DEFAULT_POLICY_SETTINGS } from './policy.js';
export { loadPolicyCatalog, parsePolicyCatalog, DEFAULT_CATALOG_PATH } from './catalog.js';
export type { PolicyCatalog } from './catalog.js';
export {
  detectJailbreak,
  detectInjection,
  detectUnsafePath,
  detectUnsafeInput,
  detectBlockedCommandOutput,
  detectSecret,
  detectDangerousCode,
  scanSecrets,
  checkJailbreakAttempt,
  checkCodeInjection,
  checkUnsafeFilePath,
  checkInputSafety,
  checkOutputSafety,
  detectSecrets,
  checkDangerousCode,
} from './detectors.js';
export { redact, maskSecret, sanitizeOutput, MASK_TOKEN, BLOCKED_COMMAND_PLACEHOLDER } from './redaction.js';
export { AnthropicPolicyBackend, loadPolicyBackend, parseBackendVerdict } from './backend.js';
export type { PolicyBackend, BackendVerdict, BackendMessage, BackendLoadResult } from './backend.js';
export { guardResponseStream } from './stream.js';
export { runSelfTest } from './self-test.js';
export type { SelfTestReport } from './self-test.js';
export type {
  PolicyConfig,
  PolicySettings,
  PatternRule,
  RedactionRule,
  Finding,
  FindingCategory,
  InputVerdict,
  BlockSource,
  SecretFinding,
  CodeRisk,
  GatewayStatus,
} from './types.js';
