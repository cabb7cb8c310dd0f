/**
 * Guardrail Types
 *
 * Types shared by the policy, the detection actions, the redaction engine
 * and the gateway. Everything here is plain data; nothing is mutated after
 * construction.
 */

export type PatternCategory = 'jailbreak' | 'injection' | 'traversal' | 'secret' | 'dangerous-code';

export type FindingCategory =
  | 'JAILBREAK'
  | 'INJECTION'
  | 'PATH_TRAVERSAL'
  | 'LENGTH_VIOLATION'
  | 'CONTROL_CHARACTER'
  | 'OBFUSCATION_RATIO'
  | 'BLOCKED_COMMAND_OUTPUT'
  | 'SECRET_LEAK';

/** Result of one detection action. Produced per call, never stored. */
export interface Finding {
  category: FindingCategory;
  /** Catalogue name of the pattern, or the literal, that fired */
  matchedPattern: string;
  message: string;
}

export interface PatternRule {
  readonly name: string;
  readonly category: PatternCategory;
  readonly source: string;
  readonly description?: string;
  readonly appliesToOutput: boolean;
  /** null when the source failed to compile; such a rule never matches */
  readonly regex: RegExp | null;
}

export interface RedactionRule {
  readonly name: string;
  readonly source: string;
  /** Global regex; null when the source failed to compile */
  readonly regex: RegExp | null;
  /** May reference capture groups as $1, $2 */
  readonly replacement: string;
}

export interface PolicyConfig {
  readonly version: string;
  readonly enabled: boolean;
  readonly maxInputLength: number;
  readonly logBlockedRequests: boolean;
  readonly jailbreakPatterns: readonly PatternRule[];
  readonly injectionPatterns: readonly PatternRule[];
  readonly traversalPatterns: readonly PatternRule[];
  readonly secretPatterns: readonly PatternRule[];
  readonly dangerousCodePatterns: readonly PatternRule[];
  /** Literal substrings, matched case-insensitively */
  readonly blockedCommands: readonly string[];
  /** Injection patterns the output gate also sanitizes */
  readonly outputCommandPatterns: readonly PatternRule[];
  /** Literal substrings; a leading ~ marks a home-relative path */
  readonly blockedPaths: readonly string[];
  readonly redactionRules: readonly RedactionRule[];
}

/** The externally configurable subset of a policy. */
export interface PolicySettings {
  enabled: boolean;
  maxInputLength: number;
  logBlockedRequests: boolean;
}

export type BlockSource = 'backend' | 'jailbreak' | 'injection' | 'path' | 'input';

export type InputVerdict =
  | { safe: true; reason: null }
  | { safe: false; reason: string; blockedBy: BlockSource };

export interface SecretFinding {
  patternName: string;
  line: number;
  /** Matched text with its middle masked */
  excerpt: string;
}

export interface CodeRisk {
  name: string;
  description: string;
}

export interface GatewayStatus {
  enabled: boolean;
  policyVersion: string;
  externalBackendAvailable: boolean;
  externalBackendInitialized: boolean;
  backendName: string | null;
  patternCounts: {
    jailbreak: number;
    injection: number;
    traversal: number;
    secret: number;
    dangerousCode: number;
    blockedCommands: number;
    blockedPaths: number;
    redactionRules: number;
  };
}
