/**
 * Detection Actions
 *
 * One stateless check per threat category. Each takes the text and a
 * policy and returns a Finding, or null when nothing fired. None of them
 * throw: a rule whose pattern did not compile, or whose evaluation fails,
 * counts as "no match" for that rule only.
 */

import type { CodeRisk, Finding, PatternRule, PolicyConfig, SecretFinding } from './types.js';
import { maskSecret } from './redaction.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'detectors' });

/** Characters that do not count towards the obfuscation ratio besides letters and digits */
const ALLOWED_PUNCTUATION = new Set([' ', '\n', '\t', '.', ',', '!', '?', '-', '_', "'", '"']);
const ALPHANUMERIC = /[\p{L}\p{N}]/u;
const MAX_SPECIAL_RATIO = 0.5;

function matches(rule: PatternRule, text: string): boolean {
  if (!rule.regex) return false;
  try {
    return rule.regex.test(text);
  } catch (error) {
    log.warn({ pattern: rule.name, error }, 'Pattern evaluation failed - treated as no match');
    return false;
  }
}

function firstMatch(rules: readonly PatternRule[], text: string): PatternRule | undefined {
  return rules.find((rule) => matches(rule, text));
}

function normalizePath(value: string): string {
  return value.replace(/\\/g, '/').toLowerCase();
}

// =============================================
// INPUT CHECKS
// =============================================

export function detectJailbreak(text: string, policy: PolicyConfig): Finding | null {
  const rule = firstMatch(policy.jailbreakPatterns, text.toLowerCase());
  if (!rule) return null;

  log.debug({ pattern: rule.name }, 'Jailbreak pattern matched');
  return {
    category: 'JAILBREAK',
    matchedPattern: rule.name,
    message: `Jailbreak phrasing matched "${rule.name}"`,
  };
}

export function detectInjection(text: string, policy: PolicyConfig): Finding | null {
  const lowered = text.toLowerCase();

  const command = policy.blockedCommands.find((cmd) => lowered.includes(cmd.toLowerCase()));
  if (command) {
    log.debug({ command }, 'Blocked command matched');
    return {
      category: 'INJECTION',
      matchedPattern: command,
      message: `Blocked command "${command}" found in input`,
    };
  }

  const rule = firstMatch(policy.injectionPatterns, lowered);
  if (rule) {
    log.debug({ pattern: rule.name }, 'Injection pattern matched');
    return {
      category: 'INJECTION',
      matchedPattern: rule.name,
      message: `Command injection pattern "${rule.name}" matched`,
    };
  }

  return null;
}

export function detectUnsafePath(text: string, policy: PolicyConfig): Finding | null {
  const normalized = normalizePath(text);

  for (const blockedPath of policy.blockedPaths) {
    let needle = normalizePath(blockedPath);
    if (needle.startsWith('~')) needle = needle.slice(1);

    if (needle && normalized.includes(needle)) {
      log.debug({ path: blockedPath }, 'Blocked path matched');
      return {
        category: 'PATH_TRAVERSAL',
        matchedPattern: blockedPath,
        message: `Sensitive path "${blockedPath}" referenced`,
      };
    }
  }

  // Traversal syntax is checked on the raw text so normalization cannot hide it
  const rule = firstMatch(policy.traversalPatterns, text);
  if (rule) {
    log.debug({ pattern: rule.name }, 'Path traversal pattern matched');
    return {
      category: 'PATH_TRAVERSAL',
      matchedPattern: rule.name,
      message: `Path traversal syntax matched "${rule.name}"`,
    };
  }

  return null;
}

export function detectUnsafeInput(text: string, policy: PolicyConfig): Finding | null {
  let length = 0;
  let special = 0;
  for (const ch of text) {
    length++;
    if (!ALPHANUMERIC.test(ch) && !ALLOWED_PUNCTUATION.has(ch)) special++;
  }

  if (length > policy.maxInputLength) {
    log.debug({ length, limit: policy.maxInputLength }, 'Input too long');
    return {
      category: 'LENGTH_VIOLATION',
      matchedPattern: 'max-input-length',
      message: `Input length ${length} exceeds limit of ${policy.maxInputLength}`,
    };
  }

  if (text.includes('\u0000')) {
    log.debug('Null byte in input');
    return {
      category: 'CONTROL_CHARACTER',
      matchedPattern: 'null-byte',
      message: 'Input contains a null byte',
    };
  }

  const ratio = special / Math.max(length, 1);
  if (ratio > MAX_SPECIAL_RATIO) {
    log.debug({ ratio: Number(ratio.toFixed(2)) }, 'High special character ratio');
    return {
      category: 'OBFUSCATION_RATIO',
      matchedPattern: 'special-character-ratio',
      message: `Special character ratio ${ratio.toFixed(2)} exceeds ${MAX_SPECIAL_RATIO}`,
    };
  }

  return null;
}

// =============================================
// OUTPUT CHECKS
// =============================================

export function detectBlockedCommandOutput(text: string, policy: PolicyConfig): Finding | null {
  const lowered = text.toLowerCase();
  const command = policy.blockedCommands.find((cmd) => lowered.includes(cmd.toLowerCase()));
  if (command) {
    log.debug({ command }, 'Blocked command in output');
    return {
      category: 'BLOCKED_COMMAND_OUTPUT',
      matchedPattern: command,
      message: `Output repeats blocked command "${command}"`,
    };
  }

  const rule = firstMatch(policy.outputCommandPatterns, text);
  if (rule) {
    log.debug({ pattern: rule.name }, 'Blocked command pattern in output');
    return {
      category: 'BLOCKED_COMMAND_OUTPUT',
      matchedPattern: rule.name,
      message: `Output matches blocked command pattern "${rule.name}"`,
    };
  }

  return null;
}

export function detectSecret(text: string, policy: PolicyConfig): Finding | null {
  const rule = firstMatch(policy.secretPatterns, text);
  if (!rule) return null;

  log.debug({ pattern: rule.name }, 'Secret pattern matched');
  return {
    category: 'SECRET_LEAK',
    matchedPattern: rule.name,
    message: `Secret shape "${rule.name}" found`,
  };
}

/**
 * Every secret-pattern match, per line, with the matched text masked.
 */
export function scanSecrets(text: string, policy: PolicyConfig): SecretFinding[] {
  const findings: SecretFinding[] = [];
  const lines = text.split(/\r?\n/);

  for (const rule of policy.secretPatterns) {
    if (!rule.regex) continue;
    const globalRegex = new RegExp(rule.regex.source, `${rule.regex.flags}g`);

    lines.forEach((line, index) => {
      for (const match of line.matchAll(globalRegex)) {
        findings.push({
          patternName: rule.name,
          line: index + 1,
          excerpt: maskSecret(match[0]),
        });
      }
    });
  }

  return findings.sort((a, b) => a.line - b.line);
}

// =============================================
// ADVISORY
// =============================================

/**
 * Risky constructs in generated code. Advisory only: callers decide what
 * to do with the result, the gates never block on it.
 */
export function detectDangerousCode(code: string, policy: PolicyConfig): CodeRisk[] {
  const risks: CodeRisk[] = [];
  for (const rule of policy.dangerousCodePatterns) {
    if (!matches(rule, code)) continue;
    const description = rule.description ?? rule.name;
    log.debug({ pattern: rule.name }, 'Dangerous code pattern matched');
    risks.push({ name: rule.name, description });
  }
  return risks;
}

// =============================================
// BOOLEAN FORMS
// =============================================

export const checkJailbreakAttempt = (text: string, policy: PolicyConfig): boolean =>
  detectJailbreak(text, policy) !== null;

export const checkCodeInjection = (text: string, policy: PolicyConfig): boolean =>
  detectInjection(text, policy) !== null;

export const checkUnsafeFilePath = (text: string, policy: PolicyConfig): boolean =>
  detectUnsafePath(text, policy) !== null;

export const checkInputSafety = (text: string, policy: PolicyConfig): boolean =>
  detectUnsafeInput(text, policy) !== null;

export const checkOutputSafety = (text: string, policy: PolicyConfig): boolean =>
  detectBlockedCommandOutput(text, policy) !== null;

export const detectSecrets = (text: string, policy: PolicyConfig): boolean =>
  detectSecret(text, policy) !== null;

export const checkDangerousCode = (code: string, policy: PolicyConfig): boolean =>
  detectDangerousCode(code, policy).length > 0;
