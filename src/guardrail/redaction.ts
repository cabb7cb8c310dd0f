/**
 * Redaction Engine
 *
 * Ordered substitution rules that mask secrets without touching the
 * surrounding text. Rules run in catalogue order: PEM blocks and
 * fixed-prefix provider keys first, generic key=value shapes last, so a
 * generic rule never eats a token a specific rule would mask better.
 */

import type { PolicyConfig } from './types.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'redaction' });

export const MASK_TOKEN = '***REDACTED***';
export const BLOCKED_COMMAND_PLACEHOLDER = '[BLOCKED COMMAND]';

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

function escapeRegExp(value: string): string {
  return value.replace(REGEX_SPECIALS, '\\$&');
}

/**
 * Apply every redaction rule. Always returns a string; running it on its
 * own output changes nothing because the mask token matches no rule.
 */
export function redact(text: string, policy: PolicyConfig): string {
  let result = text;

  for (const rule of policy.redactionRules) {
    if (!rule.regex) continue;
    try {
      result = result.replace(rule.regex, rule.replacement);
    } catch (error) {
      log.warn({ rule: rule.name, error }, 'Redaction rule failed - skipped');
    }
  }

  return result;
}

/**
 * Mask a single token for display in a findings report.
 */
export function maskSecret(token: string): string {
  if (token.length <= 8) return '*'.repeat(token.length);
  return token.slice(0, 4) + '*'.repeat(token.length - 8) + token.slice(-4);
}

/**
 * Replace every blocked command literal, case-insensitively, then every
 * match of the output command patterns, with a placeholder.
 */
export function sanitizeOutput(text: string, policy: PolicyConfig): string {
  let result = text;

  for (const command of policy.blockedCommands) {
    if (!result.toLowerCase().includes(command.toLowerCase())) continue;
    const pattern = new RegExp(escapeRegExp(command), 'gi');
    result = result.replace(pattern, () => BLOCKED_COMMAND_PLACEHOLDER);
  }

  for (const rule of policy.outputCommandPatterns) {
    if (!rule.regex) continue;
    const pattern = new RegExp(rule.regex.source, `${rule.regex.flags}g`);
    result = result.replace(pattern, () => BLOCKED_COMMAND_PLACEHOLDER);
  }

  return result;
}
