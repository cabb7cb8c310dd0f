/**
 * Policy Construction
 *
 * Compiles a catalogue into an immutable PolicyConfig. A policy is built
 * once and held by a gateway for its lifetime; a new policy means a new
 * gateway.
 */

import type { PatternCategory, PatternRule, PolicyConfig, PolicySettings, RedactionRule } from './types.js';
import { loadPolicyCatalog, type PolicyCatalog } from './catalog.js';
import type { Config } from '../config/index.js';
import { PolicyCatalogError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'policy' });

export const DEFAULT_POLICY_SETTINGS: PolicySettings = {
  enabled: true,
  maxInputLength: 100_000,
  logBlockedRequests: true,
};

export type InvalidPatternMode = 'throw' | 'skip';

export interface CompileOptions {
  /**
   * 'throw' rejects the whole catalogue on the first pattern that does not
   * compile. 'skip' logs it and keeps it as a rule that never matches.
   */
  onInvalidPattern?: InvalidPatternMode;
}

function compileRegex(
  name: string,
  source: string,
  flags: string,
  mode: InvalidPatternMode
): RegExp | null {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    if (mode === 'throw') {
      throw new PolicyCatalogError(`Pattern "${name}" does not compile: ${reason}`, name);
    }
    log.warn({ pattern: name, reason }, 'Invalid pattern skipped - it will never match');
    return null;
  }
}

function compilePatterns(
  catalog: PolicyCatalog,
  category: PatternCategory,
  mode: InvalidPatternMode
): readonly PatternRule[] {
  const rules = catalog.patterns
    .filter((entry) => entry.category === category)
    .map((entry): PatternRule =>
      Object.freeze({
        name: entry.name,
        category: entry.category,
        source: entry.pattern,
        description: entry.description,
        appliesToOutput: entry.appliesToOutput ?? false,
        regex: compileRegex(entry.name, entry.pattern, entry.caseSensitive ? '' : 'i', mode),
      })
    );
  return Object.freeze(rules);
}

function compileRedactionRules(catalog: PolicyCatalog, mode: InvalidPatternMode): readonly RedactionRule[] {
  const rules = catalog.redactionRules.map((entry): RedactionRule =>
    Object.freeze({
      name: entry.name,
      source: entry.pattern,
      replacement: entry.replacement,
      regex: compileRegex(entry.name, entry.pattern, entry.caseSensitive ? 'g' : 'gi', mode),
    })
  );
  return Object.freeze(rules);
}

export function compilePolicy(
  catalog: PolicyCatalog,
  settings: Partial<PolicySettings> = {},
  options: CompileOptions = {}
): PolicyConfig {
  const mode = options.onInvalidPattern ?? 'throw';
  const effective = { ...DEFAULT_POLICY_SETTINGS, ...settings };

  const injectionPatterns = compilePatterns(catalog, 'injection', mode);

  return Object.freeze({
    version: catalog.version,
    enabled: effective.enabled,
    maxInputLength: effective.maxInputLength,
    logBlockedRequests: effective.logBlockedRequests,
    jailbreakPatterns: compilePatterns(catalog, 'jailbreak', mode),
    injectionPatterns,
    traversalPatterns: compilePatterns(catalog, 'traversal', mode),
    secretPatterns: compilePatterns(catalog, 'secret', mode),
    dangerousCodePatterns: compilePatterns(catalog, 'dangerous-code', mode),
    blockedCommands: Object.freeze([...catalog.blockedCommands]),
    outputCommandPatterns: Object.freeze(injectionPatterns.filter((rule) => rule.appliesToOutput)),
    blockedPaths: Object.freeze([...catalog.blockedPaths]),
    redactionRules: compileRedactionRules(catalog, mode),
  });
}

/**
 * Policy seeded with the bundled catalogue.
 */
export function createDefaultPolicy(settings: Partial<PolicySettings> = {}): PolicyConfig {
  return compilePolicy(loadPolicyCatalog(), settings);
}

/**
 * Policy from application settings. Only the enable flag, the length limit
 * and the logging toggle are configurable; the pattern lists are bundled.
 */
export function policyFromSettings(
  config: Pick<Config, 'guardrailsEnabled' | 'maxInputLength' | 'logBlockedRequests'>
): PolicyConfig {
  return createDefaultPolicy({
    enabled: config.guardrailsEnabled,
    maxInputLength: config.maxInputLength,
    logBlockedRequests: config.logBlockedRequests,
  });
}

/** Look up a compiled pattern by its catalogue name. */
export function findPattern(policy: PolicyConfig, name: string): PatternRule | undefined {
  return [
    ...policy.jailbreakPatterns,
    ...policy.injectionPatterns,
    ...policy.traversalPatterns,
    ...policy.secretPatterns,
    ...policy.dangerousCodePatterns,
  ].find((rule) => rule.name === name);
}
