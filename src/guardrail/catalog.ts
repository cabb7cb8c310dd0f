/**
 * Policy Catalogue
 *
 * The pattern lists live in data/default-policy.json as versioned data,
 * so every pattern can be tested by name and the catalogue can grow
 * without touching control flow.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { PolicyCatalogError } from '../utils/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// data/ is at project root, not in src/
export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '../../data/default-policy.json');

export const catalogPatternSchema = z.object({
  name: z.string().min(1),
  category: z.enum(['jailbreak', 'injection', 'traversal', 'secret', 'dangerous-code']),
  pattern: z.string().min(1),
  caseSensitive: z.boolean().optional(),
  description: z.string().optional(),
  /** Also sanitize matches of this command pattern in output */
  appliesToOutput: z.boolean().optional(),
});

export const catalogRedactionSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().min(1),
  replacement: z.string(),
  caseSensitive: z.boolean().optional(),
});

export const policyCatalogSchema = z.object({
  version: z.string().min(1),
  patterns: z.array(catalogPatternSchema),
  blockedCommands: z.array(z.string().min(1)),
  blockedPaths: z.array(z.string().min(1)),
  redactionRules: z.array(catalogRedactionSchema),
});

export type CatalogPattern = z.infer<typeof catalogPatternSchema>;
export type CatalogRedaction = z.infer<typeof catalogRedactionSchema>;
export type PolicyCatalog = z.infer<typeof policyCatalogSchema>;

/**
 * Validate an already-parsed catalogue object.
 */
export function parsePolicyCatalog(raw: unknown): PolicyCatalog {
  const result = policyCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new PolicyCatalogError(`Invalid policy catalogue: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
  }

  const names = new Set<string>();
  for (const entry of result.data.patterns) {
    if (names.has(entry.name)) {
      throw new PolicyCatalogError(`Duplicate pattern name in catalogue: ${entry.name}`, entry.name);
    }
    names.add(entry.name);
  }

  return result.data;
}

let defaultCatalog: PolicyCatalog | null = null;

/**
 * Read a catalogue file. The default catalogue is read once and cached.
 */
export function loadPolicyCatalog(catalogPath: string = DEFAULT_CATALOG_PATH): PolicyCatalog {
  const isDefault = catalogPath === DEFAULT_CATALOG_PATH;
  if (isDefault && defaultCatalog) return defaultCatalog;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(catalogPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PolicyCatalogError(`Cannot read policy catalogue at ${catalogPath}: ${reason}`);
  }

  const catalog = parsePolicyCatalog(raw);
  if (isDefault) defaultCatalog = catalog;
  return catalog;
}
