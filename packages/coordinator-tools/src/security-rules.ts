/**
 * Disallow-list rules applied to string parameter values.
 *
 * Each security tier switches on a set of rule families. Path traversal
 * rules only apply to path-like fields, so file bodies that mention `../`
 * pass unchanged. The critical tier additionally confines path-like fields
 * to the sandbox root.
 */

import * as nodePath from 'node:path';
import type { ParameterSchema, SecurityTier } from '@taskloom/coordinator-contracts';

export type SecurityFamily = 'path_traversal' | 'script_injection' | 'code_injection' | 'sql_injection';

export const SECURITY_PATTERNS: Readonly<Record<SecurityFamily, readonly RegExp[]>> = {
  path_traversal: [
    /(\.\.\/|\.\.\\|%2e%2e%2f|%2e%2e%5c)/i,
    /(\/etc\/passwd|\/etc\/shadow|c:\\windows\\system32)/i,
  ],
  script_injection: [
    /(<script|javascript:|<[^>]*\bon\w+\s*=)/i,
    /(<iframe|<object|<embed|<link)/i,
  ],
  code_injection: [
    /(\beval\s*\(|\bexec\s*\(|\bimport\s+os\b|\bsubprocess\b)/i,
    /(__import__|\bgetattr\s*\(|\bsetattr\s*\(|\bdelattr\s*\()/i,
  ],
  sql_injection: [
    /(union\s+select|drop\s+table|delete\s+from|insert\s+into)/i,
    /(\bexecute\s*\(|sp_executesql)/i,
  ],
};

export const TIER_FAMILIES: Readonly<Record<SecurityTier, readonly SecurityFamily[]>> = {
  normal: ['path_traversal', 'script_injection'],
  high: ['path_traversal', 'script_injection', 'code_injection', 'sql_injection'],
  critical: ['path_traversal', 'script_injection', 'code_injection', 'sql_injection'],
};

/** Field names treated as filesystem paths when the schema gives no `format`. */
export const PATH_FIELD_NAMES: ReadonlySet<string> = new Set([
  'path',
  'file',
  'filepath',
  'filename',
  'file_path',
  'file_name',
  'directory',
  'dir',
  'folder',
  'dest',
  'destination',
  'src',
  'source_path',
  'target',
  'output_path',
  'output_dir',
]);

export function isPathField(name: string, schema: ParameterSchema | undefined): boolean {
  if (schema?.format === 'path') {
    return true;
  }
  return PATH_FIELD_NAMES.has(name.toLowerCase());
}

/** Families checked for a value of the given kind of field. */
export function activeFamilies(tier: SecurityTier, pathField: boolean): SecurityFamily[] {
  return TIER_FAMILIES[tier].filter((family) => pathField || family !== 'path_traversal');
}

export function matchFamilies(value: string, tier: SecurityTier, pathField: boolean): SecurityFamily[] {
  return activeFamilies(tier, pathField).filter((family) =>
    SECURITY_PATTERNS[family].some((pattern) => pattern.test(value)),
  );
}

/**
 * Why a path value is not confined to the sandbox root, or null if it is.
 */
export function sandboxViolation(value: string): string | null {
  if (value.startsWith('/') || value.startsWith('~') || /^[A-Za-z]:[\\/]/.test(value) || value.startsWith('\\\\')) {
    return 'absolute path';
  }
  const normalized = nodePath.posix.normalize(value.replace(/\\/g, '/'));
  if (normalized === '..' || normalized.startsWith('../')) {
    return 'path escapes the sandbox root';
  }
  return null;
}

/**
 * Rewrite a path into a name relative to the sandbox root, keeping only its
 * final segment. Returns null when nothing usable remains.
 */
export function toSandboxedName(value: string): string | null {
  const segments = value
    .replace(/%2f|%5c/gi, '/')
    .replace(/\\/g, '/')
    .split('/')
    .map((segment) => segment.replace(/%2e/gi, '.').trim())
    .filter((segment) => segment !== '' && segment !== '.' && segment !== '..' && !/^[A-Za-z]:$/.test(segment) && segment !== '~');
  const name = segments.at(-1);
  return name === undefined ? null : name;
}

/**
 * Remove every match of the tier's non-path rule patterns from a string.
 */
export function stripDisallowed(value: string, tier: SecurityTier): string {
  let result = value;
  for (const family of activeFamilies(tier, false)) {
    for (const pattern of SECURITY_PATTERNS[family]) {
      result = result.replace(new RegExp(pattern.source, `${pattern.flags.replace('g', '')}g`), '');
    }
  }
  return result.trim();
}
