/**
 * ParameterRepairer — mechanical fixes for invalid tool parameters.
 *
 * Every technique is applied to a detached copy. After each round the copy
 * is re-checked; a repair is only returned when the result validates, so a
 * non-null `repairedParameters` always passes `checkParameters`.
 */

import type {
  ParameterSchema,
  RepairOutcome,
  RepairTechnique,
  ToolParameters,
  ToolSchema,
  ValidationIssue,
} from '@taskloom/coordinator-contracts';
import { checkParameters, closestOption, type CheckOptions } from './parameter-checks.js';
import { deleteAt, parentAt, parsePath, schemaAt, setAt, valueAt } from './schema-paths.js';
import { isPathField, matchFamilies, stripDisallowed, toSandboxedName } from './security-rules.js';
import { PARAMETER_ALIASES, REPAIR_CONFIDENCE, REPAIR_CONFIG } from './config.js';
import { isPlainObject, snapshotValue } from './utils.js';

export interface RepairOptions extends CheckOptions {
  /** Alias table for `alias_mapping`; defaults to PARAMETER_ALIASES */
  aliases?: Readonly<Record<string, readonly string[]>>;
}

/** The issue no longer applies because an earlier repair resolved it. */
type IssueRepair = RepairTechnique | 'moot' | null;

/**
 * Product of the confidence factors of the distinct techniques used.
 */
export function repairConfidence(techniques: Iterable<RepairTechnique>): number {
  let confidence = 1;
  for (const technique of new Set(techniques)) {
    confidence *= REPAIR_CONFIDENCE[technique];
  }
  return confidence;
}

export function repairParameters(
  schema: ToolSchema,
  parameters: ToolParameters,
  errors: readonly ValidationIssue[],
  options: RepairOptions,
): RepairOutcome {
  const draft = snapshotValue(parameters);
  const techniques = new Set<RepairTechnique>();
  if (!isPlainObject(draft)) {
    return declined([...errors], techniques);
  }

  let issues: readonly ValidationIssue[] = errors;
  for (let round = 0; round < REPAIR_CONFIG.maxRounds; round++) {
    const unresolved: ValidationIssue[] = [];
    // Missing fields first, so an alias is moved before its key is removed as extra.
    const ordered = [...issues].sort((a, b) => issueRank(a) - issueRank(b));
    for (const issue of ordered) {
      const technique = repairIssue(draft, schema, issue, options);
      if (technique === null) {
        unresolved.push(issue);
      } else if (technique !== 'moot') {
        techniques.add(technique);
      }
    }
    if (unresolved.length > 0) {
      return declined(unresolved, techniques);
    }

    issues = checkParameters(schema, draft, options);
    if (issues.length === 0) {
      return {
        repairedParameters: draft,
        confidence: repairConfidence(techniques),
        techniques: [...techniques],
        unresolved: [],
      };
    }
  }

  return declined([...issues], techniques);
}

function issueRank(issue: ValidationIssue): number {
  return issue.kind === 'missing_required' ? 0 : 1;
}

function declined(unresolved: ValidationIssue[], techniques: Set<RepairTechnique>): RepairOutcome {
  return { repairedParameters: null, confidence: 0, techniques: [...techniques], unresolved };
}

// ═══════════════════════════════════════════════════════════════════════════
// Techniques
// ═══════════════════════════════════════════════════════════════════════════

function repairIssue(
  draft: Record<string, unknown>,
  schema: ToolSchema,
  issue: ValidationIssue,
  options: RepairOptions,
): IssueRepair {
  const path = parsePath(issue.field);
  if (path.length === 0) {
    return null;
  }
  const fieldSchema = schemaAt(schema, path);
  const value = valueAt(draft, path);

  switch (issue.kind) {
    case 'missing_required':
      if (value !== undefined) {
        return null;
      }
      if (moveAlias(draft, schema, path, options.aliases ?? PARAMETER_ALIASES)) {
        return 'alias_mapping';
      }
      if (fieldSchema?.default !== undefined) {
        return setAt(draft, path, snapshotValue(fieldSchema.default)) ? 'default_fill' : null;
      }
      return null;

    case 'type_mismatch': {
      if (!fieldSchema || value === undefined) {
        return null;
      }
      const coerced = coerceValue(value, fieldSchema);
      return coerced.ok && setAt(draft, path, coerced.value) ? 'coercion' : null;
    }

    case 'length_violation':
      if (typeof value === 'string' && fieldSchema?.maxLength !== undefined && value.length > fieldSchema.maxLength) {
        return setAt(draft, path, value.slice(0, fieldSchema.maxLength)) ? 'truncation' : null;
      }
      if (Array.isArray(value) && fieldSchema?.maxItems !== undefined && value.length > fieldSchema.maxItems) {
        return setAt(draft, path, value.slice(0, fieldSchema.maxItems)) ? 'truncation' : null;
      }
      return null;

    case 'range_violation':
      if (typeof value === 'number' && fieldSchema) {
        return setAt(draft, path, clamp(value, fieldSchema)) ? 'range_clamp' : null;
      }
      return null;

    case 'enum_violation': {
      const match = fieldSchema?.enum && value !== undefined ? closestOption(String(value), fieldSchema.enum) : null;
      return match !== null && setAt(draft, path, match) ? 'closest_enum' : null;
    }

    case 'extra_property': {
      const target = parentAt(draft, path);
      if (target && !Array.isArray(target.container) && !(target.key in target.container)) {
        return 'moot';
      }
      return deleteAt(draft, path) ? 'extra_property_removal' : null;
    }

    case 'pattern_mismatch':
      if (typeof value === 'string' && fieldSchema?.pattern) {
        const cleaned = fitPattern(value, new RegExp(fieldSchema.pattern));
        return cleaned !== null && setAt(draft, path, cleaned) ? 'content_stripping' : null;
      }
      return null;

    case 'security_violation': {
      if (typeof value !== 'string') {
        return null;
      }
      const pathField = isPathField(path.at(-1) ?? '', fieldSchema);
      const safe = pathField ? toSandboxedName(value) : stripDisallowed(value, options.tier);
      if (!safe || matchFamilies(safe, options.tier, pathField).length > 0) {
        return null;
      }
      return setAt(draft, path, safe) ? 'content_stripping' : null;
    }

    case 'unknown_tool':
      return null;
  }
}

/**
 * Fill the missing field at `path` from an undeclared sibling key that names
 * it differently. A key equal up to case, `_` and `-` wins; otherwise the
 * first alias listed for the field that is present.
 */
function moveAlias(
  draft: Record<string, unknown>,
  schema: ToolSchema,
  path: readonly string[],
  aliases: Readonly<Record<string, readonly string[]>>,
): boolean {
  const target = parentAt(draft, path);
  if (!target || Array.isArray(target.container)) {
    return false;
  }
  const container = target.container;
  const declared = path.length === 1 ? schema.properties : schemaAt(schema, path.slice(0, -1))?.properties;
  const undeclared = Object.keys(container).filter((key) => declared?.[key] === undefined);

  const source = findAlias(target.key, undeclared, aliases);
  if (source === null) {
    return false;
  }
  container[target.key] = container[source];
  delete container[source];
  return true;
}

function findAlias(
  name: string,
  candidates: readonly string[],
  aliases: Readonly<Record<string, readonly string[]>>,
): string | null {
  const wanted = squash(name);
  const loose = candidates.filter((key) => squash(key) === wanted);
  if (loose.length === 1) {
    return loose[0] ?? null;
  }
  return (aliases[name] ?? []).find((alias) => candidates.includes(alias)) ?? null;
}

function squash(key: string): string {
  return key.toLowerCase().replace(/[_-]/g, '');
}

type Coercion = { ok: true; value: unknown } | { ok: false };

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * string ↔ number ↔ boolean conversions, plus JSON-encoded arrays/objects.
 */
export function coerceValue(value: unknown, schema: ParameterSchema): Coercion {
  switch (schema.type) {
    case 'string':
      if (typeof value === 'number' || typeof value === 'boolean') {
        return { ok: true, value: String(value) };
      }
      return { ok: false };

    case 'number':
    case 'integer': {
      let numeric: number | undefined;
      if (typeof value === 'string' && NUMERIC.test(value.trim())) {
        numeric = Number(value.trim());
      } else if (typeof value === 'boolean') {
        numeric = value ? 1 : 0;
      } else if (typeof value === 'number' && Number.isFinite(value)) {
        numeric = value;
      }
      if (numeric === undefined) {
        return { ok: false };
      }
      return { ok: true, value: schema.type === 'integer' ? Math.round(numeric) : numeric };
    }

    case 'boolean': {
      const word = typeof value === 'string' || typeof value === 'number' ? String(value).trim().toLowerCase() : null;
      if (word !== null && REPAIR_CONFIG.trueWords.includes(word)) {
        return { ok: true, value: true };
      }
      if (word !== null && REPAIR_CONFIG.falseWords.includes(word)) {
        return { ok: true, value: false };
      }
      return { ok: false };
    }

    case 'array': {
      const decoded = typeof value === 'string' ? decodeJson(value) : undefined;
      if (Array.isArray(decoded)) {
        return { ok: true, value: decoded };
      }
      return Array.isArray(value) ? { ok: false } : { ok: true, value: [value] };
    }

    case 'object': {
      const decoded = typeof value === 'string' ? decodeJson(value) : undefined;
      return isPlainObject(decoded) ? { ok: true, value: decoded } : { ok: false };
    }

    case 'null':
      return value === 'null' ? { ok: true, value: null } : { ok: false };
  }
}

function decodeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function clamp(value: number, schema: ParameterSchema): number {
  let result = value;
  if (schema.minimum !== undefined && result < schema.minimum) {
    result = schema.minimum;
  }
  if (schema.maximum !== undefined && result > schema.maximum) {
    result = schema.maximum;
  }
  return schema.type === 'integer' ? Math.round(result) : result;
}

const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f]/g;

function fitPattern(value: string, pattern: RegExp): string | null {
  const stripped = value.replace(CONTROL_CHARS, '').trim();
  if (pattern.test(stripped)) {
    return stripped;
  }
  const underscored = stripped.replace(/\s+/g, '_');
  return pattern.test(underscored) ? underscored : null;
}
