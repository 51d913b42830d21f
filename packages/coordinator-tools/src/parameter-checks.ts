/**
 * Pure parameter checks: schema conformance (via Zod) plus the security
 * disallow-list. Produces ValidationIssues; never repairs.
 */

import type { z } from 'zod';
import type { SecurityTier, ToolSchema, ValidationIssue } from '@taskloom/coordinator-contracts';
import { toZodSchema } from './schema-converter.js';
import { formatPath, schemaAt, valueAt, type PathSegment } from './schema-paths.js';
import { isPathField, matchFamilies, sandboxViolation } from './security-rules.js';
import { VALIDATION_CONFIG } from './config.js';
import { describeValue, editDistance, isPlainObject } from './utils.js';

export interface CheckOptions {
  tier: SecurityTier;
  sandboxRoot: string;
}

const zodCache = new WeakMap<ToolSchema, z.ZodTypeAny>();

function zodFor(schema: ToolSchema): z.ZodTypeAny {
  let compiled = zodCache.get(schema);
  if (!compiled) {
    compiled = toZodSchema(schema);
    zodCache.set(schema, compiled);
  }
  return compiled;
}

/**
 * All issues with `parameters` against `schema`, schema issues first.
 */
export function checkParameters(schema: ToolSchema, parameters: unknown, options: CheckOptions): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const parsed = zodFor(schema).safeParse(parameters);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      issues.push(...mapZodIssue(issue, schema, parameters));
    }
  }
  issues.push(...scanSecurity(schema, parameters, options));
  return issues;
}

// ═══════════════════════════════════════════════════════════════════════════
// Zod issue mapping
// ═══════════════════════════════════════════════════════════════════════════

function mapZodIssue(issue: z.ZodIssue, schema: ToolSchema, parameters: unknown): ValidationIssue[] {
  const field = formatPath(issue.path);
  const actual = valueAt(parameters, issue.path);

  switch (issue.code) {
    case 'invalid_type':
      if (issue.received === 'undefined') {
        return [missingRequired(field, issue.expected)];
      }
      return [
        {
          field,
          kind: 'type_mismatch',
          message: `Parameter "${field || '(root)'}" must be ${issue.expected}, got ${issue.received}`,
          expected: issue.expected,
          actual: describeValue(actual),
          suggestion: typeSuggestion(issue.expected, actual),
        },
      ];

    case 'custom':
      if (issue.params?.kind === 'missing_required') {
        return [missingRequired(field, 'a value')];
      }
      break;

    case 'invalid_enum_value': {
      const options = issue.options.map(String);
      const closest = closestOption(String(actual), options);
      return [
        {
          field,
          kind: 'enum_violation',
          message: `Parameter "${field}" must be one of: ${options.join(', ')}`,
          expected: `one of: ${options.join(', ')}`,
          actual: describeValue(actual),
          suggestion: closest ? `Did you mean "${closest}"?` : `Use one of: ${options.join(', ')}`,
        },
      ];
    }

    case 'unrecognized_keys':
      return issue.keys.map((key) => {
        const keyField = formatPath([...issue.path, key]);
        return {
          field: keyField,
          kind: 'extra_property' as const,
          message: `Unexpected parameter "${keyField}"`,
          expected: 'no additional properties',
          actual: key,
          suggestion: `Remove "${keyField}"`,
        };
      });

    case 'too_small':
    case 'too_big':
      return [sizeIssue(issue, field, actual)];

    case 'not_multiple_of':
      return [{ field, kind: 'range_violation', message: issue.message, actual: describeValue(actual) }];

    case 'invalid_string': {
      const pattern = schemaAt(schema, issue.path)?.pattern;
      const expected = issue.validation === 'regex' && pattern ? `pattern: ${pattern}` : `valid ${String(issue.validation)}`;
      return [
        {
          field,
          kind: 'pattern_mismatch',
          message: `Parameter "${field}" does not match ${expected}`,
          expected,
          actual: describeValue(actual),
          suggestion: `Provide a value matching ${expected}`,
        },
      ];
    }

    default:
      break;
  }

  return [{ field, kind: 'type_mismatch', message: issue.message, actual: describeValue(actual) }];
}

function missingRequired(field: string, expected: string): ValidationIssue {
  return {
    field,
    kind: 'missing_required',
    message: `Missing required parameter "${field}"`,
    expected,
    actual: 'undefined',
    suggestion: `Provide "${field}"`,
  };
}

function sizeIssue(issue: z.ZodTooSmallIssue | z.ZodTooBigIssue, field: string, actual: unknown): ValidationIssue {
  const small = issue.code === 'too_small';
  const bound = String(small ? issue.minimum : issue.maximum);
  const relation = small ? 'at least' : 'at most';

  if (issue.type === 'string' || issue.type === 'array') {
    const unit = issue.type === 'string' ? 'characters' : 'items';
    const size = typeof actual === 'string' || Array.isArray(actual) ? `${actual.length} ${unit}` : describeValue(actual);
    return {
      field,
      kind: 'length_violation',
      message: `Parameter "${field}" must have ${relation} ${bound} ${unit}`,
      expected: `${relation} ${bound} ${unit}`,
      actual: size,
      suggestion: small ? `Provide a longer value` : `Shorten to ${bound} ${unit}`,
    };
  }

  const comparison = small ? (issue.inclusive ? '>=' : '>') : issue.inclusive ? '<=' : '<';
  return {
    field,
    kind: 'range_violation',
    message: `Parameter "${field}" must be ${comparison} ${bound}`,
    expected: `${comparison} ${bound}`,
    actual: describeValue(actual),
    suggestion: `Use a value ${comparison} ${bound}`,
  };
}

function typeSuggestion(expected: string, actual: unknown): string {
  if (expected === 'integer' && typeof actual === 'number') {
    return `Use a whole number, e.g. ${Math.round(actual)}`;
  }
  if (expected === 'boolean') {
    return 'Use true or false';
  }
  if (expected === 'array') {
    return 'Wrap the value in an array';
  }
  return `Provide a ${expected} value`;
}

/**
 * Case-insensitive exact match, or the option within a small edit distance.
 */
export function closestOption(value: string, options: readonly string[]): string | null {
  const lowered = value.toLowerCase();
  const exact = options.find((option) => option.toLowerCase() === lowered);
  if (exact !== undefined) {
    return exact;
  }

  let best: string | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const option of options) {
    const distance = editDistance(lowered, option.toLowerCase());
    if (distance < bestDistance) {
      best = option;
      bestDistance = distance;
    }
  }
  const tolerance = Math.max(1, Math.floor(value.length / 3));
  return best !== null && bestDistance <= tolerance ? best : null;
}

// ═══════════════════════════════════════════════════════════════════════════
// Security scan
// ═══════════════════════════════════════════════════════════════════════════

function scanSecurity(schema: ToolSchema, parameters: unknown, options: CheckOptions): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  const visit = (value: unknown, path: PathSegment[], depth: number): void => {
    if (depth > VALIDATION_CONFIG.maxScanDepth) {
      return;
    }
    if (typeof value === 'string') {
      issues.push(...checkString(schema, value, path, options));
    } else if (Array.isArray(value)) {
      value.forEach((item, index) => visit(item, [...path, index], depth + 1));
    } else if (isPlainObject(value)) {
      for (const [key, child] of Object.entries(value)) {
        visit(child, [...path, key], depth + 1);
      }
    }
  };

  visit(parameters, [], 0);
  return issues;
}

function checkString(schema: ToolSchema, value: string, path: PathSegment[], options: CheckOptions): ValidationIssue[] {
  const field = formatPath(path);
  const name = path.filter((segment): segment is string => typeof segment === 'string').at(-1) ?? '';
  const pathField = isPathField(name, schemaAt(schema, path));
  const issues: ValidationIssue[] = matchFamilies(value, options.tier, pathField).map((family) => ({
    field,
    kind: 'security_violation' as const,
    message: `Potential ${family.replace('_', ' ')} in "${field}"`,
    expected: 'safe content',
    actual: `potential ${family}`,
    suggestion: 'Remove the unsafe content or use a safe alternative',
  }));

  if (options.tier === 'critical' && issues.length === 0 && pathField) {
    const reason = sandboxViolation(value);
    if (reason) {
      issues.push({
        field,
        kind: 'security_violation',
        message: `"${field}" must stay inside the sandbox root "${options.sandboxRoot}" (${reason})`,
        expected: `a path relative to ${options.sandboxRoot}`,
        actual: describeValue(value),
        suggestion: 'Use a relative path without ".." segments',
      });
    }
  }
  return issues;
}
