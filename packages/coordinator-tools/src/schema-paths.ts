/**
 * Navigation helpers for dotted field paths ("ports.0.name").
 */

import type { ParameterSchema, ToolSchema } from '@taskloom/coordinator-contracts';
import { isPlainObject } from './utils.js';

export type PathSegment = string | number;

export function formatPath(path: readonly PathSegment[]): string {
  return path.map(String).join('.');
}

export function parsePath(field: string): string[] {
  return field === '' ? [] : field.split('.');
}

/**
 * Schema of the field at `path`, or undefined when the path leaves the schema.
 */
export function schemaAt(root: ToolSchema, path: readonly PathSegment[]): ParameterSchema | undefined {
  let current: ParameterSchema | ToolSchema = root;
  let found: ParameterSchema | undefined;
  for (const segment of path) {
    let next: ParameterSchema | undefined;
    if (current.type === 'array' && 'items' in current) {
      next = current.items;
    } else {
      next = current.properties?.[String(segment)];
    }
    if (!next) {
      return undefined;
    }
    current = next;
    found = next;
  }
  return found;
}

export function valueAt(root: unknown, path: readonly PathSegment[]): unknown {
  let current = root;
  for (const segment of path) {
    if (Array.isArray(current)) {
      current = current[Number(segment)];
    } else if (isPlainObject(current)) {
      current = current[String(segment)];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Container holding the last segment of `path`, if it exists.
 */
export function parentAt(
  root: unknown,
  path: readonly PathSegment[],
): { container: Record<string, unknown> | unknown[]; key: string } | null {
  const key = path.at(-1);
  if (key === undefined) {
    return null;
  }
  const parent = valueAt(root, path.slice(0, -1));
  if (Array.isArray(parent) || isPlainObject(parent)) {
    return { container: parent, key: String(key) };
  }
  return null;
}

export function setAt(root: unknown, path: readonly PathSegment[], value: unknown): boolean {
  const target = parentAt(root, path);
  if (!target) {
    return false;
  }
  if (Array.isArray(target.container)) {
    target.container[Number(target.key)] = value;
  } else {
    target.container[target.key] = value;
  }
  return true;
}

export function deleteAt(root: unknown, path: readonly PathSegment[]): boolean {
  const target = parentAt(root, path);
  if (!target || Array.isArray(target.container)) {
    return false;
  }
  return delete target.container[target.key];
}
