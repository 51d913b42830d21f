/**
 * Lexical helpers for locating JSON objects inside free-form text.
 *
 * The scanner is string-aware: braces inside "..." literals (including
 * escaped quotes) do not count towards nesting.
 */

/**
 * Index of the `}` closing the object that opens at `start`, or null when
 * the text ends first.
 */
export function findClosingBrace(text: string, start: number): number | null {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      depth++;
    } else if (ch === '}' || ch === ']') {
      depth--;
      if (depth === 0) {
        return ch === '}' ? i : null;
      }
      if (depth < 0) {
        return null;
      }
    }
  }
  return null;
}

export type EnclosingObject =
  | { kind: 'closed'; start: number; end: number }
  | { kind: 'unclosed'; start: number }
  | { kind: 'none' };

/**
 * Innermost `{...}` that contains `index`.
 *
 * Walks open braces backwards from `index`; the first one whose balanced
 * span reaches past `index` is the innermost container. A brace that never
 * closes makes the result `unclosed`.
 */
export function findEnclosingObject(text: string, index: number, floor = 0): EnclosingObject {
  let unclosed: number | null = null;
  for (let open = text.lastIndexOf('{', index); open >= floor; open = open === 0 ? -1 : text.lastIndexOf('{', open - 1)) {
    const close = findClosingBrace(text, open);
    if (close === null) {
      unclosed ??= open;
      continue;
    }
    if (close > index) {
      return { kind: 'closed', start: open, end: close };
    }
  }
  return unclosed === null ? { kind: 'none' } : { kind: 'unclosed', start: unclosed };
}

/**
 * Escape raw control characters that appear inside string literals, which
 * models often emit in multi-line parameter values.
 */
export function escapeControlCharsInStrings(json: string): string {
  let out = '';
  let inString = false;
  let escaped = false;

  for (const ch of json) {
    if (inString) {
      if (escaped) {
        escaped = false;
        out += ch;
        continue;
      }
      if (ch === '\\') {
        escaped = true;
        out += ch;
        continue;
      }
      if (ch === '"') {
        inString = false;
        out += ch;
        continue;
      }
      const code = ch.charCodeAt(0);
      if (code < 0x20) {
        out += ch === '\n' ? '\\n' : ch === '\r' ? '\\r' : ch === '\t' ? '\\t' : `\\u${code.toString(16).padStart(4, '0')}`;
        continue;
      }
      out += ch;
      continue;
    }
    if (ch === '"') {
      inString = true;
    }
    out += ch;
  }
  return out;
}

/**
 * JSON.parse, retrying once with control characters escaped.
 */
export function decodeJson(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (first) {
    try {
      return { ok: true, value: JSON.parse(escapeControlCharsInStrings(text)) };
    } catch {
      return { ok: false, error: first instanceof Error ? first.message : String(first) };
    }
  }
}
