/**
 * Infer the capability tags a sub-task needs from its text.
 */

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Capabilities whose keywords start a word in `description`, in table order.
 * "test" matches "testbench"; "spec" matches "specification".
 */
export function inferCapabilities(description: string, keywordTable: Readonly<Record<string, readonly string[]>>): string[] {
  const text = description.toLowerCase();
  const inferred: string[] = [];

  for (const [capability, keywords] of Object.entries(keywordTable)) {
    const hit = keywords.some((keyword) => {
      const normalized = keyword.trim().toLowerCase();
      return normalized.length > 0 && new RegExp(`\\b${escapeRegExp(normalized)}`).test(text);
    });
    if (hit) {
      inferred.push(capability);
    }
  }
  return inferred;
}

export function normalizeCapabilities(capabilities: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const capability of capabilities) {
    const tag = capability.trim().toLowerCase();
    if (tag) {
      seen.add(tag);
    }
  }
  return [...seen];
}
