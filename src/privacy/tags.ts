import { isRecord } from '../inference/http.js';

export type ParsedTags = Record<string, unknown> | unknown[] | string;

/**
 * Tag fields arrive as a dict, a list, a bare label, or a JSON string of
 * any of those. Returns undefined for empty or unparsable input.
 */
export function parseTagField(raw: unknown): ParsedTags | undefined {
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (!trimmed) return undefined;
    if (!/^[[{"]/.test(trimmed)) return trimmed;

    let decoded: unknown;
    try {
      decoded = JSON.parse(trimmed);
    } catch {
      return undefined;
    }
    return parseTagField(decoded);
  }

  if (Array.isArray(raw)) return raw.length > 0 ? raw : undefined;
  if (isRecord(raw)) return Object.keys(raw).length > 0 ? raw : undefined;
  return undefined;
}

function collectStrings(value: unknown, into: Set<string>): void {
  if (typeof value === 'string') {
    const label = value.trim();
    if (label) into.add(label);
    return;
  }
  if (Array.isArray(value)) {
    for (const item of value) {
      if (typeof item === 'string') collectStrings(item, into);
    }
  }
}

/**
 * Folds a parsed tag field into flat labels. Dict values are always taken;
 * dict keys only when `includeKeys` is set (POUR keys are principle names,
 * UDL keys are just groupings of checkpoints).
 */
export function foldTags(parsed: ParsedTags | undefined, includeKeys: boolean, into: Set<string>): void {
  if (parsed === undefined) return;

  if (typeof parsed === 'string' || Array.isArray(parsed)) {
    collectStrings(parsed, into);
    return;
  }

  for (const [key, value] of Object.entries(parsed)) {
    if (includeKeys) collectStrings(key, into);
    collectStrings(value, into);
  }
}
