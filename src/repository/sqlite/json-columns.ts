/**
 * Parsing for JSON text columns
 * Values are validated field by field instead of trusted as-is
 */

import type { Platform } from '../../domain/types.js';
import { PLATFORMS } from '../../domain/types.js';

export function parseHandles(raw: string): Partial<Record<Platform, string>> {
  const parsed: unknown = JSON.parse(raw);
  const handles: Partial<Record<Platform, string>> = {};

  if (parsed === null || typeof parsed !== 'object') {
    return handles;
  }

  for (const platform of PLATFORMS) {
    const handle: unknown = Reflect.get(parsed, platform);
    if (typeof handle === 'string' && handle !== '') {
      handles[platform] = handle;
    }
  }

  return handles;
}

/**
 * Parse a fixed-length probability array; missing or malformed bins read as 0
 */
export function parseProbabilities(raw: string, length: number): number[] {
  const parsed: unknown = JSON.parse(raw);
  const values = Array.isArray(parsed) ? parsed : [];

  return Array.from({ length }, (_, bin) => {
    const value: unknown = values[bin];
    return typeof value === 'number' && Number.isFinite(value) ? value : 0;
  });
}
