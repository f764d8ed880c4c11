import type { FieldKey } from './types';

export const INHERITS_PREFIX = 'Inherits';
export const REMOVAL_MARKER = '-';

export function isInheritsKey(key: string): boolean {
  return key.startsWith(INHERITS_PREFIX);
}

export function isRemovalKey(key: string): boolean {
  return key.startsWith(REMOVAL_MARKER);
}

/**
 * Classify a child key of a definition. `value` is the child's scalar,
 * which names the parent for inheritance directives.
 */
export function classifyKey(key: string, value: string): FieldKey {
  if (isInheritsKey(key)) {
    return { kind: 'inherits', key, parent: value };
  }
  if (isRemovalKey(key)) {
    return { kind: 'removal', key, target: key.slice(REMOVAL_MARKER.length) };
  }
  return { kind: 'field', key };
}
