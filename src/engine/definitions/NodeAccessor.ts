/**
 * Path lookups over resolved definitions.
 *
 * Rule files are not consistent about key casing (`Versus:` vs `versus:`),
 * so each step tries the exact key first and then the first key that
 * matches case-insensitively. Missing paths never throw.
 */

import { createNode } from './MiniYamlNode';
import type { ReadonlyMiniYamlNode } from './types';

function findKey(node: ReadonlyMiniYamlNode, key: string): ReadonlyMiniYamlNode | undefined {
  const exact = node.children.get(key);
  if (exact) return exact;

  const lower = key.toLowerCase();
  for (const [candidate, child] of node.children) {
    if (candidate.toLowerCase() === lower) {
      return child;
    }
  }
  return undefined;
}

/**
 * Follow a key path, returning undefined when any step is missing
 */
export function findChild(
  node: ReadonlyMiniYamlNode,
  ...path: string[]
): ReadonlyMiniYamlNode | undefined {
  let current = node;
  for (const key of path) {
    const next = findKey(current, key);
    if (!next) return undefined;
    current = next;
  }
  return current;
}

/**
 * Follow a key path, returning an empty node when any step is missing
 */
export function getChild(node: ReadonlyMiniYamlNode, ...path: string[]): ReadonlyMiniYamlNode {
  return findChild(node, ...path) ?? createNode();
}

/**
 * Scalar value at the end of a key path, or '' when the path is missing
 */
export function getValue(node: ReadonlyMiniYamlNode, ...path: string[]): string {
  return findChild(node, ...path)?.value ?? '';
}
