import type { MiniYamlNode, ReadonlyMiniYamlNode } from './types';

export function createNode(
  value: string = '',
  children: Iterable<readonly [string, MiniYamlNode]> = []
): MiniYamlNode {
  return { value, children: new Map(children) };
}

/**
 * Deep copy a node. `skipKey` drops matching children at every depth.
 */
export function cloneNode(
  node: ReadonlyMiniYamlNode,
  skipKey?: (key: string) => boolean
): MiniYamlNode {
  const copy = createNode(node.value);
  for (const [key, child] of node.children) {
    if (skipKey?.(key)) continue;
    copy.children.set(key, cloneNode(child, skipKey));
  }
  return copy;
}

export function isEmptyNode(node: ReadonlyMiniYamlNode): boolean {
  return node.value === '' && node.children.size === 0;
}

/**
 * Collect every node object reachable from `node`, itself included.
 * Used to check that resolved trees never share sub-trees.
 */
export function collectNodes(
  node: ReadonlyMiniYamlNode,
  into: Set<ReadonlyMiniYamlNode> = new Set()
): Set<ReadonlyMiniYamlNode> {
  into.add(node);
  for (const child of node.children.values()) {
    collectNodes(child, into);
  }
  return into;
}
