/**
 * Inheritance Resolver
 *
 * Flattens definitions that inherit from one or more parents:
 *
 *   ^Tank:
 *   	Armor:
 *   		Type: Heavy
 *   2TNK:
 *   	Inherits: ^Tank
 *   	Inherits@GUN: ^Cannon
 *   	-Selectable:
 *
 * Parents are merged in the order their `Inherits` keys appear, so a
 * later parent wins over an earlier one; the definition's own fields
 * win over all of them. Removal keys (`-Trait`) then delete inherited
 * fields. Unknown parents resolve to nothing and cycles fall back to
 * the raw definition, so resolution always terminates without throwing.
 *
 * One resolver instance is one resolution run: its cache and in-progress
 * set live as long as the instance does.
 */

import { classifyKey, isInheritsKey } from './directives';
import { cloneNode, createNode } from './MiniYamlNode';
import { debugResolver } from '@/utils/debugLogger';
import type {
  MiniYamlNode,
  ReadonlyMiniYamlNode,
  ResolvedDefinition,
} from './types';

/**
 * Merge `source` into `target` in place. The source's scalar replaces the
 * target's; children merge recursively. Sub-trees the target lacks are
 * deep copied, never referenced.
 */
export function deepMerge(target: MiniYamlNode, source: ReadonlyMiniYamlNode): void {
  target.value = source.value;

  for (const [key, child] of source.children) {
    if (isInheritsKey(key)) continue;

    const existing = target.children.get(key);
    if (existing) {
      deepMerge(existing, child);
    } else {
      target.children.set(key, cloneNode(child, isInheritsKey));
    }
  }
}

export class InheritanceResolver {
  private readonly definitions: ReadonlyMap<string, ReadonlyMiniYamlNode>;
  private readonly cache: Map<string, ResolvedDefinition> = new Map();
  private readonly resolving: Set<string> = new Set();

  constructor(definitions: ReadonlyMap<string, ReadonlyMiniYamlNode>) {
    this.definitions = definitions;
  }

  /**
   * Resolve a definition by name. Cached results are shared between
   * callers and must not be modified.
   */
  public resolve(name: string): ResolvedDefinition {
    const cached = this.cache.get(name);
    if (cached) {
      return cached;
    }

    const node = this.definitions.get(name);
    if (!node) {
      debugResolver.log(`[InheritanceResolver] Unknown definition '${name}'`);
      return createNode();
    }

    if (this.resolving.has(name)) {
      debugResolver.warn(`[InheritanceResolver] Inheritance cycle through '${name}', using its own fields`);
      return node;
    }

    this.resolving.add(name);
    const result = createNode();

    const parents: string[] = [];
    for (const [key, child] of node.children) {
      const field = classifyKey(key, child.value);
      if (field.kind === 'inherits' && field.parent) {
        parents.push(field.parent);
      }
    }

    for (const parent of parents) {
      deepMerge(result, this.resolve(parent));
    }
    deepMerge(result, node);

    this.applyRemovals(result);

    for (const key of [...result.children.keys()]) {
      if (isInheritsKey(key)) {
        result.children.delete(key);
      }
    }

    this.resolving.delete(name);
    this.cache.set(name, result);
    return result;
  }

  /**
   * Resolve every known definition, in declaration order
   */
  public resolveAll(): Map<string, ResolvedDefinition> {
    const resolved = new Map<string, ResolvedDefinition>();
    for (const name of this.definitions.keys()) {
      resolved.set(name, this.resolve(name));
    }
    debugResolver.log(`[InheritanceResolver] Resolved ${resolved.size} definition(s)`);
    return resolved;
  }

  public has(name: string): boolean {
    return this.definitions.has(name);
  }

  public getCacheSize(): number {
    return this.cache.size;
  }

  private applyRemovals(result: MiniYamlNode): void {
    for (const key of [...result.children.keys()]) {
      const field = classifyKey(key, '');
      if (field.kind !== 'removal') continue;

      result.children.delete(field.target);
      result.children.delete(key);
    }
  }
}
