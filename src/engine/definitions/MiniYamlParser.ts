/**
 * MiniYAML Parser
 *
 * Indentation-structured rule text: one indent unit (a tab by default)
 * per level, `key: value` per line, `#` comment lines.
 *
 *   E1:
 *   	Inherits: ^Soldier
 *   	Armament:
 *   		Weapon: M1Carbine
 *
 * The parser is tolerant. Depth jumps are attached to the nearest
 * shallower line, and nothing in the input makes it throw.
 */

import { createNode } from './MiniYamlNode';
import { debugParser } from '@/utils/debugLogger';
import type { DefinitionSet, MiniYamlNode } from './types';

export interface ParseOptions {
  /** Single indentation unit, counted at the start of each line */
  indent?: string;
  /** Lines starting with this (after indentation) are skipped */
  commentMarker?: string;
}

const DEFAULT_OPTIONS: Required<ParseOptions> = {
  indent: '\t',
  commentMarker: '#',
};

interface StackEntry {
  depth: number;
  node: MiniYamlNode;
}

/**
 * Parse MiniYAML text into its top-level definitions, in file order
 */
export function parseMiniYaml(text: string, options: ParseOptions = {}): DefinitionSet {
  const { indent, commentMarker } = { ...DEFAULT_OPTIONS, ...options };
  const root = createNode();
  const stack: StackEntry[] = [{ depth: -1, node: root }];

  for (const line of text.split(/\r?\n/)) {
    let depth = 0;
    let offset = 0;
    if (indent.length > 0) {
      while (line.startsWith(indent, offset)) {
        depth++;
        offset += indent.length;
      }
    }

    const content = line.slice(offset);
    if (content.trim().length === 0 || content.startsWith(commentMarker)) {
      continue;
    }

    // Pop to the nearest line with strictly smaller depth
    while (stack.length > 1 && stack[stack.length - 1].depth >= depth) {
      stack.pop();
    }
    const parent = stack[stack.length - 1].node;

    const colon = content.indexOf(':');
    const key = (colon === -1 ? content : content.slice(0, colon)).trim();
    const value = colon === -1 ? '' : content.slice(colon + 1).trim();

    if (parent.children.has(key)) {
      debugParser.log(`[MiniYamlParser] Duplicate key '${key}' replaces the earlier entry`);
    }

    const node = createNode(value);
    parent.children.set(key, node);
    stack.push({ depth, node });
  }

  return root.children;
}

/**
 * Combine several parsed documents into one definition set.
 * A name defined again in a later document replaces the earlier
 * definition entirely.
 */
export function mergeDocuments(documents: Iterable<DefinitionSet>): {
  definitions: DefinitionSet;
  overwritten: string[];
} {
  const definitions: DefinitionSet = new Map();
  const overwritten: string[] = [];

  for (const document of documents) {
    for (const [name, node] of document) {
      if (definitions.has(name)) {
        overwritten.push(name);
        debugParser.warn(`[MiniYamlParser] Definition '${name}' redefined by a later document`);
      }
      definitions.set(name, node);
    }
  }

  return { definitions, overwritten };
}
