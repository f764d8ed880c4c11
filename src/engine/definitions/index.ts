/**
 * Definition System - Main Export
 *
 * Parses MiniYAML rule text and resolves inheritance between definitions.
 *
 * Usage:
 *
 * 1. Parse and resolve:
 *    const definitions = parseMiniYaml(text);
 *    const resolver = new InheritanceResolver(definitions);
 *    const tank = resolver.resolve('2TNK');
 *
 * 2. Read fields:
 *    getValue(tank, 'Valued', 'Cost');
 *
 * 3. Whole pipeline from disk:
 *    const tables = await loadDamageMatrix('/path/to/mods/ra');
 */

// Parsing
export { parseMiniYaml, mergeDocuments } from './MiniYamlParser';
export type { ParseOptions } from './MiniYamlParser';
export { createNode, cloneNode, isEmptyNode, collectNodes } from './MiniYamlNode';
export { classifyKey, isInheritsKey, isRemovalKey, INHERITS_PREFIX, REMOVAL_MARKER } from './directives';

// Resolution
export { InheritanceResolver, deepMerge } from './InheritanceResolver';

// Access
export { findChild, getChild, getValue } from './NodeAccessor';

// Loading
export { RulesetLoader, RULE_FILES } from './RulesetLoader';
export type { RulesetSources } from './RulesetLoader';

// Bootstrap
export {
  resolveSources,
  resolveRuleset,
  buildDamageMatrixFromSources,
  loadDamageMatrix,
} from './bootstrap';

// Types
export type {
  MiniYamlNode,
  ReadonlyMiniYamlNode,
  DefinitionSet,
  ResolvedDefinition,
  ResolvedDefinitionSet,
  FieldKey,
  RulesetSource,
  LoadResult,
  ValidationResult,
  ValidationError,
  ValidationWarning,
} from './types';
