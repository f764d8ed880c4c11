/**
 * Definition Types for MiniYAML Rulesets
 *
 * Rule text is parsed into a tree of nodes. Every node, including the
 * implicit document root, carries a scalar value and ordered children,
 * so `Armament@PRIMARY: Weapon` and nested traits share one shape.
 */

export interface MiniYamlNode {
  value: string;
  children: Map<string, MiniYamlNode>;
}

/**
 * Read-only view of a node. Resolved definitions are handed out through
 * this type because cached results are shared between dependents.
 */
export interface ReadonlyMiniYamlNode {
  readonly value: string;
  readonly children: ReadonlyMap<string, ReadonlyMiniYamlNode>;
}

/**
 * Top-level definitions keyed by name, in declaration order
 */
export type DefinitionSet = Map<string, MiniYamlNode>;

export type ResolvedDefinition = ReadonlyMiniYamlNode;

export type ResolvedDefinitionSet = ReadonlyMap<string, ResolvedDefinition>;

/**
 * Classification of a child key. Directive prefixes are a text
 * convention; everything past the parser works on this variant.
 */
export type FieldKey =
  | { kind: 'field'; key: string }
  | { kind: 'inherits'; key: string; parent: string }
  | { kind: 'removal'; key: string; target: string };

/**
 * One rule document as read from disk (or anywhere else)
 */
export interface RulesetSource {
  name: string;
  text: string;
}

export interface LoadResult<T> {
  success: boolean;
  data?: T;
  errors: string[];
}

/**
 * Validation result for generated tables
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  type: 'invalid_armor' | 'invalid_cost' | 'invalid_multiplier' | 'value_mismatch';
  path: string;
  message: string;
  value?: unknown;
}

export interface ValidationWarning {
  type: 'missing_entity' | 'unexpected_entity';
  path: string;
  message: string;
}
