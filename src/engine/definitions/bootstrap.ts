/**
 * Ruleset Bootstrap
 *
 * Wires loader -> parser -> resolver -> matrix builder.
 *
 * Usage:
 *   // From text already in memory
 *   const tables = buildDamageMatrixFromSources({ weapons, rules });
 *
 *   // From a mod directory on disk
 *   const tables = await loadDamageMatrix('/path/to/mods/ra');
 */

import { InheritanceResolver } from './InheritanceResolver';
import { mergeDocuments, parseMiniYaml, type ParseOptions } from './MiniYamlParser';
import { RulesetLoader, type RulesetSources } from './RulesetLoader';
import {
  buildDamageMatrix,
  DEFAULT_MATRIX_CONFIG,
  type DamageMatrixConfig,
  type DamageMatrixTables,
  type ResolvedRuleset,
} from '@/engine/combat/DamageMatrix';
import { debugInitialization } from '@/utils/debugLogger';
import type { ResolvedDefinition, RulesetSource } from './types';

/**
 * Parse a group of documents and resolve every definition in it.
 * Each group gets its own resolver, so weapons never inherit from units.
 */
export function resolveSources(
  sources: readonly RulesetSource[],
  options?: ParseOptions
): Map<string, ResolvedDefinition> {
  const { definitions, overwritten } = mergeDocuments(
    sources.map((source) => parseMiniYaml(source.text, options))
  );
  if (overwritten.length > 0) {
    debugInitialization.log(`[Bootstrap] ${overwritten.length} definition(s) redefined: ${overwritten.join(', ')}`);
  }
  return new InheritanceResolver(definitions).resolveAll();
}

export function resolveRuleset(sources: RulesetSources, options?: ParseOptions): ResolvedRuleset {
  const weapons = resolveSources(sources.weapons, options);
  const units = resolveSources(sources.rules, options);
  debugInitialization.log(`[Bootstrap] Found ${weapons.size} weapon and ${units.size} unit/building definitions`);
  return { weapons, units };
}

/**
 * Build the damage matrix from rule text already in memory
 */
export function buildDamageMatrixFromSources(
  sources: RulesetSources,
  config: DamageMatrixConfig = DEFAULT_MATRIX_CONFIG
): DamageMatrixTables {
  return buildDamageMatrix(resolveRuleset(sources), config);
}

/**
 * Load rule files from a mod directory and build the damage matrix.
 *
 * @param modPath - Directory containing `weapons/` and `rules/`
 */
export async function loadDamageMatrix(
  modPath: string,
  config: DamageMatrixConfig = DEFAULT_MATRIX_CONFIG
): Promise<DamageMatrixTables> {
  const loader = new RulesetLoader(modPath);
  const result = await loader.loadRuleset();

  if (!result.success || !result.data) {
    throw new Error(`Failed to load ruleset from ${modPath}: ${result.errors.join(', ')}`);
  }

  return buildDamageMatrixFromSources(result.data, config);
}
