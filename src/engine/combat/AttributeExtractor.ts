/**
 * Attribute Extractor
 *
 * Derives armor class, cost and weapon effectiveness from resolved
 * definitions. Every lookup degrades to a default instead of failing:
 * a unit without a usable weapon is non-combat (empty table), an
 * unparseable number is zero, a missing armor tag deals normal damage.
 */

import { findChild, getValue } from '@/engine/definitions/NodeAccessor';
import { debugExtraction } from '@/utils/debugLogger';
import { getOwn } from '@/utils/ownEntry';
import {
  ARMOR_TAGS,
  EXTRACTION_CONFIG,
  isArmorTag,
  type ArmorTag,
  type FullVersusTable,
  type VersusTable,
} from '@/data/combat/combat';
import { EFFECTIVENESS_OVERRIDES, type EffectivenessOverrides } from '@/data/combat/overrides';
import type { ReadonlyMiniYamlNode, ResolvedDefinitionSet } from '@/engine/definitions/types';

const INTEGER_PATTERN = /^\+?\d+$/;

// Armament slots checked for the primary weapon; the first one present wins
const PRIMARY_SLOTS = ['Armament@PRIMARY', 'Armament', 'Armament@AG'] as const;
const SECONDARY_SLOT = 'Armament@SECONDARY';
const GARRISONED_SLOT = 'Armament@GARRISONED';

function parseNonNegativeInt(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return undefined;
  return Number.parseInt(trimmed, 10);
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

// ==================== ARMOR & COST ====================

export function getArmorType(
  definition: ReadonlyMiniYamlNode,
  fallback: ArmorTag = EXTRACTION_CONFIG.unitArmorFallback
): ArmorTag {
  const armor = getValue(definition, 'Armor', 'Type').toLowerCase();
  if (!armor) return fallback;

  if (!isArmorTag(armor)) {
    debugExtraction.warn(`[AttributeExtractor] Unknown armor type '${armor}', using '${fallback}'`);
    return fallback;
  }
  return armor;
}

export function getCost(definition: ReadonlyMiniYamlNode): number {
  return parseNonNegativeInt(getValue(definition, 'Valued', 'Cost')) ?? 0;
}

// ==================== WEAPONS ====================

export function getPrimaryWeapon(definition: ReadonlyMiniYamlNode): string {
  for (const slot of PRIMARY_SLOTS) {
    const armament = findChild(definition, slot);
    if (armament) {
      return getValue(armament, 'Weapon');
    }
  }

  // Some units only carry their ground weapon in the secondary slot
  return getSecondaryWeapon(definition);
}

export function getSecondaryWeapon(definition: ReadonlyMiniYamlNode): string {
  return getValue(definition, SECONDARY_SLOT, 'Weapon');
}

/**
 * Versus table of the first damage warhead that has one, as multipliers.
 * Returns undefined when no damage warhead carries a Versus block.
 */
export function extractVersus(weapon: ReadonlyMiniYamlNode): VersusTable | undefined {
  for (const [key, warhead] of weapon.children) {
    if (!key.toLowerCase().startsWith(EXTRACTION_CONFIG.warheadPrefix)) continue;
    if (!EXTRACTION_CONFIG.damageWarheadTags.some((tag) => warhead.value.includes(tag))) continue;

    const versusNode = findChild(warhead, 'Versus');
    if (!versusNode) continue;

    const versus: VersusTable = {};
    for (const armor of ARMOR_TAGS) {
      for (const [armorKey, entry] of versusNode.children) {
        if (armorKey.toLowerCase() !== armor) continue;

        const percent = parseNonNegativeInt(entry.value);
        if (percent !== undefined) {
          versus[armor] = percent / 100;
        }
      }
    }
    return versus;
  }

  return undefined;
}

/**
 * Fill in every armor tag, defaulting missing ones to normal damage
 */
export function fillVersus(versus: VersusTable): FullVersusTable {
  const fallback = EXTRACTION_CONFIG.defaultMultiplier;
  return {
    none: versus.none ?? fallback,
    light: versus.light ?? fallback,
    heavy: versus.heavy ?? fallback,
    wood: versus.wood ?? fallback,
    concrete: versus.concrete ?? fallback,
  };
}

/**
 * Average two versus tables over the union of their tags
 */
export function averageVersus(primary: VersusTable, secondary: VersusTable): VersusTable {
  const combined: VersusTable = {};
  for (const armor of ARMOR_TAGS) {
    const p = primary[armor];
    const s = secondary[armor];
    if (p === undefined && s === undefined) continue;

    const fallback = EXTRACTION_CONFIG.defaultMultiplier;
    combined[armor] = roundTo2(((p ?? fallback) + (s ?? fallback)) / 2);
  }
  return combined;
}

function weaponVersus(weapons: ResolvedDefinitionSet, weaponName: string): VersusTable | undefined {
  const weapon = weapons.get(weaponName);
  return weapon ? extractVersus(weapon) : undefined;
}

// ==================== EFFECTIVENESS ====================

/**
 * Effectiveness of a mobile unit against each armor tag.
 * An empty table means the unit cannot attack.
 */
export function buildUnitEffectiveness(
  unitId: string,
  definition: ReadonlyMiniYamlNode,
  weapons: ResolvedDefinitionSet,
  overrides: EffectivenessOverrides = EFFECTIVENESS_OVERRIDES
): VersusTable {
  const id = unitId.toLowerCase();

  const manual = getOwn(overrides.manualVersus, id);
  if (manual) {
    return { ...manual };
  }

  const weaponName = getOwn(overrides.groundWeapons, id) ?? getPrimaryWeapon(definition);
  if (!weaponName) {
    return {};
  }

  const primary = weaponVersus(weapons, weaponName);
  if (!primary) {
    debugExtraction.log(`[AttributeExtractor] ${id}: weapon '${weaponName}' has no versus table`);
    return {};
  }

  if (overrides.dualWeaponUnits.has(id)) {
    const secondaryName = getSecondaryWeapon(definition);
    const secondary = secondaryName ? weaponVersus(weapons, secondaryName) : undefined;
    if (secondary) {
      return fillVersus(averageVersus(primary, secondary));
    }
  }

  return fillVersus(primary);
}

/**
 * Effectiveness of a static defense. Garrisoned defenses have no
 * Armament of their own and take their weapon from the overrides or
 * the garrison slot.
 */
export function buildDefenseEffectiveness(
  defenseId: string,
  definition: ReadonlyMiniYamlNode,
  weapons: ResolvedDefinitionSet,
  overrides: EffectivenessOverrides = EFFECTIVENESS_OVERRIDES
): VersusTable {
  const id = defenseId.toLowerCase();

  const manual = getOwn(overrides.manualVersus, id);
  if (manual) {
    return { ...manual };
  }

  const weaponName =
    getOwn(overrides.defenseWeapons, id) ||
    getPrimaryWeapon(definition) ||
    getValue(definition, GARRISONED_SLOT, 'Weapon');

  if (!weaponName) {
    return {};
  }

  const versus = weaponVersus(weapons, weaponName);
  return versus ? fillVersus(versus) : {};
}
