/**
 * Combat Configuration - Armor Tags and Extraction Settings
 *
 * Armor tags are the closed set that versus tables and armor lookups are
 * keyed by. Versus percentages in weapon rules are converted to
 * multipliers: 100 = normal damage, >100 = bonus, <100 = penalty.
 */

// ==================== ARMOR TYPES ====================

export const ARMOR_TAGS = ['none', 'light', 'heavy', 'wood', 'concrete'] as const;

export type ArmorTag = (typeof ARMOR_TAGS)[number];

/**
 * Versus table: armor tag -> damage multiplier. Missing tags mean 1.0.
 */
export type VersusTable = Partial<Record<ArmorTag, number>>;

/**
 * Versus table with every armor tag present
 */
export type FullVersusTable = Record<ArmorTag, number>;

// ==================== EXTRACTION SETTINGS ====================

export interface ExtractionConfig {
  /** Armor class used when a unit has no `Armor.Type` */
  unitArmorFallback: ArmorTag;
  /** Armor class reported for unknown buildings */
  buildingArmorFallback: ArmorTag;
  /** Multiplier for an armor tag a versus table does not list */
  defaultMultiplier: number;
  /** Key prefix of weapon warhead nodes */
  warheadPrefix: string;
  /** Warhead values containing one of these are damage warheads */
  damageWarheadTags: readonly string[];
}

export const EXTRACTION_CONFIG: ExtractionConfig = {
  unitArmorFallback: 'none',
  buildingArmorFallback: 'wood',
  defaultMultiplier: 1.0,
  warheadPrefix: 'warhead',
  damageWarheadTags: ['SpreadDamage', 'TargetDamage'],
};

// ==================== HELPER FUNCTIONS ====================

export function isArmorTag(value: string): value is ArmorTag {
  return ARMOR_TAGS.some((tag) => tag === value);
}
