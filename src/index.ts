export * from './engine/definitions';

export {
  DamageMatrix,
  buildDamageMatrix,
  findDefinition,
  DEFAULT_MATRIX_CONFIG,
} from './engine/combat/DamageMatrix';
export type {
  AttributeTables,
  DamageMatrixTables,
  DamageMatrixConfig,
  ResolvedRuleset,
} from './engine/combat/DamageMatrix';
export {
  getArmorType,
  getCost,
  getPrimaryWeapon,
  getSecondaryWeapon,
  extractVersus,
  fillVersus,
  averageVersus,
  buildUnitEffectiveness,
  buildDefenseEffectiveness,
} from './engine/combat/AttributeExtractor';
export { DamageMatrixValidator } from './engine/combat/DamageMatrixValidator';

export { ARMOR_TAGS, EXTRACTION_CONFIG, isArmorTag } from './data/combat/combat';
export type { ArmorTag, VersusTable, FullVersusTable, ExtractionConfig } from './data/combat/combat';
export { EFFECTIVENESS_OVERRIDES } from './data/combat/overrides';
export type { EffectivenessOverrides } from './data/combat/overrides';
export { ENTITY_ROSTER, getRosterUnits } from './data/units/roster';
export type { EntityRoster } from './data/units/roster';
export { TARGET_ROLES } from './data/units/roles';
export type { TargetRoles } from './data/units/roles';

export { debugStore, configureDebugFromEnv } from './store/debugStore';
export type { DebugSettings } from './store/debugStore';
