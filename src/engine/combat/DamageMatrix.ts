/**
 * Damage Matrix
 *
 * Builds the per-entity attribute tables (armor class, cost, weapon
 * effectiveness) from resolved unit and weapon definitions, and answers
 * effectiveness and target-role queries over them.
 *
 * Roster ids are lowercase (`1tnk`); rule files name definitions in
 * upper case (`1TNK`). Lookups try the id as given first.
 */

import {
  buildDefenseEffectiveness,
  buildUnitEffectiveness,
  getArmorType,
  getCost,
  getPrimaryWeapon,
} from './AttributeExtractor';
import { EXTRACTION_CONFIG, type ArmorTag, type VersusTable } from '@/data/combat/combat';
import { EFFECTIVENESS_OVERRIDES, type EffectivenessOverrides } from '@/data/combat/overrides';
import { ENTITY_ROSTER, getRosterUnits, type EntityRoster } from '@/data/units/roster';
import { TARGET_ROLES, type TargetRoles } from '@/data/units/roles';
import { debugExtraction } from '@/utils/debugLogger';
import { freezeRecord, getOwn } from '@/utils/ownEntry';
import type { ResolvedDefinition, ResolvedDefinitionSet } from '@/engine/definitions/types';

export interface AttributeTables {
  armor: Readonly<Record<string, ArmorTag>>;
  cost: Readonly<Record<string, number>>;
  effectiveness: Readonly<Record<string, Readonly<VersusTable>>>;
}

export interface DamageMatrixTables {
  units: AttributeTables;
  /** Building effectiveness only covers the roster's defenses */
  buildings: AttributeTables;
}

export interface DamageMatrixConfig {
  roster: EntityRoster;
  overrides: EffectivenessOverrides;
}

export const DEFAULT_MATRIX_CONFIG: DamageMatrixConfig = {
  roster: ENTITY_ROSTER,
  overrides: EFFECTIVENESS_OVERRIDES,
};

export interface ResolvedRuleset {
  units: ResolvedDefinitionSet;
  weapons: ResolvedDefinitionSet;
}

export function findDefinition(
  definitions: ResolvedDefinitionSet,
  id: string
): ResolvedDefinition | undefined {
  return definitions.get(id) ?? definitions.get(id.toUpperCase());
}

function formatVersus(versus: VersusTable): string {
  return Object.entries(versus)
    .map(([armor, value]) => `${armor}:${value}`)
    .join(' ');
}

/**
 * Build attribute tables for every roster entity present in the ruleset.
 * Entities missing from the ruleset are left out.
 */
export function buildDamageMatrix(
  ruleset: ResolvedRuleset,
  config: DamageMatrixConfig = DEFAULT_MATRIX_CONFIG
): DamageMatrixTables {
  const { roster, overrides } = config;

  const unitArmor = new Map<string, ArmorTag>();
  const unitCost = new Map<string, number>();
  const unitEffectiveness = new Map<string, Readonly<VersusTable>>();

  for (const id of getRosterUnits(roster)) {
    const definition = findDefinition(ruleset.units, id);
    if (!definition) {
      debugExtraction.warn(`[DamageMatrix] Unit ${id.toUpperCase()} not found in rules`);
      continue;
    }

    const armor = getArmorType(definition, EXTRACTION_CONFIG.unitArmorFallback);
    const cost = getCost(definition);
    const versus = Object.freeze(buildUnitEffectiveness(id, definition, ruleset.weapons, overrides));
    unitArmor.set(id, armor);
    unitCost.set(id, cost);
    unitEffectiveness.set(id, versus);

    if (debugExtraction.isEnabled()) {
      const weapon = getOwn(overrides.groundWeapons, id) ?? getPrimaryWeapon(definition);
      debugExtraction.log(
        `[DamageMatrix] ${id} -> ${weapon || '(no attack)'} armor=${armor} cost=${cost} ${formatVersus(versus)}`
      );
    }
  }

  const buildingArmor = new Map<string, ArmorTag>();
  const buildingCost = new Map<string, number>();
  const defenseEffectiveness = new Map<string, Readonly<VersusTable>>();

  for (const id of roster.buildings) {
    const definition = findDefinition(ruleset.units, id);
    if (!definition) {
      debugExtraction.warn(`[DamageMatrix] Building ${id.toUpperCase()} not found in rules`);
      continue;
    }

    // Structures without an Armor trait still default like units do
    buildingArmor.set(id, getArmorType(definition, EXTRACTION_CONFIG.unitArmorFallback));
    buildingCost.set(id, getCost(definition));
  }

  for (const id of roster.defenses) {
    const definition = findDefinition(ruleset.units, id);
    if (!definition) continue;

    defenseEffectiveness.set(
      id,
      Object.freeze(buildDefenseEffectiveness(id, definition, ruleset.weapons, overrides))
    );
  }

  return {
    units: Object.freeze({
      armor: freezeRecord(unitArmor),
      cost: freezeRecord(unitCost),
      effectiveness: freezeRecord(unitEffectiveness),
    }),
    buildings: Object.freeze({
      armor: freezeRecord(buildingArmor),
      cost: freezeRecord(buildingCost),
      effectiveness: freezeRecord(defenseEffectiveness),
    }),
  };
}

/**
 * Query surface over built tables. Ids and armor names are case-insensitive.
 */
export class DamageMatrix {
  private readonly tables: DamageMatrixTables;
  private readonly roles: TargetRoles;

  constructor(tables: DamageMatrixTables, roles: TargetRoles = TARGET_ROLES) {
    this.tables = tables;
    this.roles = roles;
  }

  public static fromRuleset(
    ruleset: ResolvedRuleset,
    config: DamageMatrixConfig = DEFAULT_MATRIX_CONFIG,
    roles: TargetRoles = TARGET_ROLES
  ): DamageMatrix {
    return new DamageMatrix(buildDamageMatrix(ruleset, config), roles);
  }

  public getTables(): DamageMatrixTables {
    return this.tables;
  }

  /**
   * Damage multiplier of an attacker against an armor type.
   * 1.0 is normal damage; 0.0 means the attacker cannot attack at all.
   */
  public getEffectiveness(attackerType: string, targetArmor: string): number {
    return this.lookupVersus(this.tables.units.effectiveness, attackerType, targetArmor);
  }

  /**
   * Same as getEffectiveness, for static defenses
   */
  public getDefenseEffectiveness(defenseType: string, targetArmor: string): number {
    return this.lookupVersus(this.tables.buildings.effectiveness, defenseType, targetArmor);
  }

  /**
   * Effectiveness of one unit type against another, by the target's armor
   */
  public getUnitVsUnit(attacker: string, target: string): number {
    return this.getEffectiveness(attacker, this.getUnitArmor(target));
  }

  public getUnitArmor(unitType: string): ArmorTag {
    return getOwn(this.tables.units.armor, unitType.toLowerCase()) ?? EXTRACTION_CONFIG.unitArmorFallback;
  }

  public getBuildingArmor(buildingType: string): ArmorTag {
    return getOwn(this.tables.buildings.armor, buildingType.toLowerCase()) ?? EXTRACTION_CONFIG.buildingArmorFallback;
  }

  public getUnitCost(unitType: string): number {
    return getOwn(this.tables.units.cost, unitType.toLowerCase()) ?? 0;
  }

  public getBuildingCost(buildingType: string): number {
    return getOwn(this.tables.buildings.cost, buildingType.toLowerCase()) ?? 0;
  }

  public canAttack(unitType: string): boolean {
    const versus = getOwn(this.tables.units.effectiveness, unitType.toLowerCase());
    return versus !== undefined && Object.keys(versus).length > 0;
  }

  /**
   * Units in the tables that cannot attack
   */
  public getNonCombatUnits(): Set<string> {
    const nonCombat = new Set<string>();
    for (const [unitType, versus] of Object.entries(this.tables.units.effectiveness)) {
      if (Object.keys(versus).length === 0) {
        nonCombat.add(unitType);
      }
    }
    return nonCombat;
  }

  // Target roles

  /**
   * Destroying this unit or building disrupts the economy
   */
  public isEconomicTarget(unitOrBuilding: string): boolean {
    const id = unitOrBuilding.toLowerCase();
    return this.roles.economicUnits.has(id) || this.roles.economicBuildings.has(id);
  }

  public isProductionTarget(buildingType: string): boolean {
    return this.roles.productionBuildings.has(buildingType.toLowerCase());
  }

  /**
   * Destroying this building regresses the tech tree
   */
  public isTechTarget(buildingType: string): boolean {
    return this.roles.techBuildings.has(buildingType.toLowerCase());
  }

  public isPowerTarget(buildingType: string): boolean {
    return this.roles.powerBuildings.has(buildingType.toLowerCase());
  }

  private lookupVersus(
    effectiveness: Readonly<Record<string, Readonly<VersusTable>>>,
    attackerType: string,
    targetArmor: string
  ): number {
    const versus = getOwn(effectiveness, attackerType.toLowerCase());
    if (!versus || Object.keys(versus).length === 0) {
      return 0.0;
    }

    const armor = targetArmor.toLowerCase();
    const entry = Object.entries(versus).find(([tag]) => tag === armor);
    return entry?.[1] ?? EXTRACTION_CONFIG.defaultMultiplier;
  }
}
