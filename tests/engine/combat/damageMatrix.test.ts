import { describe, it, expect, beforeEach } from 'vitest';
import { buildDamageMatrix, DamageMatrix, findDefinition } from '@/engine/combat/DamageMatrix';
import type { DamageMatrixTables, ResolvedRuleset } from '@/engine/combat/DamageMatrix';
import {
  TEST_OVERRIDES,
  TEST_ROSTER,
  UNIT_RULES,
  WEAPON_RULES,
  resolveText,
  yaml,
} from '../../utils/rulesetFixtures';

const ruleset: ResolvedRuleset = {
  weapons: resolveText(WEAPON_RULES),
  units: resolveText(UNIT_RULES),
};

const config = { roster: TEST_ROSTER, overrides: TEST_OVERRIDES };

describe('buildDamageMatrix', () => {
  let tables: DamageMatrixTables;

  beforeEach(() => {
    tables = buildDamageMatrix(ruleset, config);
  });

  it('extracts unit armor and cost', () => {
    expect(tables.units.armor).toEqual({ e1: 'none', e6: 'none', dog: 'none', '4tnk': 'heavy', harv: 'heavy' });
    expect(tables.units.cost).toEqual({ e1: 100, e6: 100, dog: 200, '4tnk': 1700, harv: 1400 });
  });

  it('builds unit effectiveness with overrides applied', () => {
    expect(tables.units.effectiveness).toEqual({
      e1: { none: 1.5, light: 1.0, heavy: 0.1, wood: 0.3, concrete: 1.0 },
      e6: { none: 1.0, light: 1.0, heavy: 1.0, wood: 1.0, concrete: 1.0 },
      dog: { none: 5.0, light: 0.0, heavy: 0.0, wood: 0.0, concrete: 0.0 },
      '4tnk': { none: 0.8, light: 1.0, heavy: 0.85, wood: 1.0, concrete: 1.0 },
      harv: {},
    });
  });

  it('leaves out roster entities missing from the rules', () => {
    expect(tables.units.armor).not.toHaveProperty('ghost');
    expect(tables.units.effectiveness).not.toHaveProperty('ghost');
  });

  it('extracts buildings and gives only defenses an effectiveness row', () => {
    expect(tables.buildings.armor).toEqual({ pbox: 'wood', powr: 'none' });
    expect(tables.buildings.cost).toEqual({ pbox: 400, powr: 300 });
    expect(tables.buildings.effectiveness).toEqual({
      pbox: { none: 1.5, light: 1.0, heavy: 0.1, wood: 0.3, concrete: 1.0 },
    });
  });

  it('freezes the generated tables', () => {
    expect(Object.isFrozen(tables.units)).toBe(true);
    expect(Object.isFrozen(tables.units.armor)).toBe(true);
    expect(Object.isFrozen(tables.buildings.effectiveness)).toBe(true);
  });

  it('freezes every effectiveness row', () => {
    expect(Object.isFrozen(tables.units.effectiveness.e1)).toBe(true);
    expect(Object.isFrozen(tables.units.effectiveness.harv)).toBe(true);
    expect(Object.isFrozen(tables.buildings.effectiveness.pbox)).toBe(true);
  });

  it('stores ids that collide with Object.prototype members as own entries', () => {
    const collisions = buildDamageMatrix(
      {
        weapons: ruleset.weapons,
        units: resolveText(
          yaml('CONSTRUCTOR:', '\tValued:', '\t\tCost: 50', '\tArmament:', '\t\tWeapon: M1Carbine')
        ),
      },
      { roster: { ...TEST_ROSTER, infantry: ['constructor'], vehicles: [] }, overrides: TEST_OVERRIDES }
    );
    const matrix = new DamageMatrix(collisions);

    expect(Object.keys(collisions.units.cost)).toEqual(['constructor']);
    expect(matrix.getUnitCost('constructor')).toBe(50);
    expect(matrix.getEffectiveness('Constructor', 'heavy')).toBe(0.1);
  });

  it('finds definitions by lowercase roster id', () => {
    expect(findDefinition(ruleset.units, '4tnk')).toBe(ruleset.units.get('4TNK'));
    expect(findDefinition(ruleset.units, 'ghost')).toBeUndefined();
  });
});

describe('DamageMatrix', () => {
  let matrix: DamageMatrix;

  beforeEach(() => {
    matrix = DamageMatrix.fromRuleset(ruleset, config);
  });

  describe('getEffectiveness', () => {
    it('returns the multiplier for an armor tag', () => {
      expect(matrix.getEffectiveness('e1', 'none')).toBe(1.5);
      expect(matrix.getEffectiveness('E1', 'HEAVY')).toBe(0.1);
    });

    it('returns 0 for non-combat and unknown attackers', () => {
      expect(matrix.getEffectiveness('harv', 'none')).toBe(0);
      expect(matrix.getEffectiveness('ghost', 'none')).toBe(0);
    });

    it('returns 1.0 for an armor tag the table does not list', () => {
      expect(matrix.getEffectiveness('e1', 'plasteel')).toBe(1.0);
    });
  });

  describe('getUnitVsUnit', () => {
    it('uses the target armor', () => {
      expect(matrix.getUnitVsUnit('e1', '4tnk')).toBe(0.1);
      expect(matrix.getUnitVsUnit('4tnk', 'e1')).toBe(0.8);
    });

    it('treats an unknown target as unarmored', () => {
      expect(matrix.getUnitVsUnit('e1', 'ghost')).toBe(1.5);
    });
  });

  describe('armor and cost', () => {
    it('returns unit armor with a none fallback', () => {
      expect(matrix.getUnitArmor('4TNK')).toBe('heavy');
      expect(matrix.getUnitArmor('ghost')).toBe('none');
    });

    it('returns building armor with a wood fallback', () => {
      expect(matrix.getBuildingArmor('PBOX')).toBe('wood');
      expect(matrix.getBuildingArmor('powr')).toBe('none');
      expect(matrix.getBuildingArmor('ghost')).toBe('wood');
    });

    it('returns costs with a 0 fallback', () => {
      expect(matrix.getUnitCost('4tnk')).toBe(1700);
      expect(matrix.getUnitCost('ghost')).toBe(0);
      expect(matrix.getBuildingCost('POWR')).toBe(300);
      expect(matrix.getBuildingCost('ghost')).toBe(0);
    });
  });

  describe('combat capability', () => {
    it('reports whether a unit can attack', () => {
      expect(matrix.canAttack('e1')).toBe(true);
      expect(matrix.canAttack('dog')).toBe(true);
      expect(matrix.canAttack('harv')).toBe(false);
      expect(matrix.canAttack('ghost')).toBe(false);
    });

    it('lists non-combat units', () => {
      expect(matrix.getNonCombatUnits()).toEqual(new Set(['harv']));
    });
  });

  describe('getDefenseEffectiveness', () => {
    it('looks up defense rows', () => {
      expect(matrix.getDefenseEffectiveness('pbox', 'heavy')).toBe(0.1);
      expect(matrix.getDefenseEffectiveness('powr', 'none')).toBe(0);
    });
  });

  describe('ids that match Object.prototype members', () => {
    it('fall back to the defaults', () => {
      expect(matrix.getUnitCost('constructor')).toBe(0);
      expect(matrix.getBuildingCost('__proto__')).toBe(0);
      expect(matrix.getUnitArmor('constructor')).toBe('none');
      expect(matrix.getBuildingArmor('__proto__')).toBe('wood');
      expect(matrix.getEffectiveness('constructor', 'none')).toBe(0);
      expect(matrix.getDefenseEffectiveness('Constructor', 'none')).toBe(0);
      expect(matrix.canAttack('__proto__')).toBe(false);
      expect(matrix.getUnitVsUnit('e1', 'constructor')).toBe(1.5);
    });
  });

  describe('target roles', () => {
    it('classifies economic targets among units and buildings', () => {
      expect(matrix.isEconomicTarget('HARV')).toBe(true);
      expect(matrix.isEconomicTarget('proc')).toBe(true);
      expect(matrix.isEconomicTarget('e1')).toBe(false);
    });

    it('classifies production, tech and power buildings', () => {
      expect(matrix.isProductionTarget('WEAP')).toBe(true);
      expect(matrix.isProductionTarget('powr')).toBe(false);
      expect(matrix.isTechTarget('Dome')).toBe(true);
      expect(matrix.isTechTarget('weap')).toBe(false);
      expect(matrix.isPowerTarget('apwr')).toBe(true);
      expect(matrix.isPowerTarget('proc')).toBe(false);
    });

    it('accepts custom roles', () => {
      const empty = new Set<string>();
      const custom = new DamageMatrix(matrix.getTables(), {
        economicUnits: new Set(['miner']),
        economicBuildings: empty,
        productionBuildings: empty,
        techBuildings: empty,
        powerBuildings: new Set(['reactor']),
      });

      expect(custom.isEconomicTarget('Miner')).toBe(true);
      expect(custom.isEconomicTarget('harv')).toBe(false);
      expect(custom.isPowerTarget('REACTOR')).toBe(true);
    });
  });

  it('exposes the tables it was built from', () => {
    const tables = buildDamageMatrix(ruleset, config);
    expect(new DamageMatrix(tables).getTables()).toBe(tables);
  });
});
