import { describe, it, expect } from 'vitest';
import { ENTITY_ROSTER, getRosterUnits } from '@/data/units/roster';

describe('Entity Roster', () => {
  it('lists mobile units in category order', () => {
    const units = getRosterUnits();
    const { infantry, vehicles, aircraft, ships } = ENTITY_ROSTER;

    expect(units).toEqual([...infantry, ...vehicles, ...aircraft, ...ships]);
    expect(units[0]).toBe(infantry[0]);
  });

  it('has no duplicate ids', () => {
    const units = getRosterUnits();
    expect(new Set(units).size).toBe(units.length);
    expect(new Set(ENTITY_ROSTER.buildings).size).toBe(ENTITY_ROSTER.buildings.length);
  });

  it('uses lowercase ids', () => {
    for (const id of [...getRosterUnits(), ...ENTITY_ROSTER.buildings]) {
      expect(id).toBe(id.toLowerCase());
    }
  });

  it('lists every defense as a building', () => {
    for (const id of ENTITY_ROSTER.defenses) {
      expect(ENTITY_ROSTER.buildings).toContain(id);
    }
  });

  it('accepts a custom roster', () => {
    expect(
      getRosterUnits({ infantry: ['a'], vehicles: ['b'], aircraft: ['c'], ships: ['d'], buildings: [], defenses: [] })
    ).toEqual(['a', 'b', 'c', 'd']);
  });
});
