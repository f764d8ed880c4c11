import { describe, it, expect } from 'vitest';
import { findChild, getChild, getValue } from '@/engine/definitions/NodeAccessor';
import { parseMiniYaml } from '@/engine/definitions/MiniYamlParser';
import { createNode, isEmptyNode } from '@/engine/definitions/MiniYamlNode';
import type { ReadonlyMiniYamlNode } from '@/engine/definitions/types';
import { yaml } from '../../utils/rulesetFixtures';

function parseOne(text: string, name: string): ReadonlyMiniYamlNode {
  return parseMiniYaml(text).get(name) ?? createNode('<missing>');
}

describe('NodeAccessor', () => {
  const unit = parseOne(
    yaml('Unit:', '\tArmor:', '\t\tType: Heavy', '\tarmament:', '\t\tWeapon: Gun'),
    'Unit'
  );

  it('follows an exact key path', () => {
    expect(getValue(unit, 'Armor', 'Type')).toBe('Heavy');
  });

  it('falls back to a case-insensitive match', () => {
    expect(getValue(unit, 'Armament', 'Weapon')).toBe('Gun');
    expect(getValue(unit, 'ARMOR', 'type')).toBe('Heavy');
  });

  it('prefers the exact key over a case-insensitive one', () => {
    const weapon = parseOne(yaml('W:', '\tversus: lower', '\tVersus: upper'), 'W');

    expect(getValue(weapon, 'Versus')).toBe('upper');
    expect(getValue(weapon, 'versus')).toBe('lower');
    expect(getValue(weapon, 'VERSUS')).toBe('lower');
  });

  it('handles missing paths without throwing', () => {
    expect(findChild(unit, 'Nope', 'X')).toBeUndefined();
    expect(getValue(unit, 'Nope', 'X')).toBe('');
    expect(isEmptyNode(getChild(unit, 'Armor', 'Missing'))).toBe(true);
  });

  it('returns the node itself for an empty path', () => {
    expect(findChild(unit)).toBe(unit);
    expect(getValue(unit)).toBe('');
  });

  it('returns existing children from getChild', () => {
    expect(getChild(unit, 'Armor')).toBe(unit.children.get('Armor'));
  });
});
