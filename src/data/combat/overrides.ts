/**
 * Effectiveness Overrides
 *
 * Curated corrections for entities whose raw weapon rules misrepresent
 * how they actually fight. Applied by the attribute extractor in this
 * order: manual versus tables, ground weapon substitution, dual weapon
 * averaging, then the plain primary weapon.
 */

import type { FullVersusTable } from './combat';

export interface EffectivenessOverrides {
  /** Complete versus tables that bypass weapon lookup entirely */
  manualVersus: Readonly<Record<string, FullVersusTable>>;
  /** Units whose primary slot is anti-air only: weapon to use instead */
  groundWeapons: Readonly<Record<string, string>>;
  /** Units whose primary and secondary weapons are averaged */
  dualWeaponUnits: ReadonlySet<string>;
  /** Defenses with garrisoned weapons that have no Armament of their own */
  defenseWeapons: Readonly<Record<string, string>>;
}

// Targeting restrictions make the raw versus values misleading for these
export const MANUAL_VERSUS: Record<string, FullVersusTable> = {
  // e7: pistol targets infantry only, C4 demolishes buildings
  e7: { none: 10.0, light: 0.1, heavy: 0.1, wood: 5.0, concrete: 5.0 },
  // spy: silenced pistol, infantry only, minimal damage
  spy: { none: 0.1, light: 0.01, heavy: 0.01, wood: 0.01, concrete: 0.01 },
  // dog: jaw attack kills infantry, nothing else
  dog: { none: 5.0, light: 0.0, heavy: 0.0, wood: 0.0, concrete: 0.0 },
  // ss: torpedoes only reach water targets
  ss: { none: 0.0, light: 0.75, heavy: 1.0, wood: 0.75, concrete: 5.0 },
  // AA-only defenses
  agun: { none: 0.0, light: 1.0, heavy: 0.0, wood: 0.0, concrete: 0.0 },
  sam: { none: 0.0, light: 1.0, heavy: 0.0, wood: 0.0, concrete: 0.0 },
};

export const GROUND_WEAPONS: Record<string, string> = {
  e3: 'Dragon', // primary is RedEye (AA)
  heli: 'HellfireAG', // primary is HellfireAA
};

// 120mm cannon vs armor + tusk missiles vs infantry
export const DUAL_WEAPON_UNITS: ReadonlySet<string> = new Set(['4tnk']);

export const DEFENSE_WEAPONS: Record<string, string> = {
  pbox: 'M60mg',
  hbox: 'M60mg',
};

export const EFFECTIVENESS_OVERRIDES: EffectivenessOverrides = {
  manualVersus: MANUAL_VERSUS,
  groundWeapons: GROUND_WEAPONS,
  dualWeaponUnits: DUAL_WEAPON_UNITS,
  defenseWeapons: DEFENSE_WEAPONS,
};
