/**
 * Entity Roster
 *
 * The entities that appear in the generated tables, by lowercase id.
 * Defenses are also buildings; they additionally get an effectiveness row.
 */

import rosterData from './roster.json';

export interface EntityRoster {
  infantry: readonly string[];
  vehicles: readonly string[];
  aircraft: readonly string[];
  ships: readonly string[];
  buildings: readonly string[];
  defenses: readonly string[];
}

export const ENTITY_ROSTER: EntityRoster = rosterData;

/**
 * All mobile units, in table order
 */
export function getRosterUnits(roster: EntityRoster = ENTITY_ROSTER): string[] {
  return [...roster.infantry, ...roster.vehicles, ...roster.aircraft, ...roster.ships];
}
