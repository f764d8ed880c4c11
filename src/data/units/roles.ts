/**
 * Target Roles
 *
 * Entities whose loss hurts the owner beyond their combat value, by
 * lowercase id. An entity can hold several roles.
 */

export interface TargetRoles {
  /** Units that gather or deliver resources */
  economicUnits: ReadonlySet<string>;
  /** Refineries and storage */
  economicBuildings: ReadonlySet<string>;
  /** Buildings that produce units */
  productionBuildings: ReadonlySet<string>;
  /** Buildings that unlock the tech tree */
  techBuildings: ReadonlySet<string>;
  /** Power plants */
  powerBuildings: ReadonlySet<string>;
}

export const TARGET_ROLES: TargetRoles = {
  economicUnits: new Set(['harv', 'truk']),
  economicBuildings: new Set(['proc', 'silo']),
  productionBuildings: new Set(['barr', 'tent', 'weap', 'hpad', 'afld', 'spen', 'syrd', 'kenn']),
  techBuildings: new Set(['dome', 'atek', 'stek', 'fix']),
  powerBuildings: new Set(['powr', 'apwr']),
};
