/**
 * Damage Matrix Validator
 *
 * Checks generated tables against the roster they were built for, and
 * compares two sets of tables (e.g. freshly generated vs checked in).
 * The builder itself never rejects data; this is for tooling and tests.
 */

import { isArmorTag, type VersusTable } from '@/data/combat/combat';
import { getRosterUnits, type EntityRoster } from '@/data/units/roster';
import { getOwn } from '@/utils/ownEntry';
import type { AttributeTables, DamageMatrixTables } from './DamageMatrix';
import type {
  ValidationError,
  ValidationResult,
  ValidationWarning,
} from '@/engine/definitions/types';

type Section = keyof DamageMatrixTables;

export class DamageMatrixValidator {
  private errors: ValidationError[] = [];
  private warnings: ValidationWarning[] = [];

  /**
   * Validate tables built for a roster
   */
  public validate(tables: DamageMatrixTables, roster: EntityRoster): ValidationResult {
    this.reset();

    this.validateSection('units', tables.units, getRosterUnits(roster), getRosterUnits(roster));
    this.validateSection('buildings', tables.buildings, roster.buildings, roster.defenses);

    return this.result();
  }

  /**
   * Report every value that differs between two sets of tables
   */
  public compare(expected: DamageMatrixTables, actual: DamageMatrixTables): ValidationResult {
    this.reset();

    for (const section of ['units', 'buildings'] as const) {
      this.compareRecords(`${section}.armor`, expected[section].armor, actual[section].armor);
      this.compareRecords(`${section}.cost`, expected[section].cost, actual[section].cost);
      this.compareEffectiveness(
        `${section}.effectiveness`,
        expected[section].effectiveness,
        actual[section].effectiveness
      );
    }

    return this.result();
  }

  private validateSection(
    section: Section,
    tables: AttributeTables,
    ids: readonly string[],
    combatIds: readonly string[]
  ): void {
    for (const id of ids) {
      const path = `${section}[${id}]`;
      const armor = getOwn(tables.armor, id);
      const cost = getOwn(tables.cost, id);

      if (armor === undefined || cost === undefined) {
        this.addWarning('missing_entity', path, `No attribute data for '${id}'`);
        continue;
      }

      if (!isArmorTag(armor)) {
        this.addError('invalid_armor', `${path}.armor`, `Unknown armor type '${armor}'`, armor);
      }

      if (!Number.isInteger(cost) || cost < 0) {
        this.addError('invalid_cost', `${path}.cost`, 'Cost must be a non-negative integer', cost);
      }
    }

    for (const id of combatIds) {
      const versus = getOwn(tables.effectiveness, id);
      if (versus === undefined) {
        if (getOwn(tables.armor, id) !== undefined) {
          this.addWarning('missing_entity', `${section}[${id}].effectiveness`, `No effectiveness row for '${id}'`);
        }
        continue;
      }
      this.validateVersus(`${section}[${id}].effectiveness`, versus);
    }

    const known = new Set([...ids, ...combatIds]);
    for (const id of Object.keys(tables.armor)) {
      if (!known.has(id)) {
        this.addWarning('unexpected_entity', `${section}[${id}]`, `'${id}' is not in the roster`);
      }
    }
  }

  private validateVersus(path: string, versus: Readonly<VersusTable>): void {
    for (const [armor, multiplier] of Object.entries(versus)) {
      if (!isArmorTag(armor)) {
        this.addError('invalid_armor', `${path}.${armor}`, `Unknown armor type '${armor}'`, armor);
      }
      if (multiplier === undefined || !Number.isFinite(multiplier) || multiplier < 0) {
        this.addError('invalid_multiplier', `${path}.${armor}`, 'Multiplier must be a non-negative number', multiplier);
      }
    }
  }

  private compareRecords<T>(
    path: string,
    expected: Readonly<Record<string, T>>,
    actual: Readonly<Record<string, T>>
  ): void {
    const ids = new Set([...Object.keys(expected), ...Object.keys(actual)]);
    for (const id of ids) {
      if (expected[id] !== actual[id]) {
        this.addError(
          'value_mismatch',
          `${path}[${id}]`,
          `Expected ${String(expected[id])}, got ${String(actual[id])}`,
          actual[id]
        );
      }
    }
  }

  private compareEffectiveness(
    path: string,
    expected: Readonly<Record<string, Readonly<VersusTable>>>,
    actual: Readonly<Record<string, Readonly<VersusTable>>>
  ): void {
    const ids = new Set([...Object.keys(expected), ...Object.keys(actual)]);
    for (const id of ids) {
      const expectedRow = expected[id];
      const actualRow = actual[id];
      if (expectedRow === undefined || actualRow === undefined) {
        this.addError('value_mismatch', `${path}[${id}]`, `Row for '${id}' exists on one side only`);
        continue;
      }
      this.compareRecords(`${path}[${id}]`, expectedRow, actualRow);
    }
  }

  // Helper methods

  private reset(): void {
    this.errors = [];
    this.warnings = [];
  }

  private result(): ValidationResult {
    return {
      valid: this.errors.length === 0,
      errors: [...this.errors],
      warnings: [...this.warnings],
    };
  }

  private addError(
    type: ValidationError['type'],
    path: string,
    message: string,
    value?: unknown
  ): void {
    this.errors.push({ type, path, message, value });
  }

  private addWarning(type: ValidationWarning['type'], path: string, message: string): void {
    this.warnings.push({ type, path, message });
  }
}
