/**
 * Ruleset Loader
 *
 * Reads MiniYAML rule files from a mod directory on disk:
 *
 *   <mod>/weapons/*.yaml   every weapon file, sorted by name
 *   <mod>/rules/<file>     the rule files listed in RULE_FILES, in order
 *
 * Order matters: later documents replace earlier definitions of the
 * same name when they are merged.
 */

import { readFile, readdir } from 'fs/promises';
import * as path from 'path';
import { debugAssets } from '@/utils/debugLogger';
import type { LoadResult, RulesetSource } from './types';

export const RULE_FILES = [
  'defaults.yaml',
  'infantry.yaml',
  'vehicles.yaml',
  'aircraft.yaml',
  'ships.yaml',
  'structures.yaml',
] as const;

export interface RulesetSources {
  weapons: RulesetSource[];
  rules: RulesetSource[];
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RulesetLoader {
  private basePath: string;
  private cache: Map<string, string> = new Map();

  constructor(basePath: string = '.') {
    this.basePath = basePath;
  }

  /**
   * Set the mod directory to load from
   */
  public setBasePath(basePath: string): void {
    this.basePath = basePath;
  }

  public clearCache(): void {
    this.cache.clear();
  }

  /**
   * Read a file relative to the base path. With `optional`, a missing
   * file is a success with `null` data.
   */
  private async loadText(relativePath: string, optional: boolean = false): Promise<LoadResult<string | null>> {
    const fullPath = path.join(this.basePath, relativePath);

    const cached = this.cache.get(fullPath);
    if (cached !== undefined) {
      return { success: true, data: cached, errors: [] };
    }

    try {
      const text = await readFile(fullPath, 'utf-8');
      this.cache.set(fullPath, text);
      return { success: true, data: text, errors: [] };
    } catch (error) {
      if (optional && isMissingFile(error)) {
        debugAssets.log(`[RulesetLoader] Skipping missing file ${fullPath}`);
        return { success: true, data: null, errors: [] };
      }
      return {
        success: false,
        errors: [`Failed to load ${fullPath}: ${describeError(error)}`],
      };
    }
  }

  /**
   * Load every `.yaml` file in the weapons directory, sorted by file name
   */
  public async loadWeapons(directory: string = 'weapons'): Promise<LoadResult<RulesetSource[]>> {
    const weaponDir = path.join(this.basePath, directory);

    let entries: string[];
    try {
      entries = await readdir(weaponDir);
    } catch (error) {
      return {
        success: false,
        errors: [`Failed to read weapon directory ${weaponDir}: ${describeError(error)}`],
      };
    }

    const files = entries.filter((entry) => entry.endsWith('.yaml')).sort();
    const sources: RulesetSource[] = [];
    const errors: string[] = [];

    for (const file of files) {
      const result = await this.loadText(path.join(directory, file));
      if (result.success && typeof result.data === 'string') {
        sources.push({ name: file, text: result.data });
      } else {
        errors.push(...result.errors);
      }
    }

    if (errors.length > 0) {
      return { success: false, errors };
    }

    debugAssets.log(`[RulesetLoader] Loaded ${sources.length} weapon file(s) from ${weaponDir}`);
    return { success: true, data: sources, errors: [] };
  }

  /**
   * Load the listed rule files in order. Files that do not exist are skipped.
   */
  public async loadRules(
    files: readonly string[] = RULE_FILES,
    directory: string = 'rules'
  ): Promise<LoadResult<RulesetSource[]>> {
    const sources: RulesetSource[] = [];
    const errors: string[] = [];

    for (const file of files) {
      const result = await this.loadText(path.join(directory, file), true);
      if (!result.success) {
        errors.push(...result.errors);
      } else if (typeof result.data === 'string') {
        sources.push({ name: file, text: result.data });
      }
    }

    if (errors.length > 0) {
      return { success: false, errors };
    }

    debugAssets.log(`[RulesetLoader] Loaded ${sources.length} rule file(s)`);
    return { success: true, data: sources, errors: [] };
  }

  /**
   * Load weapons and rules together
   */
  public async loadRuleset(ruleFiles: readonly string[] = RULE_FILES): Promise<LoadResult<RulesetSources>> {
    const [weaponsResult, rulesResult] = await Promise.all([
      this.loadWeapons(),
      this.loadRules(ruleFiles),
    ]);

    const errors = [...weaponsResult.errors, ...rulesResult.errors];
    if (!weaponsResult.success || !rulesResult.success || !weaponsResult.data || !rulesResult.data) {
      return { success: false, errors };
    }

    return {
      success: true,
      data: { weapons: weaponsResult.data, rules: rulesResult.data },
      errors: [],
    };
  }
}
