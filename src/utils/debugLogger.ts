import { debugStore, type DebugSettings } from '@/store/debugStore';

export type DebugCategory = 'parser' | 'resolver' | 'extraction' | 'assets' | 'initialization';

// Map category names to debug settings keys
const categoryToSettingKey: Record<DebugCategory, keyof DebugSettings> = {
  parser: 'debugParser',
  resolver: 'debugResolver',
  extraction: 'debugExtraction',
  assets: 'debugAssets',
  initialization: 'debugInitialization',
};

/**
 * Check if debugging is enabled for a specific category
 */
function isEnabled(category: DebugCategory): boolean {
  const debugSettings = debugStore.getState().debugSettings;

  // Check master toggle first
  if (!debugSettings.debugEnabled) {
    return false;
  }

  return debugSettings[categoryToSettingKey[category]];
}

/**
 * Debug logger that respects the settings in the debug store.
 * Only logs when both the master debug toggle and the specific category are enabled.
 */
export const debugLog = {
  /**
   * Log a message if the category is enabled
   */
  log(category: DebugCategory, ...args: unknown[]): void {
    if (isEnabled(category)) {
      console.log(...args);
    }
  },

  /**
   * Log a warning if the category is enabled
   */
  warn(category: DebugCategory, ...args: unknown[]): void {
    if (isEnabled(category)) {
      console.warn(...args);
    }
  },

  /**
   * Log an error if the category is enabled
   */
  error(category: DebugCategory, ...args: unknown[]): void {
    if (isEnabled(category)) {
      console.error(...args);
    }
  },

  /**
   * Check if a category is enabled (useful for expensive debug operations)
   */
  isEnabled,
};

// Category-specific logger interface
interface CategoryLogger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  isEnabled: () => boolean;
}

function createCategoryLogger(category: DebugCategory): CategoryLogger {
  return {
    log: (...args: unknown[]) => debugLog.log(category, ...args),
    warn: (...args: unknown[]) => debugLog.warn(category, ...args),
    error: (...args: unknown[]) => debugLog.error(category, ...args),
    isEnabled: () => isEnabled(category),
  };
}

export const debugParser = createCategoryLogger('parser');
export const debugResolver = createCategoryLogger('resolver');
export const debugExtraction = createCategoryLogger('extraction');
export const debugAssets = createCategoryLogger('assets');
export const debugInitialization = createCategoryLogger('initialization');
