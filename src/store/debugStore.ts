import { createStore } from 'zustand/vanilla';

export interface DebugSettings {
  debugEnabled: boolean;
  debugParser: boolean;
  debugResolver: boolean;
  debugExtraction: boolean;
  debugAssets: boolean;
  debugInitialization: boolean;
}

export interface DebugState {
  debugSettings: DebugSettings;

  // Actions
  setDebugSetting: <K extends keyof DebugSettings>(key: K, value: DebugSettings[K]) => void;
  toggleDebugSetting: (key: keyof DebugSettings) => void;
  setDebugSettings: (settings: Partial<DebugSettings>) => void;
  resetDebugSettings: () => void;
}

export const DEFAULT_DEBUG_SETTINGS: DebugSettings = {
  debugEnabled: false,
  debugParser: false,
  debugResolver: false,
  debugExtraction: false,
  debugAssets: false,
  debugInitialization: false,
};

/**
 * Debug settings store. Plain vanilla store so it works the same in
 * scripts, tests and anything else that runs outside a UI.
 */
export const debugStore = createStore<DebugState>((set) => ({
  debugSettings: { ...DEFAULT_DEBUG_SETTINGS },

  setDebugSetting: (key, value) =>
    set((state) => ({
      debugSettings: { ...state.debugSettings, [key]: value },
    })),

  toggleDebugSetting: (key) =>
    set((state) => ({
      debugSettings: { ...state.debugSettings, [key]: !state.debugSettings[key] },
    })),

  setDebugSettings: (settings) =>
    set((state) => ({
      debugSettings: { ...state.debugSettings, ...settings },
    })),

  resetDebugSettings: () => set({ debugSettings: { ...DEFAULT_DEBUG_SETTINGS } }),
}));

// Environment variable names -> settings keys
const ENV_CATEGORY_KEYS: Record<string, keyof DebugSettings> = {
  parser: 'debugParser',
  resolver: 'debugResolver',
  extraction: 'debugExtraction',
  assets: 'debugAssets',
  initialization: 'debugInitialization',
};

/**
 * Enable debug categories from a comma separated list, e.g.
 * `DAMAGE_MATRIX_DEBUG=resolver,extraction` or `DAMAGE_MATRIX_DEBUG=all`.
 * Unknown names are ignored. Returns the settings that were applied.
 */
export function configureDebugFromEnv(
  env: Record<string, string | undefined> = process.env
): DebugSettings {
  const raw = env.DAMAGE_MATRIX_DEBUG?.trim();
  if (!raw) {
    return debugStore.getState().debugSettings;
  }

  const names = raw
    .split(',')
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0);

  const updates: Partial<DebugSettings> = { debugEnabled: true };
  for (const [name, key] of Object.entries(ENV_CATEGORY_KEYS)) {
    if (names.includes('all') || names.includes(name)) {
      updates[key] = true;
    }
  }

  debugStore.getState().setDebugSettings(updates);
  return debugStore.getState().debugSettings;
}
