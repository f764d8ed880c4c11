/**
 * Vitest Test Setup
 *
 * Debug settings live in a module-level store, so reset them before each
 * test to keep one test's toggles from leaking into the next.
 */

import { beforeEach } from 'vitest';
import { debugStore } from '@/store/debugStore';

beforeEach(() => {
  debugStore.getState().resetDebugSettings();
});
