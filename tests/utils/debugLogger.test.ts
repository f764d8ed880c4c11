import { describe, it, expect, afterEach, vi } from 'vitest';
import { debugStore } from '@/store/debugStore';
import { debugExtraction, debugLog, debugResolver } from '@/utils/debugLogger';

describe('debugLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('disables categories when master toggle is off', () => {
    debugStore.getState().setDebugSettings({ debugEnabled: false, debugResolver: true });
    expect(debugLog.isEnabled('resolver')).toBe(false);
  });

  it('respects category toggles when master is on', () => {
    debugStore.getState().setDebugSettings({ debugEnabled: true, debugResolver: true });
    expect(debugLog.isEnabled('resolver')).toBe(true);
    expect(debugLog.isEnabled('parser')).toBe(false);
    expect(debugResolver.isEnabled()).toBe(true);
  });

  it('writes to the console only for enabled categories', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    debugResolver.log('hidden');
    expect(log).not.toHaveBeenCalled();

    debugStore.getState().setDebugSettings({ debugEnabled: true, debugResolver: true });
    debugResolver.log('resolved', 3);
    debugResolver.warn('cycle');
    debugExtraction.warn('still hidden');

    expect(log).toHaveBeenCalledWith('resolved', 3);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('cycle');
  });

  it('routes errors to console.error', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    debugStore.getState().setDebugSettings({ debugEnabled: true, debugExtraction: true });

    debugExtraction.error('bad table');

    expect(error).toHaveBeenCalledWith('bad table');
  });
});
