import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createDebouncedStorage } from './preference-storage';

describe('createDebouncedStorage', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    localStorage.clear();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('writes once after rapid changes', () => {
    const storage = createDebouncedStorage(100);
    storage.setItem('prefs', '{"depth":2}');
    storage.setItem('prefs', '{"depth":3}');
    expect(localStorage.getItem('prefs')).toBeNull();

    vi.advanceTimersByTime(100);
    expect(localStorage.getItem('prefs')).toBe('{"depth":3}');
  });

  it('reads straight from localStorage', () => {
    localStorage.setItem('prefs', '{"depth":4}');
    expect(createDebouncedStorage().getItem('prefs')).toBe('{"depth":4}');
  });

  it('removeItem cancels a pending write', () => {
    const storage = createDebouncedStorage(100);
    storage.setItem('prefs', '{"depth":3}');
    storage.removeItem('prefs');
    vi.advanceTimersByTime(100);
    expect(localStorage.getItem('prefs')).toBeNull();
  });
});
