import type { StateStorage } from 'zustand/middleware';

const DEBOUNCE_MS = 1000;

/**
 * A localStorage adapter that debounces writes, so dragging the depth
 * slider or clicking through terms writes once instead of per change.
 */
export function createDebouncedStorage(delayMs = DEBOUNCE_MS): StateStorage {
  const timers = new Map<string, ReturnType<typeof setTimeout>>();
  const lastWritten = new Map<string, string>();

  return {
    getItem(name: string): string | null {
      return localStorage.getItem(name);
    },

    setItem(name: string, value: string): void {
      // Skip if identical to last write
      if (lastWritten.get(name) === value) return;

      const existing = timers.get(name);
      if (existing) clearTimeout(existing);

      timers.set(
        name,
        setTimeout(() => {
          timers.delete(name);
          try {
            localStorage.setItem(name, value);
            lastWritten.set(name, value);
          } catch (e) {
            if (e instanceof DOMException && e.name === 'QuotaExceededError') {
              console.warn('[preference-storage] localStorage quota exceeded, skipping write for', name);
            } else {
              throw e;
            }
          }
        }, delayMs),
      );
    },

    removeItem(name: string): void {
      const existing = timers.get(name);
      if (existing) clearTimeout(existing);
      timers.delete(name);
      lastWritten.delete(name);
      localStorage.removeItem(name);
    },
  };
}
