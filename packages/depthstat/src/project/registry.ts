/**
 * Explicit key -> handle registry.
 * Lookups fail with NOT_FOUND listing what is available.
 */

import type { Registry } from '../types.ts';
import { ok, err } from '../result.ts';

export const createRegistry = <T>(kind: string): Registry<T> => {
  const items = new Map<string, T>();

  const registry: Registry<T> = {
    kind,
    register: (key, item) => {
      items.set(key, item);
      return registry;
    },
    get: (key) => {
      const item = items.get(key);
      if (item !== undefined) return ok(item);
      const available = [...items.keys()];
      return err({
        code: 'NOT_FOUND',
        message: `${kind} "${key}" not found. Available: ${available.join(', ') || 'none'}`,
        kind,
        key,
        available,
      });
    },
    has: (key) => items.has(key),
    remove: (key) => items.delete(key),
    keys: () => [...items.keys()],
    entries: () => [...items.entries()],
  };

  return registry;
};
