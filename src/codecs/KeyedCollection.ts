import { LogContext, logger } from '../utils/logger';

/**
 * Decode a wire array whose elements carry their own ID into a map keyed by
 * that ID. On duplicate IDs the last element wins.
 */
export function decodeKeyed<W, T>(
  items: readonly W[] | null | undefined,
  decodeItem: (item: W, index: number) => T,
  keyOf: (value: T) => string,
  collection = 'collection',
  context?: LogContext
): Map<string, T> {
  const map = new Map<string, T>();

  (items ?? []).forEach((item, index) => {
    const value = decodeItem(item, index);
    const key = keyOf(value);
    if (map.has(key)) {
      logger.duplicateKey(collection, key, context);
    }
    map.set(key, value);
  });

  return map;
}

/**
 * Write a keyed map back as an array. The order is the map's iteration order
 * and carries no meaning.
 */
export function encodeKeyed<T, W>(
  map: ReadonlyMap<string, T>,
  encodeItem: (value: T) => W
): W[] {
  return Array.from(map.values(), value => encodeItem(value));
}
