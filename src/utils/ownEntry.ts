/**
 * Look up an id in a plain record. Only own properties count, so ids such
 * as `constructor` or `__proto__` come back undefined.
 */
export function getOwn<T>(table: Readonly<Record<string, T>>, id: string): T | undefined {
  return Object.hasOwn(table, id) ? table[id] : undefined;
}

/**
 * Frozen record from a map. Keys become own data properties even when
 * they collide with Object.prototype members.
 */
export function freezeRecord<T>(entries: ReadonlyMap<string, T>): Readonly<Record<string, T>> {
  return Object.freeze(Object.fromEntries(entries));
}
