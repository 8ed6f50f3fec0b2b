import type { ObjMap } from './ObjMap';

/**
 * Creates a keyed JS object from an array, given a function to produce the keys
 * for each value in the array.
 */
export function keyMap<T>(
  list: ReadonlyArray<T>,
  keyFn: (item: T) => string,
): ObjMap<T | undefined> {
  const result: ObjMap<T | undefined> = Object.create(null);
  for (const item of list) {
    result[keyFn(item)] = item;
  }
  return result;
}
