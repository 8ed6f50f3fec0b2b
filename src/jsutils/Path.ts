import type { Maybe } from './Maybe';

/**
 * A response path: a persistent linked list of response keys and list
 * indices, shared structurally between sibling branches.
 */
export interface Path {
  readonly prev: Path | undefined;
  readonly key: string | number;
  readonly typename: string | undefined;
}

/**
 * Given a Path and a key, return a new Path containing the new key.
 */
export function addPath(
  prev: Readonly<Path> | undefined,
  key: string | number,
  typename: string | undefined,
): Path {
  return { prev, key, typename };
}

/**
 * Given a Path, return an Array of the path keys.
 */
export function pathToArray(
  path: Maybe<Readonly<Path>>,
): Array<string | number> {
  const flattened = [];
  let curr = path;
  while (curr) {
    flattened.push(curr.key);
    curr = curr.prev;
  }
  return flattened.reverse();
}

/**
 * Renders a path as `hero.friends[0].name`.
 */
export function printPath(path: Maybe<Readonly<Path>>): string {
  let printed = '';
  for (const key of pathToArray(path)) {
    if (typeof key === 'number') {
      printed += `[${key}]`;
    } else {
      printed += printed === '' ? key : `.${key}`;
    }
  }
  return printed;
}
