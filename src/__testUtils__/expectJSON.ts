import { expect } from 'chai';

import { isObjectLike } from '../jsutils/isObjectLike';

/**
 * Deeply transforms an arbitrary value to a JSON-safe value by calling toJSON
 * on any nested value which defines it.
 */
function toJSONDeep(value: unknown): unknown {
  if (!isObjectLike(value)) {
    return value;
  }

  if (typeof value.toJSON === 'function') {
    const json: unknown = value.toJSON();
    return json;
  }

  if (Array.isArray(value)) {
    return value.map(toJSONDeep);
  }

  const result: { [key: string]: unknown } = {};
  for (const [key, nested] of Object.entries(value)) {
    result[key] = toJSONDeep(nested);
  }
  return result;
}

export function expectJSON(actual: unknown) {
  const actualJSON = toJSONDeep(actual);

  return {
    toDeepEqual(expected: unknown) {
      const expectedJSON = toJSONDeep(expected);
      expect(actualJSON).to.deep.equal(expectedJSON);
    },
    toDeepNestedProperty(path: string, expected: unknown) {
      const expectedJSON = toJSONDeep(expected);
      expect(actualJSON).to.deep.nested.property(path, expectedJSON);
    },
  };
}
