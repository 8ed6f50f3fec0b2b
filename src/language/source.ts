import { Source } from 'graphql';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Normalises parser input to a `Source`. Bytes must be valid UTF-8; anything
 * else is rejected before lexing starts.
 */
export function toSource(input: string | Uint8Array | Source): Source {
  if (input instanceof Source) {
    return input;
  }

  if (typeof input === 'string') {
    return new Source(input);
  }

  let body: string;
  try {
    body = utf8Decoder.decode(input);
  } catch (error) {
    throw new TypeError('GraphQL source must be valid UTF-8.', {
      cause: error,
    });
  }
  return new Source(body);
}
