import { expect } from 'chai';
import { describe, it } from 'mocha';

import { Source } from 'graphql';

import { parse } from '../parser';
import { toSource } from '../source';

describe('toSource', () => {
  it('returns a Source unchanged', () => {
    const source = new Source('{ a }', 'query.graphql');
    expect(toSource(source)).to.equal(source);
  });

  it('wraps a string', () => {
    const source = toSource('{ a }');
    expect(source).to.be.an.instanceOf(Source);
    expect(source.body).to.equal('{ a }');
    expect(source.name).to.equal('GraphQL request');
  });

  it('decodes UTF-8 bytes', () => {
    const source = toSource(new TextEncoder().encode('{ a(s: "é") }'));
    expect(source.body).to.equal('{ a(s: "é") }');
  });

  it('rejects malformed bytes before lexing', () => {
    expect(() => toSource(new Uint8Array([0x7b, 0xff, 0x7d])))
      .to.throw(TypeError)
      .with.property('message', 'GraphQL source must be valid UTF-8.');
  });

  it('lets the parser take bytes', () => {
    const document = parse(new TextEncoder().encode('{ a }'), {
      noLocation: true,
    });
    expect(document.definitions).to.have.lengthOf(1);
  });
});
