import { Store } from 'n3';
import { describe, expect, it } from 'vitest';
import type { RdfCodec } from '../lib/codec.js';
import { convertGraph, mediaType, parseAsk, parseBindings } from '../lib/converters.js';
import {
  MalformedAskPayloadError,
  MalformedResultsPayloadError,
  MissingBooleanKeyError,
  UnknownGraphFormatError
} from '../lib/errors.js';
import type { HttpResponse } from '../lib/http.js';
import { XSD } from '../lib/literals.js';

const int = (value: string) => ({ type: 'literal', value, datatype: `${XSD}integer` });

function graphResponse(body: string, contentType?: string): HttpResponse {
  return {
    status: 200,
    statusText: 'OK',
    url: 'http://localhost/sparql',
    headers: contentType === undefined ? {} : { 'content-type': contentType },
    body: new TextEncoder().encode(body)
  };
}

describe('parseBindings', () => {
  it('converts rows in payload order', () => {
    const payload = {
      head: { vars: ['x', 'y'] },
      results: {
        bindings: [
          { x: int('1'), y: int('2') },
          { x: int('3'), y: int('4') }
        ]
      }
    };

    expect(parseBindings(JSON.stringify(payload))).toEqual([
      { x: 1, y: 2 },
      { x: 3, y: 4 }
    ]);
  });

  it('gives every row every declared variable', () => {
    const payload = {
      head: { vars: ['s', 'label', 'missing'] },
      results: {
        bindings: [
          { s: { type: 'uri', value: 'urn:a' }, label: { type: 'literal', value: 'A' } },
          { label: { type: 'literal', value: 'B' } },
          {}
        ]
      }
    };

    const rows = parseBindings(JSON.stringify(payload));

    expect(rows).toHaveLength(3);
    for (const row of rows) expect(Object.keys(row)).toEqual(['s', 'label', 'missing']);
    expect(rows[0]).toMatchObject({ s: { termType: 'NamedNode', value: 'urn:a' }, label: 'A', missing: null });
    expect(rows[1]).toEqual({ s: null, label: 'B', missing: null });
    expect(rows[2]).toEqual({ s: null, label: null, missing: null });
  });

  it('returns no rows for an empty result', () => {
    expect(parseBindings('{"head":{"vars":["x"]},"results":{"bindings":[]}}')).toEqual([]);
  });

  it('reports a body that is not JSON', () => {
    expect(() => parseBindings('<sparql/>')).toThrow(MalformedResultsPayloadError);
    expect(() => parseBindings('<sparql/>')).toThrow(/^Malformed SPARQL results payload: body is not valid JSON/);
    try {
      parseBindings('<sparql/>');
    } catch (err) {
      expect(err).toMatchObject({ field: 'body' });
    }
  });

  it.each(['[]', 'null', '"results"'])('reports JSON %s that is not an object', (text) => {
    expect(() => parseBindings(text)).toThrow(MalformedResultsPayloadError);
    expect(() => parseBindings(text)).toThrow(/^Malformed SPARQL results payload: body is not a JSON object \(/);
  });

  it.each([
    ['{"results":{"bindings":[]}}', 'head.vars'],
    ['{"head":{},"results":{"bindings":[]}}', 'head.vars'],
    ['{"head":{"vars":["x"]}}', 'results.bindings'],
    ['{"head":{"vars":["x"]},"results":{}}', 'results.bindings']
  ])('names the missing field in %s', (text, field) => {
    expect(() => parseBindings(text)).toThrow(`missing or invalid '${field}'`);
  });

  it('propagates literal coercion failures', () => {
    const payload = {
      head: { vars: ['x'] },
      results: { bindings: [{ x: { type: 'literal', value: 'x', datatype: 'urn:custom' } }] }
    };
    expect(() => parseBindings(JSON.stringify(payload))).toThrow('Unsupported literal datatype <urn:custom>');
  });
});

describe('parseAsk', () => {
  it('returns the boolean result', () => {
    expect(parseAsk('{"head":{},"boolean":true}')).toBe(true);
    expect(parseAsk('{"boolean":false}')).toBe(false);
  });

  it('says JSON was expected for non-JSON bodies', () => {
    expect(() => parseAsk('NOT JSON')).toThrow(MalformedAskPayloadError);
    expect(() => parseAsk('NOT JSON')).toThrow(/^Expected JSON response for ASK query/);
  });

  it('names the missing boolean key', () => {
    expect(() => parseAsk('{"answer":true}')).toThrow(MissingBooleanKeyError);
    expect(() => parseAsk('{"answer":true}')).toThrow("ASK response missing 'boolean' key");
  });
});

describe('mediaType', () => {
  it('strips parameters', () => {
    expect(mediaType('text/turtle; charset=utf-8')).toBe('text/turtle');
    expect(mediaType('Application/N-Triples')).toBe('application/n-triples');
    expect(mediaType(undefined)).toBeUndefined();
  });
});

describe('convertGraph', () => {
  it('parses turtle using the content-type header', async () => {
    const body = '<urn:s> <urn:p> "1"^^<http://www.w3.org/2001/XMLSchema#integer> .';
    const graph = await convertGraph(graphResponse(body, 'text/turtle; charset=utf-8'));

    expect(graph.size).toBe(1);
    const [quad] = graph.getQuads(null, null, null, null);
    expect(quad.subject.value).toBe('urn:s');
    expect(quad.object.value).toBe('1');
  });

  it('parses n-triples', async () => {
    const body = '<urn:s> <urn:p> <urn:o1> .\n<urn:s> <urn:p> <urn:o2> .\n';
    const graph = await convertGraph(graphResponse(body, 'application/n-triples'));
    expect(graph.size).toBe(2);
  });

  it('parses RDF/XML', async () => {
    const body = `<?xml version="1.0"?>
<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#" xmlns:ex="http://example.org/">
  <rdf:Description rdf:about="http://example.org/s"><ex:p>v</ex:p></rdf:Description>
</rdf:RDF>`;
    const graph = await convertGraph(graphResponse(body, 'application/rdf+xml'));

    const quads = graph.getQuads(null, null, null, null);
    expect(quads).toHaveLength(1);
    expect(quads[0].predicate.value).toBe('http://example.org/p');
    expect(quads[0].object.value).toBe('v');
  });

  it('parses JSON-LD', async () => {
    const body = JSON.stringify({ '@id': 'urn:s', 'urn:p': [{ '@id': 'urn:o' }] });
    const graph = await convertGraph(graphResponse(body, 'application/ld+json'));

    const quads = graph.getQuads(null, null, null, null);
    expect(quads).toHaveLength(1);
    expect(quads[0].object.value).toBe('urn:o');
  });

  it('fails without a content type', async () => {
    await expect(convertGraph(graphResponse('<urn:s> <urn:p> <urn:o> .'))).rejects.toThrow(UnknownGraphFormatError);
  });

  it('asks the codec only for content types it declares', async () => {
    const parsed: string[] = [];
    const codec: RdfCodec = {
      contentTypes: ['text/x-graph'],
      async parse(_body, mimeType) {
        parsed.push(mimeType);
        return new Store();
      }
    };

    await expect(convertGraph(graphResponse('x', 'text/turtle'), codec)).rejects.toThrow('Unknown graph format: text/turtle');
    expect((await convertGraph(graphResponse('x', 'text/x-graph; v=1'), codec)).size).toBe(0);
    expect(parsed).toEqual(['text/x-graph']);
  });

  it('fails on a content type no parser handles', async () => {
    await expect(convertGraph(graphResponse('x', 'application/x-unknown'))).rejects.toMatchObject({
      name: 'UnknownGraphFormatError',
      contentType: 'application/x-unknown'
    });
  });
});
