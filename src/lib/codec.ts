import type { Quad } from '@rdfjs/types';
import { JsonLdParser } from 'jsonld-streaming-parser';
import { Parser, Store } from 'n3';
import { RdfXmlParser } from 'rdfxml-streaming-parser';
import { UnknownGraphFormatError } from './errors.js';

/** Turns an RDF serialization into a graph. */
export interface RdfCodec {
  readonly contentTypes: readonly string[];
  parse(body: Uint8Array, mimeType: string, baseIRI?: string): Promise<Store>;
}

type QuadStreamParser = {
  on(event: 'data', listener: (quad: Quad) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
  write(chunk: string): unknown;
  end(): unknown;
};

const N3_FORMATS = new Map<string, string>([
  ['text/turtle', 'Turtle'],
  ['application/x-turtle', 'Turtle'],
  ['application/n-triples', 'N-Triples'],
  ['text/plain', 'N-Triples'],
  ['application/n-quads', 'N-Quads'],
  ['application/trig', 'TriG'],
  ['text/n3', 'N3']
]);

const STREAMING_FORMATS = new Map<string, (baseIRI?: string) => QuadStreamParser>([
  ['application/rdf+xml', (baseIRI) => new RdfXmlParser({ baseIRI })],
  ['application/ld+json', (baseIRI) => new JsonLdParser({ baseIRI })],
  // CONSTRUCT responses negotiated as plain JSON are JSON-LD
  ['application/json', (baseIRI) => new JsonLdParser({ baseIRI })]
]);

function drain(parser: QuadStreamParser, text: string): Promise<Store> {
  return new Promise((resolve, reject) => {
    const store = new Store();
    parser.on('data', (quad: Quad) => {
      store.addQuad(quad);
    });
    parser.on('error', reject);
    parser.on('end', () => resolve(store));
    parser.write(text);
    parser.end();
  });
}

export class DefaultRdfCodec implements RdfCodec {
  readonly contentTypes = [...N3_FORMATS.keys(), ...STREAMING_FORMATS.keys()];

  async parse(body: Uint8Array, mimeType: string, baseIRI?: string): Promise<Store> {
    const text = new TextDecoder().decode(body);

    const n3Format = N3_FORMATS.get(mimeType);
    if (n3Format !== undefined) {
      const store = new Store();
      store.addQuads(new Parser({ format: n3Format, baseIRI }).parse(text));
      return store;
    }

    const streaming = STREAMING_FORMATS.get(mimeType);
    if (streaming !== undefined) return drain(streaming(baseIRI), text);

    throw new UnknownGraphFormatError(mimeType);
  }
}

export const defaultRdfCodec: RdfCodec = new DefaultRdfCodec();
