import { DataFactory } from 'n3';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createProgram, formatBindings } from '../cli.js';
import { RawLiteral, XSD } from '../lib/literals.js';
import { bodyFields, FakeHttpClient, silentLogger, sparqlJson, type Handler } from './fake-http.js';

const ENDPOINT = 'http://localhost:3030/ds/sparql';
const SELECT = 'SELECT ?x ?y WHERE { ?s <urn:x> ?x ; <urn:y> ?y }';

const int = (value: string) => ({ type: 'literal', value, datatype: `${XSD}integer` });

function run(handler: Handler, env: Record<string, string> = { SPARQL_ENDPOINT: ENDPOINT }) {
  const http = new FakeHttpClient(handler);
  const lines: string[] = [];
  const program = createProgram({
    env,
    write: (line) => lines.push(line),
    client: { httpClient: http, logger: silentLogger() }
  });
  const exec = (...args: string[]) => program.parseAsync(['node', 'sparql-wire', ...args]);
  return { http, lines, exec };
}

beforeEach(() => {
  vi.spyOn(process, 'emitWarning').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('query command', () => {
  it('prints the raw response body', async () => {
    const { http, lines, exec } = run(() => ({ body: 'x,y\r\n1,2\r\n' }));

    await exec('query', SELECT, '--format', 'csv');

    expect(lines).toEqual(['x,y\r\n1,2\r\n']);
    expect(http.requests[0].headers.Accept).toBe('text/csv');
  });

  it('prints converted bindings one row per line', async () => {
    const payload = {
      head: { vars: ['x', 'y'] },
      results: { bindings: [{ x: int('1'), y: int('2') }, { x: int('3') }] }
    };
    const { lines, exec } = run(() => sparqlJson(payload));

    await exec('query', SELECT, '--convert');

    expect(lines).toEqual(['x=1\ty=2', 'x=3\ty=-']);
  });

  it('prints ASK results as true or false', async () => {
    const { lines, exec } = run(() => sparqlJson({ boolean: false }));
    await exec('query', 'ASK { ?s ?p ?o }', '--convert');
    expect(lines).toEqual(['false']);
  });

  it('prints converted graphs as N-Triples', async () => {
    const { lines, exec } = run(() => ({ headers: { 'content-type': 'text/turtle' }, body: '<urn:s> <urn:p> <urn:o> .' }));
    await exec('query', 'CONSTRUCT { ?s ?p ?o } WHERE { ?s ?p ?o }', '--convert');
    expect(lines).toEqual(['<urn:s> <urn:p> <urn:o> .']);
  });

  it('sends repeated graph options and the version', async () => {
    const { http, exec } = run(() => sparqlJson({ boolean: true }));

    await exec(
      'query',
      'ASK { ?s ?p ?o }',
      '--named-graph-uri',
      'urn:g1',
      '--named-graph-uri',
      'urn:g2',
      '--default-graph-uri',
      'urn:d',
      '--version-param',
      '1.2'
    );

    expect(bodyFields(http.requests[0])).toEqual({
      query: ['ASK { ?s ?p ?o }'],
      version: ['1.2'],
      'default-graph-uri': ['urn:d'],
      'named-graph-uri': ['urn:g1', 'urn:g2']
    });
  });

  it('sends unparsed text with a declared type', async () => {
    const { http, exec } = run(() => sparqlJson({ boolean: true }));
    await exec('query', 'SELECT * { vendor:magic }', '--no-parse', '--type', 'select', '--endpoint', 'http://other/sparql');

    expect(http.requests[0].url).toBe('http://other/sparql');
    expect(http.requests[0].body.get('query')).toBe('SELECT * { vendor:magic }');
  });

  it('fails without an endpoint', async () => {
    const { exec } = run(() => ({}), {});
    await expect(exec('query', SELECT)).rejects.toThrow('No SPARQL query endpoint configured');
  });
});

describe('update command', () => {
  it('reports the response status', async () => {
    const { http, lines, exec } = run(() => ({ status: 204, statusText: 'No Content' }));

    await exec('update', 'CLEAR DEFAULT', '--using-graph-uri', 'urn:g');

    expect(lines).toEqual(['OK: 204 No Content']);
    expect(http.requests[0].url).toBe(ENDPOINT);
    expect(bodyFields(http.requests[0])).toEqual({ update: ['CLEAR DEFAULT'], 'using-graph-uri': ['urn:g'] });
  });

  it('prefers the update endpoint from the environment', async () => {
    const { http, exec } = run(() => ({ status: 200 }), {
      SPARQL_ENDPOINT: ENDPOINT,
      SPARQL_UPDATE_ENDPOINT: 'http://localhost:3030/ds/update'
    });

    await exec('update', 'CLEAR ALL');

    expect(http.requests[0].url).toBe('http://localhost:3030/ds/update');
  });
});

describe('formatBindings', () => {
  it('renders each value for the terminal', () => {
    const rows = formatBindings([
      {
        s: DataFactory.namedNode('http://example.org/item#a'),
        b: DataFactory.blankNode('b1'),
        label: 'A',
        year: new RawLiteral('2024', `${XSD}gYear`),
        n: null
      }
    ]);

    expect(rows).toEqual(['s=a\tb=_:b1\tlabel="A"\tyear="2024"^^gYear\tn=-']);
  });
});
