import type { Store } from 'n3';
import * as z from 'zod';
import { defaultRdfCodec, type RdfCodec } from './codec.js';
import {
  MalformedAskPayloadError,
  MalformedResultsPayloadError,
  MissingBooleanKeyError,
  UnknownGraphFormatError
} from './errors.js';
import { responseHeader, responseText, type HttpResponse } from './http.js';
import { coerceTerm, type Binding } from './literals.js';

export type QueryResult =
  | { type: 'bindings'; bindings: Binding[] }
  | { type: 'boolean'; value: boolean }
  | { type: 'graph'; graph: Store };

export type Converter = (response: HttpResponse, codec?: RdfCodec) => Promise<QueryResult>;

const termSchema = z.object({
  type: z.enum(['uri', 'literal', 'typed-literal', 'bnode']),
  value: z.string(),
  datatype: z.string().optional(),
  'xml:lang': z.string().optional()
});

const resultsSchema = z.object({
  head: z.object({ vars: z.array(z.string()) }),
  results: z.object({ bindings: z.array(z.record(termSchema)) })
});

export type SparqlJsonResults = z.infer<typeof resultsSchema>;

function fieldOf(path: (string | number)[]): string {
  if (path.length === 1 && path[0] === 'head') return 'head.vars';
  if (path.length === 1 && path[0] === 'results') return 'results.bindings';
  return path.join('.');
}

/** Parses a SPARQL 1.1 Query Results JSON document into result rows. */
export function parseBindings(text: string): Binding[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new MalformedResultsPayloadError('body', 'body is not valid JSON', err instanceof Error ? err.message : undefined);
  }

  const parsed = resultsSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (issue.path.length === 0) {
      throw new MalformedResultsPayloadError('body', 'body is not a JSON object', issue.message);
    }
    const field = fieldOf(issue.path);
    throw new MalformedResultsPayloadError(field, `missing or invalid '${field}'`, issue.message);
  }

  const { vars } = parsed.data.head;
  return parsed.data.results.bindings.map((row) => {
    const binding: Binding = {};
    for (const name of vars) binding[name] = coerceTerm(row[name]);
    return binding;
  });
}

export function parseAsk(text: string): boolean {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new MalformedAskPayloadError(err);
  }

  if (typeof json !== 'object' || json === null || !('boolean' in json) || typeof json.boolean !== 'boolean') {
    throw new MissingBooleanKeyError();
  }
  return json.boolean;
}

/** Media type without parameters, e.g. `text/turtle; charset=utf-8` → `text/turtle`. */
export function mediaType(contentType: string | undefined): string | undefined {
  if (contentType === undefined) return undefined;
  const type = contentType.split(';')[0].trim().toLowerCase();
  return type.length ? type : undefined;
}

export function convertBindings(response: HttpResponse): Binding[] {
  return parseBindings(responseText(response));
}

export function convertAsk(response: HttpResponse): boolean {
  return parseAsk(responseText(response));
}

export async function convertGraph(response: HttpResponse, codec: RdfCodec = defaultRdfCodec): Promise<Store> {
  const type = mediaType(responseHeader(response, 'content-type'));
  if (type === undefined || !codec.contentTypes.includes(type)) throw new UnknownGraphFormatError(type);
  return codec.parse(response.body, type, response.url || undefined);
}

export const bindingsConverter: Converter = async (response) => ({
  type: 'bindings',
  bindings: convertBindings(response)
});

export const askConverter: Converter = async (response) => ({ type: 'boolean', value: convertAsk(response) });

export const graphConverter: Converter = async (response, codec) => ({
  type: 'graph',
  graph: await convertGraph(response, codec)
});
