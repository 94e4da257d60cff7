import sparqljs from 'sparqljs';
import type { SparqlQuery } from 'sparqljs';
import { ConfigurationError, QueryParseError, UnsupportedQueryTypeError, UpdateParseError } from './errors.js';

export type QueryType = 'select' | 'ask' | 'construct' | 'describe';

/** Query text whose form is declared by the caller and trusted without parsing. */
export type TypedQuery<T extends QueryType = QueryType> = {
  readonly type: T;
  readonly text: string;
};

export type SelectQuery = TypedQuery<'select'>;
export type AskQuery = TypedQuery<'ask'>;
export type ConstructQuery = TypedQuery<'construct'>;
export type DescribeQuery = TypedQuery<'describe'>;

export type QueryInput = string | TypedQuery;

function typed<T extends QueryType>(type: T, text: string): TypedQuery<T> {
  return Object.freeze({ type, text });
}

export const selectQuery = (text: string): SelectQuery => typed('select', text);
export const askQuery = (text: string): AskQuery => typed('ask', text);
export const constructQuery = (text: string): ConstructQuery => typed('construct', text);
export const describeQuery = (text: string): DescribeQuery => typed('describe', text);

export function isTypedQuery(value: unknown): value is TypedQuery {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    'text' in value &&
    typeof value.text === 'string' &&
    (value.type === 'select' || value.type === 'ask' || value.type === 'construct' || value.type === 'describe')
  );
}

export function queryText(query: QueryInput): string {
  return typeof query === 'string' ? query : query.text;
}

function parseSparql(text: string): SparqlQuery {
  return new sparqljs.Parser().parse(text);
}

function toQueryType(queryType: string): QueryType {
  switch (queryType) {
    case 'SELECT':
      return 'select';
    case 'ASK':
      return 'ask';
    case 'CONSTRUCT':
      return 'construct';
    case 'DESCRIBE':
      return 'describe';
    default:
      throw new UnsupportedQueryTypeError(queryType);
  }
}

/**
 * Determines the query form. Typed queries are trusted as declared; plain
 * strings are parsed, which requires `parse` to be enabled.
 */
export function classifyQuery(query: QueryInput, parse: boolean): QueryType {
  if (typeof query !== 'string') return query.type;

  if (!parse) {
    throw new ConfigurationError(
      'Query type cannot be determined without parsing; pass a typed query (selectQuery, askQuery, constructQuery, describeQuery) or enable parse.'
    );
  }

  let parsed: SparqlQuery;
  try {
    parsed = parseSparql(query);
  } catch (err) {
    throw new QueryParseError(query, err);
  }
  if (parsed.type !== 'query') {
    throw new QueryParseError(query, new Error('expected a query but got an update request'));
  }
  return toQueryType(parsed.queryType);
}

/** Checks update syntax; update requests are never classified. */
export function validateUpdate(update: string): void {
  let parsed: SparqlQuery;
  try {
    parsed = parseSparql(update);
  } catch (err) {
    throw new UpdateParseError(update, err);
  }
  if (parsed.type !== 'update') {
    throw new UpdateParseError(update, new Error(`expected an update request but got a ${parsed.queryType} query`));
  }
}
