import { askConverter, bindingsConverter, graphConverter, type Converter } from './converters.js';
import { ConfigurationError } from './errors.js';
import type { QueryType } from './query.js';

export type BindingsFormat = 'json' | 'xml' | 'csv' | 'tsv';
export type GraphFormat = 'turtle' | 'xml' | 'ntriples' | 'json-ld';

// `(string & {})` keeps alias completion while accepting any MIME type
export type ResponseFormat = BindingsFormat | GraphFormat | (string & {});

/** One value, or a list sent as repeated fields. */
export type RequestDataValue = string | readonly string[] | undefined | null;

export type OperationData = Record<string, string | string[]>;

export const BINDINGS_FORMATS: Readonly<Record<BindingsFormat, string>> = {
  json: 'application/sparql-results+json',
  xml: 'application/sparql-results+xml',
  csv: 'text/csv',
  tsv: 'text/tab-separated-values'
};

export const GRAPH_FORMATS: Readonly<Record<GraphFormat, string>> = {
  turtle: 'text/turtle',
  xml: 'application/rdf+xml',
  ntriples: 'application/n-triples',
  'json-ld': 'application/ld+json'
};

const JSON_RESULT_TYPES = ['application/json', 'application/sparql-results+json'];

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/** Alias → MIME type; anything that is not an alias is used verbatim. */
export function resolveFormat(formats: Readonly<Record<string, string>>, format: string): string {
  return Object.hasOwn(formats, format) ? formats[format] : format;
}

function toProtocolName(option: string): string {
  return option.replace(/_/g, '-').replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

/**
 * Request fields under their protocol names (`namedGraphUri` and
 * `named_graph_uri` both become `named-graph-uri`). Unset options are left out.
 */
export function operationData(fields: Record<string, RequestDataValue>): OperationData {
  const data: OperationData = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined || value === null) continue;
    data[toProtocolName(key)] = typeof value === 'string' ? value : [...value];
  }
  return data;
}

export function encodeBody(data: OperationData): URLSearchParams {
  const body = new URLSearchParams();
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'string') {
      body.append(key, value);
    } else {
      for (const item of value) body.append(key, item);
    }
  }
  return body;
}

export type QueryOptions = {
  responseFormat?: ResponseFormat;
  version?: string;
  defaultGraphUri?: RequestDataValue;
  namedGraphUri?: RequestDataValue;
};

export type QueryOperationInput = QueryOptions & {
  query: string;
  queryType: QueryType;
  convert?: boolean;
};

export type QueryOperationParameters = {
  queryType: QueryType;
  responseFormat: string;
  data: OperationData;
  headers: Record<string, string>;
  converter: Converter;
};

function selectResponseFormat(queryType: QueryType, format: string | undefined, convert: boolean): string {
  switch (queryType) {
    case 'select':
    case 'ask': {
      const resolved = resolveFormat(BINDINGS_FORMATS, format ?? 'json');
      if (convert && !JSON_RESULT_TYPES.includes(resolved)) {
        throw new ConfigurationError('JSON response format required for convert=True on SELECT and ASK query results.');
      }
      return resolved;
    }
    case 'construct':
    case 'describe':
      return resolveFormat(GRAPH_FORMATS, format ?? 'turtle');
    default: {
      const unreachable: never = queryType;
      throw new ConfigurationError(`Unsupported query type: ${String(unreachable)}`);
    }
  }
}

function selectConverter(queryType: QueryType): Converter {
  switch (queryType) {
    case 'select':
      return bindingsConverter;
    case 'ask':
      return askConverter;
    case 'construct':
    case 'describe':
      return graphConverter;
    default: {
      const unreachable: never = queryType;
      throw new ConfigurationError(`Unsupported query type: ${String(unreachable)}`);
    }
  }
}

export function queryOperationParameters(input: QueryOperationInput): QueryOperationParameters {
  const responseFormat = selectResponseFormat(input.queryType, input.responseFormat, input.convert ?? false);

  return {
    queryType: input.queryType,
    responseFormat,
    data: operationData({
      query: input.query,
      version: input.version,
      defaultGraphUri: input.defaultGraphUri,
      namedGraphUri: input.namedGraphUri
    }),
    headers: {
      Accept: responseFormat,
      'Content-Type': FORM_CONTENT_TYPE
    },
    converter: selectConverter(input.queryType)
  };
}

export type UpdateOptions = {
  version?: string;
  usingGraphUri?: RequestDataValue;
  usingNamedGraphUri?: RequestDataValue;
};

export type UpdateOperationParameters = {
  data: OperationData;
  headers: Record<string, string>;
};

export function updateOperationParameters(input: UpdateOptions & { update: string }): UpdateOperationParameters {
  return {
    data: operationData({
      update: input.update,
      version: input.version,
      usingGraphUri: input.usingGraphUri,
      usingNamedGraphUri: input.usingNamedGraphUri
    }),
    headers: { 'Content-Type': FORM_CONTENT_TYPE }
  };
}
