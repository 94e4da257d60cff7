export class SparqlClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class QueryParseError extends SparqlClientError {
  constructor(readonly query: string, cause: unknown) {
    super(`Invalid SPARQL query: ${describeCause(cause)}`, { cause });
  }
}

export class UpdateParseError extends SparqlClientError {
  constructor(readonly update: string, cause: unknown) {
    super(`Invalid SPARQL update request: ${describeCause(cause)}`, { cause });
  }
}

/** Raised when the parser reports a query form this client does not know. */
export class UnsupportedQueryTypeError extends SparqlClientError {
  constructor(readonly queryType: string) {
    super(`Unsupported query type: ${queryType}`);
  }
}

export class UnsupportedLiteralTypeError extends SparqlClientError {
  constructor(readonly datatype: string, readonly value: string) {
    super(`Unsupported literal datatype <${datatype}> for value "${value}"`);
  }
}

export class InvalidLiteralError extends SparqlClientError {
  constructor(readonly datatype: string, readonly value: string) {
    super(`Invalid lexical form "${value}" for datatype <${datatype}>`);
  }
}

export class MalformedResultsPayloadError extends SparqlClientError {
  constructor(readonly field: string, problem: string, detail?: string) {
    super(`Malformed SPARQL results payload: ${problem}` + (detail ? ` (${detail})` : ''));
  }
}

export class MalformedAskPayloadError extends SparqlClientError {
  constructor(cause: unknown) {
    super(`Expected JSON response for ASK query: ${describeCause(cause)}`, { cause });
  }
}

export class MissingBooleanKeyError extends SparqlClientError {
  constructor() {
    super("ASK response missing 'boolean' key");
  }
}

export class UnknownGraphFormatError extends SparqlClientError {
  constructor(readonly contentType: string | undefined) {
    super(
      contentType === undefined
        ? 'Cannot parse graph response without a content-type header'
        : `Unknown graph format: ${contentType}`
    );
  }
}

/** Caller misconfiguration, raised before any request is sent. */
export class ConfigurationError extends SparqlClientError {}

export class HttpStatusError extends SparqlClientError {
  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly url: string,
    readonly body: string
  ) {
    super(`SPARQL request failed (${status} ${statusText}): ${body}`);
  }
}
