import type { Store } from 'n3';
import { ClientManager } from './client-manager.js';
import { defaultRdfCodec, type RdfCodec } from './codec.js';
import { convertAsk, convertBindings, convertGraph, type QueryResult } from './converters.js';
import { ConfigurationError } from './errors.js';
import {
  decodeText,
  raiseForStatus,
  raiseForStreamStatus,
  rechunk,
  splitLines,
  type HttpClient,
  type HttpClientConfig,
  type HttpRequest,
  type HttpResponse
} from './http.js';
import type { Binding } from './literals.js';
import { createConsoleLogger, structured, type Logger } from './logger.js';
import {
  encodeBody,
  queryOperationParameters,
  updateOperationParameters,
  type QueryOperationParameters,
  type QueryOptions,
  type UpdateOptions
} from './parameters.js';
import {
  askQuery,
  classifyQuery,
  constructQuery,
  describeQuery,
  queryText,
  selectQuery,
  validateUpdate,
  type QueryInput
} from './query.js';

export type SparqlClientOptions = {
  queryEndpoint?: string;
  updateEndpoint?: string;
  /** Borrowed transport; the client never closes it. */
  httpClient?: HttpClient;
  /** Config for transports the client creates itself. */
  httpConfig?: HttpClientConfig;
  /** Parse query and update text before sending (default true). */
  parse?: boolean;
  codec?: RdfCodec;
  logger?: Logger;
};

export type QueryCallOptions = QueryOptions & {
  /** Overrides the client-level `parse` flag for this call. */
  parse?: boolean;
  signal?: AbortSignal;
};

/** `bytes` yields raw chunks, `text` decoded UTF-8 text, `lines` one line at a time. */
export type StreamingMode = 'bytes' | 'text' | 'lines';

export type StreamOptions = QueryCallOptions & {
  /** Re-chunk the body into pieces of this many bytes before decoding. */
  chunkSize?: number;
  streaming?: StreamingMode;
};

export type UpdateCallOptions = UpdateOptions & {
  parse?: boolean;
  signal?: AbortSignal;
};

type PreparedQuery = { params: QueryOperationParameters; request: HttpRequest };

/**
 * SPARQL 1.1/1.2 Protocol client: form-encoded POST requests to a query and
 * an update endpoint, with optional conversion of results.
 */
export class SparqlClient {
  readonly queryEndpoint?: string;
  readonly updateEndpoint?: string;
  readonly parse: boolean;
  private readonly codec: RdfCodec;
  private readonly logger: Logger;
  private readonly manager: ClientManager;

  constructor(options: SparqlClientOptions = {}) {
    this.queryEndpoint = options.queryEndpoint;
    this.updateEndpoint = options.updateEndpoint;
    this.parse = options.parse ?? true;
    this.codec = options.codec ?? defaultRdfCodec;
    this.logger = options.logger ?? createConsoleLogger();
    this.manager = new ClientManager({ httpClient: options.httpClient, httpConfig: options.httpConfig });
  }

  /** Keeps one transport open across calls until `close()`. */
  open(): this {
    this.manager.open();
    return this;
  }

  async close(): Promise<void> {
    await this.manager.close();
  }

  /** Sends a query and returns the raw response. */
  async query(query: QueryInput, options: QueryCallOptions = {}): Promise<HttpResponse> {
    const prepared = this.prepareQuery(query, options, false);
    return this.manager.use((client) => this.send(client, prepared.request));
  }

  /** Sends a query and converts the response according to the query form. */
  async queryConverted(query: QueryInput, options: QueryCallOptions = {}): Promise<QueryResult> {
    const prepared = this.prepareQuery(query, options, true);
    return this.manager.use((client) => this.sendConverted(client, prepared));
  }

  async select(query: string, options: QueryCallOptions = {}): Promise<Binding[]> {
    return convertBindings(await this.sendTyped(selectQuery(query), options));
  }

  async ask(query: string, options: QueryCallOptions = {}): Promise<boolean> {
    return convertAsk(await this.sendTyped(askQuery(query), options));
  }

  async construct(query: string, options: QueryCallOptions = {}): Promise<Store> {
    return convertGraph(await this.sendTyped(constructQuery(query), options), this.codec);
  }

  async describe(query: string, options: QueryCallOptions = {}): Promise<Store> {
    return convertGraph(await this.sendTyped(describeQuery(query), options), this.codec);
  }

  /**
   * Streams the response body. The connection is held while iterating and
   * released when iteration ends, fails, or is abandoned with `return()`.
   */
  queryStream(query: QueryInput, options?: StreamOptions & { streaming?: 'bytes' }): AsyncGenerator<Uint8Array>;
  queryStream(query: QueryInput, options: StreamOptions & { streaming: 'text' | 'lines' }): AsyncGenerator<string>;
  queryStream(query: QueryInput, options?: StreamOptions): AsyncGenerator<Uint8Array | string>;
  async *queryStream(query: QueryInput, options: StreamOptions = {}): AsyncGenerator<Uint8Array | string> {
    const { request } = this.prepareQuery(query, options, false);
    const lease = this.manager.acquire();
    try {
      this.logRequest(request);
      const stream = await raiseForStreamStatus(await lease.client.stream(request));
      this.logResponse(stream);
      try {
        const chunks = options.chunkSize === undefined ? stream.chunks : rechunk(stream.chunks, options.chunkSize);
        switch (options.streaming ?? 'bytes') {
          case 'bytes':
            yield* chunks;
            break;
          case 'text':
            yield* decodeText(chunks);
            break;
          case 'lines':
            yield* splitLines(decodeText(chunks));
            break;
        }
      } finally {
        await stream.release();
      }
    } finally {
      await lease.release();
    }
  }

  /**
   * Runs the queries concurrently. Results keep the input order; the first
   * failure aborts the remaining requests and rejects the whole batch.
   */
  async queries(queries: readonly QueryInput[], options: QueryCallOptions = {}): Promise<HttpResponse[]> {
    const prepared = queries.map((query) => this.prepareQuery(query, options, false));
    return this.manager.use((client) =>
      this.fanOut(prepared, options.signal, (item, signal) => this.send(client, { ...item.request, signal }))
    );
  }

  async queriesConverted(queries: readonly QueryInput[], options: QueryCallOptions = {}): Promise<QueryResult[]> {
    const prepared = queries.map((query) => this.prepareQuery(query, options, true));
    return this.manager.use((client) =>
      this.fanOut(prepared, options.signal, (item, signal) =>
        this.sendConverted(client, { ...item, request: { ...item.request, signal } })
      )
    );
  }

  async update(update: string, options: UpdateCallOptions = {}): Promise<HttpResponse> {
    const request = this.prepareUpdate(update, options);
    return this.manager.use((client) => this.send(client, request));
  }

  /** Concurrent updates with the same ordering and failure rules as `queries`. */
  async updates(updates: readonly string[], options: UpdateCallOptions = {}): Promise<HttpResponse[]> {
    const requests = updates.map((update) => this.prepareUpdate(update, options));
    return this.manager.use((client) =>
      this.fanOut(requests, options.signal, (request, signal) => this.send(client, { ...request, signal }))
    );
  }

  private prepareQuery(query: QueryInput, options: QueryCallOptions, convert: boolean): PreparedQuery {
    const url = this.requireEndpoint(this.queryEndpoint, 'query');
    const queryType = classifyQuery(query, options.parse ?? this.parse);
    const params = queryOperationParameters({
      query: queryText(query),
      queryType,
      convert,
      responseFormat: options.responseFormat,
      version: options.version,
      defaultGraphUri: options.defaultGraphUri,
      namedGraphUri: options.namedGraphUri
    });
    return {
      params,
      request: { method: 'POST', url, body: encodeBody(params.data), headers: params.headers, signal: options.signal }
    };
  }

  private prepareUpdate(update: string, options: UpdateCallOptions): HttpRequest {
    const url = this.requireEndpoint(this.updateEndpoint, 'update');
    if (options.parse ?? this.parse) validateUpdate(update);
    const params = updateOperationParameters({
      update,
      version: options.version,
      usingGraphUri: options.usingGraphUri,
      usingNamedGraphUri: options.usingNamedGraphUri
    });
    return { method: 'POST', url, body: encodeBody(params.data), headers: params.headers, signal: options.signal };
  }

  private requireEndpoint(endpoint: string | undefined, kind: 'query' | 'update'): string {
    if (!endpoint) throw new ConfigurationError(`No SPARQL ${kind} endpoint configured`);
    return endpoint;
  }

  private async sendTyped(query: QueryInput, options: QueryCallOptions): Promise<HttpResponse> {
    const { request } = this.prepareQuery(query, options, true);
    return this.manager.use((client) => this.send(client, request));
  }

  private async sendConverted(client: HttpClient, prepared: PreparedQuery): Promise<QueryResult> {
    const response = await this.send(client, prepared.request);
    return prepared.params.converter(response, this.codec);
  }

  private async send(client: HttpClient, request: HttpRequest): Promise<HttpResponse> {
    this.logRequest(request);
    const response = await client.send(request);
    this.logResponse(response);
    return raiseForStatus(response);
  }

  private async fanOut<T, R>(
    items: readonly T[],
    signal: AbortSignal | undefined,
    run: (item: T, signal: AbortSignal) => Promise<R>
  ): Promise<R[]> {
    signal?.throwIfAborted();
    const controller = new AbortController();
    const forward = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forward, { once: true });
    try {
      return await Promise.all(
        items.map((item) =>
          run(item, controller.signal).catch((err: unknown) => {
            controller.abort(err);
            throw err;
          })
        )
      );
    } finally {
      signal?.removeEventListener('abort', forward);
    }
  }

  private logRequest(request: HttpRequest): void {
    this.logger.info(structured('Request', { method: request.method, url: request.url }));
    this.logger.debug(
      structured('Request', {
        method: request.method,
        url: request.url,
        headers: request.headers,
        content: request.body.toString()
      })
    );
  }

  private logResponse(response: Pick<HttpResponse, 'status' | 'statusText' | 'url' | 'headers'>): void {
    this.logger.info(structured('Response', { status: response.status, url: response.url }));
    this.logger.debug(
      structured('Response', {
        status: response.status,
        reason: response.statusText,
        url: response.url,
        headers: response.headers
      })
    );
  }
}
