import { FetchHttpClient, type HttpClient, type HttpClientConfig } from './http.js';

export type ClientManagerOptions = {
  /** Borrowed: used as is and never closed here. */
  httpClient?: HttpClient;
  /** Config for clients this manager creates (and closes). */
  httpConfig?: HttpClientConfig;
};

export type Lease = {
  client: HttpClient;
  release(): Promise<void>;
};

/**
 * Decides which HttpClient a call runs on and who closes it.
 *
 * A borrowed client is shared by every call. Without one, each call gets
 * its own client that is closed when the call settles, unless a session
 * client was opened with `open()`.
 */
export class ClientManager {
  private readonly borrowed?: HttpClient;
  private readonly httpConfig: HttpClientConfig;
  private session?: HttpClient;

  constructor(options: ClientManagerOptions = {}) {
    this.borrowed = options.httpClient;
    this.httpConfig = options.httpConfig ?? {};
  }

  get ownsClient(): boolean {
    return this.borrowed === undefined;
  }

  acquire(): Lease {
    const shared = this.borrowed ?? this.session;
    if (shared) return { client: shared, release: async () => {} };

    const client = new FetchHttpClient(this.httpConfig);
    return { client, release: () => client.close() };
  }

  async use<T>(fn: (client: HttpClient) => Promise<T>): Promise<T> {
    const lease = this.acquire();
    try {
      return await fn(lease.client);
    } finally {
      await lease.release();
    }
  }

  /** Keeps one owned client for all calls until `close()`. */
  open(): HttpClient {
    if (this.borrowed) return this.borrowed;
    if (!this.session || this.session.closed) this.session = new FetchHttpClient(this.httpConfig);
    return this.session;
  }

  async close(): Promise<void> {
    if (this.borrowed) {
      if (!this.borrowed.closed) this.warnUnmanaged();
      return;
    }
    const session = this.session;
    this.session = undefined;
    await session?.close();
  }

  private warnUnmanaged(): void {
    const msg =
      'HttpClient passed to SparqlClient is not managed by it and is still open. ' +
      'Call close() on it once it is no longer needed.';
    process.emitWarning(msg, { code: 'SPARQL_UNMANAGED_CLIENT' });
  }
}
