import type { HttpClient, HttpRequest, HttpResponse, HttpStream } from '../lib/http.js';
import type { Logger } from '../lib/logger.js';
import { vi } from 'vitest';

export type FakeReply = {
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
  body?: string;
  /** Body split into stream chunks; defaults to the whole body. */
  chunks?: string[];
};

export type Handler = (request: HttpRequest) => FakeReply | Promise<FakeReply>;

const encoder = new TextEncoder();

export function sparqlJson(value: unknown, status = 200): FakeReply {
  return {
    status,
    headers: { 'content-type': 'application/sparql-results+json' },
    body: JSON.stringify(value)
  };
}

/** In-process HttpClient that answers through `handler`. */
export class FakeHttpClient implements HttpClient {
  readonly requests: HttpRequest[] = [];
  closed = false;
  closeCalls = 0;
  releases = 0;

  constructor(private readonly handler: Handler) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const reply = await this.handler(request);
    return {
      ...this.meta(request, reply),
      body: encoder.encode(reply.body ?? '')
    };
  }

  async stream(request: HttpRequest): Promise<HttpStream> {
    this.requests.push(request);
    const reply = await this.handler(request);
    const parts = reply.chunks ?? [reply.body ?? ''];
    let released = false;
    const release = async () => {
      if (released) return;
      released = true;
      this.releases += 1;
    };
    async function* chunks(): AsyncGenerator<Uint8Array> {
      try {
        for (const part of parts) yield encoder.encode(part);
      } finally {
        await release();
      }
    }
    return { ...this.meta(request, reply), chunks: chunks(), release };
  }

  async close(): Promise<void> {
    this.closed = true;
    this.closeCalls += 1;
  }

  private meta(request: HttpRequest, reply: FakeReply): Omit<HttpResponse, 'body'> {
    const status = reply.status ?? 200;
    return {
      status,
      statusText: reply.statusText ?? (status < 300 ? 'OK' : 'Internal Server Error'),
      url: request.url,
      headers: reply.headers ?? {}
    };
  }
}

export function bodyFields(request: HttpRequest): Record<string, string[]> {
  const fields: Record<string, string[]> = {};
  for (const key of new Set(request.body.keys())) fields[key] = request.body.getAll(key);
  return fields;
}

export function silentLogger(): Logger & { warn: ReturnType<typeof vi.fn> } {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
