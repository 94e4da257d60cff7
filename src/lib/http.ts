import { HttpStatusError } from './errors.js';

export type HttpRequest = {
  method: 'POST';
  url: string;
  body: URLSearchParams;
  headers: Record<string, string>;
  signal?: AbortSignal;
};

export type HttpResponse = {
  status: number;
  statusText: string;
  url: string;
  /** Lower-cased header names. */
  headers: Record<string, string>;
  body: Uint8Array;
};

export type HttpStream = Omit<HttpResponse, 'body'> & {
  chunks: AsyncIterable<Uint8Array>;
  /** Cancels the body and returns the connection; safe to call twice. */
  release(): Promise<void>;
};

/** The transport a SparqlClient sends its requests through. */
export interface HttpClient {
  readonly closed: boolean;
  send(request: HttpRequest): Promise<HttpResponse>;
  stream(request: HttpRequest): Promise<HttpStream>;
  close(): Promise<void>;
}

export type HttpClientConfig = {
  /** Per-request timeout; none by default. */
  timeoutMs?: number;
  /** Sent with every request unless the request sets the same header. */
  headers?: Record<string, string>;
  fetch?: typeof fetch;
};

const decoder = new TextDecoder();

export function responseText(response: Pick<HttpResponse, 'body'>): string {
  return decoder.decode(response.body);
}

export function responseHeader(response: Pick<HttpResponse, 'headers'>, name: string): string | undefined {
  return response.headers[name.toLowerCase()];
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export function raiseForStatus(response: HttpResponse): HttpResponse {
  if (isSuccess(response.status)) return response;
  throw new HttpStatusError(response.status, response.statusText, response.url, responseText(response));
}

/** Like raiseForStatus, but drains and releases the stream before throwing. */
export async function raiseForStreamStatus(stream: HttpStream): Promise<HttpStream> {
  if (isSuccess(stream.status)) return stream;
  let body: Uint8Array;
  try {
    body = await collect(stream.chunks);
  } finally {
    await stream.release();
  }
  throw new HttpStatusError(stream.status, stream.statusText, stream.url, decoder.decode(body));
}

export async function collect(chunks: AsyncIterable<Uint8Array>): Promise<Uint8Array> {
  const parts: Uint8Array[] = [];
  for await (const chunk of chunks) parts.push(chunk);
  return concatBytes(parts);
}

export function concatBytes(parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.byteLength, 0));
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.byteLength;
  }
  return out;
}

function headersToRecord(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key.toLowerCase()] = value;
  });
  return out;
}

/**
 * HttpClient over the global fetch. Closing aborts whatever is still in
 * flight and rejects later requests.
 */
export class FetchHttpClient implements HttpClient {
  private readonly fetchImpl: typeof fetch;
  private readonly inFlight = new Set<AbortController>();
  private isClosed = false;

  constructor(readonly config: HttpClientConfig = {}) {
    this.fetchImpl = config.fetch ?? fetch;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const { res, done } = await this.dispatch(request);
    try {
      const body = new Uint8Array(await res.arrayBuffer());
      return { ...responseMeta(res, request.url), body };
    } finally {
      done();
    }
  }

  async stream(request: HttpRequest): Promise<HttpStream> {
    const { res, done } = await this.dispatch(request);
    const reader = res.body?.getReader();
    let released = false;

    const release = async (): Promise<void> => {
      if (released) return;
      released = true;
      try {
        await reader?.cancel();
      } finally {
        done();
      }
    };

    async function* chunks(): AsyncGenerator<Uint8Array> {
      if (!reader) return;
      try {
        for (;;) {
          const { done: finished, value } = await reader.read();
          if (finished) return;
          yield value;
        }
      } finally {
        await release();
      }
    }

    return { ...responseMeta(res, request.url), chunks: chunks(), release };
  }

  async close(): Promise<void> {
    this.isClosed = true;
    for (const controller of this.inFlight) controller.abort();
    this.inFlight.clear();
  }

  private async dispatch(request: HttpRequest): Promise<{ res: Response; done: () => void }> {
    if (this.isClosed) throw new Error('HttpClient is closed');

    const controller = new AbortController();
    const signals = [controller.signal];
    if (request.signal) signals.push(request.signal);
    if (this.config.timeoutMs !== undefined) signals.push(AbortSignal.timeout(this.config.timeoutMs));

    this.inFlight.add(controller);
    const done = () => {
      this.inFlight.delete(controller);
    };

    try {
      const res = await this.fetchImpl(request.url, {
        method: request.method,
        headers: { ...this.config.headers, ...request.headers },
        body: request.body,
        signal: AbortSignal.any(signals)
      });
      return { res, done };
    } catch (err) {
      done();
      throw err;
    }
  }
}

function responseMeta(res: Response, requestUrl: string): Omit<HttpResponse, 'body'> {
  return {
    status: res.status,
    statusText: res.statusText,
    url: res.url || requestUrl,
    headers: headersToRecord(res.headers)
  };
}

/** Regroups a byte stream into chunks of `size` bytes; the last may be shorter. */
export async function* rechunk(chunks: AsyncIterable<Uint8Array>, size: number): AsyncGenerator<Uint8Array> {
  if (!Number.isInteger(size) || size <= 0) throw new RangeError(`chunk size must be a positive integer, got ${size}`);

  let pending: Uint8Array = new Uint8Array(0);
  for await (const chunk of chunks) {
    const buffer = pending.byteLength ? concatBytes([pending, chunk]) : chunk;
    let offset = 0;
    // views into `buffer`; only the tail shorter than `size` is copied
    while (buffer.byteLength - offset >= size) {
      yield buffer.subarray(offset, offset + size);
      offset += size;
    }
    pending = buffer.slice(offset);
  }
  if (pending.byteLength) yield pending;
}

/** Decodes UTF-8 chunks; a character split across chunks is emitted whole. */
export async function* decodeText(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const utf8 = new TextDecoder();
  for await (const chunk of chunks) {
    const text = utf8.decode(chunk, { stream: true });
    if (text) yield text;
  }
  const tail = utf8.decode();
  if (tail) yield tail;
}

const LINE_BREAK = /\r\n|\r|\n/;

/** Lines without their terminators; `\n`, `\r\n` and `\r` all end a line. */
export async function* splitLines(texts: AsyncIterable<string>): AsyncGenerator<string> {
  let pending = '';
  for await (const text of texts) {
    pending += text;
    // a trailing \r may be the first half of \r\n
    const heldCr = pending.endsWith('\r');
    const lines = (heldCr ? pending.slice(0, -1) : pending).split(LINE_BREAK);
    pending = (lines.pop() ?? '') + (heldCr ? '\r' : '');
    for (const line of lines) yield line;
  }
  if (pending) yield pending.endsWith('\r') ? pending.slice(0, -1) : pending;
}
