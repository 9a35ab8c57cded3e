import { Buffer } from 'node:buffer';
import { STATUS_CODES } from 'node:http';
import type { Readable } from 'node:stream';
import {
  IncompleteRead,
  RequestError,
  TransportError,
} from '../errors/request-error.js';
import {
  ResponseHeaders,
  type ResponseHeaderSource,
} from './response-headers.js';

export const REDIRECT_STATUS_CODES: ReadonlySet<number> = new Set([
  301, 302, 303, 307, 308,
]);

export interface ResponseOptions {
  /** Final URL, after any redirects. */
  url: string;
  headers?: ResponseHeaderSource | ResponseHeaders;
  /** Default: 200 */
  status?: number;
  /** Derived from the status code when omitted. */
  reason?: string;
  /**
   * Number of body bytes the stream must deliver. When the stream ends
   * short, `read` raises IncompleteRead.
   */
  expectedLength?: number;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk), 'utf8');
}

/**
 * Uniform wrapper around a backend reply. The Response owns the raw stream:
 * closing it destroys the stream. Callers must close every Response they
 * receive, including those carried by an HTTPError.
 */
export class Response {
  readonly raw: Readable;
  readonly url: string;
  readonly headers: ResponseHeaders;
  readonly status: number;
  readonly reason: string | undefined;

  private readonly expectedLength: number | undefined;
  private iterator: AsyncIterator<unknown> | undefined;
  private buffered: Array<Buffer> = [];
  private bufferedLength = 0;
  private ended = false;
  private position = 0;
  private isClosed = false;

  constructor(raw: Readable, options: ResponseOptions) {
    this.raw = raw;
    this.url = options.url;
    this.headers =
      options.headers instanceof ResponseHeaders
        ? options.headers
        : new ResponseHeaders(options.headers);
    this.status = options.status ?? 200;
    this.reason = options.reason || STATUS_CODES[this.status];
    this.expectedLength = options.expectedLength;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  getHeader(name: string): string | undefined {
    return this.headers.get(name);
  }

  /**
   * The Location header, but only for redirect statuses.
   */
  getRedirectUrl(): string | null {
    if (!REDIRECT_STATUS_CODES.has(this.status)) return null;
    return this.headers.get('location') ?? null;
  }

  /**
   * Read up to `amount` bytes, or the rest of the body when omitted.
   * Resolves an empty buffer once the body is exhausted.
   */
  async read(amount?: number): Promise<Buffer> {
    if (this.isClosed) {
      throw new RequestError('Cannot read from a closed response');
    }
    if (amount !== undefined && amount <= 0) {
      return Buffer.alloc(0);
    }

    while (
      !this.ended &&
      (amount === undefined || this.bufferedLength < amount)
    ) {
      await this.pull();
    }

    const all = Buffer.concat(this.buffered, this.bufferedLength);
    const taken =
      amount === undefined || amount >= all.length ? all : all.subarray(0, amount);
    const rest = all.subarray(taken.length);

    this.buffered = rest.length > 0 ? [rest] : [];
    this.bufferedLength = rest.length;
    this.position += taken.length;
    return taken;
  }

  /** Number of body bytes handed out by `read` so far. */
  tell(): number {
    return this.position;
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.buffered = [];
    this.bufferedLength = 0;
    this.raw.destroy();
  }

  private async pull(): Promise<void> {
    this.iterator ??= this.raw[Symbol.asyncIterator]();

    let result: IteratorResult<unknown>;
    try {
      result = await this.iterator.next();
    } catch (error) {
      if (error instanceof RequestError) throw error;
      throw new TransportError(undefined, { cause: error });
    }

    if (!result.done) {
      const chunk = toBuffer(result.value);
      this.buffered.push(chunk);
      this.bufferedLength += chunk.length;
      return;
    }

    this.ended = true;
    const received = this.position + this.bufferedLength;
    if (this.expectedLength !== undefined && received < this.expectedLength) {
      throw new IncompleteRead(received, {
        expected: this.expectedLength - received,
      });
    }
  }
}

const BODILESS_STATUS_CODES: ReadonlySet<number> = new Set([204, 304]);

/**
 * Bytes the body must contain, from Content-Length. Unknown when the body is
 * content-encoded (the header then counts compressed bytes) or absent.
 */
export function expectedBodyLength(
  method: string,
  status: number,
  headers: ResponseHeaders,
): number | undefined {
  if (method === 'HEAD' || BODILESS_STATUS_CODES.has(status)) return undefined;
  if (status >= 100 && status < 200) return undefined;

  const encoding = headers.get('content-encoding');
  if (encoding && encoding.toLowerCase() !== 'identity') return undefined;

  const raw = headers.get('content-length');
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return undefined;
  return Number.parseInt(raw, 10);
}
