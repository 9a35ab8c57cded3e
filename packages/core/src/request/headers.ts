export type HeaderValue = string | number;

export type HeaderSource =
  | HttpHeaders
  | Iterable<readonly [string, HeaderValue]>
  | Record<string, HeaderValue | undefined>;

function isIterable(
  source: HeaderSource,
): source is Iterable<readonly [string, HeaderValue]> {
  return Symbol.iterator in source;
}

/**
 * Canonical header casing: the first letter of every alphabetic run is
 * upper-cased, the rest lower-cased (`x-test` becomes `X-Test`).
 */
export function titleCaseHeader(name: string): string {
  return name
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_, before: string, letter: string) => {
      return before + letter.toUpperCase();
    });
}

/**
 * Ordered, case-insensitive header mapping with unique keys. Later sources
 * passed to the constructor override earlier ones.
 */
export class HttpHeaders implements Iterable<[string, string]> {
  private readonly store = new Map<string, string>();

  constructor(...sources: Array<HeaderSource | undefined>) {
    for (const source of sources) {
      if (source) this.update(source);
    }
  }

  update(source: HeaderSource): this {
    if (source instanceof HttpHeaders) {
      for (const [name, value] of source) this.set(name, value);
    } else if (isIterable(source)) {
      for (const [name, value] of source) this.set(name, value);
    } else {
      for (const [name, value] of Object.entries(source)) {
        if (value !== undefined) this.set(name, value);
      }
    }
    return this;
  }

  get(name: string): string | undefined {
    return this.store.get(titleCaseHeader(name));
  }

  set(name: string, value: HeaderValue): this {
    this.store.set(titleCaseHeader(name), String(value));
    return this;
  }

  has(name: string): boolean {
    return this.store.has(titleCaseHeader(name));
  }

  delete(name: string): boolean {
    return this.store.delete(titleCaseHeader(name));
  }

  get size(): number {
    return this.store.size;
  }

  keys(): IterableIterator<string> {
    return this.store.keys();
  }

  entries(): IterableIterator<[string, string]> {
    return this.store.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.store.entries();
  }

  copy(): HttpHeaders {
    return new HttpHeaders(this);
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this.store);
  }
}
