export type ResponseHeaderSource =
  | Iterable<readonly [string, string]>
  | Record<string, string | ReadonlyArray<string> | undefined>;

function isIterable(
  source: ResponseHeaderSource,
): source is Iterable<readonly [string, string]> {
  return Symbol.iterator in source;
}

/**
 * Ordered response headers. Names keep their received casing, lookups are
 * case-insensitive and repeated names (e.g. Set-Cookie) are all kept.
 */
export class ResponseHeaders implements Iterable<[string, string]> {
  private readonly list: Array<[string, string]> = [];

  constructor(source?: ResponseHeaderSource) {
    if (!source) return;

    if (isIterable(source)) {
      for (const [name, value] of source) this.append(name, value);
      return;
    }

    for (const [name, value] of Object.entries(source)) {
      if (value === undefined) continue;
      if (typeof value === 'string') {
        this.append(name, value);
      } else {
        for (const item of value) this.append(name, item);
      }
    }
  }

  append(name: string, value: string): void {
    this.list.push([name, value]);
  }

  /** First value received for the header. */
  get(name: string): string | undefined {
    const lower = name.toLowerCase();
    return this.list.find(([key]) => key.toLowerCase() === lower)?.[1];
  }

  getAll(name: string): Array<string> {
    const lower = name.toLowerCase();
    return this.list
      .filter(([key]) => key.toLowerCase() === lower)
      .map(([, value]) => value);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  get size(): number {
    return this.list.length;
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.list.values();
  }
}
