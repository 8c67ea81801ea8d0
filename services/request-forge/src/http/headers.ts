export interface ReadonlyHeaders {
  get(name: string): string | undefined;
  getAll(name: string): string[];
  has(name: string): boolean;
  entries(): Array<[string, string]>;
  toRecord(): Record<string, string | string[]>;
}

interface HeaderEntry {
  // Name as first written; lookups go through the lower-cased key.
  name: string;
  values: string[];
}

/**
 * Case-insensitive, insertion-ordered header map. `set` replaces every value
 * for a name, `add` appends one more.
 */
export class RequestHeaders implements ReadonlyHeaders {
  private readonly entriesByKey = new Map<string, HeaderEntry>();

  constructor(init?: Iterable<[string, string]>) {
    if (init) {
      for (const [name, value] of init) {
        this.add(name, value);
      }
    }
  }

  get(name: string): string | undefined {
    return this.entriesByKey.get(name.toLowerCase())?.values[0];
  }

  getAll(name: string): string[] {
    return [...(this.entriesByKey.get(name.toLowerCase())?.values ?? [])];
  }

  has(name: string): boolean {
    return this.entriesByKey.has(name.toLowerCase());
  }

  set(name: string, value: string): this {
    const key = name.toLowerCase();
    const existing = this.entriesByKey.get(key);
    if (existing) {
      existing.values = [value];
    } else {
      this.entriesByKey.set(key, { name, values: [value] });
    }
    return this;
  }

  add(name: string, value: string): this {
    const existing = this.entriesByKey.get(name.toLowerCase());
    if (existing) {
      existing.values.push(value);
      return this;
    }
    return this.set(name, value);
  }

  delete(name: string): this {
    this.entriesByKey.delete(name.toLowerCase());
    return this;
  }

  /** One `[name, value]` pair per value, in insertion order. */
  entries(): Array<[string, string]> {
    const out: Array<[string, string]> = [];
    for (const entry of this.entriesByKey.values()) {
      for (const value of entry.values) {
        out.push([entry.name, value]);
      }
    }
    return out;
  }

  /** Lower-cased keys, the shape Node and Fastify use for incoming headers. */
  toRecord(): Record<string, string | string[]> {
    const out: Record<string, string | string[]> = {};
    for (const [key, entry] of this.entriesByKey) {
      out[key] = entry.values.length === 1 ? entry.values[0] : [...entry.values];
    }
    return out;
  }

  clone(): RequestHeaders {
    return new RequestHeaders(this.entries());
  }

  /** Frozen view over a private copy; later changes to this container do not show through. */
  readonlyView(): ReadonlyHeaders {
    const copy = this.clone();
    return Object.freeze({
      get: (name: string) => copy.get(name),
      getAll: (name: string) => copy.getAll(name),
      has: (name: string) => copy.has(name),
      entries: () => copy.entries(),
      toRecord: () => copy.toRecord()
    });
  }
}
