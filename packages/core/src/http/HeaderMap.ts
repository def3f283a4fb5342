/**
 * A single header line.
 */
export interface Header {
  name: string;
  value: string;
}

/**
 * Headers with case-insensitive access. The case of the first name set for a
 * header is kept on output, and a name may carry several values (`Set-Cookie`).
 */
export class HeaderMap implements Iterable<Header> {
  private readonly entries = new Map<string, { name: string; values: string[] }>();

  constructor(initial?: Iterable<Header>) {
    if (initial) {
      for (const header of initial) this.append(header.name, header.value);
    }
  }

  /**
   * Gets a header value, comma-joined when it has several.
   */
  get(name: string): string | undefined {
    return this.entries.get(name.toLowerCase())?.values.join(', ');
  }

  getAll(name: string): string[] {
    return [...(this.entries.get(name.toLowerCase())?.values ?? [])];
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase());
  }

  /**
   * Sets a header, replacing every existing value.
   */
  set(name: string, value: string): void {
    this.entries.set(name.toLowerCase(), { name, values: [value] });
  }

  append(name: string, value: string): void {
    const entry = this.entries.get(name.toLowerCase());
    if (entry) entry.values.push(value);
    else this.entries.set(name.toLowerCase(), { name, values: [value] });
  }

  delete(name: string): boolean {
    return this.entries.delete(name.toLowerCase());
  }

  get size(): number {
    return this.entries.size;
  }

  clone(): HeaderMap {
    return new HeaderMap(this);
  }

  /**
   * Yields one entry per value, in insertion order.
   */
  *[Symbol.iterator](): Iterator<Header> {
    for (const { name, values } of this.entries.values()) {
      for (const value of values) yield { name, value };
    }
  }
}
