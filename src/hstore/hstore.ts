// src/hstore/hstore.ts

export type HstorePair = readonly [key: string, value: string];

export type HstoreInit = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

/**
 * Mutable view of one entry. Assigning `value` writes through to the owning
 * container; using a cell after its entry was removed throws.
 */
export interface ValueCell {
  readonly key: string;
  value: string;
}

function requireString(v: unknown, what: string): string {
  if (typeof v !== "string") throw new TypeError(`Hstore ${what} must be a string, got ${typeof v}`);
  return v;
}

function isReadonlyMap(v: HstoreInit): v is ReadonlyMap<string, string> {
  return v instanceof Map;
}

class Cell implements ValueCell {
  public constructor(
    private readonly entries: Map<string, string>,
    public readonly key: string,
  ) {}

  public get value(): string {
    const v = this.entries.get(this.key);
    if (v === undefined) throw new Error(`Entry "${this.key}" is no longer present`);
    return v;
  }

  public set value(v: string) {
    if (!this.entries.has(this.key)) throw new Error(`Entry "${this.key}" is no longer present`);
    this.entries.set(this.key, requireString(v, "value"));
  }
}

/** Single-lookup access point for insert-if-absent / update-if-present. */
export class HstoreEntry {
  public constructor(
    private readonly entries: Map<string, string>,
    public readonly key: string,
  ) {}

  public get isOccupied(): boolean {
    return this.entries.has(this.key);
  }

  public get(): string | undefined {
    return this.entries.get(this.key);
  }

  /** Sets the value and returns the one it replaced. */
  public insert(value: string): string | undefined {
    const prev = this.entries.get(this.key);
    this.entries.set(this.key, requireString(value, "value"));
    return prev;
  }

  public remove(): string | undefined {
    const prev = this.entries.get(this.key);
    this.entries.delete(this.key);
    return prev;
  }

  public orInsert(value: string): string {
    return this.orInsertWith(() => value);
  }

  public orInsertWith(make: () => string): string {
    const cur = this.entries.get(this.key);
    if (cur !== undefined) return cur;
    const v = requireString(make(), "value");
    this.entries.set(this.key, v);
    return v;
  }

  public andModify(f: (value: string) => string): this {
    const cur = this.entries.get(this.key);
    if (cur !== undefined) this.entries.set(this.key, requireString(f(cur), "value"));
    return this;
  }
}

/**
 * Unique-key map from text to text, the in-memory side of the hstore type.
 *
 * Keys never map to null: the wire format's null values are dropped when
 * decoding. Iteration order carries no meaning. Not safe for concurrent
 * mutation.
 */
export class Hstore implements Iterable<[string, string]> {
  private readonly entries = new Map<string, string>();
  private cap = 0;

  public static withCapacity(capacity: number): Hstore {
    const h = new Hstore();
    h.reserve(capacity);
    return h;
  }

  public static fromMap(init: HstoreInit): Hstore {
    return Hstore.fromEntries(isReadonlyMap(init) ? init.entries() : Object.entries(init));
  }

  /** Later duplicates overwrite earlier ones. */
  public static fromEntries(pairs: Iterable<HstorePair>): Hstore {
    const h = new Hstore();
    h.extend(pairs);
    return h;
  }

  public get size(): number {
    return this.entries.size;
  }

  public isEmpty(): boolean {
    return this.entries.size === 0;
  }

  // Sizing hints only: a JS Map manages its own storage.
  public capacity(): number {
    return Math.max(this.cap, this.entries.size);
  }

  public reserve(additional: number): void {
    if (!Number.isInteger(additional) || additional < 0) {
      throw new RangeError(`Invalid capacity: ${additional}`);
    }
    this.cap = Math.max(this.cap, this.entries.size + additional);
  }

  public shrinkToFit(): void {
    this.cap = this.entries.size;
  }

  public clear(): void {
    this.entries.clear();
  }

  public get(key: string): string | undefined {
    return this.entries.get(key);
  }

  public getMut(key: string): ValueCell | undefined {
    return this.entries.has(key) ? new Cell(this.entries, key) : undefined;
  }

  /** Indexed access for keys known to be present; throws otherwise. */
  public at(key: string): string {
    const v = this.entries.get(key);
    if (v === undefined) throw new Error("no entry found for key");
    return v;
  }

  public containsKey(key: string): boolean {
    return this.entries.has(key);
  }

  /** Returns the previous value when `key` was already present. */
  public insert(key: string, value: string): string | undefined {
    requireString(key, "key");
    requireString(value, "value");
    const prev = this.entries.get(key);
    this.entries.set(key, value);
    return prev;
  }

  public remove(key: string): string | undefined {
    const prev = this.entries.get(key);
    this.entries.delete(key);
    return prev;
  }

  public entry(key: string): HstoreEntry {
    return new HstoreEntry(this.entries, requireString(key, "key"));
  }

  public extend(pairs: Iterable<HstorePair>): void {
    for (const [k, v] of pairs) this.insert(k, v);
  }

  /** Keeps the entries for which `keep` returns true; `keep` may assign `cell.value` first. */
  public retain(keep: (key: string, cell: ValueCell) => boolean): void {
    for (const key of [...this.entries.keys()]) {
      if (!keep(key, new Cell(this.entries, key))) this.entries.delete(key);
    }
  }

  /** Empties the container, yielding what it held. */
  public drain(): IterableIterator<[string, string]> {
    const taken = [...this.entries];
    this.entries.clear();
    return taken[Symbol.iterator]();
  }

  public keys(): IterableIterator<string> {
    return this.entries.keys();
  }

  public values(): IterableIterator<string> {
    return this.entries.values();
  }

  public *valuesMut(): IterableIterator<ValueCell> {
    for (const key of this.entries.keys()) yield new Cell(this.entries, key);
  }

  public iter(): IterableIterator<[string, string]> {
    return this.entries.entries();
  }

  public *iterMut(): IterableIterator<[string, ValueCell]> {
    for (const key of this.entries.keys()) yield [key, new Cell(this.entries, key)];
  }

  public [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.iter();
  }

  public equals(other: Hstore): boolean {
    if (this.entries.size !== other.entries.size) return false;
    for (const [k, v] of this.entries) {
      if (other.entries.get(k) !== v) return false;
    }
    return true;
  }

  public clone(): Hstore {
    const h = Hstore.fromEntries(this.entries);
    h.cap = this.cap;
    return h;
  }

  public toMap(): Map<string, string> {
    return new Map(this.entries);
  }

  public toRecord(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [k, v] of this.entries) {
      Object.defineProperty(out, k, { value: v, enumerable: true, writable: true, configurable: true });
    }
    return out;
  }

  public toJSON(): Record<string, string> {
    return this.toRecord();
  }

  public toString(): string {
    const parts = [...this.entries].map(([k, v]) => `${JSON.stringify(k)} => ${JSON.stringify(v)}`);
    return `Hstore {${parts.join(", ")}}`;
  }
}
