/** Handle into an `Interner`. Cheap to copy; equal handles share one text. */
export class InternedString {
  constructor(
    readonly id: number,
    private readonly text: string,
  ) {}

  toOwned(): string {
    return this.text;
  }

  equals(other: InternedString): boolean {
    return this === other || this.text === other.text;
  }

  toString(): string {
    return this.text;
  }
}

export class Interner {
  private readonly table = new Map<string, InternedString>();

  get size(): number {
    return this.table.size;
  }

  intern(text: string): InternedString {
    const existing = this.table.get(text);
    if (existing !== undefined) return existing;

    const handle = new InternedString(this.table.size, text);
    this.table.set(text, handle);
    return handle;
  }
}
