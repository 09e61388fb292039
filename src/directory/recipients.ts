export interface Recipient {
  readonly key: string;
  readonly name: string;
  readonly title: string;
  readonly address: string;
  readonly miscellaneous: unknown;
}

export type RecipientEntry = Omit<Recipient, 'key'>;

/**
 * Load-once, read-only mapping from recipient key to contact data. Iteration
 * follows declaration order and never changes for the life of the process.
 */
export class RecipientDirectory {
  private readonly byKey: ReadonlyMap<string, Recipient>;
  private readonly ordered: readonly Recipient[];

  private constructor(recipients: Recipient[]) {
    this.ordered = Object.freeze(recipients.map((recipient) => Object.freeze({ ...recipient })));
    this.byKey = new Map(this.ordered.map((recipient) => [recipient.key, recipient]));
  }

  static fromEntries(entries: Iterable<[string, RecipientEntry]>): RecipientDirectory {
    const recipients: Recipient[] = [];
    const seen = new Set<string>();
    for (const [key, entry] of entries) {
      if (seen.has(key)) {
        throw new Error(`Duplicate recipient key: ${key}`);
      }
      seen.add(key);
      recipients.push({ key, ...entry });
    }
    return new RecipientDirectory(recipients);
  }

  static fromRecord(record: Readonly<Record<string, RecipientEntry>>): RecipientDirectory {
    return RecipientDirectory.fromEntries(Object.entries(record));
  }

  get size(): number {
    return this.ordered.length;
  }

  get(key: string): Recipient | undefined {
    return this.byKey.get(key);
  }

  /** The same frozen array on every call. */
  snapshot(): readonly Recipient[] {
    return this.ordered;
  }
}
