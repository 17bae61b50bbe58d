export type Contact = {
  readonly name: string;
  readonly email?: string;
  readonly booking_link?: string;
};

export type Service = {
  readonly key: string;
  readonly phone: string;
  readonly description: string;
  /** Declared keywords plus terms derived from the key, lower-cased and deduplicated. */
  readonly keywords: readonly string[];
  readonly contacts: readonly Contact[];
};

export type Program = {
  /** Classification label; unique within a tenant and never blank. */
  readonly name: string;
  readonly description: string;
  /** Program keywords plus every owned service's keywords, deduplicated. */
  readonly keywords: readonly string[];
  /** Keyed by service key, in declaration order. */
  readonly services: ReadonlyMap<string, Service>;
};

/**
 * Read-only catalog of one tenant's programs, in declaration order.
 * Built once at start-up; a reload builds a new Registry.
 */
export class Registry {
  private readonly byName: ReadonlyMap<string, Program>;

  constructor(programs: Iterable<Program>) {
    const byName = new Map<string, Program>();
    for (const program of programs) {
      byName.set(program.name, program);
    }
    this.byName = byName;
    Object.freeze(this);
  }

  static empty(): Registry {
    return new Registry([]);
  }

  get size(): number {
    return this.byName.size;
  }

  get isEmpty(): boolean {
    return this.byName.size === 0;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): Program | undefined {
    return this.byName.get(name);
  }

  names(): string[] {
    return Array.from(this.byName.keys());
  }

  programs(): Program[] {
    return Array.from(this.byName.values());
  }

  first(): Program | undefined {
    return this.byName.values().next().value;
  }
}
