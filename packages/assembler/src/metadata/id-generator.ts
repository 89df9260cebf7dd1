/**
 * Default prefix of generated component ids.
 *
 * The leading dot keeps generated ids out of the way of hand-written ones,
 * which the core language never starts with a dot.
 */
export const DEFAULT_ID_PREFIX = '.component-';

/**
 * Session-scoped generator of component ids.
 *
 * Ids are `${prefix}${n}` with a monotonically increasing counter. Every id the
 * document declares is reserved up front, so a generated id can never clash
 * with a component declared later in the same document.
 */
export class IdGenerator {
  private counter = 0;
  private readonly taken: Set<string>;

  constructor(
    private readonly prefix: string = DEFAULT_ID_PREFIX,
    reserved: Iterable<string> = []
  ) {
    this.taken = new Set(reserved);
  }

  /**
   * Mark an id as used so it is never generated.
   */
  reserve(id: string): void {
    this.taken.add(id);
  }

  isTaken(id: string): boolean {
    return this.taken.has(id);
  }

  next(): string {
    let id: string;
    do {
      id = `${this.prefix}${++this.counter}`;
    } while (this.taken.has(id));
    this.taken.add(id);
    return id;
  }
}
