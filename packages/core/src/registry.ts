/**
 * Generic registry for pluggable implementations.
 *
 * Factories may take arguments (`A`), e.g. the locale a tokenizer is built for.
 */

export class Registry<T, A extends unknown[] = []> {
  private readonly _map = new Map<string, (...args: A) => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: (...args: A) => T): void {
    this._map.set(name, factory);
  }

  get(name: string, ...args: A): T {
    const factory = this._map.get(name);
    if (!factory) {
      const avail = this.list().join(", ");
      throw new Error(
        `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}`
      );
    }
    return factory(...args);
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
