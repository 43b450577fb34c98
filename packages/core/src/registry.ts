/**
 * Generic registry for pluggable implementations.
 *
 * Factories may take options (`O`), e.g. config overrides on top of a
 * named preset.
 */
import { ConfigError } from "./errors.js";

export class Registry<T, O = undefined> {
  private readonly _map = new Map<string, (options?: O) => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: (options?: O) => T): void {
    if (this._map.has(name)) {
      throw new ConfigError({
        message: `[${this.subsystem}] "${name}" is already registered`,
      });
    }
    this._map.set(name, factory);
  }

  /** Build a fresh instance. Unknown names throw a `ConfigError`. */
  get(name: string, options?: O): T {
    const factory = this._map.get(name);
    if (!factory) {
      const avail = [...this._map.keys()].join(", ");
      throw new ConfigError({
        message: `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}`,
      });
    }
    return factory(options);
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
