/**
 * State persistence registry
 *
 * A plain key → value store the runtime consults to seed a state cell's
 * initial value across a teardown/recreate boundary, and that the client
 * bootstrap seeds from server `stateData`. It is passed explicitly to each
 * composition root; there is no process-wide instance.
 */

import { isJsonValue, type JsonValue } from '../shared/util';

export class StateRegistry {
  private readonly values = new Map<string, unknown>();

  constructor(initial: Readonly<Record<string, unknown>> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  get size(): number {
    return this.values.size;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  set(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  delete(key: string): boolean {
    return this.values.delete(key);
  }

  /** Read and remove in one step; used for one-shot seeds */
  take(key: string): unknown {
    const value = this.values.get(key);
    this.values.delete(key);
    return value;
  }

  entries(): IterableIterator<[string, unknown]> {
    return this.values.entries();
  }

  clear(): void {
    this.values.clear();
  }

  /** JSON-compatible entries only */
  toJSON(): Record<string, JsonValue> {
    const out: Record<string, JsonValue> = {};
    for (const [key, value] of this.values) {
      if (isJsonValue(value)) out[key] = value;
    }
    return out;
  }
}
