import type { HydratedStorage } from './hydrated';

/** Process-local storage. Values are deep-copied through JSON so stored states cannot be mutated in place. */
export class InMemoryStorage implements HydratedStorage {
  private readonly entries = new Map<string, string>();

  read(key: string): unknown {
    const raw = this.entries.get(key);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  write(key: string, value: unknown): void {
    this.entries.set(key, JSON.stringify(value));
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }
}
