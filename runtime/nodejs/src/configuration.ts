/**
 * Flat, case-insensitive `Section:Key` store.
 *
 * Environment variables are mapped with `__` as the section separator, so
 * `Parameters__pass` is read as `Parameters:pass`.
 */
export class Configuration {
  private values: Map<string, string> = new Map();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.set(key, value);
    }
  }

  get(key: string): string | undefined {
    return this.values.get(normalize(key));
  }

  set(key: string, value: string): void {
    this.values.set(normalize(key), value);
  }

  has(key: string): boolean {
    return this.values.has(normalize(key));
  }

  addEnvironmentVariables(env: Record<string, string | undefined>, prefix = ""): this {
    for (const [name, value] of Object.entries(env)) {
      if (value === undefined || !name.startsWith(prefix)) {
        continue;
      }
      this.set(name.slice(prefix.length).split("__").join(":"), value);
    }
    return this;
  }
}

function normalize(key: string): string {
  return key.toLowerCase();
}
