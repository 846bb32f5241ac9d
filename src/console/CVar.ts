export type CVarValue = number | boolean | string;
export type CVarCategory = "ui" | "r" | "dev";

export interface CVarDesc<T extends CVarValue> {
  name: string;
  description: string;
  defaultValue: T;
  category: CVarCategory;
  /** Parse console text; undefined rejects the input. */
  parse: (str: string) => T | undefined;
  /** Applied to every value before it is stored (e.g. clamping). */
  normalize?: (value: T) => T;
}

/** Type-erased view used by the registry. */
export interface CVarHandle {
  readonly name: string;
  readonly description: string;
  readonly category: CVarCategory;
  setFromString(str: string): void;
  reset(): void;
  toString(): string;
}

export class CVar<T extends CVarValue> implements CVarHandle {
  readonly name: string;
  readonly description: string;
  readonly defaultValue: T;
  readonly category: CVarCategory;
  private readonly parse: (str: string) => T | undefined;
  private readonly normalize: (value: T) => T;
  private value: T;
  private listeners = new Set<(newVal: T, oldVal: T) => void>();

  constructor(desc: CVarDesc<T>) {
    this.name = desc.name;
    this.description = desc.description;
    this.category = desc.category;
    this.parse = desc.parse;
    this.normalize = desc.normalize ?? ((v) => v);
    this.defaultValue = this.normalize(desc.defaultValue);
    this.value = this.defaultValue;
  }

  get(): T {
    return this.value;
  }

  set(raw: T): void {
    const v = this.normalize(raw);
    if (v === this.value) return;
    const old = this.value;
    this.value = v;
    for (const cb of this.listeners) {
      try {
        cb(v, old);
      } catch (e) {
        console.error(`[cvar] onChange error for ${this.name}:`, e);
      }
    }
  }

  reset(): void {
    this.set(this.defaultValue);
  }

  onChange(cb: (newVal: T, oldVal: T) => void): () => void {
    this.listeners.add(cb);
    return () => this.listeners.delete(cb);
  }

  /** Parse a string value and set it. Unparseable input is ignored. */
  setFromString(str: string): void {
    const v = this.parse(str);
    if (v !== undefined) this.set(v);
  }

  toString(): string {
    return `${this.name} = ${String(this.value)} (default: ${String(this.defaultValue)}) -- ${this.description}`;
  }
}

export function parseBoolean(str: string): boolean {
  return str === "1" || str === "true";
}

export function parseNumber(str: string): number | undefined {
  const n = Number(str);
  return str.trim() === "" || Number.isNaN(n) ? undefined : n;
}

export function clampTo(min: number, max: number): (value: number) => number {
  return (value) => Math.min(max, Math.max(min, value));
}
