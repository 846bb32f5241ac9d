import { CVar, type CVarCategory, type CVarDesc, type CVarHandle, type CVarValue } from "./CVar.js";

export class CVarRegistry {
  private cvars = new Map<string, CVarHandle>();

  register<T extends CVarValue>(desc: CVarDesc<T>): CVar<T> {
    if (this.cvars.has(desc.name)) {
      throw new Error(`[cvar] duplicate registration: ${desc.name}`);
    }
    const cv = new CVar(desc);
    this.cvars.set(desc.name, cv);
    return cv;
  }

  get(name: string): CVarHandle | undefined {
    return this.cvars.get(name);
  }

  getAll(): CVarHandle[] {
    return [...this.cvars.values()];
  }

  getByCategory(category: CVarCategory): CVarHandle[] {
    return this.getAll().filter((cv) => cv.category === category);
  }

  getNames(): string[] {
    return [...this.cvars.keys()];
  }

  /** Apply "name value" pairs, e.g. from a config file or the command line. Unknown names are returned. */
  applyAll(values: Record<string, string>): string[] {
    const unknown: string[] = [];
    for (const [name, value] of Object.entries(values)) {
      const cv = this.cvars.get(name);
      if (cv) {
        cv.setFromString(value);
      } else {
        unknown.push(name);
      }
    }
    return unknown;
  }

  resetAll(): void {
    for (const cv of this.cvars.values()) cv.reset();
  }
}
