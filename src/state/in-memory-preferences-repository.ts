import { PreferencesSaveError } from "../errors.js";
import { defaultPreferences, type PersistedPreferences } from "./preferences-schema.js";
import type { PreferencesRepository } from "./preferences-store.js";

export class InMemoryPreferencesRepository implements PreferencesRepository {
  private stored: PersistedPreferences | null;
  private failing = false;
  saveCount = 0;

  constructor(initial: PersistedPreferences | null = null) {
    this.stored = initial ? structuredClone(initial) : null;
  }

  async load(): Promise<PersistedPreferences> {
    return this.stored ? structuredClone(this.stored) : defaultPreferences();
  }

  async save(preferences: PersistedPreferences): Promise<void> {
    if (this.failing) throw new PreferencesSaveError("memory://preferences", new Error("read-only file system"));
    this.stored = structuredClone(preferences);
    this.saveCount++;
  }

  /** What a fresh session would load. */
  get current(): PersistedPreferences | null {
    return this.stored;
  }

  /** Make every following save fail with PreferencesSaveError (for testing). */
  failSaves(failing = true): void {
    this.failing = failing;
  }
}
