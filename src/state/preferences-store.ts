import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { logger } from "../config/logger.js";
import { PreferencesSaveError } from "../errors.js";
import { defaultPreferences, type PersistedPreferences, preferencesSchema } from "./preferences-schema.js";

/** Load/save handle the orchestrator is given; it never reads preferences from anywhere else. */
export interface PreferencesRepository {
  load(): Promise<PersistedPreferences>;
  save(preferences: PersistedPreferences): Promise<void>;
}

/**
 * Persists preferences as a pretty-printed JSON file.
 *
 * `load()` never throws: a missing, unreadable or invalid file yields the
 * defaults. `save()` writes through a temp file and rename (the temp file is
 * removed again when the rename fails), and calls are
 * chained so concurrent saves never interleave. The last save wins.
 */
export class PreferencesStore implements PreferencesRepository {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<PersistedPreferences> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return defaultPreferences();
      logger.warn(`Could not read preferences from ${this.filePath}, using defaults`, { err });
      return defaultPreferences();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      logger.warn(`Preferences file ${this.filePath} is not valid JSON, using defaults`, { err });
      return defaultPreferences();
    }

    const parsed = preferencesSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(`Preferences file ${this.filePath} has an unexpected shape, using defaults`, {
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
      return defaultPreferences();
    }
    return parsed.data;
  }

  save(preferences: PersistedPreferences): Promise<void> {
    const snapshot = structuredClone(preferences);
    const run = this.queue.then(() => this.write(snapshot));
    // The caller observes failures through `run`; the chain itself keeps going.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async write(preferences: PersistedPreferences): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, `${JSON.stringify(preferences, null, 2)}\n`, "utf-8");
      await rename(tmpPath, this.filePath);
    } catch (err) {
      await rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        logger.debug(`Could not remove ${tmpPath}`, { err: cleanupErr });
      });
      throw new PreferencesSaveError(this.filePath, err);
    }
    logger.debug(`Saved preferences to ${this.filePath}`);
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
