import { z } from "zod";
import { containerModeSchema, containerRecordSchema } from "../docker/types.js";

export const PREFERENCES_VERSION = 1;
export const DEFAULT_HOST_PORT = 8090;

export const preferenceDefaultsSchema = z.object({
  hostPort: z.number().int().min(1).max(65535).default(DEFAULT_HOST_PORT),
  dataDirectory: z.string().min(1).optional(),
  mode: containerModeSchema.default("background"),
});

export type PreferenceDefaults = z.infer<typeof preferenceDefaultsSchema>;

export const preferencesSchema = z.object({
  version: z.literal(PREFERENCES_VERSION),
  lastContainer: containerRecordSchema.nullable().default(null),
  /** Every container this tool created and has not forgotten, most recently used first. */
  containers: z.array(containerRecordSchema).default([]),
  defaults: preferenceDefaultsSchema.default({}),
});

/** Everything that survives between sessions: the tracked containers, the current one and the operator's defaults. */
export type PersistedPreferences = z.infer<typeof preferencesSchema>;

export function defaultPreferences(): PersistedPreferences {
  return {
    version: PREFERENCES_VERSION,
    lastContainer: null,
    containers: [],
    defaults: { hostPort: DEFAULT_HOST_PORT, mode: "background" },
  };
}
