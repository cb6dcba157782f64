import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

export const DEFAULT_IMAGE_REPOSITORY = "fluree/server";
export const DEFAULT_HUB_URL = "https://hub.docker.com/v2";

/**
 * Resolve where the preferences file lives when LEDGERDOCK_STATE_FILE is not set.
 * Follows the XDG base directory convention, falling back to ~/.config.
 */
export function defaultStateFile(env: NodeJS.ProcessEnv = process.env, home: string = homedir()): string {
  const configHome = env.XDG_CONFIG_HOME && env.XDG_CONFIG_HOME.length > 0 ? env.XDG_CONFIG_HOME : join(home, ".config");
  return join(configHome, "ledgerdock", "preferences.json");
}

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

export const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Docker Engine connection. Unset fields fall back to dockerode's own defaults (DOCKER_HOST etc). */
  docker: z
    .object({
      socketPath: optionalString,
      timeoutMs: z.coerce.number().int().positive().optional(),
      stopGraceSeconds: z.coerce.number().int().min(0).max(3600).default(10),
    })
    .default({ stopGraceSeconds: 10 }),

  imageRepository: z.string().min(1).default(DEFAULT_IMAGE_REPOSITORY),
  hubUrl: z.string().url().default(DEFAULT_HUB_URL),
  stateFile: z.string().min(1),
  logTail: z.coerce.number().int().min(1).max(100_000).default(1000),
});

export type Config = z.infer<typeof configSchema>;

/** Build the raw config input from an environment. Exposed for tests. */
export function readConfigInput(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    docker: {
      socketPath: env.DOCKER_SOCKET,
      timeoutMs: env.DOCKER_TIMEOUT_MS || undefined,
      stopGraceSeconds: env.LEDGERDOCK_STOP_GRACE_SECONDS,
    },
    imageRepository: env.LEDGERDOCK_IMAGE_REPOSITORY,
    hubUrl: env.LEDGERDOCK_HUB_URL,
    stateFile: env.LEDGERDOCK_STATE_FILE || defaultStateFile(env),
    logTail: env.LEDGERDOCK_LOG_TAIL,
  };
}

export const config: Config = configSchema.parse(readConfigInput());
