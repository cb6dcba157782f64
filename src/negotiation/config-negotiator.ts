import { stat } from "node:fs/promises";
import { homedir } from "node:os";
import { resolve } from "node:path";
import { type ContainerMode, containerModeSchema } from "../docker/types.js";
import { describeError } from "../errors.js";

export type PathKind = "directory" | "file" | "missing";

/** The negotiator's only I/O: what, if anything, lives at an absolute path. */
export type PathProbe = (absolutePath: string) => Promise<PathKind>;

export interface NegotiationRequest {
  hostPort: string | number;
  dataDirectory?: string;
  mode: string;
  /** Base for relative data directories. Defaults to process.cwd(). */
  cwd?: string;
  homeDir?: string;
}

/** A container the session knows about, from the daemon listing or the persisted record. */
export interface KnownContainer {
  id: string;
  name: string;
  hostPort: number | null;
  running: boolean;
}

export interface NegotiatedConfig {
  hostPort: number;
  dataDirectory: string | null;
  mode: ContainerMode;
}

export type NegotiationRejection =
  | { kind: "invalid-port"; value: string }
  | { kind: "port-in-use"; hostPort: number; holder: { id: string; name: string } }
  | { kind: "invalid-mode"; value: string }
  | { kind: "invalid-directory"; value: string }
  | { kind: "not-a-directory"; path: string }
  | { kind: "directory-missing"; path: string }
  | { kind: "directory-unusable"; path: string; reason: string };

export type NegotiationResult = { ok: true; config: NegotiatedConfig } | { ok: false; rejection: NegotiationRejection };

const MIN_PORT = 1;
const MAX_PORT = 65535;

export const statProbe: PathProbe = async (absolutePath) => {
  try {
    const info = await stat(absolutePath);
    return info.isDirectory() ? "directory" : "file";
  } catch (err) {
    const code = typeof err === "object" && err !== null && "code" in err ? err.code : undefined;
    if (code === "ENOENT" || code === "ENOTDIR") return "missing";
    throw err;
  }
};

/** Plain decimal digits in [1, 65535]; surrounding whitespace is ignored. */
export function parseHostPort(value: string | number): number | null {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= MIN_PORT && value <= MAX_PORT ? value : null;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const port = Number.parseInt(trimmed, 10);
  return port >= MIN_PORT && port <= MAX_PORT ? port : null;
}

/**
 * Expand `~`, resolve against `cwd` and normalize. Returns null for a blank
 * path. The result never ends in a slash (except for the root itself).
 */
export function resolveDataDirectory(raw: string, cwd: string, home: string): string | null {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return null;
  if (trimmed === "~") return resolve(home);
  if (trimmed.startsWith("~/")) return resolve(home, trimmed.slice(2));
  return resolve(cwd, trimmed);
}

/**
 * Validate a creation request against what is already known. Checks run in a
 * fixed order (port, port in use, mode, directory) and the first failure wins.
 * Directories are never created here. A probe that fails for any reason other
 * than a missing path makes the directory unusable.
 */
export async function negotiate(
  request: NegotiationRequest,
  known: readonly KnownContainer[],
  probe: PathProbe = statProbe,
): Promise<NegotiationResult> {
  const hostPort = parseHostPort(request.hostPort);
  if (hostPort === null) {
    return { ok: false, rejection: { kind: "invalid-port", value: String(request.hostPort) } };
  }

  const holder = known.find((c) => c.running && c.hostPort === hostPort);
  if (holder) {
    return { ok: false, rejection: { kind: "port-in-use", hostPort, holder: { id: holder.id, name: holder.name } } };
  }

  const mode = containerModeSchema.safeParse(request.mode.trim().toLowerCase());
  if (!mode.success) {
    return { ok: false, rejection: { kind: "invalid-mode", value: request.mode } };
  }

  if (request.dataDirectory === undefined) {
    return { ok: true, config: { hostPort, dataDirectory: null, mode: mode.data } };
  }

  const path = resolveDataDirectory(
    request.dataDirectory,
    request.cwd ?? process.cwd(),
    request.homeDir ?? homedir(),
  );
  if (path === null) {
    return { ok: false, rejection: { kind: "invalid-directory", value: request.dataDirectory } };
  }

  let kind: PathKind;
  try {
    kind = await probe(path);
  } catch (err) {
    return { ok: false, rejection: { kind: "directory-unusable", path, reason: describeError(err) } };
  }
  if (kind === "file") return { ok: false, rejection: { kind: "not-a-directory", path } };
  if (kind === "missing") return { ok: false, rejection: { kind: "directory-missing", path } };

  return { ok: true, config: { hostPort, dataDirectory: path, mode: mode.data } };
}

export function describeRejection(rejection: NegotiationRejection): string {
  switch (rejection.kind) {
    case "invalid-port":
      return `"${rejection.value}" is not a valid port; enter a number between ${MIN_PORT} and ${MAX_PORT}`;
    case "port-in-use":
      return `Port ${rejection.hostPort} is already used by running container ${rejection.holder.name}`;
    case "invalid-mode":
      return `"${rejection.value}" is not a valid mode; use foreground or background`;
    case "invalid-directory":
      return "The data directory path is empty";
    case "not-a-directory":
      return `${rejection.path} exists but is not a directory`;
    case "directory-missing":
      return `${rejection.path} does not exist`;
    case "directory-unusable":
      return `Cannot use ${rejection.path} as the data directory: ${rejection.reason}`;
  }
}
