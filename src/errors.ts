/**
 * Failure taxonomy shared by the daemon adapter, ledger manager, preferences
 * store and orchestrator. Every class carries a `kind` discriminant so callers
 * can switch on it without instanceof chains.
 */

export type ErrorKind =
  | "daemon-unreachable"
  | "daemon-error"
  | "not-found"
  | "image-not-found"
  | "port-conflict"
  | "exec-failed"
  | "ledger-delete-failed"
  | "preferences-save-failed"
  | "registry-error"
  | "invalid-transition";

export abstract class LedgerdockError extends Error {
  abstract readonly kind: ErrorKind;
}

/** The Docker socket or endpoint could not be reached. Fatal to the action, not to the session. */
export class DaemonUnreachableError extends LedgerdockError {
  readonly kind = "daemon-unreachable" as const;
  readonly name = "DaemonUnreachableError";
  constructor(detail: string) {
    super(`Docker daemon is unreachable: ${detail}`);
  }
}

/** Any other daemon-side failure, surfaced verbatim. */
export class DaemonError extends LedgerdockError {
  readonly kind = "daemon-error" as const;
  readonly name = "DaemonError";
  constructor(
    message: string,
    readonly statusCode: number | null = null,
  ) {
    super(message);
  }
}

export type MissingResource = "container" | "image" | "ledger";

export class NotFoundError extends LedgerdockError {
  readonly kind = "not-found" as const;
  readonly name = "NotFoundError";
  constructor(
    readonly resource: MissingResource,
    readonly ref: string,
  ) {
    super(`${resource} not found: ${ref}`);
  }
}

export class ImageNotFoundError extends LedgerdockError {
  readonly kind = "image-not-found" as const;
  readonly name = "ImageNotFoundError";
  constructor(readonly image: string) {
    super(`Image ${image} is not available locally; pull it first`);
  }
}

export class PortConflictError extends LedgerdockError {
  readonly kind = "port-conflict" as const;
  readonly name = "PortConflictError";
  constructor(
    readonly hostPort: number | null,
    detail?: string,
  ) {
    super(`${hostPort === null ? "Host port" : `Host port ${hostPort}`} could not be bound${detail ? `: ${detail}` : ""}`);
  }
}

export class ExecFailedError extends LedgerdockError {
  readonly kind = "exec-failed" as const;
  readonly name = "ExecFailedError";
  constructor(
    readonly command: readonly string[],
    readonly exitCode: number,
    readonly stderr: string,
  ) {
    super(`Command "${command.join(" ")}" exited with code ${exitCode}${excerpt(stderr)}`);
  }
}

export class LedgerDeleteFailedError extends LedgerdockError {
  readonly kind = "ledger-delete-failed" as const;
  readonly name = "LedgerDeleteFailedError";
  constructor(
    readonly ledger: string,
    readonly reason: string,
  ) {
    super(`Failed to delete ledger ${ledger}: ${reason}`);
  }
}

export class PreferencesSaveError extends LedgerdockError {
  readonly kind = "preferences-save-failed" as const;
  readonly name = "PreferencesSaveError";
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Failed to save preferences to ${path}: ${cause instanceof Error ? cause.message : String(cause)}`);
  }
}

export class RegistryError extends LedgerdockError {
  readonly kind = "registry-error" as const;
  readonly name = "RegistryError";
  constructor(
    message: string,
    readonly status: number | null = null,
  ) {
    super(message);
  }
}

export class InvalidTransitionError extends LedgerdockError {
  readonly kind = "invalid-transition" as const;
  readonly name = "InvalidTransitionError";
  constructor(
    readonly operation: string,
    readonly phase: string,
  ) {
    super(`Cannot ${operation} while the session is in phase "${phase}"`);
  }
}

/** Keep stderr excerpts to one readable line in messages. */
export function excerpt(stderr: string, max = 200): string {
  const trimmed = stderr.trim().replace(/\s+/g, " ");
  if (!trimmed) return "";
  return `: ${trimmed.length > max ? `${trimmed.slice(0, max)}…` : trimmed}`;
}

export function isLedgerdockError(err: unknown): err is LedgerdockError {
  return err instanceof LedgerdockError;
}

/** One-line description of any thrown value, for the operator. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
