/**
 * The narrow set of Docker Engine capabilities the orchestrator
 * and ledger manager need. Consumers depend on this interface; the dockerode
 * implementation and the in-memory test double live in separate files.
 *
 * All failures are thrown as typed errors from ../errors.ts.
 */

import type {
  ContainerStatus,
  CreateContainerRequest,
  ExecResult,
  LocalImage,
  LogLine,
  ManagedContainer,
  PullProgress,
  StatSample,
} from "./types.js";

export interface DaemonClient {
  /** Probe the daemon. Throws DaemonUnreachableError when it cannot be reached. */
  ping(): Promise<void>;

  /** Create (but do not start) a container. Resolves to the daemon-assigned id. */
  createContainer(request: CreateContainerRequest): Promise<string>;

  /** Start a container. Starting a running container is a no-op. */
  startContainer(id: string): Promise<void>;

  /**
   * Stop a container, waiting `graceSeconds` before the daemon kills it.
   * Stopping a stopped container is a no-op.
   */
  stopContainer(id: string, graceSeconds: number): Promise<void>;

  /** Remove a container. Removing an already-removed container is a no-op. */
  removeContainer(id: string, force: boolean): Promise<void>;

  /** Inspect a container. A missing container yields `{ state: "missing" }`. */
  inspectContainer(id: string): Promise<ContainerStatus>;

  /** Containers created by this tool, running or not. */
  listManagedContainers(): Promise<ManagedContainer[]>;

  /** Live resource samples; ends when the container stops, the signal aborts or iteration stops. */
  streamStats(id: string, signal?: AbortSignal): AsyncIterable<StatSample>;

  /** The last `tailLines` lines of output. Finite. */
  fetchLogs(id: string, tailLines: number): AsyncIterable<LogLine>;

  /** New output as it is produced, until cancelled. */
  followLogs(id: string, signal?: AbortSignal): AsyncIterable<LogLine>;

  /** Run a command in a running container. Throws ExecFailedError on a non-zero exit. */
  execInContainer(id: string, command: readonly string[]): Promise<ExecResult>;

  /** Local images of the given repository. */
  listLocalImages(repository: string): Promise<LocalImage[]>;

  /** Pull an image, yielding progress events as the daemon reports them. */
  pullImage(reference: string, signal?: AbortSignal): AsyncIterable<PullProgress>;
}
