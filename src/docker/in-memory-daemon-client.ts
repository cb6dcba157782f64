import {
  DaemonError,
  DaemonUnreachableError,
  ExecFailedError,
  ImageNotFoundError,
  NotFoundError,
  PortConflictError,
} from "../errors.js";
import type { DaemonClient } from "./daemon-client.js";
import { isSameRepository } from "./image-ref.js";
import type {
  ContainerMode,
  ContainerStatus,
  CreateContainerRequest,
  ExecResult,
  LocalImage,
  LogLine,
  ManagedContainer,
  PullProgress,
  StatSample,
} from "./types.js";

export type DaemonCall =
  | { op: "ping" }
  | { op: "createContainer"; request: CreateContainerRequest }
  | { op: "startContainer"; id: string }
  | { op: "stopContainer"; id: string; graceSeconds: number }
  | { op: "removeContainer"; id: string; force: boolean }
  | { op: "inspectContainer"; id: string }
  | { op: "listManagedContainers" }
  | { op: "streamStats"; id: string }
  | { op: "fetchLogs"; id: string; tailLines: number }
  | { op: "followLogs"; id: string }
  | { op: "execInContainer"; id: string; command: readonly string[] }
  | { op: "listLocalImages"; repository: string }
  | { op: "pullImage"; reference: string };

export type DaemonOp = DaemonCall["op"];

export interface FakeContainer {
  id: string;
  name: string;
  image: string;
  hostPort: number | null;
  dataDirectory: string | null;
  mode: ContainerMode;
  /** Carries the managed label. */
  managed: boolean;
  running: boolean;
  startedAt: string | null;
  finishedAt: string | null;
  exitCode: number | null;
  logs: LogLine[];
}

export type ExecHandler = (command: readonly string[]) => ExecResult;

export interface InMemoryDaemonOptions {
  images?: string[];
  now?: () => Date;
}

const DEFAULT_SAMPLE: StatSample = {
  cpuPercent: 1.5,
  memoryUsageBytes: 256 * 1024 * 1024,
  memoryLimitBytes: 2 * 1024 * 1024 * 1024,
  memoryPercent: 12.5,
  readAt: "2024-01-01T00:00:00.000Z",
};

function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) resolve();
    else signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/**
 * In-process DaemonClient with the same idempotence and failure contract as
 * the dockerode adapter. Every call is appended to `calls` before it runs.
 */
export class InMemoryDaemonClient implements DaemonClient {
  readonly calls: DaemonCall[] = [];
  private readonly containers = new Map<string, FakeContainer>();
  private readonly images = new Set<string>();
  private readonly unpullable = new Set<string>();
  private readonly followLines = new Map<string, LogLine[]>();
  private statSamples: StatSample[] = [DEFAULT_SAMPLE];
  private execHandler: ExecHandler = () => ({ stdout: "", stderr: "", exitCode: 0 });
  private reachable = true;
  private nextId = 1;
  private readonly now: () => Date;

  constructor(options: InMemoryDaemonOptions = {}) {
    for (const image of options.images ?? []) this.images.add(image);
    this.now = options.now ?? (() => new Date());
  }

  // --- Seeding and inspection helpers for tests ---

  seedContainer(container: Partial<FakeContainer> & Pick<FakeContainer, "id" | "name" | "image">): FakeContainer {
    const seeded: FakeContainer = {
      hostPort: null,
      dataDirectory: null,
      mode: "background",
      managed: true,
      running: false,
      startedAt: null,
      finishedAt: null,
      exitCode: null,
      logs: [],
      ...container,
    };
    this.containers.set(seeded.id, seeded);
    return seeded;
  }

  addImage(reference: string): void {
    this.images.add(reference);
  }

  /** Make pulls of this reference fail as if the registry had no such image. */
  markUnpullable(reference: string): void {
    this.unpullable.add(reference);
  }

  /** Simulate `docker rm` by someone else. */
  removeExternally(id: string): void {
    this.containers.delete(id);
  }

  /** Simulate the container exiting on its own. */
  exitExternally(id: string, exitCode = 0): void {
    const container = this.containers.get(id);
    if (!container) return;
    container.running = false;
    container.exitCode = exitCode;
    container.finishedAt = this.now().toISOString();
  }

  setReachable(reachable: boolean): void {
    this.reachable = reachable;
  }

  setExecHandler(handler: ExecHandler): void {
    this.execHandler = handler;
  }

  setStatSamples(samples: StatSample[]): void {
    this.statSamples = samples;
  }

  /** Lines `followLogs` yields before it waits for cancellation. */
  setFollowLines(id: string, lines: LogLine[]): void {
    this.followLines.set(id, lines);
  }

  getContainer(id: string): FakeContainer | undefined {
    return this.containers.get(id);
  }

  callsOf<Op extends DaemonOp>(op: Op): Extract<DaemonCall, { op: Op }>[] {
    return this.calls.filter((c): c is Extract<DaemonCall, { op: Op }> => c.op === op);
  }

  // --- DaemonClient ---

  async ping(): Promise<void> {
    this.record({ op: "ping" });
  }

  async createContainer(request: CreateContainerRequest): Promise<string> {
    this.record({ op: "createContainer", request });

    if (!this.images.has(request.image)) {
      if (!request.pull || this.unpullable.has(request.image)) throw new ImageNotFoundError(request.image);
      this.images.add(request.image);
    }

    const hostPort = request.portMapping.hostPort;
    this.assertPortFree(hostPort, null);

    for (const existing of this.containers.values()) {
      if (existing.name === request.name) {
        throw new DaemonError(`Conflict. The container name "/${request.name}" is already in use`, 409);
      }
    }

    const id = `container-${this.nextId++}`;
    this.containers.set(id, {
      id,
      name: request.name,
      image: request.image,
      hostPort,
      dataDirectory: request.volumeMount?.hostPath ?? null,
      mode: request.mode,
      managed: true,
      running: false,
      startedAt: null,
      finishedAt: null,
      exitCode: null,
      logs: [],
    });
    return id;
  }

  async startContainer(id: string): Promise<void> {
    this.record({ op: "startContainer", id });
    const container = this.require(id);
    if (container.running) return;
    if (container.hostPort !== null) this.assertPortFree(container.hostPort, id);
    container.running = true;
    container.startedAt = this.now().toISOString();
    container.finishedAt = null;
    container.exitCode = null;
  }

  async stopContainer(id: string, graceSeconds: number): Promise<void> {
    this.record({ op: "stopContainer", id, graceSeconds });
    const container = this.require(id);
    if (!container.running) return;
    container.running = false;
    container.finishedAt = this.now().toISOString();
    container.exitCode = 0;
  }

  async removeContainer(id: string, force: boolean): Promise<void> {
    this.record({ op: "removeContainer", id, force });
    const container = this.containers.get(id);
    if (!container) return;
    if (container.running && !force) {
      throw new DaemonError(`You cannot remove a running container ${id}. Stop the container before attempting removal or force remove`, 409);
    }
    this.containers.delete(id);
  }

  async inspectContainer(id: string): Promise<ContainerStatus> {
    this.record({ op: "inspectContainer", id });
    const container = this.containers.get(id);
    if (!container) return { state: "missing", id };

    const common = {
      id: container.id,
      name: container.name,
      image: container.image,
      hostPort: container.hostPort,
      dataDirectory: container.dataDirectory,
      startedAt: container.startedAt,
    };
    if (container.running) return { state: "running", ...common };
    return { state: "exited", ...common, finishedAt: container.finishedAt, exitCode: container.exitCode };
  }

  async listManagedContainers(): Promise<ManagedContainer[]> {
    this.record({ op: "listManagedContainers" });
    return Array.from(this.containers.values())
      .filter((c) => c.managed)
      .map((c) => ({ id: c.id, name: c.name, image: c.image, hostPort: c.hostPort, running: c.running }));
  }

  async *streamStats(id: string, signal?: AbortSignal): AsyncGenerator<StatSample> {
    this.record({ op: "streamStats", id });
    const container = this.require(id);
    for (const sample of this.statSamples) {
      if (signal?.aborted || !container.running) return;
      yield sample;
    }
  }

  async *fetchLogs(id: string, tailLines: number): AsyncGenerator<LogLine> {
    this.record({ op: "fetchLogs", id, tailLines });
    const container = this.require(id);
    yield* container.logs.slice(-tailLines);
  }

  async *followLogs(id: string, signal?: AbortSignal): AsyncGenerator<LogLine> {
    this.record({ op: "followLogs", id });
    this.require(id);
    for (const line of this.followLines.get(id) ?? []) {
      if (signal?.aborted) return;
      yield line;
    }
    if (signal) await waitForAbort(signal);
  }

  async execInContainer(id: string, command: readonly string[]): Promise<ExecResult> {
    this.record({ op: "execInContainer", id, command });
    const container = this.require(id);
    if (!container.running) throw new DaemonError(`Container ${id} is not running`, 409);
    const result = this.execHandler(command);
    if (result.exitCode !== 0) throw new ExecFailedError(command, result.exitCode, result.stderr);
    return result;
  }

  async listLocalImages(repository: string): Promise<LocalImage[]> {
    this.record({ op: "listLocalImages", repository });
    return Array.from(this.images)
      .filter((reference) => isSameRepository(reference, repository))
      .sort()
      .map((reference, i) => ({
        reference,
        id: `sha256:${String(i).padStart(12, "0")}`,
        createdAt: "2024-01-01T00:00:00.000Z",
        sizeBytes: 500 * 1024 * 1024,
      }));
  }

  async *pullImage(reference: string, signal?: AbortSignal): AsyncGenerator<PullProgress> {
    this.record({ op: "pullImage", reference });
    if (this.unpullable.has(reference)) throw new ImageNotFoundError(reference);
    if (signal?.aborted) return;
    yield { status: `Pulling from ${reference}` };
    yield { status: `Status: Downloaded newer image for ${reference}` };
    this.images.add(reference);
  }

  // --- Private helpers ---

  private record(call: DaemonCall): void {
    this.calls.push(call);
    if (!this.reachable) throw new DaemonUnreachableError("ECONNREFUSED: in-memory daemon is offline");
  }

  private require(id: string): FakeContainer {
    const container = this.containers.get(id);
    if (!container) throw new NotFoundError("container", id);
    return container;
  }

  private assertPortFree(hostPort: number, self: string | null): void {
    for (const other of this.containers.values()) {
      if (other.id !== self && other.running && other.hostPort === hostPort) {
        throw new PortConflictError(hostPort, `already published by container ${other.name}`);
      }
    }
  }
}
