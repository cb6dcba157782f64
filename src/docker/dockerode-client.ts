import { Writable } from "node:stream";
import { finished } from "node:stream/promises";
import { setTimeout as delay } from "node:timers/promises";
import Docker from "dockerode";
import { z } from "zod";
import type { Config } from "../config/index.js";
import { logger } from "../config/logger.js";
import {
  DaemonError,
  DaemonUnreachableError,
  ExecFailedError,
  ImageNotFoundError,
  isLedgerdockError,
  type LedgerdockError,
  type MissingResource,
  NotFoundError,
  PortConflictError,
} from "../errors.js";
import type { DaemonClient } from "./daemon-client.js";
import { isSameRepository } from "./image-ref.js";
import { LogFrameDecoder } from "./log-frames.js";
import { destroyStream, readLines } from "./ndjson.js";
import { parseStatLine } from "./stats.js";
import {
  CONTAINER_DATA_PATH,
  CONTAINER_PORT,
  type ContainerStatus,
  type CreateContainerRequest,
  type ExecResult,
  type LocalImage,
  type LogLine,
  MANAGED_LABEL,
  type ManagedContainer,
  MODE_LABEL,
  type PullProgress,
  type StatSample,
  type VolumeMount,
} from "./types.js";

/** errno codes that mean the daemon socket or endpoint is not there. */
const UNREACHABLE_CODES = new Set(["ECONNREFUSED", "ENOENT", "EACCES", "ECONNRESET", "ETIMEDOUT", "EPIPE"]);

const BIND_FAILURE = /port is already allocated|address already in use/i;
const MISSING_IMAGE = /not found|manifest unknown|does not exist|pull access denied/i;

const EXEC_POLL_ATTEMPTS = 20;
const EXEC_POLL_INTERVAL_MS = 50;

/** Docker reports unset timestamps as the zero time. */
const ZERO_TIME_PREFIX = "0001-";

const portBindingsSchema = z.record(z.array(z.object({ HostPort: z.string().optional() })).nullable());

const pullEventSchema = z.object({
  status: z.string().optional(),
  id: z.string().optional(),
  progress: z.string().optional(),
  error: z.string().optional(),
  errorDetail: z.object({ message: z.string().optional() }).optional(),
});

interface ClassifyContext {
  resource?: MissingResource;
  ref?: string;
  hostPort?: number;
}

export function statusCodeOf(err: unknown): number | null {
  if (typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return null;
}

function errnoOf(err: unknown): string | null {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return null;
}

/** The daemon's own message when dockerode parsed one out of the response body. */
function daemonMessage(err: unknown): string {
  if (typeof err === "object" && err !== null && "json" in err) {
    const json = err.json;
    if (typeof json === "object" && json !== null && "message" in json && typeof json.message === "string") {
      return json.message;
    }
  }
  return err instanceof Error ? err.message : String(err);
}

function portFromMessage(message: string): number | null {
  const match = /(?:\d{1,3}(?:\.\d{1,3}){3}|\[[0-9a-f:]*\]):(\d{1,5})/i.exec(message);
  return match ? Number.parseInt(match[1], 10) : null;
}

/** Map a dockerode failure onto the error taxonomy. Already-typed errors pass through. */
export function classifyDockerError(err: unknown, context: ClassifyContext = {}): LedgerdockError {
  if (isLedgerdockError(err)) return err;

  const message = daemonMessage(err);
  const errno = errnoOf(err);
  if (errno && UNREACHABLE_CODES.has(errno)) {
    return new DaemonUnreachableError(`${errno}: ${message}`);
  }

  const status = statusCodeOf(err);
  if (status === 404) {
    if (context.resource === "image") return new ImageNotFoundError(context.ref ?? "unknown");
    return new NotFoundError(context.resource ?? "container", context.ref ?? "unknown");
  }

  if (BIND_FAILURE.test(message)) {
    return new PortConflictError(context.hostPort ?? portFromMessage(message), message);
  }

  return new DaemonError(message, status);
}

/** Bind spec for the data directory: forward slashes, no trailing slash, read-write. */
export function formatBind(mount: VolumeMount): string {
  const hostPath = mount.hostPath.replace(/\\/g, "/").replace(/(.)\/+$/, "$1");
  return `${hostPath}:${mount.containerPath}:rw`;
}

export function hostPortFromBindings(bindings: unknown): number | null {
  const parsed = portBindingsSchema.safeParse(bindings);
  if (!parsed.success) return null;
  const hostPort = parsed.data[`${CONTAINER_PORT}/tcp`]?.[0]?.HostPort;
  if (!hostPort) return null;
  const port = Number.parseInt(hostPort, 10);
  return Number.isNaN(port) ? null : port;
}

function timestampOrNull(value: string | undefined): string | null {
  if (!value || value.startsWith(ZERO_TIME_PREFIX)) return null;
  return value;
}

/** Create a dockerode instance from config; unset fields fall back to dockerode's defaults (DOCKER_HOST etc). */
export function createDocker(docker: Config["docker"]): Docker {
  return new Docker({
    ...(docker.socketPath ? { socketPath: docker.socketPath } : {}),
    ...(docker.timeoutMs ? { timeout: docker.timeoutMs } : {}),
  });
}

/**
 * DaemonClient backed by dockerode. Holds no state besides the connection;
 * every failure leaves here as a typed error.
 */
export class DockerodeClient implements DaemonClient {
  private readonly docker: Docker;

  constructor(docker: Docker) {
    this.docker = docker;
  }

  async ping(): Promise<void> {
    try {
      await this.docker.ping();
    } catch (err) {
      throw classifyDockerError(err);
    }
  }

  async createContainer(request: CreateContainerRequest): Promise<string> {
    const { image, name, portMapping, volumeMount, mode } = request;
    const { hostPort } = portMapping;

    await this.ensureImage(image, request.pull === true);
    await this.assertPortFree(hostPort);

    const portKey = `${portMapping.containerPort}/tcp`;
    try {
      const container = await this.docker.createContainer({
        Image: image,
        name,
        Labels: {
          [MANAGED_LABEL]: "true",
          [MODE_LABEL]: mode,
        },
        ExposedPorts: { [portKey]: {} },
        HostConfig: {
          PortBindings: { [portKey]: [{ HostIp: "0.0.0.0", HostPort: String(hostPort) }] },
          Binds: volumeMount ? [formatBind(volumeMount)] : undefined,
        },
      });
      logger.info(`Created container ${container.id} (${name}) from ${image}`, { hostPort, mode });
      return container.id;
    } catch (err) {
      throw classifyDockerError(err, { resource: "image", ref: image, hostPort });
    }
  }

  async startContainer(id: string): Promise<void> {
    try {
      await this.docker.getContainer(id).start();
      logger.info(`Started container ${id}`);
    } catch (err) {
      // Docker 304: container already started
      if (statusCodeOf(err) === 304) {
        logger.debug(`Container ${id} already running`);
        return;
      }
      throw classifyDockerError(err, { resource: "container", ref: id });
    }
  }

  async stopContainer(id: string, graceSeconds: number): Promise<void> {
    try {
      await this.docker.getContainer(id).stop({ t: graceSeconds });
      logger.info(`Stopped container ${id}`);
    } catch (err) {
      // Docker 304: container already stopped
      if (statusCodeOf(err) === 304) {
        logger.debug(`Container ${id} already stopped`);
        return;
      }
      throw classifyDockerError(err, { resource: "container", ref: id });
    }
  }

  async removeContainer(id: string, force: boolean): Promise<void> {
    try {
      await this.docker.getContainer(id).remove({ force });
      logger.info(`Removed container ${id}`);
    } catch (err) {
      if (statusCodeOf(err) === 404) {
        logger.debug(`Container ${id} already removed`);
        return;
      }
      throw classifyDockerError(err, { resource: "container", ref: id });
    }
  }

  async inspectContainer(id: string): Promise<ContainerStatus> {
    let info: Docker.ContainerInspectInfo;
    try {
      info = await this.docker.getContainer(id).inspect();
    } catch (err) {
      if (statusCodeOf(err) === 404) return { state: "missing", id };
      throw classifyDockerError(err, { resource: "container", ref: id });
    }

    const mount = (info.Mounts ?? []).find((m) => m.Destination === CONTAINER_DATA_PATH);
    const common = {
      id: info.Id,
      name: info.Name.replace(/^\//, ""),
      image: info.Config.Image,
      hostPort: hostPortFromBindings(info.HostConfig.PortBindings),
      dataDirectory: mount?.Source ?? null,
      startedAt: timestampOrNull(info.State.StartedAt),
    };

    if (info.State.Running) return { state: "running", ...common };
    return {
      state: "exited",
      ...common,
      finishedAt: timestampOrNull(info.State.FinishedAt),
      exitCode: info.State.ExitCode,
    };
  }

  async listManagedContainers(): Promise<ManagedContainer[]> {
    try {
      const containers = await this.docker.listContainers({
        all: true,
        filters: { label: [`${MANAGED_LABEL}=true`] },
      });
      return containers.map((c) => ({
        id: c.Id,
        name: (c.Names[0] ?? c.Id).replace(/^\//, ""),
        image: c.Image,
        hostPort: c.Ports.find((p) => p.PrivatePort === CONTAINER_PORT && p.PublicPort)?.PublicPort ?? null,
        running: c.State === "running",
      }));
    } catch (err) {
      throw classifyDockerError(err);
    }
  }

  async *streamStats(id: string, signal?: AbortSignal): AsyncGenerator<StatSample> {
    let stream: NodeJS.ReadableStream;
    try {
      stream = await this.docker.getContainer(id).stats({ stream: true });
    } catch (err) {
      throw classifyDockerError(err, { resource: "container", ref: id });
    }

    for await (const line of readLines(stream, signal)) {
      const sample = parseStatLine(line);
      if (sample) yield sample;
      else logger.debug(`Skipping unparseable stats line for ${id}`);
    }
  }

  async *fetchLogs(id: string, tailLines: number): AsyncGenerator<LogLine> {
    let buf: Buffer;
    try {
      buf = await this.docker.getContainer(id).logs({
        stdout: true,
        stderr: true,
        tail: tailLines,
        follow: false,
      });
    } catch (err) {
      throw classifyDockerError(err, { resource: "container", ref: id });
    }

    const decoder = new LogFrameDecoder();
    yield* decoder.push(buf);
    yield* decoder.end();
  }

  async *followLogs(id: string, signal?: AbortSignal): AsyncGenerator<LogLine> {
    if (signal?.aborted) return;

    let stream: NodeJS.ReadableStream;
    try {
      stream = await this.docker.getContainer(id).logs({
        stdout: true,
        stderr: true,
        tail: 0,
        follow: true,
      });
    } catch (err) {
      throw classifyDockerError(err, { resource: "container", ref: id });
    }

    const onAbort = () => destroyStream(stream);
    signal?.addEventListener("abort", onAbort, { once: true });
    const decoder = new LogFrameDecoder();
    try {
      for await (const chunk of stream) {
        yield* decoder.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
      }
      yield* decoder.end();
    } catch (err) {
      // Destroying the stream on abort surfaces as a premature close.
      if (signal?.aborted) return;
      throw classifyDockerError(err, { resource: "container", ref: id });
    } finally {
      signal?.removeEventListener("abort", onAbort);
      destroyStream(stream);
    }
  }

  async execInContainer(id: string, command: readonly string[]): Promise<ExecResult> {
    const container = this.docker.getContainer(id);
    let output: { stdout: string; stderr: string };
    let exec: Docker.Exec;
    try {
      exec = await container.exec({
        Cmd: [...command],
        AttachStdout: true,
        AttachStderr: true,
      });
      const stream = await exec.start({ hijack: true, stdin: false });
      const stdout = new TextSink();
      const stderr = new TextSink();
      this.docker.modem.demuxStream(stream, stdout, stderr);
      await finished(stream, { writable: false });
      output = { stdout: stdout.text(), stderr: stderr.text() };
    } catch (err) {
      throw classifyDockerError(err, { resource: "container", ref: id });
    }

    const exitCode = await this.awaitExitCode(exec, id);
    logger.debug(`exec in ${id}: ${command.join(" ")} -> ${exitCode}`);
    if (exitCode !== 0) throw new ExecFailedError(command, exitCode, output.stderr);
    return { ...output, exitCode };
  }

  async listLocalImages(repository: string): Promise<LocalImage[]> {
    let images: Docker.ImageInfo[];
    try {
      images = await this.docker.listImages();
    } catch (err) {
      throw classifyDockerError(err);
    }

    const result: LocalImage[] = [];
    for (const image of images) {
      for (const tag of image.RepoTags ?? []) {
        if (tag === "<none>:<none>" || !isSameRepository(tag, repository)) continue;
        result.push({
          reference: tag,
          id: image.Id,
          createdAt: new Date(image.Created * 1000).toISOString(),
          sizeBytes: image.Size,
        });
      }
    }
    return result.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || a.reference.localeCompare(b.reference));
  }

  async *pullImage(reference: string, signal?: AbortSignal): AsyncGenerator<PullProgress> {
    logger.info(`Pulling image ${reference}`);
    let stream: NodeJS.ReadableStream;
    try {
      stream = await this.docker.pull(reference);
    } catch (err) {
      throw classifyDockerError(err, { resource: "image", ref: reference });
    }

    for await (const line of readLines(stream, signal)) {
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        logger.debug(`Skipping unparseable pull progress line for ${reference}`);
        continue;
      }
      const parsed = pullEventSchema.safeParse(json);
      if (!parsed.success) continue;

      const event = parsed.data;
      const failure = event.errorDetail?.message ?? event.error;
      if (failure) {
        throw MISSING_IMAGE.test(failure) ? new ImageNotFoundError(reference) : new DaemonError(failure);
      }
      if (event.status) {
        yield {
          status: event.status,
          ...(event.id ? { id: event.id } : {}),
          ...(event.progress ? { progress: event.progress } : {}),
        };
      }
    }
  }

  // --- Private helpers ---

  private async ensureImage(image: string, pull: boolean): Promise<void> {
    try {
      await this.docker.getImage(image).inspect();
      return;
    } catch (err) {
      if (statusCodeOf(err) !== 404) throw classifyDockerError(err, { resource: "image", ref: image });
    }

    if (!pull) throw new ImageNotFoundError(image);
    for await (const progress of this.pullImage(image)) {
      logger.debug(`pull ${image}: ${progress.status}`, progress.id ? { layer: progress.id } : {});
    }
  }

  /** The daemon only reports a taken port at start; check published ports up front. */
  private async assertPortFree(hostPort: number): Promise<void> {
    let running: Docker.ContainerInfo[];
    try {
      running = await this.docker.listContainers();
    } catch (err) {
      throw classifyDockerError(err);
    }
    const holder = running.find((c) => c.Ports.some((p) => p.PublicPort === hostPort));
    if (holder) {
      const holderName = (holder.Names[0] ?? holder.Id).replace(/^\//, "");
      throw new PortConflictError(hostPort, `already published by container ${holderName}`);
    }
  }

  private async awaitExitCode(exec: Docker.Exec, id: string): Promise<number> {
    for (let attempt = 0; attempt < EXEC_POLL_ATTEMPTS; attempt++) {
      let info: Docker.ExecInspectInfo;
      try {
        info = await exec.inspect();
      } catch (err) {
        throw classifyDockerError(err, { resource: "container", ref: id });
      }
      if (!info.Running && info.ExitCode !== null) return info.ExitCode;
      await delay(EXEC_POLL_INTERVAL_MS);
    }
    throw new DaemonError(`exec in container ${id} did not report an exit code`);
  }
}

/** Collects everything written to it as UTF-8 text. */
class TextSink extends Writable {
  private readonly chunks: Buffer[] = [];

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk);
    callback();
  }

  text(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}
