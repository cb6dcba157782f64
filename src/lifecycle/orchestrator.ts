import { mkdir } from "node:fs/promises";
import { logger } from "../config/logger.js";
import type { DaemonClient } from "../docker/daemon-client.js";
import {
  CONTAINER_DATA_PATH,
  CONTAINER_PORT,
  type ContainerRecord,
  type ContainerState,
  type ContainerStatus,
  containerNameSchema,
  type LocalImage,
  type LogLine,
  type StatSample,
} from "../docker/types.js";
import { describeError, InvalidTransitionError, NotFoundError, PreferencesSaveError } from "../errors.js";
import type { DeleteLedgerOutcome, LedgerListing, LedgerManager } from "../ledger/ledger-manager.js";
import type { LedgerDetail } from "../ledger/ledger-parser.js";
import {
  type KnownContainer,
  type NegotiationRejection,
  type NegotiationRequest,
  negotiate,
  type PathProbe,
  statProbe,
} from "../negotiation/config-negotiator.js";
import {
  defaultPreferences,
  type PersistedPreferences,
  type PreferenceDefaults,
} from "../state/preferences-schema.js";
import type { PreferencesRepository } from "../state/preferences-store.js";
import { isAllowedIn, isValidTransition, type SessionOperation, type SessionPhase } from "./session-state.js";
import { StreamScope } from "./stream-scope.js";

export const RESUME_OPTIONS = ["resume", "recreate", "discard"] as const;
export type ResumeOption = (typeof RESUME_OPTIONS)[number];

export interface SessionWarning {
  kind: "save-failed";
  message: string;
}

export interface Transition {
  state: SessionPhase;
  warnings: SessionWarning[];
  /** What an operator may do with a stopped container; only set in await-resume. */
  options?: readonly ResumeOption[];
}

export interface ContainerSelection {
  image: string;
  name: string;
  hostPort: string | number;
  dataDirectory?: string;
  /** Create a missing data directory instead of rejecting it. */
  createDirectory?: boolean;
  mode: string;
  pull?: boolean;
}

/** A tracked container and what the daemon says about it right now. */
export interface TrackedContainer {
  record: ContainerRecord;
  state: ContainerState;
}

export type CreateRejection = NegotiationRejection | { kind: "invalid-name"; value: string; reason: string };

export type CreateResult = { ok: true; transition: Transition } | { ok: false; rejection: CreateRejection };

export interface OrchestratorOptions {
  daemon: DaemonClient;
  store: PreferencesRepository;
  ledgers: LedgerManager;
  stopGraceSeconds: number;
  probe?: PathProbe;
  makeDirectory?: (path: string) => Promise<void>;
  cwd?: string;
  homeDir?: string;
  now?: () => Date;
}

const makeDirectoryRecursive = async (path: string): Promise<void> => {
  await mkdir(path, { recursive: true });
};

function isMissingContainer(err: unknown): err is NotFoundError {
  return err instanceof NotFoundError && err.resource === "container";
}

/**
 * Drives one interactive session: reconciles the persisted container record
 * with the daemon, gates every operation on the session phase, and writes the
 * record back after each daemon mutation.
 *
 * A container that disappears while managed is forgotten and the session
 * drops back to await-selection; the NotFoundError is still rethrown. Nothing
 * is retried.
 */
export class LifecycleOrchestrator {
  private phase: SessionPhase = "start";
  private preferences: PersistedPreferences = defaultPreferences();
  private readonly streams = new StreamScope();

  private readonly daemon: DaemonClient;
  private readonly store: PreferencesRepository;
  private readonly ledgers: LedgerManager;
  private readonly stopGraceSeconds: number;
  private readonly probe: PathProbe;
  private readonly makeDirectory: (path: string) => Promise<void>;
  private readonly cwd: string | undefined;
  private readonly homeDir: string | undefined;
  private readonly now: () => Date;

  constructor(options: OrchestratorOptions) {
    this.daemon = options.daemon;
    this.store = options.store;
    this.ledgers = options.ledgers;
    this.stopGraceSeconds = options.stopGraceSeconds;
    this.probe = options.probe ?? statProbe;
    this.makeDirectory = options.makeDirectory ?? makeDirectoryRecursive;
    this.cwd = options.cwd;
    this.homeDir = options.homeDir;
    this.now = options.now ?? (() => new Date());
  }

  get state(): SessionPhase {
    return this.phase;
  }

  get record(): ContainerRecord | null {
    return this.preferences.lastContainer;
  }

  get defaults(): PreferenceDefaults {
    return this.preferences.defaults;
  }

  /** Number of stats/log streams still open. */
  get openStreams(): number {
    return this.streams.size;
  }

  async open(): Promise<Transition> {
    this.begin("open");
    this.preferences = await this.store.load();
    const record = this.preferences.lastContainer;
    if (record) this.remember(record);
    return this.reconcileRecord();
  }

  async reconcile(): Promise<Transition> {
    this.begin("reconcile");
    return this.reconcileRecord();
  }

  /** Every tracked container with its live state. Missing ones stay listed until selected. */
  async trackedContainers(): Promise<TrackedContainer[]> {
    this.begin("tracked");
    const tracked: TrackedContainer[] = [];
    for (const record of this.preferences.containers) {
      const status = await this.daemon.inspectContainer(record.id);
      tracked.push({ record, state: status.state });
    }
    return tracked;
  }

  /** Make a tracked container the current one, then reconcile it like a record found at open. */
  async select(id: string): Promise<Transition> {
    this.begin("select");
    const record = this.preferences.containers.find((c) => c.id === id);
    if (!record) throw new NotFoundError("container", id);
    this.remember(record);
    return this.reconcileRecord(true);
  }

  async localImages(repository: string): Promise<LocalImage[]> {
    this.begin("images");
    return this.daemon.listLocalImages(repository);
  }

  async create(selection: ContainerSelection): Promise<CreateResult> {
    this.begin("create");

    const name = containerNameSchema.safeParse(selection.name);
    if (!name.success) {
      return {
        ok: false,
        rejection: { kind: "invalid-name", value: selection.name, reason: name.error.issues[0]?.message ?? "invalid" },
      };
    }

    const request: NegotiationRequest = {
      hostPort: selection.hostPort,
      dataDirectory: selection.dataDirectory,
      mode: selection.mode,
      cwd: this.cwd,
      homeDir: this.homeDir,
    };
    const known = await this.knownContainers();
    let negotiated = await negotiate(request, known, this.probe);
    if (!negotiated.ok && negotiated.rejection.kind === "directory-missing" && selection.createDirectory === true) {
      const { path } = negotiated.rejection;
      try {
        await this.makeDirectory(path);
      } catch (err) {
        logger.warn(`Could not create data directory ${path}`, { err });
        return { ok: false, rejection: { kind: "directory-unusable", path, reason: describeError(err) } };
      }
      logger.info(`Created data directory ${path}`);
      negotiated = await negotiate(request, known, this.probe);
    }
    if (!negotiated.ok) return negotiated;

    const { hostPort, dataDirectory, mode } = negotiated.config;
    const id = await this.daemon.createContainer({
      image: selection.image,
      name: name.data,
      portMapping: { hostPort, containerPort: CONTAINER_PORT },
      volumeMount: dataDirectory ? { hostPath: dataDirectory, containerPath: CONTAINER_DATA_PATH } : undefined,
      mode,
      pull: selection.pull,
    });

    try {
      await this.daemon.startContainer(id);
    } catch (err) {
      logger.error(`Failed to start container ${id}, removing it`, { err });
      await this.daemon.removeContainer(id, true).catch((cleanupErr: unknown) => {
        logger.warn(`Failed to remove unstartable container ${id}`, { err: cleanupErr });
      });
      throw err;
    }

    const startedAt = this.now().toISOString();
    const record: ContainerRecord = {
      id,
      name: name.data,
      image: selection.image,
      hostPort,
      ...(dataDirectory ? { dataDirectory } : {}),
      mode,
      createdAt: startedAt,
      lastStartedAt: startedAt,
    };
    this.remember(record);
    this.preferences = {
      ...this.preferences,
      defaults: { hostPort, mode, ...(dataDirectory ? { dataDirectory } : {}) },
    };
    const warnings = await this.persist();
    return { ok: true, transition: this.moveTo("managing", warnings) };
  }

  async resume(): Promise<Transition> {
    return this.guarded("resume", async (record) => {
      await this.daemon.startContainer(record.id);
      this.touchStarted(record, this.now().toISOString());
      const warnings = await this.persist();
      return this.moveTo("managing", warnings);
    });
  }

  async recreate(): Promise<Transition> {
    return this.guarded("recreate", async (record) => {
      await this.daemon.removeContainer(record.id, true);
      this.forget();
      const warnings = await this.persist();
      return this.moveTo("await-selection", warnings);
    });
  }

  async discard(): Promise<Transition> {
    this.begin("discard");
    this.requireRecord("discard");
    this.forget();
    const warnings = await this.persist();
    return this.moveTo("await-selection", warnings);
  }

  /** Leave the current container as it is, still tracked, and go back to selection. */
  async release(): Promise<Transition> {
    this.begin("release");
    this.requireRecord("release");
    this.preferences = { ...this.preferences, lastContainer: null };
    const warnings = await this.persist();
    return this.moveTo("await-selection", warnings);
  }

  async status(): Promise<ContainerStatus> {
    return this.guarded("status", async (record) => {
      const status = await this.daemon.inspectContainer(record.id);
      if (status.state === "missing") throw new NotFoundError("container", record.id);
      return status;
    });
  }

  stats(signal?: AbortSignal): AsyncIterable<StatSample> {
    this.begin("stats");
    const record = this.requireRecord("stats");
    return this.streams.stream((scoped) => this.watchDrift(record, this.daemon.streamStats(record.id, scoped)), signal);
  }

  async logs(tailLines: number): Promise<LogLine[]> {
    return this.guarded("logs", async (record) => {
      const lines: LogLine[] = [];
      for await (const line of this.daemon.fetchLogs(record.id, tailLines)) lines.push(line);
      return lines;
    });
  }

  follow(signal?: AbortSignal): AsyncIterable<LogLine> {
    this.begin("follow");
    const record = this.requireRecord("follow");
    return this.streams.stream((scoped) => this.watchDrift(record, this.daemon.followLogs(record.id, scoped)), signal);
  }

  async listLedgers(): Promise<LedgerListing> {
    return this.guarded("listLedgers", (record) => this.ledgers.listLedgers(record.id));
  }

  async describeLedger(name: string): Promise<LedgerDetail> {
    return this.guarded("describeLedger", (record) => this.ledgers.describeLedger(record.id, name));
  }

  async deleteLedger(name: string, confirmed: boolean): Promise<DeleteLedgerOutcome> {
    return this.guarded("deleteLedger", (record) => this.ledgers.deleteLedger(record.id, name, confirmed));
  }

  async stop(): Promise<Transition> {
    return this.guarded("stop", async (record) => {
      await this.daemon.stopContainer(record.id, this.stopGraceSeconds);
      const saveWarnings = await this.persist();
      const next = await this.reconcileRecord();
      return { ...next, warnings: [...saveWarnings, ...next.warnings] };
    });
  }

  async destroy(): Promise<Transition> {
    return this.guarded("destroy", async (record) => {
      await this.daemon.stopContainer(record.id, this.stopGraceSeconds);
      await this.daemon.removeContainer(record.id, true);
      this.forget();
      const warnings = await this.persist();
      return this.moveTo("await-selection", warnings);
    });
  }

  /** Cancel streams and persist the current record. Calling it again is a no-op. */
  async exit(): Promise<Transition> {
    if (this.phase === "exited") return { state: "exited", warnings: [] };
    this.begin("exit");
    const warnings = this.preferences.lastContainer ? await this.persist() : [];
    return this.moveTo("exited", warnings);
  }

  // --- Private helpers ---

  /** Phase check, then cancel whatever streams the previous operation left open. */
  private begin(operation: SessionOperation): void {
    if (!isAllowedIn(operation, this.phase)) throw new InvalidTransitionError(operation, this.phase);
    const cancelled = this.streams.cancelAll();
    if (cancelled > 0) logger.debug(`Cancelled ${cancelled} open stream(s) before ${operation}`);
  }

  private requireRecord(operation: SessionOperation): ContainerRecord {
    const record = this.preferences.lastContainer;
    if (!record) throw new InvalidTransitionError(`${operation} without a container`, this.phase);
    return record;
  }

  private async guarded<T>(operation: SessionOperation, fn: (record: ContainerRecord) => Promise<T>): Promise<T> {
    this.begin(operation);
    const record = this.requireRecord(operation);
    try {
      return await fn(record);
    } catch (err) {
      if (isMissingContainer(err)) await this.demoteMissing(record);
      throw err;
    }
  }

  private async *watchDrift<T>(record: ContainerRecord, source: AsyncIterable<T>): AsyncGenerator<T> {
    try {
      yield* source;
    } catch (err) {
      if (isMissingContainer(err)) await this.demoteMissing(record);
      throw err;
    }
  }

  /** `selected` means the current record was just chosen and has to be saved whatever its state. */
  private async reconcileRecord(selected = false): Promise<Transition> {
    const record = this.preferences.lastContainer;
    if (!record) return this.moveTo("await-selection", []);

    const status = await this.daemon.inspectContainer(record.id);
    switch (status.state) {
      case "missing": {
        logger.warn(`Container ${record.name} (${record.id}) no longer exists; forgetting it`);
        this.forget();
        const warnings = await this.persist();
        return this.moveTo("await-selection", warnings);
      }
      case "running": {
        if (status.startedAt && status.startedAt !== record.lastStartedAt) {
          this.touchStarted(record, status.startedAt);
          return this.moveTo("managing", await this.persist());
        }
        return this.moveTo("managing", selected ? await this.persist() : []);
      }
      case "exited":
        return this.moveTo("await-resume", selected ? await this.persist() : [], RESUME_OPTIONS);
    }
  }

  /** Drop a record whose container vanished, if it is still the current one. */
  private async demoteMissing(record: ContainerRecord): Promise<void> {
    if (this.preferences.lastContainer?.id !== record.id || this.phase === "exited") return;
    logger.warn(`Container ${record.name} (${record.id}) disappeared; returning to selection`);
    this.forget();
    await this.persist();
    this.moveTo("await-selection", []);
  }

  private async knownContainers(): Promise<KnownContainer[]> {
    const managed = await this.daemon.listManagedContainers();
    const known: KnownContainer[] = managed.map((c) => ({
      id: c.id,
      name: c.name,
      hostPort: c.hostPort,
      running: c.running,
    }));
    const record = this.preferences.lastContainer;
    if (record && !known.some((c) => c.id === record.id)) {
      // Not on the daemon's managed list, so it is not running anything.
      known.push({ id: record.id, name: record.name, hostPort: record.hostPort, running: false });
    }
    return known;
  }

  private touchStarted(record: ContainerRecord, startedAt: string): void {
    this.remember({ ...record, lastStartedAt: startedAt });
  }

  /** Make `record` the current container and move it to the front of the tracked list. */
  private remember(record: ContainerRecord): void {
    this.preferences = {
      ...this.preferences,
      lastContainer: record,
      containers: [record, ...this.preferences.containers.filter((c) => c.id !== record.id)],
    };
  }

  /** Drop the current container from the session and from the tracked list. */
  private forget(): void {
    const id = this.preferences.lastContainer?.id;
    this.preferences = {
      ...this.preferences,
      lastContainer: null,
      containers: this.preferences.containers.filter((c) => c.id !== id),
    };
  }

  private async persist(): Promise<SessionWarning[]> {
    try {
      await this.store.save(this.preferences);
      return [];
    } catch (err) {
      if (!(err instanceof PreferencesSaveError)) throw err;
      logger.warn("Preferences were not saved; the session continues with the change", { err });
      return [{ kind: "save-failed", message: err.message }];
    }
  }

  private moveTo(next: SessionPhase, warnings: SessionWarning[], options?: readonly ResumeOption[]): Transition {
    if (!isValidTransition(this.phase, next)) throw new InvalidTransitionError(`move to ${next}`, this.phase);
    this.phase = next;
    return options ? { state: next, warnings, options } : { state: next, warnings };
  }
}
