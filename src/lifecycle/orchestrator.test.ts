import { beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { InMemoryDaemonClient } from "../docker/in-memory-daemon-client.js";
import { CONTAINER_DATA_PATH, type ContainerRecord } from "../docker/types.js";
import { DaemonError, InvalidTransitionError, NotFoundError } from "../errors.js";
import { LedgerManager } from "../ledger/ledger-manager.js";
import type { PathProbe } from "../negotiation/config-negotiator.js";
import { InMemoryPreferencesRepository } from "../state/in-memory-preferences-repository.js";
import { LifecycleOrchestrator, RESUME_OPTIONS } from "./orchestrator.js";

const IMAGE = "fluree/server:stable";
const NOW = "2024-05-01T00:00:00.000Z";
const now = () => new Date(NOW);

const record: ContainerRecord = {
  id: "c1",
  name: "ledger-1",
  image: IMAGE,
  hostPort: 8090,
  mode: "background",
  createdAt: "2024-01-01T00:00:00.000Z",
  lastStartedAt: "2024-01-02T00:00:00.000Z",
};

interface Harness {
  daemon: InMemoryDaemonClient;
  store: InMemoryPreferencesRepository;
  directories: Set<string>;
  makeDirectory: Mock<(path: string) => Promise<void>>;
  orchestrator: LifecycleOrchestrator;
}

function harness(options: { record?: ContainerRecord; tracked?: ContainerRecord[] } = {}): Harness {
  const daemon = new InMemoryDaemonClient({ images: [IMAGE], now });
  const store = new InMemoryPreferencesRepository({
    version: 1,
    lastContainer: options.record ?? null,
    containers: options.tracked ?? (options.record ? [options.record] : []),
    defaults: { hostPort: 8090, mode: "background" },
  });
  const directories = new Set<string>();
  const probe: PathProbe = async (path) => (directories.has(path) ? "directory" : "missing");
  const makeDirectory = vi.fn(async (path: string) => {
    directories.add(path);
  });
  const orchestrator = new LifecycleOrchestrator({
    daemon,
    store,
    ledgers: new LedgerManager(daemon),
    stopGraceSeconds: 10,
    probe,
    makeDirectory,
    cwd: "/work",
    homeDir: "/home/op",
    now,
  });
  return { daemon, store, directories, makeDirectory, orchestrator };
}

function seedRunning(daemon: InMemoryDaemonClient, startedAt = "2024-01-02T00:00:00.000Z"): void {
  daemon.seedContainer({ id: "c1", name: "ledger-1", image: IMAGE, hostPort: 8090, running: true, startedAt });
}

function seedExited(daemon: InMemoryDaemonClient): void {
  daemon.seedContainer({ id: "c1", name: "ledger-1", image: IMAGE, hostPort: 8090, exitCode: 0 });
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

describe("LifecycleOrchestrator", () => {
  describe("open", () => {
    it("goes to await-selection without a record", async () => {
      const { orchestrator, daemon } = harness();
      expect(await orchestrator.open()).toEqual({ state: "await-selection", warnings: [] });
      expect(daemon.calls).toEqual([]);
    });

    it("manages a running container without rewriting an unchanged record", async () => {
      const { orchestrator, daemon, store } = harness({ record });
      seedRunning(daemon);

      expect(await orchestrator.open()).toEqual({ state: "managing", warnings: [] });
      expect(store.saveCount).toBe(0);
    });

    it("records a newer start time", async () => {
      const { orchestrator, daemon, store } = harness({ record });
      seedRunning(daemon, "2024-04-30T10:00:00.000Z");

      await orchestrator.open();

      expect(orchestrator.record?.lastStartedAt).toBe("2024-04-30T10:00:00.000Z");
      expect(store.current?.lastContainer?.lastStartedAt).toBe("2024-04-30T10:00:00.000Z");
    });

    it("offers resume options for an exited container", async () => {
      const { orchestrator, daemon } = harness({ record });
      seedExited(daemon);

      expect(await orchestrator.open()).toEqual({ state: "await-resume", warnings: [], options: RESUME_OPTIONS });
    });

    it("forgets a record whose container is gone", async () => {
      const { orchestrator, store } = harness({ record });

      expect(await orchestrator.open()).toEqual({ state: "await-selection", warnings: [] });
      expect(orchestrator.record).toBeNull();
      expect(store.current?.lastContainer).toBeNull();
    });

    it("cannot be called twice", async () => {
      const { orchestrator } = harness();
      await orchestrator.open();
      await expect(orchestrator.open()).rejects.toBeInstanceOf(InvalidTransitionError);
    });
  });

  describe("create", () => {
    let h: Harness;

    beforeEach(async () => {
      h = harness();
      await h.orchestrator.open();
    });

    it("creates, starts and records the container", async () => {
      h.directories.add("/work/ledgers");

      const result = await h.orchestrator.create({
        image: IMAGE,
        name: "ledger-2",
        hostPort: "8091",
        dataDirectory: "ledgers",
        mode: "Background",
      });

      expect(result).toEqual({ ok: true, transition: { state: "managing", warnings: [] } });
      expect(h.daemon.callsOf("createContainer")[0]?.request).toEqual({
        image: IMAGE,
        name: "ledger-2",
        portMapping: { hostPort: 8091, containerPort: 8090 },
        volumeMount: { hostPath: "/work/ledgers", containerPath: CONTAINER_DATA_PATH },
        mode: "background",
      });
      expect(h.daemon.getContainer("container-1")?.running).toBe(true);
      const created: ContainerRecord = {
        id: "container-1",
        name: "ledger-2",
        image: IMAGE,
        hostPort: 8091,
        dataDirectory: "/work/ledgers",
        mode: "background",
        createdAt: NOW,
        lastStartedAt: NOW,
      };
      expect(h.store.current).toEqual({
        version: 1,
        lastContainer: created,
        containers: [created],
        defaults: { hostPort: 8091, dataDirectory: "/work/ledgers", mode: "background" },
      });
    });

    it("rejects a port held by another running container before touching the daemon", async () => {
      h.daemon.seedContainer({ id: "other", name: "web", image: IMAGE, hostPort: 8090, running: true });

      const result = await h.orchestrator.create({ image: IMAGE, name: "ledger-2", hostPort: 8090, mode: "background" });

      expect(result).toEqual({
        ok: false,
        rejection: { kind: "port-in-use", hostPort: 8090, holder: { id: "other", name: "web" } },
      });
      expect(h.daemon.callsOf("createContainer")).toEqual([]);
      expect(h.orchestrator.state).toBe("await-selection");
    });

    it("rejects an invalid container name", async () => {
      const result = await h.orchestrator.create({ image: IMAGE, name: "-bad name", hostPort: 8091, mode: "background" });
      expect(result.ok === false && result.rejection.kind).toBe("invalid-name");
      expect(h.daemon.calls).toEqual([]);
    });

    it("reports a missing data directory unless asked to create it", async () => {
      const selection = { image: IMAGE, name: "ledger-2", hostPort: 8091, dataDirectory: "~/fresh", mode: "background" };

      expect(await h.orchestrator.create(selection)).toEqual({
        ok: false,
        rejection: { kind: "directory-missing", path: "/home/op/fresh" },
      });
      expect(h.makeDirectory).not.toHaveBeenCalled();

      const created = await h.orchestrator.create({ ...selection, createDirectory: true });
      expect(created.ok).toBe(true);
      expect(h.makeDirectory).toHaveBeenCalledWith("/home/op/fresh");
      expect(h.orchestrator.record?.dataDirectory).toBe("/home/op/fresh");
    });

    it("returns a directory it could not create as a rejection", async () => {
      h.makeDirectory.mockRejectedValueOnce(
        Object.assign(new Error("EACCES: permission denied, mkdir '/srv/ledgers'"), { code: "EACCES" }),
      );

      const result = await h.orchestrator.create({
        image: IMAGE,
        name: "ledger-2",
        hostPort: 8091,
        dataDirectory: "/srv/ledgers",
        createDirectory: true,
        mode: "background",
      });

      expect(result).toEqual({
        ok: false,
        rejection: {
          kind: "directory-unusable",
          path: "/srv/ledgers",
          reason: "EACCES: permission denied, mkdir '/srv/ledgers'",
        },
      });
      expect(h.daemon.callsOf("createContainer")).toEqual([]);
      expect(h.orchestrator.state).toBe("await-selection");
    });

    it("removes the container when it fails to start", async () => {
      vi.spyOn(h.daemon, "startContainer").mockRejectedValueOnce(new DaemonError("exec format error"));

      await expect(
        h.orchestrator.create({ image: IMAGE, name: "ledger-2", hostPort: 8091, mode: "background" }),
      ).rejects.toBeInstanceOf(DaemonError);

      expect(h.daemon.callsOf("removeContainer")).toEqual([{ op: "removeContainer", id: "container-1", force: true }]);
      expect(h.orchestrator.state).toBe("await-selection");
      expect(h.orchestrator.record).toBeNull();
    });

    it("keeps the session going when the record cannot be saved", async () => {
      h.store.failSaves();

      const result = await h.orchestrator.create({ image: IMAGE, name: "ledger-2", hostPort: 8091, mode: "background" });

      expect(result).toEqual({
        ok: true,
        transition: {
          state: "managing",
          warnings: [
            { kind: "save-failed", message: "Failed to save preferences to memory://preferences: read-only file system" },
          ],
        },
      });
      expect(h.orchestrator.record?.id).toBe("container-1");
    });

    it("is refused while managing", async () => {
      await h.orchestrator.create({ image: IMAGE, name: "ledger-2", hostPort: 8091, mode: "background" });
      const before = h.daemon.calls.length;

      await expect(
        h.orchestrator.create({ image: IMAGE, name: "ledger-3", hostPort: 8092, mode: "background" }),
      ).rejects.toBeInstanceOf(InvalidTransitionError);
      expect(h.daemon.calls).toHaveLength(before);
    });
  });

  describe("await-resume", () => {
    let h: Harness;

    beforeEach(async () => {
      h = harness({ record });
      seedExited(h.daemon);
      await h.orchestrator.open();
    });

    it("resume starts the container and records the start time", async () => {
      expect(await h.orchestrator.resume()).toEqual({ state: "managing", warnings: [] });
      expect(h.daemon.getContainer("c1")?.running).toBe(true);
      expect(h.store.current?.lastContainer?.lastStartedAt).toBe(NOW);
    });

    it("recreate removes the container and forgets it", async () => {
      expect(await h.orchestrator.recreate()).toEqual({ state: "await-selection", warnings: [] });
      expect(h.daemon.callsOf("removeContainer")).toEqual([{ op: "removeContainer", id: "c1", force: true }]);
      expect(h.daemon.getContainer("c1")).toBeUndefined();
      expect(h.store.current?.lastContainer).toBeNull();
    });

    it("discard forgets the container but leaves it on the daemon", async () => {
      expect(await h.orchestrator.discard()).toEqual({ state: "await-selection", warnings: [] });
      expect(h.daemon.getContainer("c1")).toBeDefined();
      expect(h.store.current?.lastContainer).toBeNull();
    });

    it("resume of a container removed meanwhile falls back to selection", async () => {
      h.daemon.removeExternally("c1");

      await expect(h.orchestrator.resume()).rejects.toEqual(new NotFoundError("container", "c1"));
      expect(h.orchestrator.state).toBe("await-selection");
      expect(h.orchestrator.record).toBeNull();
    });
  });

  describe("managing", () => {
    let h: Harness;

    beforeEach(async () => {
      h = harness({ record });
      seedRunning(h.daemon);
      await h.orchestrator.open();
    });

    it("reports status", async () => {
      expect(await h.orchestrator.status()).toMatchObject({ state: "running", id: "c1", hostPort: 8090 });
    });

    it("drops back to selection when the container vanished", async () => {
      h.daemon.removeExternally("c1");

      await expect(h.orchestrator.status()).rejects.toEqual(new NotFoundError("container", "c1"));
      expect(h.orchestrator.state).toBe("await-selection");
      expect(h.store.current?.lastContainer).toBeNull();
    });

    it("stop moves to await-resume with the grace period", async () => {
      expect(await h.orchestrator.stop()).toEqual({ state: "await-resume", warnings: [], options: RESUME_OPTIONS });
      expect(h.daemon.callsOf("stopContainer")).toEqual([{ op: "stopContainer", id: "c1", graceSeconds: 10 }]);
      expect(h.store.current?.lastContainer?.id).toBe("c1");
    });

    it("destroy stops, removes and forgets", async () => {
      expect(await h.orchestrator.destroy()).toEqual({ state: "await-selection", warnings: [] });
      expect(h.daemon.calls.map((c) => c.op).slice(-2)).toEqual(["stopContainer", "removeContainer"]);
      expect(h.store.current?.lastContainer).toBeNull();
    });

    it("reconcile notices a container that exited on its own", async () => {
      h.daemon.exitExternally("c1", 137);
      expect(await h.orchestrator.reconcile()).toEqual({ state: "await-resume", warnings: [], options: RESUME_OPTIONS });
    });

    it("streams stats until another operation starts", async () => {
      h.daemon.setStatSamples([
        { cpuPercent: 1, memoryUsageBytes: 1, memoryLimitBytes: 4, memoryPercent: 25, readAt: NOW },
        { cpuPercent: 2, memoryUsageBytes: 2, memoryLimitBytes: 4, memoryPercent: 50, readAt: NOW },
      ]);
      const stats = h.orchestrator.stats()[Symbol.asyncIterator]();

      expect((await stats.next()).value).toMatchObject({ cpuPercent: 1 });
      expect(h.orchestrator.openStreams).toBe(1);

      await h.orchestrator.logs(10);

      expect(h.orchestrator.openStreams).toBe(0);
      expect((await stats.next()).done).toBe(true);
    });

    it("follows logs until the caller aborts", async () => {
      h.daemon.setFollowLines("c1", [
        { source: "stdout", text: "a" },
        { source: "stderr", text: "b" },
      ]);
      const controller = new AbortController();
      const seen: string[] = [];
      for await (const line of h.orchestrator.follow(controller.signal)) {
        seen.push(line.text);
        if (seen.length === 2) controller.abort();
      }
      expect(seen).toEqual(["a", "b"]);
      expect(h.orchestrator.openStreams).toBe(0);
    });

    it("a log follow that loses its container returns to selection", async () => {
      h.daemon.removeExternally("c1");

      await expect(collect(h.orchestrator.follow())).rejects.toBeInstanceOf(NotFoundError);
      expect(h.orchestrator.state).toBe("await-selection");
    });

    it("asks for confirmation before deleting a ledger", async () => {
      expect(await h.orchestrator.deleteLedger("demo", false)).toEqual({ status: "confirmation-required", name: "demo" });
      expect(h.daemon.callsOf("execInContainer")).toEqual([]);
    });
  });

  describe("tracked containers", () => {
    const older: ContainerRecord = {
      ...record,
      id: "c0",
      name: "ledger-0",
      hostPort: 8089,
      lastStartedAt: "2023-12-01T00:00:00.000Z",
    };

    it("keeps earlier containers tracked after creating a new one", async () => {
      const h = harness({ tracked: [older] });
      h.daemon.seedContainer({ id: "c0", name: "ledger-0", image: IMAGE, hostPort: 8089, exitCode: 0 });
      await h.orchestrator.open();

      await h.orchestrator.create({ image: IMAGE, name: "ledger-2", hostPort: 8091, mode: "background" });

      expect(h.store.current?.containers.map((c) => c.id)).toEqual(["container-1", "c0"]);
    });

    it("lists every tracked container with its live state", async () => {
      const h = harness({ tracked: [record, older] });
      seedRunning(h.daemon);
      await h.orchestrator.open();

      expect(await h.orchestrator.trackedContainers()).toEqual([
        { record, state: "running" },
        { record: older, state: "missing" },
      ]);
    });

    it("selects a running container and saves it as the current one", async () => {
      const h = harness({ tracked: [older, record] });
      seedRunning(h.daemon);
      await h.orchestrator.open();

      expect(await h.orchestrator.select("c1")).toEqual({ state: "managing", warnings: [] });
      expect(h.store.current?.lastContainer).toEqual(record);
      expect(h.store.current?.containers.map((c) => c.id)).toEqual(["c1", "c0"]);
    });

    it("offers resume options for a selected stopped container", async () => {
      const h = harness({ tracked: [record] });
      seedExited(h.daemon);
      await h.orchestrator.open();

      expect(await h.orchestrator.select("c1")).toEqual({ state: "await-resume", warnings: [], options: RESUME_OPTIONS });
      expect(h.orchestrator.record?.id).toBe("c1");
    });

    it("forgets a selected container that no longer exists", async () => {
      const h = harness({ tracked: [record, older] });
      await h.orchestrator.open();

      expect(await h.orchestrator.select("c1")).toEqual({ state: "await-selection", warnings: [] });
      expect(h.orchestrator.record).toBeNull();
      expect(h.store.current?.containers).toEqual([older]);
    });

    it("release leaves the container running and tracked", async () => {
      const h = harness({ record });
      seedRunning(h.daemon);
      await h.orchestrator.open();

      expect(await h.orchestrator.release()).toEqual({ state: "await-selection", warnings: [] });
      expect(h.store.current?.lastContainer).toBeNull();
      expect(h.store.current?.containers).toEqual([record]);
      expect(h.daemon.getContainer("c1")?.running).toBe(true);
    });

    it("refuses an id it does not track", async () => {
      const h = harness({ tracked: [record] });
      await h.orchestrator.open();

      await expect(h.orchestrator.select("nope")).rejects.toEqual(new NotFoundError("container", "nope"));
      expect(h.orchestrator.state).toBe("await-selection");
      expect(h.daemon.callsOf("inspectContainer")).toEqual([]);
    });
  });

  describe("exit", () => {
    it("persists the record once and is idempotent", async () => {
      const { orchestrator, daemon, store } = harness({ record });
      seedRunning(daemon);
      await orchestrator.open();

      expect(await orchestrator.exit()).toEqual({ state: "exited", warnings: [] });
      expect(await orchestrator.exit()).toEqual({ state: "exited", warnings: [] });
      expect(store.saveCount).toBe(1);
      await expect(orchestrator.status()).rejects.toBeInstanceOf(InvalidTransitionError);
    });

    it("is allowed before open", async () => {
      const { orchestrator, store } = harness();
      expect(await orchestrator.exit()).toEqual({ state: "exited", warnings: [] });
      expect(store.saveCount).toBe(0);
    });
  });
});
