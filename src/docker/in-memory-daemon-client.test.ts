import { describe, expect, it } from "vitest";
import { DaemonError, DaemonUnreachableError, ExecFailedError, ImageNotFoundError, NotFoundError, PortConflictError } from "../errors.js";
import { InMemoryDaemonClient } from "./in-memory-daemon-client.js";
import type { CreateContainerRequest } from "./types.js";

const IMAGE = "fluree/server:stable";
const fixedNow = () => new Date("2024-03-01T12:00:00.000Z");

function request(overrides: Partial<CreateContainerRequest> = {}): CreateContainerRequest {
  return {
    image: IMAGE,
    name: "ledger-1",
    portMapping: { hostPort: 8090, containerPort: 8090 },
    mode: "background",
    ...overrides,
  };
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

describe("InMemoryDaemonClient", () => {
  it("creates stopped containers with sequential ids", async () => {
    const daemon = new InMemoryDaemonClient({ images: [IMAGE] });
    const id = await daemon.createContainer(request());

    expect(id).toBe("container-1");
    expect(await daemon.inspectContainer(id)).toEqual({
      state: "exited",
      id,
      name: "ledger-1",
      image: IMAGE,
      hostPort: 8090,
      dataDirectory: null,
      startedAt: null,
      finishedAt: null,
      exitCode: null,
    });
  });

  it("requires the image locally unless pull is set", async () => {
    const daemon = new InMemoryDaemonClient();
    await expect(daemon.createContainer(request())).rejects.toEqual(new ImageNotFoundError(IMAGE));
    await expect(daemon.createContainer(request({ pull: true }))).resolves.toBe("container-1");
  });

  it("rejects a port held by a running container", async () => {
    const daemon = new InMemoryDaemonClient({ images: [IMAGE] });
    daemon.seedContainer({ id: "other", name: "web", image: "nginx", hostPort: 8090, running: true });

    await expect(daemon.createContainer(request())).rejects.toBeInstanceOf(PortConflictError);
    await expect(daemon.createContainer(request({ portMapping: { hostPort: 8091, containerPort: 8090 } }))).resolves.toBe(
      "container-1",
    );
  });

  it("rejects a duplicate name", async () => {
    const daemon = new InMemoryDaemonClient({ images: [IMAGE] });
    await daemon.createContainer(request());
    await expect(daemon.createContainer(request({ portMapping: { hostPort: 9000, containerPort: 8090 } }))).rejects.toBeInstanceOf(
      DaemonError,
    );
  });

  it("starts and stops idempotently", async () => {
    const daemon = new InMemoryDaemonClient({ images: [IMAGE], now: fixedNow });
    const id = await daemon.createContainer(request());

    await daemon.startContainer(id);
    await daemon.startContainer(id);
    expect(await daemon.inspectContainer(id)).toMatchObject({ state: "running", startedAt: "2024-03-01T12:00:00.000Z" });

    await daemon.stopContainer(id, 10);
    await daemon.stopContainer(id, 10);
    expect(await daemon.inspectContainer(id)).toMatchObject({
      state: "exited",
      finishedAt: "2024-03-01T12:00:00.000Z",
      exitCode: 0,
    });
    expect(daemon.callsOf("stopContainer")).toEqual([
      { op: "stopContainer", id, graceSeconds: 10 },
      { op: "stopContainer", id, graceSeconds: 10 },
    ]);
  });

  it("fails start on a missing container and treats remove of one as done", async () => {
    const daemon = new InMemoryDaemonClient();
    await expect(daemon.startContainer("gone")).rejects.toEqual(new NotFoundError("container", "gone"));
    await expect(daemon.removeContainer("gone", false)).resolves.toBeUndefined();
    expect(await daemon.inspectContainer("gone")).toEqual({ state: "missing", id: "gone" });
  });

  it("refuses to remove a running container without force", async () => {
    const daemon = new InMemoryDaemonClient();
    daemon.seedContainer({ id: "c1", name: "ledger", image: IMAGE, running: true });

    await expect(daemon.removeContainer("c1", false)).rejects.toBeInstanceOf(DaemonError);
    await daemon.removeContainer("c1", true);
    expect(daemon.getContainer("c1")).toBeUndefined();
  });

  it("lists only managed containers", async () => {
    const daemon = new InMemoryDaemonClient();
    daemon.seedContainer({ id: "c1", name: "ledger", image: IMAGE, hostPort: 8090, running: true });
    daemon.seedContainer({ id: "c2", name: "other", image: "nginx", managed: false });

    expect(await daemon.listManagedContainers()).toEqual([
      { id: "c1", name: "ledger", image: IMAGE, hostPort: 8090, running: true },
    ]);
  });

  it("records the call before failing when offline", async () => {
    const daemon = new InMemoryDaemonClient();
    daemon.setReachable(false);

    await expect(daemon.ping()).rejects.toBeInstanceOf(DaemonUnreachableError);
    expect(daemon.calls).toEqual([{ op: "ping" }]);
  });

  it("streams configured samples only while running", async () => {
    const daemon = new InMemoryDaemonClient();
    daemon.seedContainer({ id: "c1", name: "ledger", image: IMAGE, running: true });
    daemon.seedContainer({ id: "c2", name: "idle", image: IMAGE });

    const samples = await collect(daemon.streamStats("c1"));
    expect(samples.map((s) => s.cpuPercent)).toEqual([1.5]);
    expect(await collect(daemon.streamStats("c2"))).toEqual([]);
  });

  it("returns the last N log lines", async () => {
    const daemon = new InMemoryDaemonClient();
    daemon.seedContainer({
      id: "c1",
      name: "ledger",
      image: IMAGE,
      logs: [
        { source: "stdout", text: "one" },
        { source: "stdout", text: "two" },
        { source: "stderr", text: "three" },
      ],
    });

    expect(await collect(daemon.fetchLogs("c1", 2))).toEqual([
      { source: "stdout", text: "two" },
      { source: "stderr", text: "three" },
    ]);
  });

  it("follows until the signal aborts", async () => {
    const daemon = new InMemoryDaemonClient();
    daemon.seedContainer({ id: "c1", name: "ledger", image: IMAGE, running: true });
    daemon.setFollowLines("c1", [{ source: "stdout", text: "live" }]);

    const controller = new AbortController();
    const seen: string[] = [];
    for await (const line of daemon.followLogs("c1", controller.signal)) {
      seen.push(line.text);
      controller.abort();
    }
    expect(seen).toEqual(["live"]);
  });

  it("runs exec through the handler and fails on non-zero exit", async () => {
    const daemon = new InMemoryDaemonClient();
    daemon.seedContainer({ id: "c1", name: "ledger", image: IMAGE, running: true });
    daemon.setExecHandler((command) =>
      command[0] === "rm" ? { stdout: "", stderr: "rm: permission denied", exitCode: 1 } : { stdout: "ok\n", stderr: "", exitCode: 0 },
    );

    expect(await daemon.execInContainer("c1", ["echo"])).toEqual({ stdout: "ok\n", stderr: "", exitCode: 0 });
    await expect(daemon.execInContainer("c1", ["rm", "-rf", "/x"])).rejects.toBeInstanceOf(ExecFailedError);
  });

  it("refuses exec in a stopped container", async () => {
    const daemon = new InMemoryDaemonClient();
    daemon.seedContainer({ id: "c1", name: "ledger", image: IMAGE });
    await expect(daemon.execInContainer("c1", ["ls"])).rejects.toBeInstanceOf(DaemonError);
  });

  it("lists local images of one repository", async () => {
    const daemon = new InMemoryDaemonClient({ images: ["fluree/server:stable", "fluree/server:latest", "nginx:1"] });
    const images = await daemon.listLocalImages("fluree/server");
    expect(images.map((i) => i.reference)).toEqual(["fluree/server:latest", "fluree/server:stable"]);
  });

  it("adds the image after a pull and refuses unpullable references", async () => {
    const daemon = new InMemoryDaemonClient();
    daemon.markUnpullable("fluree/server:nope");

    expect(await collect(daemon.pullImage(IMAGE))).toHaveLength(2);
    expect((await daemon.listLocalImages("fluree/server")).map((i) => i.reference)).toEqual([IMAGE]);
    await expect(collect(daemon.pullImage("fluree/server:nope"))).rejects.toEqual(new ImageNotFoundError("fluree/server:nope"));
  });
});
