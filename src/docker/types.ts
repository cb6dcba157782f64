import { z } from "zod";

/** Port the Fluree server listens on inside the container. */
export const CONTAINER_PORT = 8090;

/** Data directory of the Fluree server inside the container. */
export const CONTAINER_DATA_PATH = "/opt/fluree-server/data";

export const MANAGED_LABEL = "ledgerdock.managed";
export const MODE_LABEL = "ledgerdock.mode";

export const containerModeSchema = z.enum(["foreground", "background"]);
export type ContainerMode = z.infer<typeof containerModeSchema>;

/** Docker container names: alphanumeric first, then alphanumeric plus `_`, `.`, `-`. */
export const containerNameSchema = z
  .string()
  .trim()
  .regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]{0,127}$/, "Name must start with a letter or digit and contain only [a-zA-Z0-9_.-]");

export const containerRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  image: z.string().min(1),
  hostPort: z.number().int().min(1).max(65535),
  dataDirectory: z.string().min(1).optional(),
  mode: containerModeSchema,
  createdAt: z.string(),
  lastStartedAt: z.string().optional(),
});

/** The container this tool created and tracks across sessions. */
export type ContainerRecord = z.infer<typeof containerRecordSchema>;

export interface PortMapping {
  hostPort: number;
  containerPort: number;
}

export interface VolumeMount {
  hostPath: string;
  containerPath: string;
}

export interface CreateContainerRequest {
  image: string;
  name: string;
  portMapping: PortMapping;
  volumeMount?: VolumeMount;
  mode: ContainerMode;
  /** Pull the image before creating when it is not present locally. */
  pull?: boolean;
}

/** Live status derived from the daemon. Never persisted. */
export type ContainerStatus =
  | {
      state: "running";
      id: string;
      name: string;
      image: string;
      hostPort: number | null;
      dataDirectory: string | null;
      startedAt: string | null;
    }
  | {
      state: "exited";
      id: string;
      name: string;
      image: string;
      hostPort: number | null;
      dataDirectory: string | null;
      startedAt: string | null;
      finishedAt: string | null;
      exitCode: number | null;
    }
  | { state: "missing"; id: string };

export type ContainerState = ContainerStatus["state"];

/** A container carrying the managed label, as reported by the daemon listing. */
export interface ManagedContainer {
  id: string;
  name: string;
  image: string;
  hostPort: number | null;
  running: boolean;
}

/** One resource usage sample from the stats stream. */
export interface StatSample {
  cpuPercent: number;
  memoryUsageBytes: number;
  memoryLimitBytes: number;
  memoryPercent: number;
  readAt: string;
}

export interface LogLine {
  source: "stdout" | "stderr";
  text: string;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface LocalImage {
  reference: string;
  id: string;
  createdAt: string;
  sizeBytes: number;
}

export interface PullProgress {
  status: string;
  id?: string;
  progress?: string;
}
