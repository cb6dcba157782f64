import { z } from "zod";
import type { StatSample } from "./types.js";

const cpuStatsSchema = z.object({
  cpu_usage: z.object({
    total_usage: z.number().default(0),
    percpu_usage: z.array(z.number()).nullish(),
  }),
  system_cpu_usage: z.number().nullish(),
  online_cpus: z.number().nullish(),
});

/** The subset of the Engine API stats payload needed for a sample. */
export const rawStatsSchema = z.object({
  read: z.string().optional(),
  cpu_stats: cpuStatsSchema,
  precpu_stats: cpuStatsSchema.partial({ cpu_usage: true }).optional(),
  memory_stats: z
    .object({
      usage: z.number().nullish(),
      limit: z.number().nullish(),
    })
    .default({}),
});

export type RawStats = z.infer<typeof rawStatsSchema>;

const round2 = (n: number) => Math.round(n * 100) / 100;

/**
 * Compute a sample the way `docker stats` does: CPU share of the system
 * delta since the previous read, scaled by the number of online CPUs.
 */
export function computeStatSample(raw: RawStats, now: () => Date = () => new Date()): StatSample {
  const cpu = raw.cpu_stats;
  const pre = raw.precpu_stats;

  const cpuDelta = cpu.cpu_usage.total_usage - (pre?.cpu_usage?.total_usage ?? 0);
  const systemDelta = (cpu.system_cpu_usage ?? 0) - (pre?.system_cpu_usage ?? 0);
  const numCpus = cpu.online_cpus || cpu.cpu_usage.percpu_usage?.length || 1;
  const cpuPercent = systemDelta > 0 && cpuDelta > 0 ? (cpuDelta / systemDelta) * numCpus * 100 : 0;

  const memoryUsageBytes = raw.memory_stats.usage ?? 0;
  const memoryLimitBytes = raw.memory_stats.limit ?? 0;
  const memoryPercent = memoryLimitBytes > 0 ? (memoryUsageBytes / memoryLimitBytes) * 100 : 0;

  const readAt = raw.read && !raw.read.startsWith("0001-") ? raw.read : now().toISOString();

  return {
    cpuPercent: round2(cpuPercent),
    memoryUsageBytes,
    memoryLimitBytes,
    memoryPercent: round2(memoryPercent),
    readAt,
  };
}

/** Parse one NDJSON stats line; null when the line is not a stats payload. */
export function parseStatLine(line: string, now?: () => Date): StatSample | null {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = rawStatsSchema.safeParse(json);
  if (!parsed.success) return null;
  return computeStatSample(parsed.data, now);
}
