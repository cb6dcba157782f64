import chalk from "chalk";
import type { ContainerRecord, ContainerStatus, LocalImage, LogLine, StatSample } from "../docker/types.js";
import type { MalformedResponse } from "../ledger/ledger-manager.js";
import type { LedgerSummary } from "../ledger/ledger-parser.js";
import type { SessionWarning, TrackedContainer } from "../lifecycle/orchestrator.js";
import { relativeAge, type TagInfo } from "../registry/hub-client.js";

const UNITS = ["B", "KiB", "MiB", "GiB", "TiB"];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

export function formatRecord(record: ContainerRecord): string {
  const volume = record.dataDirectory ? `, data ${record.dataDirectory}` : "";
  return `${chalk.bold(record.name)} (${record.image}) on port ${record.hostPort}${volume}, ${record.mode}`;
}

export function formatTracked({ record, state }: TrackedContainer): string {
  const label =
    state === "running" ? chalk.green("running") : state === "exited" ? chalk.yellow("stopped") : chalk.red("not found");
  return `${chalk.bold(record.name)} [${label}] (${record.image}, port ${record.hostPort}, last start ${record.lastStartedAt ?? "never"})`;
}

export function formatStatus(status: ContainerStatus): string {
  if (status.state === "missing") return `${chalk.red("missing")} ${status.id}`;

  const lines = [
    `${chalk.bold(status.name)} ${status.state === "running" ? chalk.green("running") : chalk.yellow("exited")}`,
    `  id       ${status.id.slice(0, 12)}`,
    `  image    ${status.image}`,
    `  port     ${status.hostPort === null ? "not published" : `http://localhost:${status.hostPort}`}`,
    `  data     ${status.dataDirectory ?? "inside the container"}`,
  ];
  if (status.startedAt) lines.push(`  started  ${status.startedAt}`);
  if (status.state === "exited") {
    if (status.finishedAt) lines.push(`  finished ${status.finishedAt}`);
    if (status.exitCode !== null) lines.push(`  exit     ${status.exitCode}`);
  }
  return lines.join("\n");
}

export function formatStat(sample: StatSample): string {
  const cpu = `CPU ${sample.cpuPercent.toFixed(2)}%`;
  const mem = `MEM ${formatBytes(sample.memoryUsageBytes)} / ${formatBytes(sample.memoryLimitBytes)} (${sample.memoryPercent.toFixed(2)}%)`;
  return `${cpu}  ${mem}`;
}

export function formatLogLine(line: LogLine): string {
  return line.source === "stderr" ? chalk.red(line.text) : line.text;
}

export function formatLedger(ledger: LedgerSummary): string {
  const updated = ledger.lastUpdated ?? "unknown";
  return `${chalk.bold(ledger.name)} (last commit ${chalk.yellow(updated)}, commits ${chalk.green(String(ledger.commitCount))}, size ${chalk.blue(formatBytes(ledger.sizeBytes))})`;
}

export function formatTag(repository: string, tag: TagInfo, width: number, now?: Date): string {
  return `${repository}:${tag.name.padEnd(width)} (updated ${relativeAge(tag.lastUpdated, now)})`;
}

export function formatImage(image: LocalImage): string {
  return `${image.reference} (${formatBytes(image.sizeBytes)}, created ${image.createdAt.slice(0, 10)})`;
}

export function formatWarning(warning: SessionWarning | MalformedResponse): string {
  if (warning.kind === "save-failed") return chalk.yellow(`warning: ${warning.message}`);
  return chalk.yellow(`warning: malformed ledger descriptor ${warning.descriptorPath}: ${warning.reason}`);
}

export function formatError(message: string): string {
  return chalk.red(`error: ${message}`);
}
