import { posix } from "node:path";
import { logger } from "../config/logger.js";
import type { DaemonClient } from "../docker/daemon-client.js";
import { CONTAINER_DATA_PATH } from "../docker/types.js";
import { ExecFailedError, excerpt, LedgerDeleteFailedError, NotFoundError } from "../errors.js";
import { type LedgerDetail, type LedgerSummary, parseDescriptor, splitPaths } from "./ledger-parser.js";

export interface MalformedResponse {
  kind: "malformed-response";
  descriptorPath: string;
  reason: string;
}

export interface LedgerListing {
  ledgers: LedgerSummary[];
  warnings: MalformedResponse[];
}

export type DeleteLedgerOutcome = { status: "confirmation-required"; name: string } | { status: "deleted"; name: string };

interface DescriptorScan {
  details: LedgerDetail[];
  warnings: MalformedResponse[];
}

const byName = (a: LedgerSummary, b: LedgerSummary) => a.name.localeCompare(b.name);

/**
 * Reads and deletes ledgers inside a running server container. All access
 * goes through exec; nothing on the host is touched.
 */
export class LedgerManager {
  constructor(
    private readonly daemon: DaemonClient,
    private readonly dataRoot: string = CONTAINER_DATA_PATH,
  ) {}

  /**
   * List ledgers by their descriptors. One malformed descriptor empties the
   * whole listing and is reported as a warning instead of an exception.
   */
  async listLedgers(containerId: string): Promise<LedgerListing> {
    const scan = await this.scan(containerId);
    if (scan.warnings.length > 0) return { ledgers: [], warnings: scan.warnings };
    return { ledgers: scan.details.map((d) => d.summary).sort(byName), warnings: [] };
  }

  async describeLedger(containerId: string, name: string): Promise<LedgerDetail> {
    const { details } = await this.scan(containerId);
    const detail = details.find((d) => d.summary.name === name);
    if (!detail) throw new NotFoundError("ledger", name);
    return detail;
  }

  /** Deletes the directory holding the ledger's descriptor. Nothing runs without `confirmed === true`. */
  async deleteLedger(containerId: string, name: string, confirmed: boolean): Promise<DeleteLedgerOutcome> {
    if (confirmed !== true) return { status: "confirmation-required", name };

    const { summary } = await this.describeLedger(containerId, name);
    const directory = posix.dirname(summary.descriptorPath);
    const relative = posix.relative(this.dataRoot, directory);
    if (relative === "" || relative.startsWith("..") || posix.isAbsolute(relative)) {
      throw new LedgerDeleteFailedError(name, `${directory} is not inside ${this.dataRoot}`);
    }

    try {
      await this.daemon.execInContainer(containerId, ["rm", "-rf", directory]);
    } catch (err) {
      if (err instanceof ExecFailedError) {
        throw new LedgerDeleteFailedError(name, `rm exited with code ${err.exitCode}${excerpt(err.stderr)}`);
      }
      throw err;
    }
    logger.info(`Deleted ledger ${name} (${directory})`, { containerId });
    return { status: "deleted", name };
  }

  private async scan(containerId: string): Promise<DescriptorScan> {
    const found = await this.daemon.execInContainer(containerId, [
      "find",
      this.dataRoot,
      "-type",
      "f",
      "-name",
      "*.json",
      "-not",
      "-path",
      "*/commit/*",
    ]);

    const details: LedgerDetail[] = [];
    const warnings: MalformedResponse[] = [];
    for (const descriptorPath of splitPaths(found.stdout)) {
      const { stdout } = await this.daemon.execInContainer(containerId, ["cat", descriptorPath]);
      const result = parseDescriptor(descriptorPath, stdout);
      if (result.ok) {
        details.push(result.detail);
      } else {
        logger.warn(`Malformed ledger descriptor ${descriptorPath}: ${result.reason}`, { containerId });
        warnings.push({ kind: "malformed-response", descriptorPath, reason: result.reason });
      }
    }
    return { details, warnings };
  }
}
