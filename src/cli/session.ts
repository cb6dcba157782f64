import chalk from "chalk";
import { logger } from "../config/logger.js";
import { parseImageRef } from "../docker/image-ref.js";
import type { ContainerMode } from "../docker/types.js";
import { describeError, isLedgerdockError } from "../errors.js";
import type { LedgerSummary } from "../ledger/ledger-parser.js";
import type {
  ContainerSelection,
  CreateRejection,
  LifecycleOrchestrator,
  TrackedContainer,
  Transition,
} from "../lifecycle/orchestrator.js";
import { describeRejection } from "../negotiation/config-negotiator.js";
import type { HubClient } from "../registry/hub-client.js";
import {
  formatError,
  formatImage,
  formatLedger,
  formatLogLine,
  formatRecord,
  formatStat,
  formatStatus,
  formatTag,
  formatTracked,
  formatWarning,
} from "./format.js";
import { type Choice, type OperatorPrompt, PromptClosedError } from "./prompt.js";

export interface SessionOptions {
  orchestrator: LifecycleOrchestrator;
  prompt: OperatorPrompt;
  hub: HubClient;
  imageRepository: string;
  logTail: number;
  write?: (text: string) => void;
}

type ImageSource = "local" | "hub" | "manual" | "back";

type SelectionAction = { kind: "create" } | { kind: "use"; tracked: TrackedContainer } | { kind: "quit" };

type ManagingAction = "status" | "stats" | "logs" | "follow" | "ledgers" | "stop" | "destroy" | "switch" | "quit";

const MORE = Symbol("more");

/**
 * The interactive loop: shows the menu for the current session phase, runs
 * the chosen action and reports typed failures without ending the session.
 * Resolves to the process exit code.
 */
export class InteractiveSession {
  private readonly orchestrator: LifecycleOrchestrator;
  private readonly prompt: OperatorPrompt;
  private readonly hub: HubClient;
  private readonly imageRepository: string;
  private readonly logTail: number;
  private readonly write: (text: string) => void;

  constructor(options: SessionOptions) {
    this.orchestrator = options.orchestrator;
    this.prompt = options.prompt;
    this.hub = options.hub;
    this.imageRepository = options.imageRepository;
    this.logTail = options.logTail;
    this.write = options.write ?? ((text) => process.stdout.write(text));
  }

  async run(): Promise<number> {
    if (!(await this.connect())) return 1;

    while (this.orchestrator.state !== "exited") {
      try {
        await this.step();
      } catch (err) {
        if (err instanceof PromptClosedError) {
          await this.quit();
          break;
        }
        if (!isLedgerdockError(err)) throw err;
        logger.debug("Action failed", { err });
        this.println(formatError(describeError(err)));
      }
    }
    return 0;
  }

  /** Open the session, offering a retry for as long as opening fails. False when the operator gives up. */
  private async connect(): Promise<boolean> {
    let attempt = () => this.orchestrator.open();
    for (;;) {
      try {
        this.report(await attempt());
        return true;
      } catch (err) {
        if (!isLedgerdockError(err)) throw err;
        this.println(formatError(describeError(err)));
      }
      // Preferences are loaded by now; only the daemon check is repeated.
      attempt = () => this.orchestrator.reconcile();
      if (!(await this.askRetry())) {
        await this.quit();
        return false;
      }
    }
  }

  private async askRetry(): Promise<boolean> {
    try {
      return await this.prompt.select("Docker could not be reached", [
        { label: "Retry", value: true },
        { label: "Quit", value: false },
      ]);
    } catch (err) {
      if (err instanceof PromptClosedError) return false;
      throw err;
    }
  }

  private async step(): Promise<void> {
    switch (this.orchestrator.state) {
      case "await-selection":
        return this.selectionMenu();
      case "await-resume":
        return this.resumeMenu();
      case "managing":
        return this.managingMenu();
      case "start":
      case "exited":
        return;
    }
  }

  // --- await-selection ---

  private async selectionMenu(): Promise<void> {
    const tracked = await this.trackedContainers();
    const action = await this.prompt.select<SelectionAction>("No container selected", [
      { label: "Create a new container", value: { kind: "create" } },
      ...tracked.map((t): Choice<SelectionAction> => ({ label: `Use ${formatTracked(t)}`, value: { kind: "use", tracked: t } })),
      { label: "Quit", value: { kind: "quit" } },
    ]);
    if (action.kind === "quit") return this.quit();
    if (action.kind === "use") return this.useTracked(action.tracked);

    const image = await this.chooseImage();
    if (!image) return;
    const selection = await this.askSelection(image.reference, image.pull);
    await this.createContainer(selection);
  }

  /** Tracked containers for the menu; a daemon failure here only hides them. */
  private async trackedContainers(): Promise<TrackedContainer[]> {
    try {
      return await this.orchestrator.trackedContainers();
    } catch (err) {
      if (!isLedgerdockError(err)) throw err;
      this.println(formatError(describeError(err)));
      return [];
    }
  }

  private async useTracked({ record }: TrackedContainer): Promise<void> {
    const transition = await this.orchestrator.select(record.id);
    this.report(transition);
    if (transition.state === "await-selection") {
      this.println(chalk.yellow(`${record.name} no longer exists on Docker; it has been forgotten.`));
    }
  }

  private async chooseImage(): Promise<{ reference: string; pull: boolean } | null> {
    const source = await this.prompt.select<ImageSource>("Which image?", [
      { label: "A local image", value: "local" },
      { label: `A tag from Docker Hub (${this.imageRepository})`, value: "hub" },
      { label: "Type an image reference", value: "manual" },
      { label: "Back", value: "back" },
    ]);

    switch (source) {
      case "local": {
        const images = await this.orchestrator.localImages(this.imageRepository);
        if (images.length === 0) {
          this.println(chalk.yellow(`No local ${this.imageRepository} images; pick a tag from Docker Hub instead.`));
          return null;
        }
        const reference = await this.prompt.select(
          "Local images",
          images.map((image) => ({ label: formatImage(image), value: image.reference })),
        );
        return { reference, pull: false };
      }
      case "hub": {
        const reference = await this.chooseHubTag();
        return reference ? { reference, pull: true } : null;
      }
      case "manual": {
        const typed = await this.prompt.input("Image reference", `${this.imageRepository}:latest`);
        return { reference: typed, pull: true };
      }
      case "back":
        return null;
    }
  }

  private async chooseHubTag(): Promise<string | null> {
    let page = 1;
    for (;;) {
      const result = await this.hub.listTags({ repository: this.imageRepository, page });
      if (result.tags.length === 0) {
        this.println(chalk.yellow("The registry returned no tags."));
        return null;
      }
      const width = Math.max(...result.tags.map((t) => t.name.length));
      const choices: Choice<string | typeof MORE | null>[] = result.tags.map((tag) => ({
        label: formatTag(this.imageRepository, tag, width),
        value: `${this.imageRepository}:${tag.name}`,
      }));
      if (result.next !== null) choices.push({ label: "More tags…", value: MORE });
      choices.push({ label: "Back", value: null });

      const picked = await this.prompt.select(`Tags (page ${page})`, choices);
      if (picked !== MORE) return picked;
      page = result.next ?? page + 1;
    }
  }

  private async askSelection(image: string, pull: boolean): Promise<ContainerSelection> {
    const defaults = this.orchestrator.defaults;
    const name = await this.prompt.input("Container name", defaultContainerName(image));
    const hostPort = await this.prompt.input("Host port", String(defaults.hostPort));
    const dataDirectory = await this.prompt.input("Data directory on the host (blank keeps data in the container)", defaults.dataDirectory);
    const mode = await this.prompt.select<ContainerMode>("Run mode", [
      { label: "Background (detached)", value: "background" },
      { label: "Foreground (follow logs)", value: "foreground" },
    ]);
    return {
      image,
      name,
      hostPort,
      ...(dataDirectory.trim() ? { dataDirectory } : {}),
      mode,
      pull,
    };
  }

  private async createContainer(selection: ContainerSelection): Promise<void> {
    let result = await this.orchestrator.create(selection);
    if (!result.ok && result.rejection.kind === "directory-missing") {
      const create = await this.prompt.confirm(`${result.rejection.path} does not exist. Create it?`, true);
      if (!create) return;
      result = await this.orchestrator.create({ ...selection, createDirectory: true });
    }
    if (!result.ok) {
      this.println(formatError(describeCreateRejection(result.rejection)));
      return;
    }

    this.report(result.transition);
    const record = this.orchestrator.record;
    if (record) this.println(chalk.green(`Started ${formatRecord(record)}`));
    if (record?.mode === "foreground") await this.followUntilEnter();
  }

  // --- await-resume ---

  private async resumeMenu(): Promise<void> {
    const record = this.orchestrator.record;
    if (record) this.println(`Last container ${formatRecord(record)} is ${chalk.yellow("stopped")}.`);

    const choice = await this.prompt.select("What now?", [
      { label: "Start it again", value: "resume" as const },
      { label: "Remove it and create a new one", value: "recreate" as const },
      { label: "Forget it (leave it on Docker) and create a new one", value: "discard" as const },
      { label: "Pick another container", value: "switch" as const },
      { label: "Quit", value: "quit" as const },
    ]);
    switch (choice) {
      case "resume":
        this.report(await this.orchestrator.resume());
        return;
      case "recreate":
        this.report(await this.orchestrator.recreate());
        return;
      case "discard":
        this.report(await this.orchestrator.discard());
        return;
      case "switch":
        this.report(await this.orchestrator.release());
        return;
      case "quit":
        return this.quit();
    }
  }

  // --- managing ---

  private async managingMenu(): Promise<void> {
    const record = this.orchestrator.record;
    const action = await this.prompt.select<ManagingAction>(record ? `Managing ${record.name}` : "Managing", [
      { label: "Status", value: "status" },
      { label: "Live stats", value: "stats" },
      { label: `Recent logs (last ${this.logTail} lines)`, value: "logs" },
      { label: "Follow logs", value: "follow" },
      { label: "Ledgers", value: "ledgers" },
      { label: "Stop container", value: "stop" },
      { label: "Stop and remove container", value: "destroy" },
      { label: "Switch to another container", value: "switch" },
      { label: "Quit (leave container as is)", value: "quit" },
    ]);

    switch (action) {
      case "status":
        this.println(formatStatus(await this.orchestrator.status()));
        return;
      case "stats":
        return this.statsUntilEnter();
      case "logs": {
        const lines = await this.orchestrator.logs(this.logTail);
        for (const line of lines) this.println(formatLogLine(line));
        if (lines.length === 0) this.println(chalk.dim("(no output yet)"));
        return;
      }
      case "follow":
        return this.followUntilEnter();
      case "ledgers":
        return this.ledgersMenu();
      case "stop":
        this.report(await this.orchestrator.stop());
        return;
      case "destroy": {
        const sure = await this.prompt.confirm("Stop and remove the container? Data outside a host directory is lost.");
        if (sure) this.report(await this.orchestrator.destroy());
        return;
      }
      case "switch":
        this.report(await this.orchestrator.release());
        return;
      case "quit":
        return this.quit();
    }
  }

  private async ledgersMenu(): Promise<void> {
    const listing = await this.orchestrator.listLedgers();
    for (const warning of listing.warnings) this.println(formatWarning(warning));
    if (listing.ledgers.length === 0) {
      if (listing.warnings.length === 0) this.println(chalk.dim("No ledgers yet."));
      return;
    }

    const picked = await this.prompt.select<LedgerSummary | null>("Ledgers", [
      ...listing.ledgers.map((ledger) => ({ label: formatLedger(ledger), value: ledger })),
      { label: "Back", value: null },
    ]);
    if (!picked) return;

    const action = await this.prompt.select(picked.name, [
      { label: "Show descriptor", value: "details" as const },
      { label: "Delete ledger", value: "delete" as const },
      { label: "Back", value: "back" as const },
    ]);
    if (action === "details") {
      const detail = await this.orchestrator.describeLedger(picked.name);
      this.println(JSON.stringify(detail.document, null, 2));
    } else if (action === "delete") {
      await this.deleteLedger(picked.name);
    }
  }

  private async deleteLedger(name: string): Promise<void> {
    const first = await this.orchestrator.deleteLedger(name, false);
    if (first.status === "deleted") return;

    const sure = await this.prompt.confirm(`Delete ledger ${name} and all of its data? This cannot be undone.`);
    if (!sure) return;
    const outcome = await this.orchestrator.deleteLedger(name, true);
    if (outcome.status === "deleted") this.println(chalk.green(`Deleted ledger ${outcome.name}.`));
  }

  // --- streams ---

  private async statsUntilEnter(): Promise<void> {
    const controller = new AbortController();
    const pump = drain(this.orchestrator.stats(controller.signal), (sample) => this.println(formatStat(sample)));
    await this.untilEnter(controller, pump);
  }

  private async followUntilEnter(): Promise<void> {
    const controller = new AbortController();
    const pump = drain(this.orchestrator.follow(controller.signal), (line) => this.println(formatLogLine(line)));
    await this.untilEnter(controller, pump);
  }

  private async untilEnter(controller: AbortController, pump: Promise<unknown>): Promise<void> {
    try {
      await this.prompt.waitForEnter("Press Enter to return to the menu");
    } finally {
      controller.abort();
      const failure = await pump;
      if (failure !== null) {
        if (!isLedgerdockError(failure)) throw failure;
        this.println(formatError(describeError(failure)));
      }
    }
  }

  // --- helpers ---

  private async quit(): Promise<void> {
    const transition = await this.orchestrator.exit();
    for (const warning of transition.warnings) this.println(formatWarning(warning));
  }

  private report(transition: Transition): void {
    for (const warning of transition.warnings) this.println(formatWarning(warning));
    logger.debug(`Session is now ${transition.state}`);
  }

  private println(text: string): void {
    this.write(`${text}\n`);
  }
}

/** Consume a stream until it ends. Resolves to the error that ended it, or null. */
async function drain<T>(stream: AsyncIterable<T>, onItem: (item: T) => void): Promise<unknown> {
  try {
    for await (const item of stream) onItem(item);
    return null;
  } catch (err) {
    return err;
  }
}

export function defaultContainerName(image: string): string {
  const { repository, tag } = parseImageRef(image);
  const base = repository.split("/").pop() ?? "server";
  return `${base}-${tag}`.replace(/[^a-zA-Z0-9_.-]/g, "-");
}

function describeCreateRejection(rejection: CreateRejection): string {
  if (rejection.kind === "invalid-name") return `"${rejection.value}" is not a valid container name: ${rejection.reason}`;
  return describeRejection(rejection);
}
