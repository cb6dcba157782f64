#!/usr/bin/env node
import { Command } from "commander";
import { InteractiveSession } from "./cli/session.js";
import { ReadlinePrompt } from "./cli/prompt.js";
import { config } from "./config/index.js";
import { logger, setLogLevel } from "./config/logger.js";
import { createDocker, DockerodeClient } from "./docker/dockerode-client.js";
import { LedgerManager } from "./ledger/ledger-manager.js";
import { LifecycleOrchestrator } from "./lifecycle/orchestrator.js";
import { registerProcessHandlers } from "./process-handlers.js";
import { HubClient } from "./registry/hub-client.js";
import { PreferencesStore } from "./state/preferences-store.js";

const VERSION = "0.1.0";

registerProcessHandlers();

async function runSession(options: { verbose?: boolean }): Promise<void> {
  if (options.verbose) setLogLevel("debug");
  logger.debug("Starting session", { stateFile: config.stateFile, imageRepository: config.imageRepository });

  const daemon = new DockerodeClient(createDocker(config.docker));
  const orchestrator = new LifecycleOrchestrator({
    daemon,
    store: new PreferencesStore(config.stateFile),
    ledgers: new LedgerManager(daemon),
    stopGraceSeconds: config.docker.stopGraceSeconds,
  });

  const prompt = new ReadlinePrompt();
  try {
    const session = new InteractiveSession({
      orchestrator,
      prompt,
      hub: new HubClient(config.hubUrl),
      imageRepository: config.imageRepository,
      logTail: config.logTail,
    });
    process.exitCode = await session.run();
  } finally {
    prompt.close();
  }
}

const program = new Command()
  .name("ledgerdock")
  .description("Run and manage Fluree ledger server containers on the local Docker daemon")
  .version(VERSION)
  .option("-v, --verbose", "log debug output to stderr")
  .action(runSession);

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error("ledgerdock failed", { err });
  process.exit(1);
});
