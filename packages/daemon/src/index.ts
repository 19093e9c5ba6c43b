import { mkdirSync } from "fs";
import { dirname } from "path";
import { loadConfig } from "./config.js";
import { EventBus } from "./event-bus.js";
import { AutomationRepository } from "./automation/store.js";
import { createCatalog } from "./capabilities/catalog.js";
import { CapabilityRegistry } from "./capabilities/registry.js";
import { TriggerEvaluator } from "./schedule/evaluator.js";
import { ScheduleRegistry } from "./schedule/registry.js";
import { BusNotifier } from "./notifications/notifier.js";
import { AutomationOrchestrator } from "./engine/orchestrator.js";
import { createContext } from "./api/context.js";
import { startApiServer } from "./api/server.js";

async function main() {
  console.log("☀️  Sundial — Scheduled Automations");
  console.log("===================================\n");

  // 1. Load config
  const config = loadConfig();

  // 2. Init EventBus
  const eventBus = new EventBus();

  // 3. Init repository
  if (config.dbPath !== ":memory:") mkdirSync(dirname(config.dbPath), { recursive: true });
  const repository = new AutomationRepository(config.dbPath);
  console.log(`[Init] Repository initialized (${config.dbPath})`);

  // 4. Init capabilities
  const capabilities = new CapabilityRegistry(createCatalog(config.capabilities), eventBus);

  // 5. Init schedule
  const schedule = new ScheduleRegistry(
    new TriggerEvaluator({
      solarFireWindowMs: config.scheduler.solarFireWindowMs,
      solarDuplicateGuardMs: config.scheduler.solarDuplicateGuardMs,
    }),
  );

  // 6. Init orchestrator
  const orchestrator = new AutomationOrchestrator({
    persistence: repository,
    capabilities,
    schedule,
    notifier: new BusNotifier(eventBus),
    eventBus,
    checkIntervalMs: config.scheduler.checkIntervalMs,
  });

  // 7. Start engine
  await orchestrator.start();

  // 8. Start API server
  const server = startApiServer(
    createContext({ orchestrator, repository, capabilities, eventBus, config }),
    config.apiPort,
    config.apiHost,
  );

  console.log(`\n✅ Sundial running — API on ${config.apiHost}:${config.apiPort}`);
  console.log("   Press Ctrl+C to stop\n");

  // 9. Graceful shutdown
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log("\n\nShutting down...");
    await server.close();
    await orchestrator.stop();
    repository.close();
    console.log("Goodbye!");
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
