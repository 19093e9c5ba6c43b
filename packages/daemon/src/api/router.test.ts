import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { CapabilityFactory } from "@sundial/capability-sdk";
import { appRouter } from "./router.js";
import { createCallerFactory } from "./trpc.js";
import type { TRPCContext } from "./context.js";
import { AutomationRepository } from "../automation/store.js";
import { CapabilityRegistry } from "../capabilities/registry.js";
import { SimulatedLightCapability } from "../capabilities/builtin/simulated-light.js";
import { ScheduleRegistry } from "../schedule/registry.js";
import { TriggerEvaluator } from "../schedule/evaluator.js";
import { AutomationOrchestrator } from "../engine/orchestrator.js";
import { BusNotifier } from "../notifications/notifier.js";
import { EventBus } from "../event-bus.js";
import { loadConfig } from "../config.js";

const createCaller = createCallerFactory(appRouter);

describe("appRouter", () => {
  let light: SimulatedLightCapability;
  let repository: AutomationRepository;
  let orchestrator: AutomationOrchestrator;
  let caller: ReturnType<typeof createCaller>;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});

    const now = Date.parse("2026-03-20T00:00:00Z");
    light = new SimulatedLightCapability();
    const eventBus = new EventBus();
    repository = new AutomationRepository(":memory:", () => now);
    const capabilities = new CapabilityRegistry(
      new Map<string, CapabilityFactory>([["simulated-light", () => light]]),
      eventBus,
    );
    orchestrator = new AutomationOrchestrator({
      persistence: repository,
      capabilities,
      schedule: new ScheduleRegistry(new TriggerEvaluator(), () => now),
      notifier: new BusNotifier(eventBus),
      eventBus,
      checkIntervalMs: 59_000,
    });

    const ctx: TRPCContext = {
      orchestrator,
      repository,
      capabilities,
      eventBus,
      config: loadConfig({ SUNDIAL_DB_PATH: ":memory:" }),
    };
    caller = createCaller(ctx);
    await orchestrator.start();
  });

  afterEach(async () => {
    await orchestrator.stop();
    repository.close();
    vi.restoreAllMocks();
  });

  it("creates rules and schedules enabled ones", async () => {
    const rule = await caller.automations.create({
      name: "Evening",
      trigger: { type: "solar", event: "sunset", offsetMinutes: -10 },
      capabilityId: "simulated-light",
      action: "turnOn",
    });

    expect(await caller.automations.list()).toEqual([rule]);
    expect((await caller.automations.active()).map((r) => r.id)).toEqual([rule.id]);
    expect(await caller.automations.debug()).toEqual([
      { id: rule.id, name: "Evening", trigger: "Sunset -10min", lastFireTime: null, nextFireTime: null },
    ]);
  });

  it("rejects rules for unknown capabilities with NOT_FOUND", async () => {
    await expect(
      caller.automations.create({
        name: "Nope",
        trigger: { type: "interval", periodMs: 1000 },
        capabilityId: "lava-lamp",
        action: "turnOn",
      }),
    ).rejects.toMatchObject({ code: "NOT_FOUND", message: "Capability not found: lava-lamp" });
    expect(await caller.automations.list()).toEqual([]);
  });

  it("rejects invalid input with BAD_REQUEST", async () => {
    await expect(
      caller.automations.create({
        name: "",
        trigger: { type: "interval", periodMs: 1000 },
        capabilityId: "simulated-light",
        action: "turnOn",
      }),
    ).rejects.toMatchObject({ code: "BAD_REQUEST" });
  });

  it("updates, toggles and deletes rules", async () => {
    const rule = await caller.automations.create({
      name: "Tick",
      trigger: { type: "interval", periodMs: 1000 },
      capabilityId: "simulated-light",
      action: "turnOn",
    });

    const renamed = await caller.automations.update({ id: rule.id, changes: { name: "Tock" } });
    expect(renamed.name).toBe("Tock");
    expect(renamed.trigger).toEqual({ type: "interval", periodMs: 1000 });

    const disabled = await caller.automations.toggle({ id: rule.id });
    expect(disabled.enabled).toBe(false);
    expect(await caller.automations.active()).toEqual([]);

    await caller.automations.delete({ id: rule.id });
    expect(await caller.automations.list()).toEqual([]);
    await expect(caller.automations.toggle({ id: rule.id })).rejects.toMatchObject({ code: "NOT_FOUND" });
  });

  it("runs rules on demand and surfaces failures", async () => {
    const ok = await caller.automations.create({
      name: "Dim",
      trigger: { type: "time_of_day", hour: 22, minute: 0 },
      capabilityId: "simulated-light",
      action: "setBrightness",
      parameters: { level: 20 },
    });
    expect(await caller.automations.runNow({ id: ok.id })).toMatchObject({ ruleId: ok.id, success: true });
    expect(light.state).toMatchObject({ on: true, brightness: 20 });

    const bad = await caller.automations.create({
      name: "Too bright",
      trigger: { type: "time_of_day", hour: 22, minute: 0 },
      capabilityId: "simulated-light",
      action: "setBrightness",
      parameters: { level: 200 },
    });
    await expect(caller.automations.runNow({ id: bad.id })).rejects.toMatchObject({
      code: "INTERNAL_SERVER_ERROR",
      message: 'Action "setBrightness" failed: Invalid parameter "level": must be <= 100, got 200',
    });
  });

  it("lists and executes capabilities", async () => {
    expect((await caller.capabilities.list()).map((d) => d.id)).toEqual(["simulated-light"]);
    expect((await caller.capabilities.get({ id: "simulated-light" })).displayName).toBe("Simulated Light");
    await expect(caller.capabilities.get({ id: "lava-lamp" })).rejects.toMatchObject({ code: "NOT_FOUND" });

    await caller.capabilities.execute({ capabilityId: "simulated-light", action: "setColor", parameters: { color: "cool" } });
    expect(light.state.color).toBe("cool");
  });

  it("reports engine status and restarts", async () => {
    expect(await caller.engine.status()).toEqual({
      state: "running",
      activeAutomations: 0,
      capabilities: 1,
      scheduledTasks: 0,
      location: null,
    });

    await orchestrator.stop();
    expect((await caller.engine.restart()).state).toBe("running");
  });

  it("reads and updates settings", async () => {
    const updated = await caller.settings.update({ latitude: 10, longitude: 20 });
    expect(updated).toMatchObject({ latitude: 10, longitude: 20 });
    expect(await caller.settings.get()).toEqual(updated);
    expect((await caller.engine.status()).location).toEqual({ latitude: 10, longitude: 20 });

    await expect(caller.settings.update({ latitude: 100 })).rejects.toMatchObject({ code: "BAD_REQUEST" });
  });

  it("exports and imports the configuration", async () => {
    await caller.automations.create({
      name: "Tick",
      trigger: { type: "interval", periodMs: 5000 },
      capabilityId: "simulated-light",
      action: "turnOff",
    });
    const { json } = await caller.config.export();

    await caller.automations.delete({ id: (await caller.automations.list())[0].id });
    expect(await caller.automations.active()).toEqual([]);

    expect(await caller.config.import({ json })).toEqual({ rules: 1 });
    expect((await caller.automations.active()).map((r) => r.name)).toEqual(["Tick"]);

    await expect(caller.config.import({ json: "{}" })).rejects.toMatchObject({ code: "BAD_REQUEST" });
  });
});
