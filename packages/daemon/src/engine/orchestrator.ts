import type {
  AutomationRule,
  CapabilityDescriptor,
  EngineState,
  EngineStatus,
  ExecutionOutcome,
  GlobalSettings,
  ParameterMap,
  ScheduledTaskInfo,
} from "@sundial/shared";
import { DEFAULT_SETTINGS, coordinatesOf } from "@sundial/shared";
import type { AutomationRepository, StoredConfiguration } from "../automation/store.js";
import type { CapabilityRegistry } from "../capabilities/registry.js";
import type { ScheduleRegistry } from "../schedule/registry.js";
import type { Notifier } from "../notifications/notifier.js";
import type { EventBus } from "../event-bus.js";
import { DispatchGroup } from "../schedule/dispatch-group.js";
import {
  CapabilityNotFoundError,
  ConfigurationError,
  RuleNotFoundError,
  describeError,
} from "./errors.js";

export type RulePersistence = Pick<AutomationRepository, "load" | "get" | "updateRule" | "updateSettings">;

export interface OrchestratorDeps {
  persistence: RulePersistence;
  capabilities: CapabilityRegistry;
  schedule: ScheduleRegistry;
  notifier: Notifier;
  eventBus: EventBus;
  checkIntervalMs: number;
}

/**
 * Owns the engine lifecycle and the active rule set. Scheduled runs report
 * through notifications and never throw; interactive calls propagate errors.
 */
export class AutomationOrchestrator {
  private currentState: EngineState = "stopped";
  private active: AutomationRule[] = [];
  private settings: GlobalSettings = { ...DEFAULT_SETTINGS };
  private invocations = new DispatchGroup("Orchestrator");

  constructor(private deps: OrchestratorDeps) {}

  // ── Lifecycle ──

  get state(): EngineState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.currentState === "running";
  }

  async start(): Promise<void> {
    if (this.currentState !== "stopped") {
      console.warn(`[Orchestrator] Start ignored, engine is ${this.currentState}`);
      return;
    }
    this.setState("starting");

    let stored: StoredConfiguration;
    try {
      stored = this.loadConfiguration();
    } catch (err) {
      this.setState("stopped");
      throw err;
    }

    try {
      const report = await this.deps.capabilities.discover();
      console.log(
        `[Orchestrator] Capabilities: ${report.loaded.length} loaded, ${report.skipped.length} skipped`,
      );
    } catch (err) {
      console.error("[Orchestrator] Capability discovery failed:", err);
    }

    await this.runStartupActions();

    // Rules may have been edited while capabilities were loading
    try {
      stored = this.loadConfiguration();
    } catch (err) {
      console.error("[Orchestrator] Reload after discovery failed, using the initial snapshot:", err);
    }

    this.settings = stored.settings;
    this.applyLocation(stored.settings);
    this.deps.schedule.start(this.deps.checkIntervalMs);

    for (const rule of stored.rules) {
      if (!rule.enabled) continue;
      try {
        this.registerAutomation(rule);
      } catch (err) {
        console.error(`[Orchestrator] Could not register "${rule.name}":`, err);
      }
    }

    this.setState("running");
    console.log(`[Orchestrator] Running with ${this.active.length} active automations`);
  }

  async stop(): Promise<void> {
    if (this.currentState !== "running") {
      console.warn(`[Orchestrator] Stop ignored, engine is ${this.currentState}`);
      return;
    }
    this.setState("stopping");

    this.deps.schedule.stop();
    await this.deps.schedule.drain();
    await this.invocations.drain();
    this.deps.schedule.clear();
    await this.deps.capabilities.unloadAll();
    this.active = [];

    this.setState("stopped");
  }

  async restart(): Promise<void> {
    await this.stop();
    await this.start();
  }

  // ── Rule Management ──

  registerAutomation(rule: AutomationRule): void {
    if (!this.deps.capabilities.has(rule.capabilityId)) {
      throw new CapabilityNotFoundError(rule.capabilityId);
    }

    this.deps.schedule.add(rule, () => this.dispatch(rule.id));
    const index = this.active.findIndex((r) => r.id === rule.id);
    if (index === -1) this.active.push(rule);
    else this.active[index] = rule;

    this.deps.eventBus.emit("automation:registered", { rule, timestamp: Date.now() });
  }

  unregisterAutomation(id: string): boolean {
    const removed = this.deps.schedule.remove(id);
    const before = this.active.length;
    this.active = this.active.filter((r) => r.id !== id);
    if (!removed && this.active.length === before) return false;

    this.deps.eventBus.emit("automation:unregistered", { ruleId: id, timestamp: Date.now() });
    return true;
  }

  /** Persists the rule, then brings the schedule in line with its enabled flag. */
  updateAutomation(rule: AutomationRule): AutomationRule {
    if (rule.enabled && !this.deps.capabilities.has(rule.capabilityId)) {
      throw new CapabilityNotFoundError(rule.capabilityId);
    }

    let stored: AutomationRule;
    try {
      stored = this.deps.persistence.updateRule(rule);
    } catch (err) {
      if (err instanceof RuleNotFoundError || err instanceof ConfigurationError) throw err;
      throw new ConfigurationError(`Failed to save "${rule.name}": ${describeError(err)}`, { cause: err });
    }

    const isActive = this.active.some((r) => r.id === stored.id);
    if (!stored.enabled) {
      if (isActive) this.unregisterAutomation(stored.id);
    } else if (isActive) {
      this.deps.schedule.update(stored);
      this.active = this.active.map((r) => (r.id === stored.id ? stored : r));
    } else {
      this.registerAutomation(stored);
    }
    return stored;
  }

  /** Reconciles the active set with `rules`; problems are logged per rule. */
  syncAutomations(rules: AutomationRule[]): void {
    const wanted = new Map(rules.filter((r) => r.enabled).map((r) => [r.id, r]));

    for (const rule of [...this.active]) {
      if (!wanted.has(rule.id)) this.unregisterAutomation(rule.id);
    }

    for (const rule of wanted.values()) {
      if (!this.deps.capabilities.has(rule.capabilityId)) {
        console.warn(`[Orchestrator] Skipping "${rule.name}": capability ${rule.capabilityId} is not loaded`);
        this.unregisterAutomation(rule.id);
        continue;
      }
      if (this.active.some((r) => r.id === rule.id)) {
        this.deps.schedule.update(rule);
        this.active = this.active.map((r) => (r.id === rule.id ? rule : r));
      } else {
        this.registerAutomation(rule);
      }
    }
  }

  // ── Execution ──

  /** Runs a rule's action and reports the result. Never throws. */
  async executeAutomation(rule: AutomationRule): Promise<ExecutionOutcome> {
    const { outcome } = await this.perform(rule);
    return outcome;
  }

  /** Manual run of an active or stored rule; failures reach the caller. */
  async runAutomationNow(id: string): Promise<ExecutionOutcome> {
    const rule = this.active.find((r) => r.id === id) ?? this.deps.persistence.get(id);
    if (!rule) throw new RuleNotFoundError(id);

    const { outcome, error } = await this.perform(rule);
    if (error !== undefined) throw error;
    return outcome;
  }

  executeQuickAction(capabilityId: string, action: string, parameters: ParameterMap): Promise<void> {
    return this.invocations.track(() => this.deps.capabilities.invoke(capabilityId, action, parameters));
  }

  // ── Settings ──

  getSettings(): GlobalSettings {
    return { ...this.settings };
  }

  applySettings(changes: Partial<GlobalSettings>): GlobalSettings {
    this.settings = this.deps.persistence.updateSettings(changes);
    this.applyLocation(this.settings);
    return this.getSettings();
  }

  // ── Accessors ──

  getActiveAutomations(): AutomationRule[] {
    return [...this.active];
  }

  getAvailableCapabilities(): CapabilityDescriptor[] {
    return this.deps.capabilities.listDescriptors();
  }

  getCapabilityDescriptor(id: string): CapabilityDescriptor | undefined {
    return this.deps.capabilities.getDescriptor(id);
  }

  getScheduleDebugInfo(): ScheduledTaskInfo[] {
    return this.deps.schedule.listDebugInfo();
  }

  status(): EngineStatus {
    return {
      state: this.currentState,
      activeAutomations: this.active.length,
      capabilities: this.deps.capabilities.size,
      scheduledTasks: this.deps.schedule.size,
      location: this.deps.schedule.location,
    };
  }

  // ── Helpers ──

  private setState(state: EngineState): void {
    this.currentState = state;
    this.deps.eventBus.emit("engine:state", { state, timestamp: Date.now() });
  }

  /** Bound action of a scheduled task; looks the rule up so updates take effect. */
  private async dispatch(ruleId: string): Promise<void> {
    const rule = this.active.find((r) => r.id === ruleId);
    if (!rule) return;
    this.deps.eventBus.emit("automation:fired", { rule, timestamp: Date.now() });
    await this.executeAutomation(rule);
  }

  private async perform(rule: AutomationRule): Promise<{ outcome: ExecutionOutcome; error?: unknown }> {
    const started = Date.now();
    let outcome: ExecutionOutcome;
    let error: unknown;

    try {
      await this.invocations.track(() =>
        this.deps.capabilities.invoke(rule.capabilityId, rule.action, rule.parameters),
      );
      outcome = { ruleId: rule.id, success: true, durationMs: Date.now() - started };
      console.log(`[Orchestrator] "${rule.name}" ran ${rule.capabilityId}.${rule.action}`);
      this.notify("success", rule.name, `${rule.action} completed`);
    } catch (err) {
      error = err;
      outcome = { ruleId: rule.id, success: false, error: describeError(err), durationMs: Date.now() - started };
      console.error(`[Orchestrator] "${rule.name}" failed:`, err);
      this.notify("error", rule.name, describeError(err));
    }

    this.deps.eventBus.emit("automation:executed", { rule, outcome, timestamp: Date.now() });
    return { outcome, error };
  }

  private loadConfiguration(): StoredConfiguration {
    try {
      return this.deps.persistence.load();
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      throw new ConfigurationError(`Failed to load configuration: ${describeError(err)}`, { cause: err });
    }
  }

  private notify(level: "success" | "error", title: string, message: string): void {
    if (!this.settings.notificationsEnabled) return;
    try {
      if (level === "success") this.deps.notifier.sendSuccess(title, message);
      else this.deps.notifier.sendError(title, message);
    } catch (err) {
      console.error("[Orchestrator] Notification failed:", err);
    }
  }

  private applyLocation(settings: GlobalSettings): void {
    const coords = coordinatesOf(settings);
    if (coords) {
      this.deps.schedule.setLocation(coords.latitude, coords.longitude);
    } else if (this.deps.schedule.location) {
      this.deps.schedule.clearLocation();
    }
  }

  private async runStartupActions(): Promise<void> {
    for (const descriptor of this.deps.capabilities.listDescriptors()) {
      const capability = this.deps.capabilities.get(descriptor.id);
      for (const step of capability.startupActions ?? []) {
        try {
          await this.deps.capabilities.invoke(descriptor.id, step.action, step.parameters);
        } catch (err) {
          console.error(`[Orchestrator] Startup action ${descriptor.id}.${step.action} failed:`, err);
        }
      }
    }
  }
}
