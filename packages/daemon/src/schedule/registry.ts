import type { AutomationRule, Coordinates, ScheduledTaskInfo } from "@sundial/shared";
import { describeTrigger } from "@sundial/shared";
import { SolarTimeCalculator } from "../solar/calculator.js";
import { DispatchGroup } from "./dispatch-group.js";
import { TriggerEvaluator, nextSolarFireTime } from "./evaluator.js";
import type { ScheduledTask, TaskAction } from "./evaluator.js";

export class ScheduleRegistry {
  private tasks = new Map<string, ScheduledTask>();
  private calculator: SolarTimeCalculator | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private dispatches = new DispatchGroup("ScheduleRegistry");

  constructor(
    private evaluator: TriggerEvaluator = new TriggerEvaluator(),
    private clock: () => number = Date.now,
  ) {}

  // ── Task Management ──

  /** Installs a task, replacing any task with the same rule id. */
  add(rule: AutomationRule, action: TaskAction): void {
    this.tasks.set(rule.id, {
      rule,
      action,
      lastFireTime: null,
      nextFireTime: this.computeNext(rule, this.clock()),
    });
    console.log(`[ScheduleRegistry] Added "${rule.name}" (${describeTrigger(rule.trigger)})`);
  }

  /** Swaps the rule of an existing task; bookkeeping and the bound action stay. */
  update(rule: AutomationRule): void {
    const task = this.tasks.get(rule.id);
    if (!task) return;
    task.rule = rule;
    task.nextFireTime = this.computeNext(rule, this.clock());
  }

  remove(id: string): boolean {
    return this.tasks.delete(id);
  }

  clear(): void {
    this.tasks.clear();
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  get size(): number {
    return this.tasks.size;
  }

  listDebugInfo(): ScheduledTaskInfo[] {
    return Array.from(this.tasks.values()).map((task) => ({
      id: task.rule.id,
      name: task.rule.name,
      trigger: describeTrigger(task.rule.trigger),
      lastFireTime: task.lastFireTime,
      nextFireTime: task.nextFireTime,
    }));
  }

  // ── Location ──

  get location(): Coordinates | null {
    if (!this.calculator) return null;
    return { latitude: this.calculator.latitude, longitude: this.calculator.longitude };
  }

  setLocation(latitude: number, longitude: number): void {
    this.calculator = new SolarTimeCalculator(latitude, longitude);
    this.recomputeSolar();
    console.log(`[ScheduleRegistry] Location set to ${latitude}, ${longitude}`);
  }

  clearLocation(): void {
    this.calculator = null;
    this.recomputeSolar();
  }

  // ── Evaluation ──

  /**
   * Checks every enabled task against the same `now` and dispatches the due
   * ones without waiting for them. Returns the ids that fired.
   */
  evaluateAndDispatch(now: number = this.clock()): string[] {
    const fired: string[] = [];

    for (const task of this.tasks.values()) {
      if (!task.rule.enabled) continue;

      try {
        this.refreshSolar(task, now);
        if (!this.evaluator.shouldFire(task, now)) continue;

        task.lastFireTime = now;
        if (task.rule.trigger.type === "solar") {
          task.nextFireTime = nextSolarFireTime(task.rule.trigger, this.calculator, now);
        }
        fired.push(task.rule.id);
        this.dispatches.run(task.rule.name, task.action);
      } catch (err) {
        console.error(`[ScheduleRegistry] Evaluation of "${task.rule.name}" failed:`, err);
      }
    }

    return fired;
  }

  start(intervalMs: number): void {
    if (this.timer) {
      console.warn("[ScheduleRegistry] Already running");
      return;
    }
    this.timer = setInterval(() => {
      this.evaluateAndDispatch(this.clock());
    }, intervalMs);
    console.log(`[ScheduleRegistry] Started (every ${intervalMs}ms)`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log("[ScheduleRegistry] Stopped");
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** Waits for every dispatched action to settle. */
  drain(): Promise<void> {
    return this.dispatches.drain();
  }

  // ── Helpers ──

  private computeNext(rule: AutomationRule, now: number): number | null {
    if (rule.trigger.type !== "solar") return null;
    return nextSolarFireTime(rule.trigger, this.calculator, now);
  }

  private recomputeSolar(): void {
    const now = this.clock();
    for (const task of this.tasks.values()) {
      if (task.rule.trigger.type === "solar") {
        task.nextFireTime = nextSolarFireTime(task.rule.trigger, this.calculator, now);
      }
    }
  }

  /** Rolls a missed occurrence forward and retries one that had none (polar night). */
  private refreshSolar(task: ScheduledTask, now: number): void {
    const trigger = task.rule.trigger;
    if (trigger.type !== "solar" || !this.calculator) return;

    if (task.nextFireTime === null) {
      task.nextFireTime = nextSolarFireTime(trigger, this.calculator, now);
      return;
    }

    if (this.evaluator.isSolarMissed(task, now)) {
      const missed = task.nextFireTime;
      task.nextFireTime = nextSolarFireTime(trigger, this.calculator, now);
      console.warn(
        `[ScheduleRegistry] "${task.rule.name}" missed ${new Date(missed).toISOString()}, next at ${
          task.nextFireTime === null ? "(none)" : new Date(task.nextFireTime).toISOString()
        }`,
      );
    }
  }
}
