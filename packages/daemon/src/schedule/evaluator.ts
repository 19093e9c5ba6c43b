import type { AutomationRule, SolarTrigger } from "@sundial/shared";
import { triggerAppliesOn } from "@sundial/shared";
import type { SolarTimeCalculator } from "../solar/calculator.js";

const DAY_MS = 86_400_000;

export type TaskAction = () => Promise<void>;

export interface ScheduledTask {
  rule: AutomationRule;
  action: TaskAction;
  lastFireTime: number | null;
  nextFireTime: number | null;   // solar triggers only
}

export interface EvaluatorOptions {
  solarFireWindowMs: number;
  solarDuplicateGuardMs: number;
}

export const DEFAULT_EVALUATOR_OPTIONS: EvaluatorOptions = {
  solarFireWindowMs: 2000,
  solarDuplicateGuardMs: 60_000,
};

/**
 * Decides whether a task is due. Never mutates the task; the registry applies
 * bookkeeping after a positive answer.
 */
export class TriggerEvaluator {
  constructor(readonly options: EvaluatorOptions = DEFAULT_EVALUATOR_OPTIONS) {}

  shouldFire(task: ScheduledTask, now: number): boolean {
    const trigger = task.rule.trigger;

    switch (trigger.type) {
      case "time_of_day": {
        const at = new Date(now);
        if (at.getHours() !== trigger.hour || at.getMinutes() !== trigger.minute) return false;
        if (!triggerAppliesOn(trigger, at.getDay())) return false;
        if (task.lastFireTime === null) return true;

        // Matches on hour/minute only; relies on a check interval below one minute
        const last = new Date(task.lastFireTime);
        return !(
          sameLocalDay(last, at) &&
          last.getHours() === trigger.hour &&
          last.getMinutes() === trigger.minute
        );
      }

      case "solar": {
        if (task.nextFireTime === null) return false;
        const late = now - task.nextFireTime;
        if (late < 0 || late >= this.options.solarFireWindowMs) return false;
        if (task.lastFireTime === null) return true;
        return Math.abs(task.lastFireTime - task.nextFireTime) >= this.options.solarDuplicateGuardMs;
      }

      case "interval":
        if (task.lastFireTime === null) return true;
        return now - task.lastFireTime >= trigger.periodMs;
    }
  }

  /** True when a solar task's occurrence passed its window without firing. */
  isSolarMissed(task: ScheduledTask, now: number): boolean {
    if (task.rule.trigger.type !== "solar" || task.nextFireTime === null) return false;
    return now - task.nextFireTime >= this.options.solarFireWindowMs;
  }
}

/** Next occurrence strictly after `now`: today's if still ahead, else tomorrow's. */
export function nextSolarFireTime(
  trigger: SolarTrigger,
  calculator: SolarTimeCalculator | null,
  now: number,
): number | null {
  if (!calculator) return null;

  for (const dayOffset of [0, 1]) {
    const date = new Date(now + dayOffset * DAY_MS);
    const occurrence = calculator.event(trigger.event, date, trigger.offsetMinutes);
    if (occurrence && occurrence.getTime() > now) return occurrence.getTime();
  }
  return null;
}

function sameLocalDay(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() &&
    a.getMonth() === b.getMonth() &&
    a.getDate() === b.getDate()
  );
}
