import type {
  AutomationTrigger,
  Coordinates,
  GlobalSettings,
  IntervalTrigger,
  SolarTrigger,
  TimeOfDayTrigger,
} from "./types.js";

export const WEEKDAYS: readonly number[] = [1, 2, 3, 4, 5];
export const WEEKENDS: readonly number[] = [0, 6];

const DAY_NAMES = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

function clampInt(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.max(min, Math.min(max, Math.trunc(value)));
}

/** Sorted, de-duplicated weekday list; numbers outside 0-6 are dropped. */
export function normalizeDays(days: Iterable<number>): number[] {
  const set = new Set<number>();
  for (const day of days) {
    if (Number.isInteger(day) && day >= 0 && day <= 6) set.add(day);
  }
  return Array.from(set).sort((a, b) => a - b);
}

export function timeOfDay(hour: number, minute: number, daysOfWeek: Iterable<number> = []): TimeOfDayTrigger {
  return {
    type: "time_of_day",
    hour: clampInt(hour, 0, 23),
    minute: clampInt(minute, 0, 59),
    daysOfWeek: normalizeDays(daysOfWeek),
  };
}

export function daily(hour: number, minute: number): TimeOfDayTrigger {
  return timeOfDay(hour, minute, []);
}

export function weekdays(hour: number, minute: number): TimeOfDayTrigger {
  return timeOfDay(hour, minute, WEEKDAYS);
}

export function weekends(hour: number, minute: number): TimeOfDayTrigger {
  return timeOfDay(hour, minute, WEEKENDS);
}

export function sunrise(offsetMinutes = 0): SolarTrigger {
  return { type: "solar", event: "sunrise", offsetMinutes: Math.trunc(offsetMinutes) };
}

export function sunset(offsetMinutes = 0): SolarTrigger {
  return { type: "solar", event: "sunset", offsetMinutes: Math.trunc(offsetMinutes) };
}

export function every(periodMs: number): IntervalTrigger {
  if (!(periodMs > 0)) {
    throw new RangeError(`Interval period must be positive, got ${periodMs}`);
  }
  return { type: "interval", periodMs };
}

/** Re-applies the construction invariants to a trigger read from storage or the API. */
export function normalizeTrigger(trigger: AutomationTrigger): AutomationTrigger {
  switch (trigger.type) {
    case "time_of_day":
      return timeOfDay(trigger.hour, trigger.minute, trigger.daysOfWeek);
    case "solar":
      return { type: "solar", event: trigger.event, offsetMinutes: Math.trunc(trigger.offsetMinutes) };
    case "interval":
      return every(trigger.periodMs);
  }
}

export function triggerAppliesOn(trigger: TimeOfDayTrigger, weekday: number): boolean {
  return trigger.daysOfWeek.length === 0 || trigger.daysOfWeek.includes(weekday);
}

export function describeDays(days: readonly number[]): string {
  if (days.length === 0) return "Every day";
  const key = normalizeDays(days).join(",");
  if (key === WEEKDAYS.join(",")) return "Weekdays";
  if (key === normalizeDays(WEEKENDS).join(",")) return "Weekends";
  return normalizeDays(days).map((d) => DAY_NAMES[d]).join(", ");
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function describeOffset(label: string, offset: number): string {
  if (offset === 0) return label;
  return offset > 0 ? `${label} +${offset}min` : `${label} ${offset}min`;
}

export function describeTrigger(trigger: AutomationTrigger): string {
  switch (trigger.type) {
    case "time_of_day":
      return `${pad(trigger.hour)}:${pad(trigger.minute)} - ${describeDays(trigger.daysOfWeek)}`;
    case "solar":
      return describeOffset(trigger.event === "sunrise" ? "Sunrise" : "Sunset", trigger.offsetMinutes);
    case "interval": {
      const seconds = trigger.periodMs / 1000;
      if (seconds < 60) return `Every ${Math.floor(seconds * 10) / 10}s`;
      if (seconds < 3600) return `Every ${Math.floor(seconds / 60)}min`;
      return `Every ${Math.floor(seconds / 3600)}h`;
    }
  }
}

export const DEFAULT_SETTINGS: GlobalSettings = {
  notificationsEnabled: true,
  latitude: null,
  longitude: null,
  useAutomaticLocation: true,
};

export function coordinatesOf(settings: GlobalSettings): Coordinates | null {
  if (settings.latitude == null || settings.longitude == null) return null;
  return { latitude: settings.latitude, longitude: settings.longitude };
}
