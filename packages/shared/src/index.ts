export type {
  ParameterValue,
  ParameterMap,
  SolarEventKind,
  TimeOfDayTrigger,
  SolarTrigger,
  IntervalTrigger,
  AutomationTrigger,
  AutomationRule,
  ScheduledTaskInfo,
  ExecutionOutcome,
  ParameterType,
  ParameterValidation,
  ParameterSpec,
  ActionDescriptor,
  CapabilityDescriptor,
  CompatibilityResult,
  GlobalSettings,
  Coordinates,
  EngineState,
  EngineStatus,
  NotificationLevel,
  NotificationMessage,
  BusEvent,
} from "./types.js";

export {
  WEEKDAYS,
  WEEKENDS,
  DEFAULT_SETTINGS,
  normalizeDays,
  timeOfDay,
  daily,
  weekdays,
  weekends,
  sunrise,
  sunset,
  every,
  normalizeTrigger,
  triggerAppliesOn,
  describeDays,
  describeTrigger,
  coordinatesOf,
} from "./triggers.js";
