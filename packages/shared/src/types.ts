// ── Parameter Values ──

// Closed JSON variant; capabilities read it through the SDK accessors
export type ParameterValue =
  | string
  | number
  | boolean
  | null
  | ParameterValue[]
  | { [key: string]: ParameterValue };

export type ParameterMap = Record<string, ParameterValue>;

// ── Trigger Types ──

export type SolarEventKind = "sunrise" | "sunset";

export interface TimeOfDayTrigger {
  type: "time_of_day";
  hour: number;           // 0-23
  minute: number;         // 0-59
  daysOfWeek: number[];   // 0=Sun … 6=Sat, empty = every day
}

export interface SolarTrigger {
  type: "solar";
  event: SolarEventKind;
  offsetMinutes: number;
}

export interface IntervalTrigger {
  type: "interval";
  periodMs: number;
}

export type AutomationTrigger = TimeOfDayTrigger | SolarTrigger | IntervalTrigger;

// ── Automation Types ──

export interface AutomationRule {
  id: string;
  name: string;
  description: string;
  enabled: boolean;
  trigger: AutomationTrigger;
  capabilityId: string;
  action: string;
  parameters: ParameterMap;
  createdAt: number;
  updatedAt: number;
}

export interface ScheduledTaskInfo {
  id: string;
  name: string;
  trigger: string;
  lastFireTime: number | null;
  nextFireTime: number | null;
}

export interface ExecutionOutcome {
  ruleId: string;
  success: boolean;
  error?: string;
  durationMs: number;
}

// ── Capability Types ──

export type ParameterType =
  | "string"
  | "integer"
  | "float"
  | "boolean"
  | "time"
  | "date"
  | "selection";

export interface ParameterValidation {
  min?: number;
  max?: number;
  options?: string[];
  pattern?: string;
}

export interface ParameterSpec {
  id: string;
  displayName: string;
  type: ParameterType;
  required: boolean;
  defaultValue?: ParameterValue;
  validation?: ParameterValidation;
}

export interface ActionDescriptor {
  id: string;
  displayName: string;
  description: string;
  parameters: ParameterSpec[];
}

export interface CapabilityDescriptor {
  id: string;
  displayName: string;
  version: string;
  description: string;
  actions: ActionDescriptor[];
}

export interface CompatibilityResult {
  compatible: boolean;
  missingRequirements: string[];
  warnings: string[];
}

// ── Settings ──

export interface GlobalSettings {
  notificationsEnabled: boolean;
  latitude: number | null;
  longitude: number | null;
  useAutomaticLocation: boolean;
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}

// ── Engine ──

export type EngineState = "stopped" | "starting" | "running" | "stopping";

export interface EngineStatus {
  state: EngineState;
  activeAutomations: number;
  capabilities: number;
  scheduledTasks: number;
  location: Coordinates | null;
}

export type NotificationLevel = "success" | "error";

export interface NotificationMessage {
  level: NotificationLevel;
  title: string;
  message: string;
  timestamp: number;
}

export interface BusEvent {
  type: string;
  data: Record<string, unknown>;
  timestamp: number;
}
