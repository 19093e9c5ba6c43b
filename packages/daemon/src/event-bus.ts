import { EventEmitter } from "events";
import type {
  AutomationRule,
  CapabilityDescriptor,
  EngineState,
  ExecutionOutcome,
  NotificationMessage,
} from "@sundial/shared";

export interface EventBusEvents {
  "automation:fired": (data: { rule: AutomationRule; timestamp: number }) => void;
  "automation:executed": (data: {
    rule: AutomationRule;
    outcome: ExecutionOutcome;
    timestamp: number;
  }) => void;
  "automation:registered": (data: { rule: AutomationRule; timestamp: number }) => void;
  "automation:unregistered": (data: { ruleId: string; timestamp: number }) => void;
  "engine:state": (data: { state: EngineState; timestamp: number }) => void;
  "capability:loaded": (data: {
    descriptor: CapabilityDescriptor;
    warnings: string[];
    timestamp: number;
  }) => void;
  "capability:skipped": (data: { id: string; reason: string; timestamp: number }) => void;
  notification: (data: NotificationMessage) => void;
}

export class EventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  on<K extends keyof EventBusEvents>(
    event: K,
    listener: EventBusEvents[K],
  ): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof EventBusEvents>(
    event: K,
    listener: EventBusEvents[K],
  ): void {
    this.emitter.off(event, listener);
  }

  emit<K extends keyof EventBusEvents>(
    event: K,
    ...args: Parameters<EventBusEvents[K]>
  ): void {
    this.emitter.emit(event, ...args);
  }
}
