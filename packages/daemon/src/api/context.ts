import type { AutomationOrchestrator } from "../engine/orchestrator.js";
import type { AutomationRepository } from "../automation/store.js";
import type { CapabilityRegistry } from "../capabilities/registry.js";
import type { EventBus } from "../event-bus.js";
import type { SundialConfig } from "../config.js";

export interface TRPCContext {
  orchestrator: AutomationOrchestrator;
  repository: AutomationRepository;
  capabilities: CapabilityRegistry;
  eventBus: EventBus;
  config: SundialConfig;
}

export function createContext(deps: TRPCContext): TRPCContext {
  return deps;
}
