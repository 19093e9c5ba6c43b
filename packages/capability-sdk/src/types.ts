import type {
  CapabilityDescriptor,
  CompatibilityResult,
  ParameterMap,
} from "@sundial/shared";

// ── Capability Interface ───────────────────────────────────────────────────

export interface StartupAction {
  action: string;
  parameters: ParameterMap;
}

export interface Capability {
  readonly descriptor: CapabilityDescriptor;

  /** Actions the daemon runs once right after discovery (e.g. reset a light to off). */
  readonly startupActions?: readonly StartupAction[];

  execute(actionId: string, parameters: ParameterMap): Promise<void>;
  compatibility(): CompatibilityResult | Promise<CompatibilityResult>;
  cleanup(): Promise<void>;
}

/** Builds a capability instance. May throw when the backing subsystem is unusable. */
export type CapabilityFactory = () => Capability;

// ── Compatibility Helpers ──────────────────────────────────────────────────

export function compatible(warnings: string[] = []): CompatibilityResult {
  return { compatible: true, missingRequirements: [], warnings };
}

export function incompatible(reasons: string[], warnings: string[] = []): CompatibilityResult {
  return { compatible: false, missingRequirements: reasons, warnings };
}
