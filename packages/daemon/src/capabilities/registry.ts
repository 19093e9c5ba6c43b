import type { CapabilityDescriptor, ParameterMap } from "@sundial/shared";
import type { Capability, CapabilityFactory } from "@sundial/capability-sdk";
import { validateDescriptor } from "@sundial/capability-sdk";
import type { EventBus } from "../event-bus.js";
import {
  CapabilityIncompatibleError,
  CapabilityNotFoundError,
  ConfigurationError,
  ExecutionFailedError,
  describeError,
} from "../engine/errors.js";

export interface DiscoveryReport {
  loaded: string[];
  skipped: Array<{ id: string; reason: string }>;
}

/**
 * Holds the usable capabilities. Candidates come from a static catalog of
 * factories keyed by capability id; only compatible ones are kept.
 */
export class CapabilityRegistry {
  private capabilities = new Map<string, Capability>();

  constructor(
    private catalog: ReadonlyMap<string, CapabilityFactory>,
    private eventBus?: EventBus,
  ) {}

  async discover(): Promise<DiscoveryReport> {
    if (this.capabilities.size > 0) await this.unloadAll();

    const report: DiscoveryReport = { loaded: [], skipped: [] };
    let examined = 0;

    for (const [id, factory] of this.catalog) {
      let capability: Capability;
      try {
        capability = factory();
      } catch (err) {
        this.skip(report, id, `Failed to initialize: ${describeError(err)}`);
        continue;
      }

      examined++;
      try {
        const warnings = await this.check(id, capability);
        this.capabilities.set(id, capability);
        report.loaded.push(id);
        for (const warning of warnings) {
          console.warn(`[CapabilityRegistry] ${id}: ${warning}`);
        }
        console.log(`[CapabilityRegistry] Loaded ${capability.descriptor.displayName} (${id})`);
        this.eventBus?.emit("capability:loaded", {
          descriptor: capability.descriptor,
          warnings,
          timestamp: Date.now(),
        });
      } catch (err) {
        this.skip(report, id, describeError(err));
        await this.release(id, capability);
      }
    }

    if (this.catalog.size > 0 && examined === 0) {
      throw new ConfigurationError(
        `No capability could be initialized: ${report.skipped.map((s) => `${s.id} (${s.reason})`).join(", ")}`,
      );
    }

    return report;
  }

  has(id: string): boolean {
    return this.capabilities.has(id);
  }

  get(id: string): Capability {
    const capability = this.capabilities.get(id);
    if (!capability) throw new CapabilityNotFoundError(id);
    return capability;
  }

  /** Runs an action; any failure inside the capability surfaces as ExecutionFailedError. */
  async invoke(id: string, action: string, parameters: ParameterMap): Promise<void> {
    const capability = this.get(id);
    try {
      await capability.execute(action, parameters);
    } catch (err) {
      throw new ExecutionFailedError(action, err);
    }
  }

  listDescriptors(): CapabilityDescriptor[] {
    return Array.from(this.capabilities.values())
      .map((c) => c.descriptor)
      .sort((a, b) => a.displayName.localeCompare(b.displayName));
  }

  getDescriptor(id: string): CapabilityDescriptor | undefined {
    return this.capabilities.get(id)?.descriptor;
  }

  async unload(id: string): Promise<boolean> {
    const capability = this.capabilities.get(id);
    if (!capability) return false;
    this.capabilities.delete(id);
    await this.release(id, capability);
    console.log(`[CapabilityRegistry] Unloaded ${id}`);
    return true;
  }

  /** Re-instantiates a catalog entry and re-checks it. */
  async reload(id: string): Promise<CapabilityDescriptor> {
    const factory = this.catalog.get(id);
    if (!factory) throw new CapabilityNotFoundError(id);

    await this.unload(id);

    let capability: Capability;
    try {
      capability = factory();
    } catch (err) {
      throw new CapabilityIncompatibleError(id, [`Failed to initialize: ${describeError(err)}`]);
    }

    try {
      await this.check(id, capability);
    } catch (err) {
      await this.release(id, capability);
      throw err;
    }

    this.capabilities.set(id, capability);
    console.log(`[CapabilityRegistry] Reloaded ${id}`);
    return capability.descriptor;
  }

  async unloadAll(): Promise<void> {
    const entries = Array.from(this.capabilities.entries());
    this.capabilities.clear();
    for (const [id, capability] of entries) {
      await this.release(id, capability);
    }
  }

  get size(): number {
    return this.capabilities.size;
  }

  // ── Helpers ──

  /** Returns compatibility warnings; throws CapabilityIncompatibleError otherwise. */
  private async check(id: string, capability: Capability): Promise<string[]> {
    const problems = validateDescriptor(capability.descriptor);
    if (capability.descriptor.id !== id) {
      problems.push(`Descriptor id "${capability.descriptor.id}" does not match catalog id "${id}"`);
    }
    if (problems.length > 0) throw new CapabilityIncompatibleError(id, problems);

    const result = await capability.compatibility();
    if (!result.compatible) {
      throw new CapabilityIncompatibleError(id, result.missingRequirements);
    }
    return result.warnings;
  }

  private skip(report: DiscoveryReport, id: string, reason: string): void {
    report.skipped.push({ id, reason });
    console.warn(`[CapabilityRegistry] Skipped ${id}: ${reason}`);
    this.eventBus?.emit("capability:skipped", { id, reason, timestamp: Date.now() });
  }

  private async release(id: string, capability: Capability): Promise<void> {
    try {
      await capability.cleanup();
    } catch (err) {
      console.error(`[CapabilityRegistry] Cleanup of ${id} failed:`, err);
    }
  }
}
