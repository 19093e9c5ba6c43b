import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { CapabilityDescriptor, CompatibilityResult, ParameterMap } from "@sundial/shared";
import type { Capability, CapabilityFactory } from "@sundial/capability-sdk";
import { compatible, incompatible } from "@sundial/capability-sdk";
import { CapabilityRegistry } from "./registry.js";
import { createCatalog } from "./catalog.js";
import { SimulatedLightCapability } from "./builtin/simulated-light.js";
import { EventBus } from "../event-bus.js";
import {
  CapabilityIncompatibleError,
  CapabilityNotFoundError,
  ConfigurationError,
  ExecutionFailedError,
} from "../engine/errors.js";

class FakeCapability implements Capability {
  readonly descriptor: CapabilityDescriptor;
  calls: Array<{ action: string; parameters: ParameterMap }> = [];
  cleanups = 0;

  constructor(
    id: string,
    displayName: string,
    private result: CompatibilityResult = compatible(),
  ) {
    this.descriptor = {
      id,
      displayName,
      version: "1.0.0",
      description: "",
      actions: [{ id: "ping", displayName: "Ping", description: "", parameters: [] }],
    };
  }

  compatibility(): CompatibilityResult {
    return this.result;
  }

  async execute(action: string, parameters: ParameterMap): Promise<void> {
    if (action !== "ping") throw new Error(`unsupported: ${action}`);
    this.calls.push({ action, parameters });
  }

  async cleanup(): Promise<void> {
    this.cleanups++;
  }
}

describe("CapabilityRegistry", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps compatible capabilities and reports the rest", async () => {
    const rejected = new FakeCapability("beta", "Beta", incompatible(["needs hardware"]));
    const bus = new EventBus();
    const skipped: string[] = [];
    bus.on("capability:skipped", (e) => skipped.push(e.id));

    const registry = new CapabilityRegistry(
      new Map<string, CapabilityFactory>([
        ["zeta", () => new FakeCapability("zeta", "Zeta", compatible(["simulated"]))],
        ["beta", () => rejected],
        ["alpha", () => new FakeCapability("alpha", "Alpha")],
        ["broken", () => {
          throw new Error("no driver");
        }],
      ]),
      bus,
    );

    const report = await registry.discover();

    expect(report.loaded).toEqual(["zeta", "alpha"]);
    expect(report.skipped).toEqual([
      { id: "beta", reason: 'Capability "beta" is incompatible: needs hardware' },
      { id: "broken", reason: "Failed to initialize: no driver" },
    ]);
    expect(skipped).toEqual(["beta", "broken"]);
    expect(rejected.cleanups).toBe(1);
    expect(registry.has("beta")).toBe(false);
    expect(registry.listDescriptors().map((d) => d.displayName)).toEqual(["Alpha", "Zeta"]);
    expect(console.warn).toHaveBeenCalledWith("[CapabilityRegistry] zeta: simulated");
  });

  it("rejects descriptors with duplicate or mismatched ids", async () => {
    const dup = new FakeCapability("dup", "Dup");
    dup.descriptor.actions.push(dup.descriptor.actions[0]);

    const registry = new CapabilityRegistry(
      new Map<string, CapabilityFactory>([
        ["dup", () => dup],
        ["renamed", () => new FakeCapability("other", "Other")],
      ]),
    );

    const report = await registry.discover();

    expect(report.loaded).toEqual([]);
    expect(report.skipped.map((s) => s.id)).toEqual(["dup", "renamed"]);
    expect(report.skipped[0].reason).toContain('Duplicate action id "ping"');
  });

  it("accepts an empty catalog but not one where nothing initializes", async () => {
    await expect(new CapabilityRegistry(new Map()).discover()).resolves.toEqual({ loaded: [], skipped: [] });

    const registry = new CapabilityRegistry(
      new Map<string, CapabilityFactory>([["broken", () => {
        throw new Error("no driver");
      }]]),
    );
    await expect(registry.discover()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("routes invocations and wraps failures", async () => {
    const fake = new FakeCapability("alpha", "Alpha");
    const registry = new CapabilityRegistry(new Map([["alpha", () => fake]]));
    await registry.discover();

    await registry.invoke("alpha", "ping", { n: 1 });
    expect(fake.calls).toEqual([{ action: "ping", parameters: { n: 1 } }]);

    const failure = registry.invoke("alpha", "explode", {});
    await expect(failure).rejects.toBeInstanceOf(ExecutionFailedError);
    await expect(failure).rejects.toThrow('Action "explode" failed: unsupported: explode');

    await expect(registry.invoke("missing", "ping", {})).rejects.toBeInstanceOf(CapabilityNotFoundError);
    expect(() => registry.get("missing")).toThrow("Capability not found: missing");
  });

  it("wraps parameter validation failures of real capabilities", async () => {
    const registry = new CapabilityRegistry(new Map([["simulated-light", () => new SimulatedLightCapability()]]));
    await registry.discover();

    await expect(registry.invoke("simulated-light", "setBrightness", { level: 150 })).rejects.toThrow(
      'Action "setBrightness" failed: Invalid parameter "level": must be <= 100, got 150',
    );
  });

  it("reloads and unloads capabilities", async () => {
    let compatibleNow = true;
    const instances: FakeCapability[] = [];
    const registry = new CapabilityRegistry(
      new Map<string, CapabilityFactory>([
        ["alpha", () => {
          const fake = new FakeCapability("alpha", "Alpha", compatibleNow ? compatible() : incompatible(["unplugged"]));
          instances.push(fake);
          return fake;
        }],
      ]),
    );
    await registry.discover();

    const descriptor = await registry.reload("alpha");
    expect(descriptor.id).toBe("alpha");
    expect(instances).toHaveLength(2);
    expect(instances[0].cleanups).toBe(1);

    compatibleNow = false;
    await expect(registry.reload("alpha")).rejects.toBeInstanceOf(CapabilityIncompatibleError);
    expect(registry.has("alpha")).toBe(false);
    await expect(registry.reload("nope")).rejects.toBeInstanceOf(CapabilityNotFoundError);

    expect(await registry.unload("alpha")).toBe(false);
  });

  it("unloads everything even when a cleanup fails", async () => {
    const failing = new FakeCapability("alpha", "Alpha");
    failing.cleanup = async () => {
      throw new Error("stuck");
    };
    const other = new FakeCapability("beta", "Beta");
    const registry = new CapabilityRegistry(
      new Map<string, CapabilityFactory>([
        ["alpha", () => failing],
        ["beta", () => other],
      ]),
    );
    await registry.discover();

    await registry.unloadAll();

    expect(registry.size).toBe(0);
    expect(other.cleanups).toBe(1);
    expect(console.error).toHaveBeenCalledWith("[CapabilityRegistry] Cleanup of alpha failed:", expect.any(Error));
  });
});

describe("createCatalog", () => {
  it("lists every builtin by default", () => {
    const catalog = createCatalog({ ledsDir: "/tmp/none", enabled: null });
    expect(Array.from(catalog.keys())).toEqual(["keyboard-backlight", "simulated-light"]);
  });

  it("narrows to the enabled ids and skips unknown ones", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const catalog = createCatalog({ ledsDir: "/tmp/none", enabled: ["simulated-light", "lava-lamp"] });
    expect(Array.from(catalog.keys())).toEqual(["simulated-light"]);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});
