import type { CapabilityFactory } from "@sundial/capability-sdk";
import type { SundialConfig } from "../config.js";
import { KEYBOARD_BACKLIGHT_ID, KeyboardBacklightCapability } from "./builtin/keyboard-backlight.js";
import { SIMULATED_LIGHT_ID, SimulatedLightCapability } from "./builtin/simulated-light.js";

/** Built-in capability factories, narrowed to `enabled` when it is set. */
export function createCatalog(options: SundialConfig["capabilities"]): Map<string, CapabilityFactory> {
  const builtins = new Map<string, CapabilityFactory>([
    [KEYBOARD_BACKLIGHT_ID, () => new KeyboardBacklightCapability({ ledsDir: options.ledsDir })],
    [SIMULATED_LIGHT_ID, () => new SimulatedLightCapability()],
  ]);

  if (!options.enabled) return builtins;

  const catalog = new Map<string, CapabilityFactory>();
  for (const id of options.enabled) {
    const factory = builtins.get(id);
    if (!factory) {
      const available = Array.from(builtins.keys()).join(", ");
      console.warn(`[Catalog] Unknown capability "${id}". Available: ${available}`);
      continue;
    }
    catalog.set(id, factory);
  }
  return catalog;
}
