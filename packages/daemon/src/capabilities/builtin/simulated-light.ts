import type { CapabilityDescriptor, CompatibilityResult, ParameterMap } from "@sundial/shared";
import type { Capability } from "@sundial/capability-sdk";
import { compatible, findAction, resolveParameters } from "@sundial/capability-sdk";

export const SIMULATED_LIGHT_ID = "simulated-light";

export const LIGHT_COLORS = ["warm", "neutral", "cool"];

export const SIMULATED_LIGHT_DESCRIPTOR: CapabilityDescriptor = {
  id: SIMULATED_LIGHT_ID,
  displayName: "Simulated Light",
  version: "1.0.0",
  description: "In-memory light for trying out automations",
  actions: [
    { id: "turnOn", displayName: "Turn On", description: "Switch the light on", parameters: [] },
    { id: "turnOff", displayName: "Turn Off", description: "Switch the light off", parameters: [] },
    {
      id: "setBrightness",
      displayName: "Set Brightness",
      description: "Set brightness in percent and switch on",
      parameters: [
        {
          id: "level",
          displayName: "Level (%)",
          type: "integer",
          required: true,
          defaultValue: 100,
          validation: { min: 0, max: 100 },
        },
      ],
    },
    {
      id: "setColor",
      displayName: "Set Color",
      description: "Change the color temperature",
      parameters: [
        {
          id: "color",
          displayName: "Color",
          type: "selection",
          required: true,
          defaultValue: "neutral",
          validation: { options: LIGHT_COLORS },
        },
      ],
    },
  ],
};

export interface SimulatedLightState {
  on: boolean;
  brightness: number;
  color: string;
}

export class SimulatedLightCapability implements Capability {
  readonly descriptor = SIMULATED_LIGHT_DESCRIPTOR;

  private current: SimulatedLightState = { on: false, brightness: 100, color: "neutral" };

  get state(): SimulatedLightState {
    return { ...this.current };
  }

  compatibility(): CompatibilityResult {
    return compatible();
  }

  async execute(actionId: string, parameters: ParameterMap): Promise<void> {
    const params = resolveParameters(findAction(this.descriptor, actionId), parameters);

    switch (actionId) {
      case "turnOn":
        this.current.on = true;
        break;
      case "turnOff":
        this.current.on = false;
        break;
      case "setBrightness":
        this.current.brightness = params.integer("level") ?? 100;
        this.current.on = this.current.brightness > 0;
        break;
      case "setColor":
        this.current.color = params.string("color") ?? "neutral";
        break;
    }
    console.log(`[SimulatedLight] ${actionId} → ${JSON.stringify(this.current)}`);
  }

  async cleanup(): Promise<void> {
    this.current = { on: false, brightness: 100, color: "neutral" };
  }
}
