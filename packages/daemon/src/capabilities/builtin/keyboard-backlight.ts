import { readFile, readdir, writeFile } from "fs/promises";
import { join } from "path";
import { setTimeout as sleep } from "timers/promises";
import type { CapabilityDescriptor, CompatibilityResult, ParameterMap } from "@sundial/shared";
import type { Capability, StartupAction } from "@sundial/capability-sdk";
import { compatible, findAction, incompatible, resolveParameters } from "@sundial/capability-sdk";

export const KEYBOARD_BACKLIGHT_ID = "keyboard-backlight";

const FADE_STEPS_PER_SECOND = 20;
const TOGGLE_THRESHOLD = 0.1;

const levelParam = {
  id: "level",
  displayName: "Level",
  type: "float",
  required: true,
  defaultValue: 1,
  validation: { min: 0, max: 1 },
} as const;

export const KEYBOARD_BACKLIGHT_DESCRIPTOR: CapabilityDescriptor = {
  id: KEYBOARD_BACKLIGHT_ID,
  displayName: "Keyboard Backlight",
  version: "1.0.0",
  description: "Controls the keyboard backlight through the Linux LED class interface",
  actions: [
    {
      id: "setBrightness",
      displayName: "Set Brightness",
      description: "Set the backlight level (0 = off, 1 = full)",
      parameters: [{ ...levelParam }],
    },
    { id: "turnOn", displayName: "Turn On", description: "Full brightness", parameters: [] },
    { id: "turnOff", displayName: "Turn Off", description: "Backlight off", parameters: [] },
    { id: "toggle", displayName: "Toggle", description: "Switch between off and full brightness", parameters: [] },
    {
      id: "fadeTo",
      displayName: "Fade To",
      description: "Gradually move to a level",
      parameters: [
        { ...levelParam },
        {
          id: "duration",
          displayName: "Duration (s)",
          type: "float",
          required: false,
          defaultValue: 2,
          validation: { min: 0.1, max: 10 },
        },
      ],
    },
  ],
};

interface BacklightDevice {
  dir: string;
  maxBrightness: number;
}

export interface KeyboardBacklightOptions {
  ledsDir: string;
  platform?: NodeJS.Platform;
}

/**
 * Drives a `*kbd_backlight*` LED class device. Without one the level is kept
 * in memory only. Every level change bumps a generation counter so a running
 * fade stops at its next step.
 */
export class KeyboardBacklightCapability implements Capability {
  readonly descriptor = KEYBOARD_BACKLIGHT_DESCRIPTOR;
  readonly startupActions: readonly StartupAction[] = [
    { action: "setBrightness", parameters: { level: 0 } },
  ];

  private device: Promise<BacklightDevice | null> | null = null;
  private level = 0;
  private generation = 0;

  constructor(private options: KeyboardBacklightOptions) {}

  get currentLevel(): number {
    return this.level;
  }

  async compatibility(): Promise<CompatibilityResult> {
    const platform = this.options.platform ?? process.platform;
    if (platform !== "linux") {
      return incompatible([`Requires Linux (running on ${platform})`]);
    }

    const device = await this.locate();
    if (!device) {
      return compatible([`No keyboard backlight found under ${this.options.ledsDir}; level is simulated`]);
    }
    return compatible();
  }

  async execute(actionId: string, parameters: ParameterMap): Promise<void> {
    const params = resolveParameters(findAction(this.descriptor, actionId), parameters);
    // the first probe seeds the level from the device
    await this.locate();

    switch (actionId) {
      case "setBrightness":
        this.generation++;
        await this.apply(params.float("level") ?? 1);
        break;
      case "turnOn":
        this.generation++;
        await this.apply(1);
        break;
      case "turnOff":
        this.generation++;
        await this.apply(0);
        break;
      case "toggle":
        this.generation++;
        await this.apply(this.level > TOGGLE_THRESHOLD ? 0 : 1);
        break;
      case "fadeTo":
        await this.fade(params.float("level") ?? 1, params.float("duration") ?? 2);
        break;
    }
  }

  async cleanup(): Promise<void> {
    // stops any fade in progress
    this.generation++;
  }

  private async fade(target: number, durationSeconds: number): Promise<void> {
    const generation = ++this.generation;
    const steps = Math.max(1, Math.round(durationSeconds * FADE_STEPS_PER_SECOND));
    const stepMs = (durationSeconds * 1000) / steps;
    const from = this.level;

    for (let i = 1; i <= steps; i++) {
      await sleep(stepMs);
      if (generation !== this.generation) return;
      await this.apply(from + ((target - from) * i) / steps);
    }
  }

  private async apply(level: number): Promise<void> {
    this.level = Math.max(0, Math.min(1, level));

    const device = await this.locate();
    if (!device) return;
    const raw = Math.round(this.level * device.maxBrightness);
    await writeFile(join(device.dir, "brightness"), `${raw}\n`);
  }

  private locate(): Promise<BacklightDevice | null> {
    if (!this.device) this.device = this.findDevice();
    return this.device;
  }

  private async findDevice(): Promise<BacklightDevice | null> {
    let entries: string[];
    try {
      entries = await readdir(this.options.ledsDir);
    } catch (err) {
      console.warn(`[KeyboardBacklight] Cannot read ${this.options.ledsDir}:`, err);
      return null;
    }

    const name = entries.sort().find((e) => e.includes("kbd_backlight"));
    if (!name) return null;

    const dir = join(this.options.ledsDir, name);
    const maxBrightness = parseInt(await readFile(join(dir, "max_brightness"), "utf8"), 10);
    if (!Number.isFinite(maxBrightness) || maxBrightness <= 0) {
      console.warn(`[KeyboardBacklight] ${name} reports an unusable max_brightness`);
      return null;
    }

    const current = parseInt(await readFile(join(dir, "brightness"), "utf8"), 10);
    if (Number.isFinite(current)) this.level = Math.max(0, Math.min(1, current / maxBrightness));

    console.log(`[KeyboardBacklight] Using ${dir} (max ${maxBrightness})`);
    return { dir, maxBrightness };
  }
}
