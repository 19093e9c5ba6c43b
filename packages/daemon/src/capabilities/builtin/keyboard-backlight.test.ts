import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { KeyboardBacklightCapability } from "./keyboard-backlight.js";

describe("KeyboardBacklightCapability", () => {
  let ledsDir: string;
  let deviceDir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    ledsDir = await mkdtemp(join(tmpdir(), "sundial-leds-"));
    await mkdir(join(ledsDir, "input3::capslock"));
    deviceDir = join(ledsDir, "platform::kbd_backlight");
    await mkdir(deviceDir);
    await writeFile(join(deviceDir, "max_brightness"), "255\n");
    await writeFile(join(deviceDir, "brightness"), "0\n");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(ledsDir, { recursive: true, force: true });
  });

  const brightness = async () => (await readFile(join(deviceDir, "brightness"), "utf8")).trim();

  it("is compatible on Linux with a device present", async () => {
    const backlight = new KeyboardBacklightCapability({ ledsDir, platform: "linux" });
    expect(await backlight.compatibility()).toEqual({ compatible: true, missingRequirements: [], warnings: [] });
  });

  it("is incompatible off Linux", async () => {
    const backlight = new KeyboardBacklightCapability({ ledsDir, platform: "darwin" });
    expect(await backlight.compatibility()).toEqual({
      compatible: false,
      missingRequirements: ["Requires Linux (running on darwin)"],
      warnings: [],
    });
  });

  it("warns and simulates without a device", async () => {
    const empty = await mkdtemp(join(tmpdir(), "sundial-leds-empty-"));
    try {
      const backlight = new KeyboardBacklightCapability({ ledsDir: empty, platform: "linux" });
      const result = await backlight.compatibility();
      expect(result.compatible).toBe(true);
      expect(result.warnings).toEqual([`No keyboard backlight found under ${empty}; level is simulated`]);

      await backlight.execute("setBrightness", { level: 0.4 });
      expect(backlight.currentLevel).toBe(0.4);
    } finally {
      await rm(empty, { recursive: true, force: true });
    }
  });

  it("writes scaled brightness levels", async () => {
    const backlight = new KeyboardBacklightCapability({ ledsDir, platform: "linux" });

    await backlight.execute("setBrightness", { level: 0.5 });
    expect(await brightness()).toBe("128");

    await backlight.execute("turnOn", {});
    expect(await brightness()).toBe("255");

    await backlight.execute("turnOff", {});
    expect(await brightness()).toBe("0");
  });

  it("toggles between off and full", async () => {
    const backlight = new KeyboardBacklightCapability({ ledsDir, platform: "linux" });

    await backlight.execute("toggle", {});
    expect(await brightness()).toBe("255");
    await backlight.execute("toggle", {});
    expect(await brightness()).toBe("0");

    await backlight.execute("setBrightness", { level: 0.05 });
    await backlight.execute("toggle", {});
    expect(backlight.currentLevel).toBe(1);
  });

  it("picks up the current level from the device", async () => {
    await writeFile(join(deviceDir, "brightness"), "51\n");
    const backlight = new KeyboardBacklightCapability({ ledsDir, platform: "linux" });
    await backlight.compatibility();
    expect(backlight.currentLevel).toBe(0.2);
  });

  it("fades to the target level", async () => {
    const backlight = new KeyboardBacklightCapability({ ledsDir, platform: "linux" });

    await backlight.execute("fadeTo", { level: 1, duration: 0.1 });

    expect(backlight.currentLevel).toBe(1);
    expect(await brightness()).toBe("255");
  });

  it("abandons a fade when a newer level arrives", async () => {
    const backlight = new KeyboardBacklightCapability({ ledsDir, platform: "linux" });

    const fade = backlight.execute("fadeTo", { level: 1, duration: 1 });
    await backlight.execute("setBrightness", { level: 0.2 });
    await fade;

    expect(backlight.currentLevel).toBe(0.2);
    expect(await brightness()).toBe("51");
  });

  it("rejects out-of-range parameters and unknown actions", async () => {
    const backlight = new KeyboardBacklightCapability({ ledsDir, platform: "linux" });

    await expect(backlight.execute("fadeTo", { level: 0.5, duration: 20 })).rejects.toThrow(
      'Invalid parameter "duration": must be <= 10, got 20',
    );
    await expect(backlight.execute("blink", {})).rejects.toThrow(
      'Capability "keyboard-backlight" does not support action "blink"',
    );
  });

  it("turns the light off at startup", () => {
    const backlight = new KeyboardBacklightCapability({ ledsDir, platform: "linux" });
    expect(backlight.startupActions).toEqual([{ action: "setBrightness", parameters: { level: 0 } }]);
  });
});
