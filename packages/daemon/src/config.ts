import { resolve } from "path";
import { homedir } from "os";
import { z } from "zod";
import { ConfigurationError } from "./engine/errors.js";

export interface SundialConfig {
  apiPort: number;
  apiHost: string;
  dbPath: string;
  scheduler: {
    checkIntervalMs: number;        // must stay below 60s, time-of-day triggers match on the minute
    solarFireWindowMs: number;
    solarDuplicateGuardMs: number;
  };
  capabilities: {
    ledsDir: string;
    enabled: string[] | null;       // null = every catalog entry
  };
}

const sundialHome = resolve(homedir(), ".sundial");

const defaults: SundialConfig = {
  apiPort: 3200,
  apiHost: "127.0.0.1",
  dbPath: resolve(sundialHome, "sundial.db"),
  scheduler: {
    checkIntervalMs: 1000,
    solarFireWindowMs: 2000,
    solarDuplicateGuardMs: 60_000,
  },
  capabilities: {
    ledsDir: "/sys/class/leds",
    enabled: null,
  },
};

const configSchema = z.object({
  apiPort: z.number().int().min(1).max(65535),
  apiHost: z.string().min(1),
  dbPath: z.string().min(1),
  scheduler: z.object({
    checkIntervalMs: z.number().int().positive().lt(60_000, "check interval must be below 60000 ms"),
    solarFireWindowMs: z.number().int().positive(),
    solarDuplicateGuardMs: z.number().int().positive(),
  }),
  capabilities: z.object({
    ledsDir: z.string().min(1),
    enabled: z.array(z.string().min(1)).nullable(),
  }),
});

function expandHome(path: string): string {
  return path.replace(/^~(?=$|\/)/, homedir());
}

function parseList(value: string | undefined): string[] | null {
  if (value === undefined || value.trim() === "") return null;
  return value.split(",").map((s) => s.trim()).filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SundialConfig {
  const candidate: SundialConfig = {
    ...defaults,
    apiPort: parseInt(env.SUNDIAL_PORT ?? String(defaults.apiPort), 10),
    apiHost: env.SUNDIAL_HOST ?? defaults.apiHost,
    dbPath: expandHome(env.SUNDIAL_DB_PATH ?? defaults.dbPath),
    scheduler: {
      ...defaults.scheduler,
      checkIntervalMs: parseInt(env.SUNDIAL_CHECK_INTERVAL_MS ?? String(defaults.scheduler.checkIntervalMs), 10),
    },
    capabilities: {
      ledsDir: expandHome(env.SUNDIAL_LEDS_DIR ?? defaults.capabilities.ledsDir),
      enabled: parseList(env.SUNDIAL_CAPABILITIES),
    },
  };

  const result = configSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`);
  }
  return result.data;
}
