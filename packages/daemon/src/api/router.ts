import { router } from "./trpc.js";
import { automationsRouter } from "./routers/automations.js";
import { capabilitiesRouter } from "./routers/capabilities.js";
import { engineRouter } from "./routers/engine.js";
import { settingsRouter } from "./routers/settings.js";
import { configRouter } from "./routers/config.js";
import { eventsRouter } from "./routers/events.js";

export const appRouter = router({
  automations: automationsRouter,
  capabilities: capabilitiesRouter,
  engine: engineRouter,
  settings: settingsRouter,
  config: configRouter,
  events: eventsRouter,
});

export type AppRouter = typeof appRouter;
