import { observable } from "@trpc/server/observable";
import type { BusEvent } from "@sundial/shared";
import { procedure, router } from "../trpc.js";
import type { EventBusEvents } from "../../event-bus.js";

type EventData<K extends keyof EventBusEvents> = Parameters<EventBusEvents[K]>[0];

export const eventsRouter = router({
  onEvent: procedure.subscription(({ ctx }) => {
    return observable<BusEvent>((emit) => {
      const handlers: Array<() => void> = [];

      const firedHandler = (data: EventData<"automation:fired">) => {
        emit.next({ type: "automation:fired", data: { ...data }, timestamp: data.timestamp });
      };
      ctx.eventBus.on("automation:fired", firedHandler);
      handlers.push(() => ctx.eventBus.off("automation:fired", firedHandler));

      const executedHandler = (data: EventData<"automation:executed">) => {
        emit.next({ type: "automation:executed", data: { ...data }, timestamp: data.timestamp });
      };
      ctx.eventBus.on("automation:executed", executedHandler);
      handlers.push(() => ctx.eventBus.off("automation:executed", executedHandler));

      const registeredHandler = (data: EventData<"automation:registered">) => {
        emit.next({ type: "automation:registered", data: { ...data }, timestamp: data.timestamp });
      };
      ctx.eventBus.on("automation:registered", registeredHandler);
      handlers.push(() => ctx.eventBus.off("automation:registered", registeredHandler));

      const unregisteredHandler = (data: EventData<"automation:unregistered">) => {
        emit.next({ type: "automation:unregistered", data: { ...data }, timestamp: data.timestamp });
      };
      ctx.eventBus.on("automation:unregistered", unregisteredHandler);
      handlers.push(() => ctx.eventBus.off("automation:unregistered", unregisteredHandler));

      const stateHandler = (data: EventData<"engine:state">) => {
        emit.next({ type: "engine:state", data: { ...data }, timestamp: data.timestamp });
      };
      ctx.eventBus.on("engine:state", stateHandler);
      handlers.push(() => ctx.eventBus.off("engine:state", stateHandler));

      const loadedHandler = (data: EventData<"capability:loaded">) => {
        emit.next({ type: "capability:loaded", data: { ...data }, timestamp: data.timestamp });
      };
      ctx.eventBus.on("capability:loaded", loadedHandler);
      handlers.push(() => ctx.eventBus.off("capability:loaded", loadedHandler));

      const skippedHandler = (data: EventData<"capability:skipped">) => {
        emit.next({ type: "capability:skipped", data: { ...data }, timestamp: data.timestamp });
      };
      ctx.eventBus.on("capability:skipped", skippedHandler);
      handlers.push(() => ctx.eventBus.off("capability:skipped", skippedHandler));

      const notificationHandler = (data: EventData<"notification">) => {
        emit.next({ type: "notification", data: { ...data }, timestamp: data.timestamp });
      };
      ctx.eventBus.on("notification", notificationHandler);
      handlers.push(() => ctx.eventBus.off("notification", notificationHandler));

      return () => handlers.forEach((h) => h());
    });
  }),
});
