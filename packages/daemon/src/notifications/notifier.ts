import type { NotificationLevel } from "@sundial/shared";
import type { EventBus } from "../event-bus.js";

export interface Notifier {
  sendSuccess(title: string, message: string): void;
  sendError(title: string, message: string): void;
}

/** Logs notifications and publishes them on the bus for connected clients. */
export class BusNotifier implements Notifier {
  constructor(private eventBus: EventBus) {}

  sendSuccess(title: string, message: string): void {
    this.send("success", title, message);
  }

  sendError(title: string, message: string): void {
    this.send("error", title, message);
  }

  private send(level: NotificationLevel, title: string, message: string): void {
    const line = `[Notify] ${title}: ${message}`;
    if (level === "error") console.error(line);
    else console.log(line);
    this.eventBus.emit("notification", { level, title, message, timestamp: Date.now() });
  }
}
