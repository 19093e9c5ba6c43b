import http from "http";
import { createHTTPHandler } from "@trpc/server/adapters/standalone";
import { applyWSSHandler } from "@trpc/server/adapters/ws";
import { WebSocketServer } from "ws";
import { appRouter } from "./router.js";
import type { TRPCContext } from "./context.js";

export interface ApiServer {
  close(): Promise<void>;
}

export function startApiServer(ctx: TRPCContext, port: number, host: string): ApiServer {
  const handler = createHTTPHandler({
    router: appRouter,
    createContext: () => ctx,
  });

  const server = http.createServer((req, res) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (req.method === "OPTIONS") {
      res.writeHead(200);
      res.end();
      return;
    }

    // Strip the /trpc prefix so procedure paths resolve
    const url = req.url ?? "/";
    if (url.startsWith("/trpc")) {
      req.url = url.replace(/^\/trpc/, "") || "/";
    }
    handler(req, res);
  });

  const wss = new WebSocketServer({ server });
  const wssHandler = applyWSSHandler({
    wss,
    router: appRouter,
    createContext: () => ctx,
  });

  server.listen(port, host);
  console.log(`[API] HTTP + WebSocket server listening on ${host}:${port}`);

  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        wssHandler.broadcastReconnectNotification();
        wss.close();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
