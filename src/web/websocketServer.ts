import { WebSocketServer, WebSocket } from "ws";
import type { Server } from "http";
import EventEmitter from "events";

export const stationEvents = new EventEmitter();

export interface Reading {
  topic: string;
  payload: string;
}

interface WebSocketClient extends WebSocket {
  isAlive?: boolean;
  /** Topic prefix the client subscribed to; undefined until it subscribes */
  prefix?: string;
}

// Last retained payload per topic, replayed to new subscribers
const retained = new Map<string, string>();

export function getRetainedReadings(prefix = ""): Reading[] {
  const readings: Reading[] = [];
  for (const [topic, payload] of retained) {
    if (topic.startsWith(prefix)) readings.push({ topic, payload });
  }
  return readings.sort((a, b) => a.topic.localeCompare(b.topic));
}

export function clearRetainedReadings(): void {
  retained.clear();
}

export function broadcastReading(topic: string, payload: string, retain: boolean): void {
  if (retain) {
    retained.set(topic, payload);
  }
  stationEvents.emit("reading", { topic, payload });
}

function parseSubscribe(message: string): { prefix: string } | null {
  const data: unknown = JSON.parse(message);
  if (typeof data !== "object" || data === null || !("type" in data) || data.type !== "subscribe") {
    return null;
  }
  const prefix = "prefix" in data && typeof data.prefix === "string" ? data.prefix : "";
  return { prefix };
}

export function initializeWebSocketServer(server: Server): WebSocketServer {
  const wss = new WebSocketServer({ server });

  const heartbeat = setInterval(() => {
    wss.clients.forEach((ws: WebSocket) => {
      const client: WebSocketClient = ws;
      if (client.isAlive === false) {
        return client.terminate();
      }
      client.isAlive = false;
      client.ping();
    });
  }, 30000);

  const onReading = (reading: Reading) => {
    wss.clients.forEach((ws: WebSocket) => {
      const client: WebSocketClient = ws;
      if (
        client.readyState === WebSocket.OPEN &&
        client.prefix !== undefined &&
        reading.topic.startsWith(client.prefix)
      ) {
        client.send(JSON.stringify({ type: "reading", ...reading }));
      }
    });
  };
  stationEvents.on("reading", onReading);

  wss.on("connection", (ws: WebSocket) => {
    const client: WebSocketClient = ws;
    client.isAlive = true;

    client.on("pong", () => {
      client.isAlive = true;
    });

    client.on("message", (message) => {
      try {
        const subscribe = parseSubscribe(message.toString());
        if (!subscribe) return;

        client.prefix = subscribe.prefix;
        console.log(`Client subscribed to readings under "${subscribe.prefix}"`);
        client.send(
          JSON.stringify({
            type: "initial",
            readings: getRetainedReadings(subscribe.prefix),
          })
        );
      } catch (error) {
        console.error("Error processing WebSocket message:", error);
      }
    });

    client.on("close", (code, reason) => {
      console.log(`Client disconnected, code: ${code}, reason: ${reason.toString() || "none"}`);
    });

    client.on("error", (error) => {
      console.error("WebSocket error:", error);
    });
  });

  wss.on("close", () => {
    clearInterval(heartbeat);
    stationEvents.off("reading", onReading);
  });

  return wss;
}
