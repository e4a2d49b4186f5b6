import express from "express";
import { createServer } from "http";
import { ConfigError, loadConfig, type AppConfig } from "./config.js";
import { decodeMessages } from "./decoder.js";
import { Exporter } from "./metrics/exporter.js";
import { pumpMessages } from "./pipeline.js";
import { Publisher } from "./publisher.js";
import { readRawMessages } from "./reader.js";
import { bindReceiver, receivePackets } from "./receiver.js";
import { LatestReadings } from "./stationState.js";
import { createWebRouter } from "./web/webRouter.js";
import { initializeWebSocketServer } from "./web/websocketServer.js";

function readConfig(): AppConfig | null {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Invalid configuration: ${err.message}`);
      return null;
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }

  const exporter = new Exporter(config.stationElevation, config.validity);
  const publisher = new Publisher(config.stationElevation);
  const latest = new LatestReadings(config.stationElevation, config.validity);

  const app = express();
  const server = createServer(app);
  const wss = initializeWebSocketServer(server);
  app.use("/", createWebRouter({ exporter, latest }));

  await new Promise<void>((resolve) => server.listen(config.port, resolve));
  console.log(`Server listening on :${config.port} - metrics at http://localhost:${config.port}/metrics`);

  const socket = await bindReceiver(config.udpPort);
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    console.log(`Received ${signal}, shutting down`);
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  const packets = receivePackets(socket, controller.signal);
  const count = await pumpMessages(
    decodeMessages(readRawMessages(packets)),
    [exporter, publisher, latest],
    controller.signal
  );
  console.log(`Handled ${count} station messages`);

  socket.close();
  wss.clients.forEach((client) => client.terminate());
  wss.close();
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));

  if (count === 0) {
    console.error("No messages were received from the station");
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
