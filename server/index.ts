import { createServer } from "http";
import { loadConfig } from "./config";
import { buildServices, createApp, log } from "./app";
import { cache } from "./cache-service";

const config = loadConfig();
const services = buildServices(config);
const app = createApp(services);
const httpServer = createServer(app);

httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
  log(`serving on port ${config.port} (${config.env})`);
});

function shutdown(signal: string) {
  log(`${signal} received, closing server`);
  cache.stop();
  httpServer.close((err) => {
    if (err) {
      console.error("[Server] Error while closing:", err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
