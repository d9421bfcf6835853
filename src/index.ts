import dotenv from "dotenv";
import http from "http";
import { createApp } from "./app.js";
import { ConfigError, loadConfig, type Config } from "./config.js";
import { GrpcServer } from "./grpc/server.js";
import { createServices } from "./services.js";
import { openStore, type Store } from "./store/index.js";

dotenv.config();

function readConfig(): Readonly<Config> {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[server] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

function listen(server: http.Server, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

function closeHttp(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

async function main(): Promise<void> {
  const config = readConfig();
  console.log(`[server] Starting ${config.app.name} (${config.app.env})`);

  const store: Store = await openStore(config);
  const services = createServices(config, store);

  const httpServer = http.createServer(createApp(config, services));
  const grpcServer = new GrpcServer(services, config.requestTimeoutMs);

  await listen(httpServer, config.host, config.httpPort);
  console.log(`[server] REST listening on http://${config.host}:${config.httpPort}`);
  await grpcServer.start(config.host, config.grpcPort);

  // ---- Graceful shutdown ----
  let isShuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) return;
    isShuttingDown = true;

    console.log(`[server] ${signal} received, shutting down`);

    // 1. Stop accepting work on both transports
    const results = await Promise.allSettled([closeHttp(httpServer), grpcServer.stop()]);
    for (const result of results) {
      if (result.status === "rejected") {
        console.error("[server] Error while stopping a server:", result.reason);
      }
    }

    // 2. Release the store
    try {
      await store.close();
    } catch (err) {
      console.error("[server] Error while closing the store:", err);
    }

    console.log("[server] Shutdown complete");
    process.exit(0);
  }

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("[server] Fatal error during start-up:", err);
  process.exit(1);
});
