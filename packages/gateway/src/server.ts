import "dotenv/config";
import { loadConfig } from "./config";
import { createGateway } from "./gateway";
import { logger } from "./utils/logger";

const config = loadConfig(process.env);
const gateway = createGateway({ config, httpClient: fetch });

if (config.providers.length === 0) {
  logger.warn("No provider API keys set; chat requests will fail until one is configured");
}

const loaded = await gateway.sessions.load();
if (!loaded.ok) {
  logger.error("Failed to load stored sessions", loaded.error);
}

const restored = await gateway.scheduler.loadAll();
if (!restored.ok) {
  logger.error("Failed to restore scheduled tasks", restored.error);
}

const server = gateway.app.listen(config.port, () => {
  logger.info(`LLM gateway listening on http://localhost:${config.port}`, {
    providers: config.providers.map((provider) => provider.type),
    defaultProvider: config.defaultProvider,
  });
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`Received ${signal}, shutting down`);

  await gateway.scheduler.shutdown();
  await gateway.sessions.shutdown();
  server.close((error) => {
    if (error) {
      logger.error("Failed to close HTTP server", error);
      process.exit(1);
    }
    process.exit(0);
  });
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error("Shutdown failed", error);
      process.exit(1);
    });
  });
}
