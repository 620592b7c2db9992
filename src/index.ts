import "dotenv/config";
import { createServer } from "node:http";
import { getRequestListener } from "@hono/node-server";
import { createApplication } from "./bootstrap.js";
import { loadConfig } from "./config.js";
import { createHttpApp } from "./httpApp.js";
import { createLogger } from "./logger.js";

async function bootstrap() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const { processing } = await createApplication(config, logger);
  const app = createHttpApp({ processing, logger });

  const server = createServer(getRequestListener((request, env) => app.fetch(request, env)));
  server.listen(config.port, () => {
    logger.info("server_started", { port: config.port });
  });
}

bootstrap().catch((error) => {
  createLogger().error("Failed to start server", { error });
  process.exit(1);
});
