/**
 * Standalone entry point: `npm start` in packages/server.
 */

import "dotenv/config";
import { createTokenAuth } from "./auth/index.js";
import { ConfigError, loadConfig, type ServerConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { ChatMatchmaker } from "./matchmaking/index.js";
import { createServer } from "./server.js";

function readConfig(): ServerConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      createLogger().fatal({ issues: err.issues }, err.message);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();
const logger = createLogger({ level: config.log.level, format: config.log.format });

if (!config.auth.jwtSecret) {
  logger.warn("AUTH_JWT_SECRET is unset; tokens are decoded without signature checks");
}

const matchmaker = new ChatMatchmaker({
  ...config.chat,
  logger,
});

const server = createServer({
  matchmaker,
  host: config.host,
  port: config.port,
  corsAllowedOrigins: config.corsAllowedOrigins,
  onAuth: createTokenAuth({ secret: config.auth.jwtSecret }),
  authRequired: config.auth.required,
  path: config.ws.path,
  maxPayload: config.ws.maxMessageBytes,
  pingIntervalMs: config.ws.pingIntervalMs,
  logger,
});

server.on("listening", () => {
  logger.info(
    { host: config.host, port: config.port, wsPath: config.ws.path },
    `listening on http://${config.host}:${config.port}`
  );
});

server.on("error", (err) => {
  logger.fatal({ err }, "server error");
  process.exit(1);
});

let shuttingDown = false;

function shutdown(signal: NodeJS.Signals): void {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "shutting down");
  matchmaker.close();
  for (const client of server.ws.clients) client.terminate();
  server.ws.close();
  server.close((err) => {
    if (err) {
      logger.error({ err }, "error while closing http server");
      process.exit(1);
    }
    process.exit(0);
  });
  server.closeAllConnections();
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
