import { loadConfig } from "../app/config";
import { startServer } from "../app/server/http";
import { logger } from "../host/logger";

async function main(): Promise<void> {
  const config = loadConfig();
  const { app } = await startServer(config);
  const base = `http://localhost:${config.port}`;
  app.logger.info({ status: `${base}/`, stream: `${base}/stream`, logs: `${base}/logs` }, "listening");
}

main().catch(err => {
  logger.fatal({ err }, "failed to start");
  process.exitCode = 1;
});
