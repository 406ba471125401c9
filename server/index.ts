import express from "express";
import { createServer } from "http";
import { createAuditService, HttpFetchPort, LlmSummaryRefiner } from "./audit";
import { config } from "./config";
import { logger } from "./logger";
import { registerRoutes } from "./routes";

async function main() {
  const app = express();
  app.use(express.json({ limit: "100kb" }));

  const service = createAuditService({
    fetcher: new HttpFetchPort(config.USER_AGENT),
    userAgent: config.USER_AGENT,
    refiner: config.LLM_API_KEY ? new LlmSummaryRefiner(config.LLM_API_KEY, config.LLM_MODEL, config.LLM_BASE_URL) : null,
  });

  const httpServer = await registerRoutes(createServer(app), app, service);
  httpServer.listen(config.PORT, () => {
    logger.info("server listening", { port: config.PORT });
  });
}

main().catch((error: unknown) => {
  logger.error("server failed to start", { error });
  process.exit(1);
});
