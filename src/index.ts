import "dotenv/config";
import { loadConfig } from "./env";
import { ConfigurationError, errorMessage } from "./errors";
import { createLogger, setLogLevel } from "./logger";
import { createExaClient } from "./providers/exa";
import { createTraditionalSearch } from "./providers/traditional";
import { createComparisonService } from "./compare";
import { loadPageRenderer } from "./render";
import { createApp } from "./api/server";

const log = createLogger("main");

async function main() {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);

  const exa = createExaClient({
    apiKey: config.exa.apiKey,
    baseUrl: config.exa.baseUrl,
    timeoutMs: config.providerTimeoutMs,
    userAgent: config.userAgent,
  });
  const traditional = createTraditionalSearch(config);

  const service = createComparisonService({
    neural: exa,
    traditional,
    answers: config.exa.includeAnswer ? exa : undefined,
    defaultMaxResults: config.defaultMaxResults,
  });
  const renderer = loadPageRenderer(config.templatePath);
  const app = createApp({ service, renderer });

  const server = app.listen(config.server.port, config.server.host, () => {
    log.info(`listening on http://localhost:${config.server.port}`, {
      neural: exa.name,
      traditional: traditional.name,
      answer: config.exa.includeAnswer,
    });
  });

  const shutdown = () => {
    log.info("Shutting down...");
    server.close((err) => {
      if (err) {
        log.error("Error while closing server", { error: err.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

// printed regardless of LOG_LEVEL
main().catch((e) => {
  if (e instanceof ConfigurationError) {
    console.error(`Configuration error: ${e.message}`);
  } else {
    console.error("Failed to start server:", errorMessage(e));
  }
  process.exit(1);
});
