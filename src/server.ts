import "dotenv/config";

import { startServer } from "./http/server.js";
import { parseEnv } from "./config/env.js";
import { resolveAnalyzerConfig } from "./core/config.js";
import { loadStopWords } from "./core/stopWords.js";
import { createLogger } from "./logger.js";

const env = parseEnv();
const logger = createLogger({ nodeEnv: env.NODE_ENV, level: env.LOG_LEVEL });

const config = resolveAnalyzerConfig({
  topWordsCount: env.TOP_WORDS_COUNT,
  locale: env.ANALYZER_LOCALE,
  stopWords: env.STOP_WORDS_FILE ? loadStopWords(env.STOP_WORDS_FILE) : undefined,
});

const { server, port } = await startServer({
  port: env.PORT,
  metricsEnabled: env.METRICS_ENABLED,
  maxBodyBytes: env.MAX_FILE_SIZE,
  config,
  logger,
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, "shutting down");
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

logger.info({ port, topWordsCount: config.topWordsCount, stopWords: config.stopWords.size }, "listening");
