// Crawls pokemondb.net and fills the vector index without starting the server.
//   npm run ingest -- --limit 25 --start-from 0
import { parseArgs } from "util";

import { createServices } from "@app/container";
import { logger } from "@infrastructure/logging/Logger";
import { normalizeCrawlLimit } from "@interfaces/http/ingest/schema";

async function run(): Promise<void> {
  const { values } = parseArgs({
    options: {
      limit: { type: "string", default: "10" },
      "start-from": { type: "string", default: "0" },
    },
  });

  const services = createServices();

  try {
    const result = await services.ingest.ingest({
      source: "pokemondb",
      crawlLimit: normalizeCrawlLimit(Number(values.limit) || 0),
      startFrom: Math.max(0, Number(values["start-from"]) || 0),
    });

    logger.log("info", "INGEST_SCRIPT_DONE", { ...result });
  } finally {
    await services.close();
  }
}

run().catch((error: unknown) => {
  logger.log("error", "INGEST_SCRIPT_FAILED", {
    message: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
});
