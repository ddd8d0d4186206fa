/**
 * Main module for Code Researcher
 */

import "dotenv/config";
import { fileURLToPath } from "url";
import { createProvider, checkProviderAvailability } from "./llm/index.js";
import { CodeResearcher, createPlanner } from "./research/index.js";
import { loadConfig, logger } from "./utils.js";

export * from "./rag/index.js";
export * from "./llm/index.js";
export * from "./research/index.js";
export * from "./errors/index.js";
export { loadConfig, logger, getConfigValue, formatDuration } from "./utils.js";
export type { Config, ProviderSettings } from "./utils.js";

async function main(): Promise<void> {
  logger.info("Starting Code Researcher...");

  const config = loadConfig();

  const availability = await checkProviderAvailability(config.provider);
  if (!availability.available) {
    logger.error(`Provider not available: ${availability.error}`);
    process.exit(1);
  }

  const provider = createProvider(config.provider);
  const researcher = new CodeResearcher({
    embedder: provider,
    generator: provider,
    planner: createPlanner(config.planner, provider, config.research.historyTurns),
    rag: config.rag,
    research: config.research,
  });

  const stats = await researcher.index(config.projectPath, {
    onProgress: (current, _total, stage) => {
      if (current % 50 === 0) logger.info(`[Main] ${current} files: ${stage}`);
    },
  });
  logger.info(
    `Indexed ${stats.filesIndexed} files (${stats.chunksAdded} new chunks, ` +
      `${stats.embeddingFailures} embedding failures)`
  );

  if (config.question === null) {
    logger.info("No QUESTION set, indexing only");
    return;
  }

  const answer = await researcher.ask(config.question);
  process.stdout.write(`${answer.text}\n`);

  if (answer.citations.length > 0) {
    process.stdout.write("\nSources:\n");
    for (const citation of answer.citations) {
      const symbol = citation.symbol ? ` (${citation.symbol})` : "";
      process.stdout.write(
        `  ${citation.path}:${citation.startLine}-${citation.endLine}${symbol}\n`
      );
    }
  }

  if (answer.status === "failed") {
    process.exitCode = 1;
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    logger.error("Fatal error:", error);
    process.exit(1);
  });
}

export { main };
