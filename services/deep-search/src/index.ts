/**
 * @deepsearch/service
 * Command-line entry point: run one research session and print the report
 */

import "dotenv/config";
import { getBaseConfig, logger, wrapError } from "@deepsearch/core";
import { createResearchSystem } from "./systems/research/system.js";
import type { ResearchResults } from "./systems/research/types.js";

const DEFAULT_TOPIC = "Recent advances in solid-state battery manufacturing";

function printSection(title: string, lines: string[]): void {
  if (lines.length === 0) {
    return;
  }
  console.log("=".repeat(60));
  console.log(title);
  console.log("=".repeat(60));
  for (const line of lines) {
    console.log(line);
  }
  console.log();
}

function printResults(results: ResearchResults): void {
  printSection("REPORT", [results.mainReport]);
  printSection("KEY LEARNINGS", results.keyLearnings.map((learning) => `- ${learning}`));
  printSection("AREAS COVERED", results.areasCovered.map((area) => `- ${area}`));
  printSection("AREAS TO EXPLORE", results.areasToExplore.map((area) => `- ${area}`));
  if (results.additionalNotes) {
    printSection("NOTES", [results.additionalNotes]);
  }
}

async function main(): Promise<number> {
  const config = getBaseConfig();
  logger.configure({ level: config.env.logLevel, format: config.env.logFormat });

  const topic = process.argv[2] ?? DEFAULT_TOPIC;
  const depthArg = process.argv[3];
  const settings = depthArg === undefined ? undefined : { maxDepth: Number(depthArg) };

  console.log("Topic:", topic);
  console.log("Depth:", settings?.maxDepth ?? config.research.maxDepth);
  console.log();

  const system = createResearchSystem({ config });
  const session = await system.run(topic, settings);
  const status = session.getStatus();
  const results = session.getResults();

  if (status.state !== "completed" || !results) {
    console.error(`Research ${status.state}: ${status.error ?? "no results"}`);
    return 1;
  }

  printResults(results);
  console.log(
    `Session ${status.sessionId} completed ${session.getRounds().length} rounds`
  );
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error("Research run failed", wrapError(error, "Research run failed"));
    process.exitCode = 1;
  });
