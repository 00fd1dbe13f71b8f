import { releaseHeldLocks } from "./enrichment/checkpoint";
import { logError } from "./enrichment/logger";
import { parseEnrichmentOptions } from "./enrichment/options";
import { listDefinitionIds, resolveConfigFromEnv, runEnrichment } from "./enrichment/pipeline";

async function main() {
  const { overrides, all } = parseEnrichmentOptions(process.argv.slice(2));
  const baseConfig = resolveConfigFromEnv(overrides);
  const lists = all ? await listDefinitionIds(baseConfig.listDir) : [baseConfig.list];

  console.log("Starting enrichment pipeline with config:", {
    lists,
    provider: baseConfig.provider,
    enableAi: baseConfig.enableAi,
    resume: baseConfig.resume,
    sampleLimit: baseConfig.sampleLimit,
    validationPolicy: baseConfig.validationPolicy,
  });

  for (const list of lists) {
    const result = await runEnrichment({ ...baseConfig, list, outputPath: all ? undefined : baseConfig.outputPath });

    console.log(`\n${result.list.name}`);
    console.log(`Loaded ${result.items} items, ${result.pending} pending.`);
    if (result.skippedReason) {
      console.log(`Generation skipped: ${result.skippedReason}`);
    } else if (result.scheduled) {
      console.log(
        `Completed ${result.scheduled.completedBatches}/${result.scheduled.totalBatches} batches, `
          + `saved ${result.scheduled.appended} records (${result.scheduled.rejected} rejected).`,
      );
      if (result.scheduled.missing.length) {
        console.log(`${result.scheduled.missing.length} items were missing from responses and stay pending.`);
      }
    }

    const { totalWords, withPhonetic, withExamples } = result.stats;
    const percent = (count: number) => (totalWords ? ((100 * count) / totalWords).toFixed(1) : "0.0");
    console.log(`Output written to ${result.outputPath}`);
    console.log(`  Total words: ${totalWords}`);
    console.log(`  With phonetic: ${withPhonetic} (${percent(withPhonetic)}%)`);
    console.log(`  With 2+ examples: ${withExamples} (${percent(withExamples)}%)`);
  }
}

const shutdown = async (signal: NodeJS.Signals, exitCode: number) => {
  console.log(`Received ${signal}, releasing checkpoint locks. Re-run to resume.`);
  try {
    await releaseHeldLocks();
    process.exit(exitCode);
  } catch (error) {
    logError(error);
    process.exit(1);
  }
};

process.on("SIGINT", () => void shutdown("SIGINT", 130));
process.on("SIGTERM", () => void shutdown("SIGTERM", 143));

main().catch((error) => {
  console.error("Enrichment pipeline failed.");
  logError(error);
  process.exitCode = 1;
});
