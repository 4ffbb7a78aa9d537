import { Command } from "commander";

import { ScoringClient, TranslationClient } from "./clients";
import { PgCheckpointStore } from "./checkpoint";
import { config } from "./config";
import { createPool, runSchemaMigration } from "./db";
import { ModerationPipeline } from "./pipeline";
import { writeReport } from "./report";
import { fingerprintInput, readMessages } from "./source";

interface RunOptions {
  inputFile: string;
  outputFile: string;
  batch?: string;
  migrate?: boolean;
}

async function runCommand(options: RunOptions): Promise<void> {
  const pool = createPool(config.DATABASE_URL);
  try {
    if (options.migrate) {
      await runSchemaMigration(pool);
    }

    const batchId = options.batch ?? (await fingerprintInput(options.inputFile));
    const retry = {
      maxAttempts: config.RETRY_MAX_ATTEMPTS,
      baseDelayMs: config.RETRY_BASE_DELAY_MS,
      maxDelayMs: config.RETRY_MAX_DELAY_MS
    };

    const pipeline = new ModerationPipeline({
      store: new PgCheckpointStore(pool, {
        batchId,
        policy: { rule: config.AGGREGATION_RULE, threshold: config.FLAG_THRESHOLD }
      }),
      translator: new TranslationClient(
        { url: config.TRANSLATION_URL, timeoutMs: config.REQUEST_TIMEOUT_MS, retry },
        config.TARGET_LANGUAGE
      ),
      scorer: new ScoringClient({
        url: config.SCORING_URL,
        timeoutMs: config.REQUEST_TIMEOUT_MS,
        retry
      }),
      concurrency: config.WORKER_CONCURRENCY,
      translation: {
        enabled: config.TRANSLATION_ENABLED,
        targetLanguage: config.TARGET_LANGUAGE,
        translateUnknownLanguage: config.TRANSLATE_UNKNOWN_LANGUAGE
      }
    });

    console.log(`Processing ${options.inputFile} as batch ${batchId}`);
    const summary = await pipeline.run(
      readMessages(options.inputFile, { onRejected: (row) => pipeline.reject(row) })
    );
    await writeReport(options.outputFile, summary.aggregates);

    const flagged = summary.aggregates.filter((aggregate) => aggregate.flagged).length;
    console.log(
      `Run completed: ${summary.total} messages (${summary.resumed} already done, ` +
        `${summary.scored} scored, ${summary.failed} failed, ${summary.skipped} skipped, ` +
        `${summary.rejected} rejected). ${flagged} of ${summary.aggregates.length} users flagged.`
    );
  } finally {
    await pool.end();
  }
}

async function migrateCommand(): Promise<void> {
  const pool = createPool(config.DATABASE_URL);
  try {
    await runSchemaMigration(pool);
    console.log("Schema migration completed.");
  } finally {
    await pool.end();
  }
}

const program = new Command()
  .name("user-flag")
  .description("Scores user messages and reports users posting offensive content.");

program
  .command("run")
  .description("Process an input CSV and write the per-user report")
  .requiredOption("-I, --input-file <path>", "location of the input file")
  .requiredOption("-O, --output-file <path>", "location of the output file")
  .option("--batch <id>", "checkpoint batch id (defaults to a hash of the input file)")
  .option("--migrate", "apply the database schema before running")
  .action(runCommand);

program
  .command("migrate")
  .description("Apply the database schema")
  .action(migrateCommand);

program.parseAsync(process.argv).catch((error) => {
  console.error("Fatal error", error);
  process.exit(1);
});
