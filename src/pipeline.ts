import pLimit from "p-limit";

import type { CheckpointStore } from "./checkpoint";
import { PipelineAbortedError, RemoteCallError } from "./errors";
import {
  isTerminal,
  type MessageRecord,
  type RejectedRow,
  type RunState,
  type RunSummary
} from "./types";

export interface Translator {
  translate(text: string, sourceLanguage?: string): Promise<string>;
}

export interface Scorer {
  score(text: string): Promise<number>;
}

export interface TranslationSettings {
  enabled: boolean;
  targetLanguage: string;
  /** Whether records without a language are sent for translation. */
  translateUnknownLanguage: boolean;
}

export interface PipelineOptions {
  store: CheckpointStore;
  translator: Translator;
  scorer: Scorer;
  concurrency: number;
  translation: TranslationSettings;
}

interface RunCounts {
  total: number;
  resumed: number;
  scored: number;
  failed: number;
  skipped: number;
  rejected: number;
}

function emptyCounts(): RunCounts {
  return { total: 0, resumed: 0, scored: 0, failed: 0, skipped: 0, rejected: 0 };
}

export function needsTranslation(
  record: Pick<MessageRecord, "language">,
  settings: TranslationSettings
): boolean {
  if (!settings.enabled) return false;
  if (record.language === null) return settings.translateUnknownLanguage;
  return record.language !== settings.targetLanguage;
}

export class ModerationPipeline {
  private runState: RunState | "idle" = "idle";
  private counts = emptyCounts();
  private aborted = false;
  private abortCause: unknown = null;

  constructor(private readonly options: PipelineOptions) {}

  get state(): RunState | "idle" {
    return this.runState;
  }

  /** Counts a row the message source refused; hook it up as the source's `onRejected`. */
  reject(row: RejectedRow): void {
    this.counts.rejected += 1;
    const where = row.line === null ? "unknown line" : `line ${row.line}`;
    console.warn(`Skipping malformed row at ${where}: ${row.reason}`);
  }

  async run(source: AsyncIterable<MessageRecord>): Promise<RunSummary> {
    this.runState = "running";
    this.counts = emptyCounts();
    this.aborted = false;
    this.abortCause = null;

    const { concurrency } = this.options;
    const limit = pLimit(concurrency);
    const inFlight = new Set<Promise<void>>();

    try {
      for await (const record of source) {
        if (this.aborted) break;
        this.counts.total += 1;
        const task: Promise<void> = limit(() => this.dispatch(record)).finally(() => {
          inFlight.delete(task);
        });
        inFlight.add(task);
        if (limit.pendingCount >= concurrency) {
          await Promise.race(inFlight);
        }
      }
    } catch (error) {
      this.abort(error);
    }

    await Promise.all(inFlight);

    if (!this.aborted) {
      try {
        const aggregates = await this.options.store.finalize();
        this.runState = "completed";
        return { state: "completed", ...this.counts, aggregates };
      } catch (error) {
        this.abort(error);
      }
    }

    this.runState = "aborted";
    throw new PipelineAbortedError({ cause: this.abortCause });
  }

  private abort(cause: unknown): void {
    if (this.aborted) return;
    this.aborted = true;
    this.abortCause = cause;
    console.error("Pipeline aborting, no further messages will be dispatched", cause);
  }

  private async dispatch(record: MessageRecord): Promise<void> {
    if (this.aborted) return;
    try {
      await this.process(record);
    } catch (error) {
      this.abort(error);
    }
  }

  private async process(record: MessageRecord): Promise<void> {
    const { store, translator, scorer, translation } = this.options;

    const status = await store.loadStatus(record.id);
    if (status !== null && isTerminal(status)) {
      this.counts.resumed += 1;
      return;
    }
    if (status === null) {
      await store.recordPending(record);
    }

    if (record.raw_text.trim() === "") {
      if (await store.recordSkip(record.id, "empty message")) {
        this.counts.skipped += 1;
      }
      return;
    }

    try {
      let text = record.raw_text;
      if (status === "translated") {
        text = (await store.loadTranslation(record.id)) ?? record.raw_text;
      } else if (needsTranslation(record, translation)) {
        text = await translator.translate(record.raw_text, record.language ?? undefined);
        await store.recordTranslation(record.id, text);
      }

      const score = await scorer.score(text);
      if (await store.recordScore(record.id, score)) {
        this.counts.scored += 1;
      } else {
        console.warn(`Message ${record.id} was already terminal, score ignored`);
      }
    } catch (error) {
      if (!(error instanceof RemoteCallError)) {
        throw error;
      }
      console.warn(`Message ${record.id} failed: ${error.message}`);
      if (await store.recordFailure(record.id, error.message)) {
        this.counts.failed += 1;
      }
    }
  }
}
