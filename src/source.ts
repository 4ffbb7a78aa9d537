import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

import { parse } from "csv-parse";
import { z } from "zod";

import type { MessageRecord, RejectedRow } from "./types";

export interface ReadMessagesOptions {
  onRejected?: (rejected: RejectedRow) => void;
}

const parsedEntrySchema = z.object({
  info: z.object({ lines: z.number() }),
  record: z.record(z.unknown())
});

const rowSchema = z.object({
  id: z.string().trim().optional(),
  user_id: z
    .string({ required_error: "missing user_id" })
    .trim()
    .min(1, "empty user_id"),
  message: z.string({ required_error: "missing message" }),
  language: z.string().trim().toLowerCase().optional()
});

function logRejected(rejected: RejectedRow): void {
  const where = rejected.line === null ? "unknown line" : `line ${rejected.line}`;
  console.warn(`Skipping malformed row at ${where}: ${rejected.reason}`);
}

function hasUnreadableText(record: Record<string, unknown>): boolean {
  return Object.values(record).some(
    (value) => typeof value === "string" && value.includes("\uFFFD")
  );
}

/**
 * Streams message rows from a CSV file in input order. Each call re-opens the
 * file, so iterating twice yields the same records with the same ids.
 *
 * Rows without an explicit `id` column value are identified by their position
 * among the parsed records (`row-1`, `row-2`, ...). Rows rejected after
 * parsing still take up a position.
 */
export async function* readMessages(
  filePath: string,
  options: ReadMessagesOptions = {}
): AsyncGenerator<MessageRecord> {
  const onRejected = options.onRejected ?? logRejected;
  const input = createReadStream(filePath);
  const parser = parse({
    columns: true,
    bom: true,
    info: true,
    skip_empty_lines: true,
    relax_column_count: true,
    skip_records_with_error: true
  });
  input.on("error", (error) => parser.destroy(error));
  input.pipe(parser);
  parser.on("skip", (error: Error & { lines?: number }) => {
    onRejected({
      line: typeof error.lines === "number" ? error.lines : null,
      reason: error.message
    });
  });

  const seenIds = new Set<string>();
  let position = 0;

  try {
    for await (const entry of parser) {
      const parsedEntry = parsedEntrySchema.safeParse(entry);
      if (!parsedEntry.success) {
        continue;
      }
      position += 1;
      const { info, record } = parsedEntry.data;

      if (hasUnreadableText(record)) {
        onRejected({ line: info.lines, reason: "unreadable text encoding" });
        continue;
      }

      const row = rowSchema.safeParse(record);
      if (!row.success) {
        onRejected({
          line: info.lines,
          reason: row.error.issues.map((issue) => issue.message).join("; ")
        });
        continue;
      }

      const id = row.data.id ? row.data.id : `row-${position}`;
      if (seenIds.has(id)) {
        onRejected({ line: info.lines, reason: `duplicate message id ${id}` });
        continue;
      }
      seenIds.add(id);

      yield {
        id,
        user_id: row.data.user_id,
        raw_text: row.data.message,
        language: row.data.language ? row.data.language : null,
        translated_text: null,
        offensive_score: null,
        status: "pending",
        status_reason: null
      };
    }
  } finally {
    input.destroy();
  }
}

/** Content hash of the input file, used as the default checkpoint batch id. */
export async function fingerprintInput(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex").slice(0, 16);
}
