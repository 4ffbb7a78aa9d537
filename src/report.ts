import fs from "node:fs/promises";

import { stringify } from "csv-stringify/sync";

import { compareUserIds } from "./aggregator";
import type { UserAggregate } from "./types";

const REPORT_COLUMNS = ["user_id", "aggregate_score", "flagged"] as const;

export function renderReport(aggregates: readonly UserAggregate[]): string {
  const rows = [...aggregates]
    .filter((aggregate) => aggregate.message_count > 0)
    .sort(compareUserIds)
    .map((aggregate) => ({
      user_id: aggregate.user_id,
      aggregate_score: aggregate.aggregate_score,
      flagged: aggregate.flagged
    }));

  return stringify(rows, {
    header: true,
    columns: [...REPORT_COLUMNS],
    record_delimiter: "unix",
    cast: {
      boolean: (value) => (value ? "true" : "false"),
      number: (value) => String(value)
    }
  });
}

export async function writeReport(
  filePath: string,
  aggregates: readonly UserAggregate[]
): Promise<void> {
  await fs.writeFile(filePath, renderReport(aggregates), "utf8");
}
