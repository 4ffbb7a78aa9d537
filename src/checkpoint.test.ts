import type { Pool } from "pg";
import { describe, expect, it, vi } from "vitest";

import { PgCheckpointStore } from "./checkpoint";
import { CheckpointStoreError } from "./errors";

interface FakeResult {
  rows: unknown[];
  rowCount: number;
}

type Responder = (sql: string, params: unknown[]) => FakeResult;

const EMPTY: FakeResult = { rows: [], rowCount: 0 };

function compact(sql: string): string {
  return sql.replace(/\s+/g, " ").trim();
}

function fakePool(respond: Responder) {
  const statements: string[] = [];
  const query = vi.fn(async (sql: string, params: unknown[] = []) => {
    const text = compact(sql);
    statements.push(text);
    return respond(text, params);
  });
  const client = { query, release: vi.fn() };
  const pool = { query, connect: vi.fn(async () => client) };
  return {
    pool: pool as unknown as Pool,
    client,
    query,
    statements
  };
}

function store(pool: Pool) {
  return new PgCheckpointStore(pool, {
    batchId: "batch-1",
    policy: { rule: "sum", threshold: 5 }
  });
}

describe("PgCheckpointStore", () => {
  it("returns null for a message it has never seen", async () => {
    const fake = fakePool(() => EMPTY);

    await expect(store(fake.pool).loadStatus("row-1")).resolves.toBeNull();
    expect(fake.query).toHaveBeenCalledWith(expect.stringContaining("SELECT status"), [
      "batch-1",
      "row-1"
    ]);
  });

  it("scores a message and folds the score into the user aggregate in one transaction", async () => {
    const fake = fakePool((sql) => {
      if (sql.startsWith("UPDATE messages") && sql.includes("RETURNING user_id")) {
        return { rows: [{ user_id: "u1" }], rowCount: 1 };
      }
      if (sql.startsWith("SELECT user_id, total_score")) {
        return {
          rows: [{ user_id: "u1", total_score: 2, max_score: 2, message_count: 1 }],
          rowCount: 1
        };
      }
      return EMPTY;
    });

    await expect(store(fake.pool).recordScore("row-2", 0.5)).resolves.toBe(true);

    expect(fake.statements[0]).toBe("BEGIN");
    expect(fake.statements.at(-1)).toBe("COMMIT");
    expect(fake.statements[2]).toMatch(/^INSERT INTO user_aggregates/);
    expect(fake.query).toHaveBeenCalledWith(
      expect.stringContaining("SET total_score = $3"),
      ["batch-1", "u1", 2.5, 2, 2]
    );
    expect(fake.client.release).toHaveBeenCalledTimes(1);
  });

  it("leaves the aggregate alone when the message is already terminal", async () => {
    const fake = fakePool(() => EMPTY);

    await expect(store(fake.pool).recordScore("row-2", 0.5)).resolves.toBe(false);

    expect(fake.statements).toHaveLength(3);
    expect(fake.statements.some((sql) => sql.includes("user_aggregates"))).toBe(false);
    expect(fake.statements.at(-1)).toBe("COMMIT");
  });

  it("rolls back the score when the aggregate update fails", async () => {
    const fake = fakePool((sql) => {
      if (sql.includes("RETURNING user_id")) {
        return { rows: [{ user_id: "u1" }], rowCount: 1 };
      }
      if (sql.startsWith("SELECT user_id, total_score")) {
        return {
          rows: [{ user_id: "u1", total_score: 0, max_score: null, message_count: 0 }],
          rowCount: 1
        };
      }
      if (sql.startsWith("UPDATE user_aggregates")) {
        throw new Error("could not serialize access");
      }
      return EMPTY;
    });

    const failure = store(fake.pool).recordScore("row-2", 1);

    await expect(failure).rejects.toBeInstanceOf(CheckpointStoreError);
    await expect(failure).rejects.toThrow(
      "Checkpoint store recordScore failed: could not serialize access"
    );
    expect(fake.statements.at(-1)).toBe("ROLLBACK");
    expect(fake.statements).not.toContain("COMMIT");
    expect(fake.client.release).toHaveBeenCalledTimes(1);
  });

  it("wraps connection errors as checkpoint store failures", async () => {
    const fake = fakePool(() => {
      throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
    });

    await expect(store(fake.pool).loadStatus("row-1")).rejects.toThrow(
      "Checkpoint store loadStatus failed: connect ECONNREFUSED 127.0.0.1:5432"
    );
  });

  it("only moves open messages to failed", async () => {
    const fake = fakePool((sql) =>
      sql.startsWith("UPDATE messages") ? { rows: [], rowCount: 1 } : EMPTY
    );

    await expect(store(fake.pool).recordFailure("row-3", "scoring timed out")).resolves.toBe(
      true
    );
    expect(fake.statements[0]).toContain("AND status IN ('pending', 'translated')");
    expect(fake.query).toHaveBeenCalledWith(expect.any(String), [
      "batch-1",
      "row-3",
      "failed",
      "scoring timed out"
    ]);
  });

  it("registers a pending message once", async () => {
    let inserted = false;
    const fake = fakePool(() => {
      const result = { rows: [], rowCount: inserted ? 0 : 1 };
      inserted = true;
      return result;
    });
    const checkpoints = store(fake.pool);
    const record = {
      id: "row-1",
      user_id: "u1",
      raw_text: "hello",
      language: "en",
      translated_text: null,
      offensive_score: null,
      status: "pending" as const,
      status_reason: null
    };

    await expect(checkpoints.recordPending(record)).resolves.toBe(true);
    await expect(checkpoints.recordPending(record)).resolves.toBe(false);
    expect(fake.statements[0]).toContain("ON CONFLICT (batch_id, id) DO NOTHING");
  });

  it("finalizes aggregates in user order and persists the flags", async () => {
    const fake = fakePool((sql) => {
      if (sql.startsWith("SELECT user_id, total_score")) {
        return {
          rows: [
            { user_id: "u2", total_score: 1, max_score: 1, message_count: 1 },
            { user_id: "u1", total_score: 9, max_score: 9, message_count: 2 }
          ],
          rowCount: 2
        };
      }
      return EMPTY;
    });

    const aggregates = await store(fake.pool).finalize();

    expect(aggregates).toEqual([
      {
        user_id: "u1",
        total_score: 9,
        max_score: 9,
        message_count: 2,
        aggregate_score: 9,
        flagged: true
      },
      {
        user_id: "u2",
        total_score: 1,
        max_score: 1,
        message_count: 1,
        aggregate_score: 1,
        flagged: false
      }
    ]);
    expect(fake.query).toHaveBeenCalledWith(expect.stringContaining("SET aggregate_score"), [
      "batch-1",
      "u1",
      9,
      true
    ]);
    expect(fake.statements.at(-1)).toBe("COMMIT");
  });
});
