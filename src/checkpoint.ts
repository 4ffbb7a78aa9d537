import type { Pool, PoolClient } from "pg";

import { applyScore, compareUserIds, finalizeTally } from "./aggregator";
import { withTransaction } from "./db";
import { CheckpointStoreError } from "./errors";
import type {
  AggregationPolicy,
  MessageRecord,
  MessageStatus,
  UserAggregate,
  UserTally
} from "./types";

/**
 * Durable per-message status and per-user running aggregates for one batch.
 *
 * Every `record*` transition is guarded by the record's current status and
 * resolves to `false` when the record had already moved past it. Storage
 * failures reject with {@link CheckpointStoreError}.
 */
export interface CheckpointStore {
  loadStatus(id: string): Promise<MessageStatus | null>;
  loadTranslation(id: string): Promise<string | null>;
  recordPending(record: MessageRecord): Promise<boolean>;
  recordTranslation(id: string, translatedText: string): Promise<boolean>;
  /** Marks the message scored and folds the score into its user's aggregate, atomically. */
  recordScore(id: string, offensiveScore: number): Promise<boolean>;
  recordFailure(id: string, reason: string): Promise<boolean>;
  recordSkip(id: string, reason: string): Promise<boolean>;
  /** Evaluates the flagging rule for every aggregate; result is ordered by user_id. */
  finalize(): Promise<UserAggregate[]>;
}

export interface PgCheckpointStoreOptions {
  batchId: string;
  policy: AggregationPolicy;
}

export class PgCheckpointStore implements CheckpointStore {
  constructor(
    private readonly pool: Pool,
    private readonly options: PgCheckpointStoreOptions
  ) {}

  get batchId(): string {
    return this.options.batchId;
  }

  async loadStatus(id: string): Promise<MessageStatus | null> {
    return this.guard("loadStatus", async () => {
      const rows = await this.pool.query<{ status: MessageStatus }>(
        `
        SELECT status
        FROM messages
        WHERE batch_id = $1 AND id = $2
        `,
        [this.batchId, id]
      );
      return rows.rows[0]?.status ?? null;
    });
  }

  async loadTranslation(id: string): Promise<string | null> {
    return this.guard("loadTranslation", async () => {
      const rows = await this.pool.query<{ translated_text: string | null }>(
        `
        SELECT translated_text
        FROM messages
        WHERE batch_id = $1 AND id = $2
        `,
        [this.batchId, id]
      );
      return rows.rows[0]?.translated_text ?? null;
    });
  }

  async recordPending(record: MessageRecord): Promise<boolean> {
    return this.guard("recordPending", async () => {
      const inserted = await this.pool.query(
        `
        INSERT INTO messages (
          batch_id,
          id,
          user_id,
          raw_text,
          language,
          status
        )
        VALUES ($1, $2, $3, $4, $5, 'pending')
        ON CONFLICT (batch_id, id) DO NOTHING
        `,
        [this.batchId, record.id, record.user_id, record.raw_text, record.language]
      );
      return (inserted.rowCount ?? 0) > 0;
    });
  }

  async recordTranslation(id: string, translatedText: string): Promise<boolean> {
    return this.guard("recordTranslation", async () => {
      const updated = await this.pool.query(
        `
        UPDATE messages
        SET status = 'translated',
            translated_text = $3,
            updated_at = NOW()
        WHERE batch_id = $1
          AND id = $2
          AND status = 'pending'
        `,
        [this.batchId, id, translatedText]
      );
      return (updated.rowCount ?? 0) > 0;
    });
  }

  async recordScore(id: string, offensiveScore: number): Promise<boolean> {
    return this.guard("recordScore", () =>
      withTransaction(this.pool, async (client) => {
        const scored = await client.query<{ user_id: string }>(
          `
          UPDATE messages
          SET status = 'scored',
              offensive_score = $3,
              status_reason = NULL,
              updated_at = NOW()
          WHERE batch_id = $1
            AND id = $2
            AND status IN ('pending', 'translated')
          RETURNING user_id
          `,
          [this.batchId, id, offensiveScore]
        );

        const userId = scored.rows[0]?.user_id;
        if (userId === undefined) {
          return false;
        }

        const tally = await this.lockTally(client, userId);
        const next = applyScore(tally, offensiveScore);
        await client.query(
          `
          UPDATE user_aggregates
          SET total_score = $3,
              max_score = $4,
              message_count = $5,
              updated_at = NOW()
          WHERE batch_id = $1 AND user_id = $2
          `,
          [this.batchId, userId, next.total_score, next.max_score, next.message_count]
        );
        return true;
      })
    );
  }

  async recordFailure(id: string, reason: string): Promise<boolean> {
    return this.guard("recordFailure", () => this.closeOut(id, "failed", reason));
  }

  async recordSkip(id: string, reason: string): Promise<boolean> {
    return this.guard("recordSkip", () => this.closeOut(id, "skipped", reason));
  }

  async finalize(): Promise<UserAggregate[]> {
    return this.guard("finalize", () =>
      withTransaction(this.pool, async (client) => {
        const rows = await client.query<UserTally>(
          `
          SELECT user_id, total_score, max_score, message_count
          FROM user_aggregates
          WHERE batch_id = $1
            AND message_count > 0
          FOR UPDATE
          `,
          [this.batchId]
        );

        const aggregates = rows.rows
          .map((row) =>
            finalizeTally(
              {
                user_id: row.user_id,
                total_score: row.total_score,
                max_score: row.max_score,
                message_count: row.message_count
              },
              this.options.policy
            )
          )
          .sort(compareUserIds);

        for (const aggregate of aggregates) {
          await client.query(
            `
            UPDATE user_aggregates
            SET aggregate_score = $3,
                flagged = $4,
                finalized_at = NOW()
            WHERE batch_id = $1 AND user_id = $2
            `,
            [this.batchId, aggregate.user_id, aggregate.aggregate_score, aggregate.flagged]
          );
        }
        return aggregates;
      })
    );
  }

  private async lockTally(client: PoolClient, userId: string): Promise<UserTally> {
    await client.query(
      `
      INSERT INTO user_aggregates (batch_id, user_id)
      VALUES ($1, $2)
      ON CONFLICT (batch_id, user_id) DO NOTHING
      `,
      [this.batchId, userId]
    );
    const locked = await client.query<UserTally>(
      `
      SELECT user_id, total_score, max_score, message_count
      FROM user_aggregates
      WHERE batch_id = $1 AND user_id = $2
      FOR UPDATE
      `,
      [this.batchId, userId]
    );
    const row = locked.rows[0];
    if (!row) {
      throw new Error(`Aggregate row for user ${userId} vanished inside its transaction`);
    }
    return row;
  }

  private async closeOut(
    id: string,
    status: "failed" | "skipped",
    reason: string
  ): Promise<boolean> {
    const updated = await this.pool.query(
      `
      UPDATE messages
      SET status = $3,
          status_reason = $4,
          updated_at = NOW()
      WHERE batch_id = $1
        AND id = $2
        AND status IN ('pending', 'translated')
      `,
      [this.batchId, id, status, reason]
    );
    return (updated.rowCount ?? 0) > 0;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new CheckpointStoreError(operation, { cause: error });
    }
  }
}
