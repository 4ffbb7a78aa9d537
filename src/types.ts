export type MessageStatus =
  | "pending"
  | "translated"
  | "scored"
  | "failed"
  | "skipped";

export type TerminalStatus = Extract<MessageStatus, "scored" | "failed" | "skipped">;

export const TERMINAL_STATUSES: ReadonlySet<MessageStatus> = new Set<MessageStatus>([
  "scored",
  "failed",
  "skipped"
]);

export function isTerminal(status: MessageStatus): status is TerminalStatus {
  return TERMINAL_STATUSES.has(status);
}

export interface MessageRecord {
  id: string;
  user_id: string;
  raw_text: string;
  language: string | null;
  translated_text: string | null;
  offensive_score: number | null;
  status: MessageStatus;
  status_reason: string | null;
}

export type AggregationRule = "sum" | "average" | "max";

export interface AggregationPolicy {
  rule: AggregationRule;
  threshold: number;
}

export interface UserTally {
  user_id: string;
  total_score: number;
  max_score: number | null;
  message_count: number;
}

export interface UserAggregate extends UserTally {
  aggregate_score: number;
  flagged: boolean;
}

export interface RejectedRow {
  line: number | null;
  reason: string;
}

export type RunState = "running" | "completed" | "aborted";

export interface RunSummary {
  state: RunState;
  total: number;
  resumed: number;
  scored: number;
  failed: number;
  skipped: number;
  rejected: number;
  aggregates: UserAggregate[];
}
