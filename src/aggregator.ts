import type {
  AggregationPolicy,
  AggregationRule,
  UserAggregate,
  UserTally
} from "./types";

// Pure combination rules. Whether a score has already been applied is decided
// by the checkpoint store's status transition, never here.

export function emptyTally(userId: string): UserTally {
  return {
    user_id: userId,
    total_score: 0,
    max_score: null,
    message_count: 0
  };
}

export function applyScore(tally: UserTally, score: number): UserTally {
  return {
    user_id: tally.user_id,
    total_score: tally.total_score + score,
    max_score: tally.max_score === null ? score : Math.max(tally.max_score, score),
    message_count: tally.message_count + 1
  };
}

export function aggregateScore(tally: UserTally, rule: AggregationRule): number {
  if (tally.message_count === 0) return 0;
  switch (rule) {
    case "sum":
      return tally.total_score;
    case "average":
      return tally.total_score / tally.message_count;
    case "max":
      return tally.max_score ?? 0;
  }
}

// Totals accumulate in completion order; finalized values must not depend on it.
const SCORE_PRECISION = 1e6;

export function roundScore(value: number): number {
  return Math.round(value * SCORE_PRECISION) / SCORE_PRECISION;
}

export function finalizeTally(
  tally: UserTally,
  policy: AggregationPolicy
): UserAggregate {
  const aggregate = roundScore(aggregateScore(tally, policy.rule));
  return {
    ...tally,
    total_score: roundScore(tally.total_score),
    aggregate_score: aggregate,
    flagged: aggregate > policy.threshold
  };
}

export function compareUserIds(
  a: Pick<UserTally, "user_id">,
  b: Pick<UserTally, "user_id">
): number {
  if (a.user_id < b.user_id) return -1;
  if (a.user_id > b.user_id) return 1;
  return 0;
}
