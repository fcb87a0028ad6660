import { normalizeEntityId, type EntityId } from './identity';

export interface LeaderboardEntry {
  entityId: EntityId;
  displayName: string | null;
  rank: number | null;
  score: number;
  tier: number | null;
  page: number;
  /** First-seen position across the whole listing; the tie-break key. */
  sequence: number;
}

export interface CandidateEntry extends Omit<LeaderboardEntry, 'entityId'> {
  entityId: EntityId | null;
}

export interface DedupeOutcome {
  entries: LeaderboardEntry[];
  duplicatesDropped: number;
  invalidDropped: number;
}

export interface TargetStanding {
  entityId: EntityId | null;
  found: boolean;
  rank: number | null;
  score: number | null;
  tier: number | null;
}

export function dedupeEntries(candidates: readonly CandidateEntry[]): DedupeOutcome {
  const byId = new Map<EntityId, LeaderboardEntry>();
  let duplicatesDropped = 0;
  let invalidDropped = 0;

  for (const candidate of candidates) {
    const entityId = normalizeEntityId(candidate.entityId);
    if (entityId === null) {
      invalidDropped += 1;
      continue;
    }

    const entry: LeaderboardEntry = { ...candidate, entityId };
    const existing = byId.get(entityId);
    if (!existing) {
      byId.set(entityId, entry);
      continue;
    }

    duplicatesDropped += 1;
    if (entry.score > existing.score) {
      // Keep the original slot in first-seen order so ties elsewhere stay stable.
      byId.set(entityId, { ...entry, sequence: Math.min(existing.sequence, entry.sequence) });
    }
  }

  const entries = [...byId.values()].sort((a, b) => a.sequence - b.sequence);
  return { entries, duplicatesDropped, invalidDropped };
}

export function compareByScore(a: LeaderboardEntry, b: LeaderboardEntry): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  return a.sequence - b.sequence;
}

export function sortByScore(entries: readonly LeaderboardEntry[]): LeaderboardEntry[] {
  return [...entries].sort(compareByScore);
}

export function resolveTarget(entries: readonly LeaderboardEntry[], targetId: unknown): TargetStanding {
  const entityId = normalizeEntityId(targetId);
  const match = entityId === null ? undefined : entries.find((entry) => entry.entityId === entityId);

  if (!match) {
    return { entityId, found: false, rank: null, score: null, tier: null };
  }

  return {
    entityId,
    found: true,
    rank: match.rank,
    score: match.score,
    tier: match.tier,
  };
}

/**
 * Top `limit` entries of an already sorted listing. A target found in the
 * listing but outside the window is appended, so the result holds at most
 * `limit + 1` entries.
 */
export function selectTopEntries(
  sorted: readonly LeaderboardEntry[],
  limit: number,
  target: TargetStanding,
): LeaderboardEntry[] {
  const top = sorted.slice(0, Math.max(0, limit));
  if (!target.found || target.entityId === null) {
    return top;
  }

  if (top.some((entry) => entry.entityId === target.entityId)) {
    return top;
  }

  const targetEntry = sorted.find((entry) => entry.entityId === target.entityId);
  return targetEntry ? [...top, targetEntry] : top;
}

export function normalizeLimit(value: unknown, fallback: number, max: number): number {
  const clampLimit = (candidate: number): number => Math.min(Math.max(1, Math.floor(candidate)), Math.max(1, max));

  let numeric: number | null = null;
  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'string' && value.trim().length > 0) {
    numeric = Number(value.trim());
  }

  return numeric !== null && Number.isFinite(numeric) ? clampLimit(numeric) : clampLimit(fallback);
}
