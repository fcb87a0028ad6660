import { normalizeEntityId, type EntityId } from './identity';

export type JsonRecord = Record<string, unknown>;

export type FieldAliases = readonly string[];

/** Accepted field names per logical attribute, in lookup order. */
export const LISTING_FIELDS = {
  entries: ['list', 'room_list', 'ranking', 'entries'],
  nextPage: ['next_page', 'nextPage', 'has_next'],
} as const satisfies Record<string, FieldAliases>;

export const ENTRY_FIELDS = {
  entityId: ['room_id', 'roomId', 'id'],
  displayName: ['room_name', 'roomName', 'name'],
  rank: ['rank', 'order_no'],
  score: ['point', 'points', 'score'],
  tierContainer: ['event_entry', 'entry'],
  tier: ['quest_level', 'level'],
} as const satisfies Record<string, FieldAliases>;

export const TOTAL_COUNT_FIELDS: FieldAliases = ['total_entries', 'total_count', 'entry_count', 'total'];

export const PROFILE_FIELDS = {
  displayName: ['room_name', 'main_name'],
  level: ['room_level', 'level'],
  tierLabel: ['show_rank_subdivided', 'rank_label', 'tier_label'],
  followerCount: ['follower_num', 'follower_count', 'followers'],
  streakDays: ['live_continuous_days', 'streak_days'],
  isVerified: ['is_official', 'is_verified', 'verified'],
} as const satisfies Record<string, FieldAliases>;

function isRecord(value: unknown): value is JsonRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonRecord | null {
  return isRecord(value) ? value : null;
}

export function pickField(record: JsonRecord, aliases: FieldAliases): unknown {
  for (const alias of aliases) {
    if (Object.prototype.hasOwnProperty.call(record, alias) && record[alias] !== undefined) {
      return record[alias];
    }
  }
  return undefined;
}

export function hasAnyField(record: JsonRecord, aliases: FieldAliases): boolean {
  return aliases.some((alias) => Object.prototype.hasOwnProperty.call(record, alias));
}

/** First alias holding an array, skipping aliases present with another type. */
export function pickList(record: JsonRecord, aliases: FieldAliases): unknown[] | null {
  for (const alias of aliases) {
    const candidate = record[alias];
    if (Array.isArray(candidate)) {
      return candidate;
    }
  }
  return null;
}

export function readInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'string') {
    const cleaned = value.replace(/[,\s]/g, '');
    if (!/^[+-]?\d+(\.\d+)?$/.test(cleaned)) {
      return null;
    }
    const parsed = Number(cleaned);
    return Number.isFinite(parsed) ? Math.trunc(parsed) : null;
  }
  return null;
}

export function readString(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

export function readBoolean(value: unknown): boolean | null {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (value === 1) {
      return true;
    }
    return value === 0 ? false : null;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes'].includes(normalized)) {
      return true;
    }
    if (['0', 'false', 'no'].includes(normalized)) {
      return false;
    }
  }
  return null;
}

export interface RawLeaderboardEntry {
  entityId: EntityId | null;
  displayName: string | null;
  rank: number | null;
  score: number;
  tier: number | null;
}

export function parseLeaderboardEntry(value: unknown): RawLeaderboardEntry | null {
  const record = asRecord(value);
  if (!record) {
    return null;
  }

  const tierContainer = asRecord(pickField(record, ENTRY_FIELDS.tierContainer));

  return {
    entityId: normalizeEntityId(pickField(record, ENTRY_FIELDS.entityId)),
    displayName: readString(pickField(record, ENTRY_FIELDS.displayName)),
    rank: readInteger(pickField(record, ENTRY_FIELDS.rank)),
    score: readInteger(pickField(record, ENTRY_FIELDS.score)) ?? 0,
    tier: tierContainer ? readInteger(pickField(tierContainer, ENTRY_FIELDS.tier)) : null,
  };
}

export interface ListingPage {
  entries: unknown[];
  hasNextPage: boolean | null;
}

/** `null` when the body is not an object or carries no list-typed field. */
export function parseListingPage(body: unknown): ListingPage | null {
  const record = asRecord(body);
  if (!record) {
    return null;
  }

  const entries = pickList(record, LISTING_FIELDS.entries);
  if (!entries) {
    return null;
  }

  let hasNextPage: boolean | null = null;
  if (hasAnyField(record, LISTING_FIELDS.nextPage)) {
    const signal = pickField(record, LISTING_FIELDS.nextPage);
    hasNextPage = signal !== null && signal !== undefined && signal !== false && signal !== 0 && signal !== '';
  }

  return { entries, hasNextPage };
}

export function parseTotalCount(body: unknown): number | null {
  const record = asRecord(body);
  if (!record) {
    return null;
  }
  const total = readInteger(pickField(record, TOTAL_COUNT_FIELDS));
  return total !== null && total >= 0 ? total : null;
}

export interface ProfileAttributes {
  displayName: string | null;
  level: number | null;
  tierLabel: string | null;
  followerCount: number | null;
  streakDays: number | null;
  isVerified: boolean | null;
}

export const UNAVAILABLE_PROFILE: Readonly<ProfileAttributes> = Object.freeze({
  displayName: null,
  level: null,
  tierLabel: null,
  followerCount: null,
  streakDays: null,
  isVerified: null,
});

export function parseProfile(body: unknown): ProfileAttributes | null {
  const record = asRecord(body);
  if (!record) {
    return null;
  }

  return {
    displayName: readString(pickField(record, PROFILE_FIELDS.displayName)),
    level: readInteger(pickField(record, PROFILE_FIELDS.level)),
    tierLabel: readString(pickField(record, PROFILE_FIELDS.tierLabel)),
    followerCount: readInteger(pickField(record, PROFILE_FIELDS.followerCount)),
    streakDays: readInteger(pickField(record, PROFILE_FIELDS.streakDays)),
    isVerified: readBoolean(pickField(record, PROFILE_FIELDS.isVerified)),
  };
}
