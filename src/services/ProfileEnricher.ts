import type { ContextLogger } from '../lib/logger';
import { describeFetchError, type FetchError, type FetchErrorKind } from '../lib/result';
import type EventApiClient from './EventApiClient';
import { mapWithConcurrency } from './utils/concurrency';
import { placeholderDisplayName, type EntityId } from './utils/identity';
import type { LeaderboardEntry } from './utils/leaderboard';
import { parseProfile, UNAVAILABLE_PROFILE, type ProfileAttributes } from './utils/payload';

export type ProfileStatus = 'ok' | FetchErrorKind;

export interface EnrichedEntry extends Omit<LeaderboardEntry, 'displayName'> {
  displayName: string;
  level: number | null;
  tierLabel: string | null;
  followerCount: number | null;
  streakDays: number | null;
  isVerified: boolean | null;
  isTarget: boolean;
  profileStatus: ProfileStatus;
}

interface ProfileLookup {
  profile: ProfileAttributes;
  status: ProfileStatus;
}

export interface ProfileEnricherOptions {
  client: EventApiClient;
  logger: ContextLogger;
  concurrency?: number;
}

const DEFAULT_CONCURRENCY = 5;

export default class ProfileEnricher {
  private readonly client: EventApiClient;

  private readonly logger: ContextLogger;

  private readonly concurrency: number;

  constructor({ client, logger, concurrency = DEFAULT_CONCURRENCY }: ProfileEnricherOptions) {
    this.client = client;
    this.logger = logger;
    this.concurrency = Math.max(1, Math.floor(concurrency));
  }

  public async enrich(entries: readonly LeaderboardEntry[], targetId: EntityId | null = null): Promise<EnrichedEntry[]> {
    if (entries.length === 0) {
      return [];
    }

    const uniqueIds = [...new Set(entries.map((entry) => entry.entityId))];
    const lookups = await mapWithConcurrency(uniqueIds, this.concurrency, async (entityId) => {
      const lookup = await this.lookupProfile(entityId);
      return [entityId, lookup] as const;
    });
    const profiles = new Map<EntityId, ProfileLookup>(lookups);

    return entries.map((entry) => {
      const lookup: ProfileLookup = profiles.get(entry.entityId) ?? { profile: UNAVAILABLE_PROFILE, status: 'malformed' };
      return this.mergeProfile(entry, lookup, targetId);
    });
  }

  private async lookupProfile(entityId: EntityId): Promise<ProfileLookup> {
    const result = await this.client.fetchProfile(entityId);
    if (!result.ok) {
      return this.unavailable(entityId, result.error);
    }

    const profile = parseProfile(result.value);
    if (!profile) {
      return this.unavailable(entityId, {
        kind: 'malformed',
        url: this.client.profileUrl(entityId),
        message: 'profile body is not an object',
      });
    }

    return { profile, status: 'ok' };
  }

  private unavailable(entityId: EntityId, error: FetchError): ProfileLookup {
    this.logger.warn('Profile enrichment skipped for %s: %s', entityId, describeFetchError(error));
    return { profile: UNAVAILABLE_PROFILE, status: error.kind };
  }

  private mergeProfile(entry: LeaderboardEntry, lookup: ProfileLookup, targetId: EntityId | null): EnrichedEntry {
    const { profile, status } = lookup;
    return {
      ...entry,
      displayName: entry.displayName ?? profile.displayName ?? placeholderDisplayName(entry.entityId),
      level: profile.level,
      tierLabel: profile.tierLabel,
      followerCount: profile.followerCount,
      streakDays: profile.streakDays,
      isVerified: profile.isVerified,
      isTarget: targetId !== null && entry.entityId === targetId,
      profileStatus: status,
    };
  }
}
