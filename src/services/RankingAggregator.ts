import type { ContextLogger } from '../lib/logger';
import type LeaderboardFetcher from './LeaderboardFetcher';
import type { ListingStopReason } from './LeaderboardFetcher';
import type ProfileEnricher from './ProfileEnricher';
import type { EnrichedEntry } from './ProfileEnricher';
import {
  dedupeEntries,
  normalizeLimit,
  resolveTarget,
  selectTopEntries,
  sortByScore,
  type TargetStanding,
} from './utils/leaderboard';

export interface RankingQuery {
  eventId: string | null | undefined;
  targetId?: unknown;
  limit?: unknown;
}

export interface ListingSummary {
  pagesFetched: number;
  entriesRetrieved: number;
  uniqueEntries: number;
  duplicatesDropped: number;
  invalidEntriesDropped: number;
  stopReason: ListingStopReason;
}

export interface AggregationResult {
  eventId: string | null;
  limit: number;
  totalParticipantCount: number | null;
  targetStanding: TargetStanding;
  topEntries: EnrichedEntry[];
  listing: ListingSummary;
}

export interface RankingAggregatorOptions {
  fetcher: LeaderboardFetcher;
  enricher: ProfileEnricher;
  logger: ContextLogger;
  defaultLimit?: number;
  maxLimit?: number;
}

export default class RankingAggregator {
  private readonly fetcher: LeaderboardFetcher;

  private readonly enricher: ProfileEnricher;

  private readonly logger: ContextLogger;

  private readonly defaultLimit: number;

  private readonly maxLimit: number;

  constructor({ fetcher, enricher, logger, defaultLimit = 10, maxLimit = 100 }: RankingAggregatorOptions) {
    this.fetcher = fetcher;
    this.enricher = enricher;
    this.logger = logger;
    this.maxLimit = Math.max(1, Math.floor(maxLimit));
    this.defaultLimit = normalizeLimit(defaultLimit, 10, this.maxLimit);
  }

  public normalizeLimit(limit: unknown): number {
    return normalizeLimit(limit, this.defaultLimit, this.maxLimit);
  }

  public async aggregate(query: RankingQuery, logger: ContextLogger = this.logger): Promise<AggregationResult> {
    const eventId = typeof query.eventId === 'string' && query.eventId.trim().length > 0 ? query.eventId.trim() : null;
    const limit = this.normalizeLimit(query.limit);

    if (!eventId) {
      return this.emptyResult(limit, query.targetId);
    }

    const [listing, totalParticipantCount] = await Promise.all([
      this.fetcher.fetchListing(eventId),
      this.fetcher.fetchTotalCount(eventId),
    ]);

    const { entries, duplicatesDropped, invalidDropped } = dedupeEntries(listing.entries);
    const sorted = sortByScore(entries);
    const targetStanding = resolveTarget(sorted, query.targetId);
    const selected = selectTopEntries(sorted, limit, targetStanding);
    const topEntries = await this.enricher.enrich(selected, targetStanding.found ? targetStanding.entityId : null);

    if (duplicatesDropped > 0) {
      logger.debug('Dropped %d duplicate listing entries', duplicatesDropped, { eventId });
    }
    if (targetStanding.entityId !== null && !targetStanding.found) {
      logger.info('Target %s not found in the retrieved listing', targetStanding.entityId, {
        eventId,
        stopReason: listing.stopReason,
      });
    }

    return {
      eventId,
      limit,
      totalParticipantCount,
      targetStanding,
      topEntries,
      listing: {
        pagesFetched: listing.pagesFetched,
        entriesRetrieved: listing.entries.length,
        uniqueEntries: entries.length,
        duplicatesDropped,
        invalidEntriesDropped: invalidDropped,
        stopReason: listing.stopReason,
      },
    };
  }

  private emptyResult(limit: number, targetId: unknown): AggregationResult {
    return {
      eventId: null,
      limit,
      totalParticipantCount: null,
      targetStanding: resolveTarget([], targetId),
      topEntries: [],
      listing: {
        pagesFetched: 0,
        entriesRetrieved: 0,
        uniqueEntries: 0,
        duplicatesDropped: 0,
        invalidEntriesDropped: 0,
        stopReason: 'no-event',
      },
    };
  }
}
