import type { ContextLogger } from '../lib/logger';
import { describeFetchError, type FetchError } from '../lib/result';
import type EventApiClient from './EventApiClient';
import type { CandidateEntry } from './utils/leaderboard';
import { parseLeaderboardEntry, parseListingPage, parseTotalCount } from './utils/payload';

export type ListingStopReason =
  | 'no-event'
  | 'short-page'
  | 'empty-page'
  | 'no-next-page'
  | 'not-found'
  | 'page-ceiling'
  | 'error';

export interface ListingFetchResult {
  entries: CandidateEntry[];
  pagesFetched: number;
  stopReason: ListingStopReason;
  error: FetchError | null;
}

export interface LeaderboardFetcherOptions {
  client: EventApiClient;
  logger: ContextLogger;
  pageSize?: number;
  maxPages?: number;
}

const DEFAULT_PAGE_SIZE = 30;
const DEFAULT_MAX_PAGES = 59;

export default class LeaderboardFetcher {
  private readonly client: EventApiClient;

  private readonly logger: ContextLogger;

  private readonly pageSize: number;

  private readonly maxPages: number;

  constructor({ client, logger, pageSize = DEFAULT_PAGE_SIZE, maxPages = DEFAULT_MAX_PAGES }: LeaderboardFetcherOptions) {
    this.client = client;
    this.logger = logger;
    this.pageSize = Math.max(1, Math.floor(pageSize));
    this.maxPages = Math.max(1, Math.floor(maxPages));
  }

  public async fetchListing(eventId: string | null | undefined): Promise<ListingFetchResult> {
    const normalizedEventId = this.normalizeEventId(eventId);
    if (!normalizedEventId) {
      return { entries: [], pagesFetched: 0, stopReason: 'no-event', error: null };
    }

    const entries: CandidateEntry[] = [];
    let pagesFetched = 0;

    for (let page = 1; page <= this.maxPages; page += 1) {
      const result = await this.client.fetchListingPage(normalizedEventId, page);

      if (!result.ok) {
        if (result.error.kind === 'not-found') {
          return { entries, pagesFetched, stopReason: 'not-found', error: null };
        }
        this.logger.warn('Listing pagination aborted on page %d: %s', page, describeFetchError(result.error), {
          eventId: normalizedEventId,
          retainedEntries: entries.length,
        });
        return { entries, pagesFetched, stopReason: 'error', error: result.error };
      }

      const listing = parseListingPage(result.value);
      if (!listing) {
        const error: FetchError = {
          kind: 'malformed',
          url: this.client.listingPageUrl(normalizedEventId, page),
          message: 'no entry list in response body',
        };
        this.logger.warn('Listing page %d has no entry list; keeping %d entries', page, entries.length, {
          eventId: normalizedEventId,
        });
        return { entries, pagesFetched, stopReason: 'error', error };
      }

      pagesFetched += 1;
      if (listing.entries.length === 0) {
        return { entries, pagesFetched, stopReason: 'empty-page', error: null };
      }

      for (const raw of listing.entries) {
        const parsed = parseLeaderboardEntry(raw);
        entries.push({
          entityId: parsed?.entityId ?? null,
          displayName: parsed?.displayName ?? null,
          rank: parsed?.rank ?? null,
          score: parsed?.score ?? 0,
          tier: parsed?.tier ?? null,
          page,
          sequence: entries.length,
        });
      }

      if (listing.entries.length < this.pageSize) {
        return { entries, pagesFetched, stopReason: 'short-page', error: null };
      }
      if (listing.hasNextPage === false) {
        return { entries, pagesFetched, stopReason: 'no-next-page', error: null };
      }
    }

    this.logger.info('Listing reached the %d page ceiling', this.maxPages, { eventId: normalizedEventId });
    return { entries, pagesFetched, stopReason: 'page-ceiling', error: null };
  }

  /** `0` on not-found, `null` when the count is unavailable. */
  public async fetchTotalCount(eventId: string | null | undefined): Promise<number | null> {
    const normalizedEventId = this.normalizeEventId(eventId);
    if (!normalizedEventId) {
      return null;
    }

    const result = await this.client.fetchTotalCount(normalizedEventId);
    if (!result.ok) {
      if (result.error.kind === 'not-found') {
        return 0;
      }
      this.logger.warn('Total participant count unavailable: %s', describeFetchError(result.error), {
        eventId: normalizedEventId,
      });
      return null;
    }

    const total = parseTotalCount(result.value);
    if (total === null) {
      this.logger.debug('Total participant count missing from response', { eventId: normalizedEventId });
    }
    return total;
  }

  private normalizeEventId(eventId: string | null | undefined): string | null {
    if (typeof eventId !== 'string') {
      return null;
    }
    const trimmed = eventId.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
}
