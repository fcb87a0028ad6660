import type { RankingApiConfig } from '../config';
import type { JsonHttpClient } from '../lib/http';
import type { Result } from '../lib/result';

type EndpointConfig = Pick<RankingApiConfig, 'baseUrl' | 'listingPath' | 'totalCountPath' | 'profilePath'>;

interface EventApiClientOptions {
  http: JsonHttpClient;
  api: EndpointConfig;
}

/** URL building for the three upstream endpoints; bodies are returned unparsed. */
export default class EventApiClient {
  private readonly http: JsonHttpClient;

  private readonly api: EndpointConfig;

  constructor({ http, api }: EventApiClientOptions) {
    this.http = http;
    this.api = api;
  }

  public fetchListingPage(eventId: string, page: number): Promise<Result<unknown>> {
    return this.http.getJson(this.listingPageUrl(eventId, page));
  }

  public listingPageUrl(eventId: string, page: number): string {
    return this.buildUrl(this.api.listingPath, { event_id: eventId, p: String(page) });
  }

  public fetchTotalCount(eventId: string): Promise<Result<unknown>> {
    return this.http.getJson(this.buildUrl(this.api.totalCountPath, { event_id: eventId }));
  }

  public fetchProfile(entityId: string): Promise<Result<unknown>> {
    return this.http.getJson(this.profileUrl(entityId));
  }

  public profileUrl(entityId: string): string {
    return this.buildUrl(this.api.profilePath, { room_id: entityId });
  }

  public buildUrl(pathname: string, params: Record<string, string>): string {
    const url = new URL(pathname, `${this.api.baseUrl}/`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }
}
