import dotenv from 'dotenv';

dotenv.config();

type Env = Record<string, string | undefined>;

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function parseTrimmed(value: string | undefined): string | undefined {
  const trimmed = (value ?? '').trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parsePath(value: string | undefined, fallback: string): string {
  const raw = parseTrimmed(value) ?? fallback;
  return raw.startsWith('/') ? raw : `/${raw}`;
}

export interface LoggingConfig {
  level: string;
}

export interface RankingApiConfig {
  baseUrl: string;
  listingPath: string;
  totalCountPath: string;
  profilePath: string;
  requestTimeoutMs: number;
  pageSize: number;
  maxPages: number;
}

export interface RankingConfig {
  defaultLimit: number;
  maxLimit: number;
  profileConcurrency: number;
}

export interface Config {
  port: number;
  logging: LoggingConfig;
  api: RankingApiConfig;
  ranking: RankingConfig;
}

export function loadConfig(env: Env = process.env): Config {
  const maxLimit = clamp(parseInteger(env.RANKING_MAX_LIMIT, 100), 1, 500);

  return {
    port: parseInteger(env.PORT, 3000),
    logging: {
      level: parseTrimmed(env.LOG_LEVEL) ?? 'info',
    },
    api: {
      baseUrl: (parseTrimmed(env.RANKING_API_BASE_URL) ?? 'https://www.showroom-live.com').replace(/\/+$/, ''),
      listingPath: parsePath(env.RANKING_LISTING_PATH, '/api/event/room_list'),
      totalCountPath: parsePath(env.RANKING_TOTAL_PATH, '/api/event/room_list'),
      profilePath: parsePath(env.RANKING_PROFILE_PATH, '/api/room/profile'),
      requestTimeoutMs: clamp(parseInteger(env.RANKING_REQUEST_TIMEOUT_MS, 10_000), 1_000, 30_000),
      pageSize: Math.max(1, parseInteger(env.RANKING_PAGE_SIZE, 30)),
      maxPages: Math.max(1, parseInteger(env.RANKING_MAX_PAGES, 59)),
    },
    ranking: {
      defaultLimit: clamp(parseInteger(env.RANKING_DEFAULT_LIMIT, 10), 1, maxLimit),
      maxLimit,
      profileConcurrency: clamp(parseInteger(env.RANKING_PROFILE_CONCURRENCY, 5), 1, 10),
    },
  };
}

const config: Config = loadConfig();

export default config;
