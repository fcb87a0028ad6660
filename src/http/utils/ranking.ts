import { randomUUID } from 'node:crypto';
import type { Request } from 'express';
import type { ContextLogger } from '../../lib/logger';
import { normalizeEntityId } from '../../services/utils/identity';

export class RankingRequestError extends Error {
  public readonly code: string;

  public readonly status: number;

  constructor(code: string, message: string, status = 400) {
    super(message);
    this.name = 'RankingRequestError';
    this.code = code;
    this.status = status;
  }
}

/** Everything a ranking request needs, built per request and passed down explicitly. */
export interface RankingRequestContext {
  requestId: string;
  eventId: string;
  targetId: string | null;
  limit: number | undefined;
  logger: ContextLogger;
}

const EVENT_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

function extractString(value: unknown): string | null {
  if (Array.isArray(value)) {
    for (const entry of value) {
      const candidate = extractString(entry);
      if (candidate) {
        return candidate;
      }
    }
    return null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  return null;
}

export function buildRankingContext(
  params: Request['params'],
  query: Request['query'],
  baseLogger: ContextLogger,
  requestId: string = randomUUID(),
): RankingRequestContext {
  const eventId = extractString(params.eventId);
  if (!eventId || !EVENT_ID_PATTERN.test(eventId)) {
    throw new RankingRequestError('INVALID_EVENT_ID', 'The event identifier is missing or malformed.');
  }

  const source: Record<string, unknown> = query && typeof query === 'object' ? query : {};
  const rawTarget = extractString(source.target ?? source.targetId ?? source.room ?? source.roomId);
  const targetId = rawTarget === null ? null : normalizeEntityId(rawTarget);

  const rawLimit = extractString(source.limit ?? source.top);
  if (rawLimit !== null && !/^\d+$/.test(rawLimit)) {
    throw new RankingRequestError('INVALID_LIMIT', 'The limit must be a positive integer.');
  }

  return {
    requestId,
    eventId,
    targetId,
    limit: rawLimit === null ? undefined : Number(rawLimit),
    logger: baseLogger.child({ requestId, eventId }),
  };
}
