import { Command, InvalidArgumentError } from 'commander';
import config from '../src/config';
import FetchJsonClient from '../src/lib/http';
import LoggerService from '../src/lib/logger';
import EventApiClient from '../src/services/EventApiClient';
import LeaderboardFetcher from '../src/services/LeaderboardFetcher';
import ProfileEnricher from '../src/services/ProfileEnricher';
import RankingAggregator from '../src/services/RankingAggregator';
import { formatRankingTable, formatStandingSummary } from '../src/services/utils/format';

interface CliOptions {
  event: string;
  target?: string;
  limit?: number;
  json: boolean;
  verbose: boolean;
}

function parsePositiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('event-ranking')
  .description('Prints the leaderboard of a live event with profile details and the standing of a target room.')
  .requiredOption('-e, --event <id>', 'event identifier')
  .option('-t, --target <roomId>', 'room whose standing is reported even outside the top entries')
  .option('-l, --limit <n>', 'number of top entries', parsePositiveInteger)
  .option('--json', 'print the raw aggregation as JSON', false)
  .option('-v, --verbose', 'log upstream warnings to stderr', false)
  .parse(process.argv);

const options = program.opts<CliOptions>();

async function main(): Promise<void> {
  const loggerService = new LoggerService({ level: options.verbose ? 'debug' : 'error', service: 'event-ranking-cli' });
  const client = new EventApiClient({
    http: new FetchJsonClient({ timeoutMs: config.api.requestTimeoutMs }),
    api: config.api,
  });

  const aggregator = new RankingAggregator({
    fetcher: new LeaderboardFetcher({
      client,
      logger: loggerService.forContext('LeaderboardFetcher'),
      pageSize: config.api.pageSize,
      maxPages: config.api.maxPages,
    }),
    enricher: new ProfileEnricher({
      client,
      logger: loggerService.forContext('ProfileEnricher'),
      concurrency: config.ranking.profileConcurrency,
    }),
    logger: loggerService.forContext('RankingAggregator'),
    defaultLimit: config.ranking.defaultLimit,
    maxLimit: config.ranking.maxLimit,
  });

  try {
    const result = await aggregator.aggregate({
      eventId: options.event,
      targetId: options.target,
      limit: options.limit,
    });

    if (options.json) {
      process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
      return;
    }

    process.stdout.write(`${formatRankingTable(result)}\n`);
    if (options.target) {
      process.stdout.write(`${formatStandingSummary(result.targetStanding)}\n`);
    }
  } finally {
    loggerService.close();
  }
}

void main().catch((error: unknown) => {
  console.error('event-ranking failed', error);
  process.exitCode = 1;
});
