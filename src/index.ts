import config, { type Config } from './config';
import AppServer from './http/AppServer';
import FetchJsonClient, { type JsonHttpClient } from './lib/http';
import LoggerService from './lib/logger';
import EventApiClient from './services/EventApiClient';
import LeaderboardFetcher from './services/LeaderboardFetcher';
import ProfileEnricher from './services/ProfileEnricher';
import RankingAggregator from './services/RankingAggregator';

interface ServiceContext {
  resolve<T>(key: string): T;
}

type ShutdownHandler = () => Promise<void> | void;

interface ServiceDefinition<T> {
  factory: (context: ServiceContext) => T;
  start?: (service: T, context: ServiceContext) => Promise<void> | void;
  stop?: (service: T, context: ServiceContext) => Promise<void> | void;
  eager?: boolean;
}

interface RegisteredService {
  create: (context: ServiceContext) => unknown;
  start: (instance: unknown, context: ServiceContext) => Promise<void>;
  stop: ((instance: unknown, context: ServiceContext) => Promise<void>) | null;
  eager: boolean;
}

export class ServiceContainer {
  private readonly definitions = new Map<string, RegisteredService>();

  private readonly instances = new Map<string, unknown>();

  private readonly registrationOrder: string[] = [];

  private readonly started = new Set<string>();

  private readonly shutdownHandlers: ShutdownHandler[] = [];

  private shutdownPromise: Promise<void> | null = null;

  public register<T>(key: string, definition: ServiceDefinition<T>): void {
    if (this.definitions.has(key)) {
      throw new Error(`Service "${key}" is already registered.`);
    }

    const { factory, start, stop } = definition;
    this.definitions.set(key, {
      create: (context) => factory(context),
      start: async (instance, context) => {
        if (start) {
          await start(instance as T, context);
        }
      },
      stop: stop
        ? async (instance, context) => {
            await stop(instance as T, context);
          }
        : null,
      eager: definition.eager ?? false,
    });
    this.registrationOrder.push(key);
  }

  public resolve<T>(key: string): T {
    const definition = this.definitions.get(key);
    if (!definition) {
      throw new Error(`Service "${key}" is not registered.`);
    }

    if (!this.instances.has(key)) {
      const instance = definition.create(this.createContext());
      this.instances.set(key, instance);

      const { stop } = definition;
      if (stop) {
        this.shutdownHandlers.push(async () => {
          try {
            await stop(instance, this.createContext());
          } catch (error) {
            console.error(`Error while stopping service "${key}"`, error);
          }
        });
      }
    }

    return this.instances.get(key) as T;
  }

  public async start(): Promise<void> {
    for (const key of this.registrationOrder) {
      const definition = this.definitions.get(key);
      if (!definition?.eager || this.started.has(key)) {
        continue;
      }
      const instance = this.resolve<unknown>(key);
      await definition.start(instance, this.createContext());
      this.started.add(key);
    }
  }

  public async shutdown(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = (async () => {
      for (const handler of [...this.shutdownHandlers].reverse()) {
        try {
          await handler();
        } catch (error) {
          console.error('Shutdown handler failed', error);
        }
      }
    })();

    return this.shutdownPromise;
  }

  private createContext(): ServiceContext {
    return {
      resolve: <T>(serviceKey: string) => this.resolve<T>(serviceKey),
    };
  }
}

export function registerServices(container: ServiceContainer, appConfig: Config = config): void {
  container.register<Config>('config', {
    factory: () => appConfig,
  });

  container.register<LoggerService>('logger', {
    factory: (ctx) => new LoggerService({ level: ctx.resolve<Config>('config').logging.level }),
    start: (logger) => {
      logger.forContext('Bootstrap').info('Logger initialized at level %s', logger.getLevel());
    },
    stop: (logger) => {
      logger.close();
    },
    eager: true,
  });

  container.register<JsonHttpClient>('httpClient', {
    factory: (ctx) => new FetchJsonClient({ timeoutMs: ctx.resolve<Config>('config').api.requestTimeoutMs }),
  });

  container.register<EventApiClient>('eventApiClient', {
    factory: (ctx) =>
      new EventApiClient({
        http: ctx.resolve<JsonHttpClient>('httpClient'),
        api: ctx.resolve<Config>('config').api,
      }),
  });

  container.register<LeaderboardFetcher>('leaderboardFetcher', {
    factory: (ctx) => {
      const cfg = ctx.resolve<Config>('config');
      return new LeaderboardFetcher({
        client: ctx.resolve<EventApiClient>('eventApiClient'),
        logger: ctx.resolve<LoggerService>('logger').forContext('LeaderboardFetcher'),
        pageSize: cfg.api.pageSize,
        maxPages: cfg.api.maxPages,
      });
    },
  });

  container.register<ProfileEnricher>('profileEnricher', {
    factory: (ctx) =>
      new ProfileEnricher({
        client: ctx.resolve<EventApiClient>('eventApiClient'),
        logger: ctx.resolve<LoggerService>('logger').forContext('ProfileEnricher'),
        concurrency: ctx.resolve<Config>('config').ranking.profileConcurrency,
      }),
  });

  container.register<RankingAggregator>('rankingAggregator', {
    factory: (ctx) => {
      const cfg = ctx.resolve<Config>('config');
      return new RankingAggregator({
        fetcher: ctx.resolve<LeaderboardFetcher>('leaderboardFetcher'),
        enricher: ctx.resolve<ProfileEnricher>('profileEnricher'),
        logger: ctx.resolve<LoggerService>('logger').forContext('RankingAggregator'),
        defaultLimit: cfg.ranking.defaultLimit,
        maxLimit: cfg.ranking.maxLimit,
      });
    },
  });

  container.register<AppServer>('appServer', {
    factory: (ctx) =>
      new AppServer({
        config: ctx.resolve<Config>('config'),
        rankingAggregator: ctx.resolve<RankingAggregator>('rankingAggregator'),
        logger: ctx.resolve<LoggerService>('logger').forContext('Http'),
      }),
    start: async (server) => {
      await server.start();
    },
    stop: async (server) => {
      await server.stop();
    },
    eager: true,
  });
}

async function bootstrap(): Promise<void> {
  const container = new ServiceContainer();
  registerServices(container);

  try {
    await container.start();
  } catch (error) {
    console.error('Failed to bootstrap application', error);
    await container.shutdown();
    process.exit(1);
  }

  const loggerService = container.resolve<LoggerService>('logger');
  const logger = loggerService.forContext('Bootstrap');
  logger.info('Application started on port %d', config.port);

  let shutdownInitiated = false;
  const initiateShutdown = (reason: string, exitCode = 0): void => {
    if (shutdownInitiated) {
      return;
    }
    shutdownInitiated = true;

    const shutdownLogger = loggerService.forContext('Shutdown');
    shutdownLogger.info('Shutting down due to %s', reason);

    container
      .shutdown()
      .then(() => {
        process.exit(exitCode);
      })
      .catch((shutdownError: unknown) => {
        shutdownLogger.error('Shutdown encountered an error', shutdownError);
        process.exit(1);
      });
  };

  process.once('SIGINT', () => initiateShutdown('SIGINT'));
  process.once('SIGTERM', () => initiateShutdown('SIGTERM'));
}

if (require.main === module) {
  void bootstrap();
}
