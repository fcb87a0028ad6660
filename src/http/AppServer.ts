import compression from 'compression';
import express, { type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import type { Server } from 'http';
import type { Config } from '../config';
import type { ContextLogger } from '../lib/logger';
import type RankingAggregator from '../services/RankingAggregator';
import { createRankingRouter } from './routes/ranking';

interface AppServerOptions {
  config: Pick<Config, 'port'>;
  rankingAggregator: RankingAggregator;
  logger: ContextLogger;
  createRequestId?: () => string;
}

export default class AppServer {
  private readonly config: Pick<Config, 'port'>;

  private readonly rankingAggregator: RankingAggregator;

  private readonly logger: ContextLogger;

  private readonly createRequestId?: () => string;

  private readonly app = express();

  private httpServer: Server | null = null;

  constructor({ config, rankingAggregator, logger, createRequestId }: AppServerOptions) {
    this.config = config;
    this.rankingAggregator = rankingAggregator;
    this.logger = logger;
    this.createRequestId = createRequestId;

    this.configureMiddleware();
    this.registerRoutes();
  }

  public getApp(): express.Express {
    return this.app;
  }

  public start(port: number = this.config.port): Promise<Server> {
    if (this.httpServer) {
      return Promise.resolve(this.httpServer);
    }

    return new Promise((resolve, reject) => {
      const server = this.app.listen(port);
      const handleError = (error: Error): void => {
        this.httpServer = null;
        reject(error);
      };
      server.once('error', handleError);
      server.once('listening', () => {
        server.off('error', handleError);
        resolve(server);
      });
      this.httpServer = server;
    });
  }

  public stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) {
      return Promise.resolve();
    }
    this.httpServer = null;

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  private configureMiddleware(): void {
    this.app.disable('x-powered-by');

    this.app.use(
      helmet({
        contentSecurityPolicy: false,
        crossOriginResourcePolicy: { policy: 'cross-origin' },
      }),
    );

    this.app.use(
      compression({
        threshold: 512,
        filter: (req, res) => {
          const header = req.headers['x-no-compression'];
          if (typeof header === 'string' && header.toLowerCase() === 'true') {
            return false;
          }
          return compression.filter(req, res);
        },
      }),
    );
  }

  private registerRoutes(): void {
    this.app.get('/api/health', (_req: Request, res: Response) => {
      res.setHeader('Cache-Control', 'no-store');
      res.json({ status: 'ok' });
    });

    this.app.use(
      '/api',
      createRankingRouter({
        rankingAggregator: this.rankingAggregator,
        logger: this.logger,
        createRequestId: this.createRequestId,
      }),
    );

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'NOT_FOUND', message: 'Not found' });
    });

    this.app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      this.logger.error('Unhandled request error', error);
      if (res.headersSent) {
        return;
      }
      res.status(500).json({ error: 'INTERNAL_ERROR', message: 'Unexpected server error.' });
    });
  }
}
