import { Router, type Request, type Response } from 'express';
import type { ContextLogger } from '../../lib/logger';
import type RankingAggregator from '../../services/RankingAggregator';
import { buildRankingContext, RankingRequestError, type RankingRequestContext } from '../utils/ranking';

interface RankingRouterDeps {
  rankingAggregator: RankingAggregator;
  logger: ContextLogger;
  createRequestId?: () => string;
}

export function createRankingRouter({ rankingAggregator, logger, createRequestId }: RankingRouterDeps): Router {
  const router = Router();

  router.get('/events/:eventId/ranking', async (req: Request, res: Response) => {
    let context: RankingRequestContext | null = null;
    try {
      context = buildRankingContext(req.params, req.query, logger, createRequestId?.());
      const result = await rankingAggregator.aggregate(
        { eventId: context.eventId, targetId: context.targetId, limit: context.limit },
        context.logger,
      );
      res.setHeader('Cache-Control', 'no-store');
      res.setHeader('X-Request-Id', context.requestId);
      res.json({ ranking: result });
    } catch (error) {
      if (error instanceof RankingRequestError) {
        res.status(error.status).json({ error: error.code, message: error.message });
        return;
      }
      (context?.logger ?? logger).error('Failed to aggregate event ranking', error);
      res.status(500).json({
        error: 'RANKING_FAILED',
        message: 'Unable to build the event ranking.',
      });
    }
  });

  return router;
}
