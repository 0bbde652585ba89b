import { Router, Request, Response } from 'express';
import type { MetricsService } from '../services/metrics';
import { asyncHandler, NotFoundError, ValidationError } from '../utils/errors';

const SERVICE_ID_PATTERN = /^[A-Za-z0-9_.-]{1,64}$/;

export interface MetricsRouterOptions {
  service: MetricsService;
  clock?: () => number;
}

export function createMetricsRouter(options: MetricsRouterOptions): Router {
  const { service, clock = Date.now } = options;
  const router = Router();

  router.get('/', asyncHandler(async (_req: Request, res: Response) => {
    const { document, coalesced } = await service.orchestrator.runDetailed(clock());
    res.set('X-Metrics-Coalesced', String(coalesced));
    res.json(document);
  }));

  router.get('/breakers', (_req: Request, res: Response) => {
    res.json({
      failureThreshold: service.breakers.getFailureThreshold(),
      cooldownMs: service.breakers.getCooldownMs(),
      breakers: service.breakers.listStatuses(clock()),
    });
  });

  router.delete('/breakers/:serviceId', (req: Request, res: Response) => {
    const { serviceId } = req.params;
    if (!SERVICE_ID_PATTERN.test(serviceId)) {
      throw new ValidationError('Invalid service id', 'serviceId');
    }
    if (!service.breakers.reset(serviceId)) {
      throw new NotFoundError('Breaker');
    }
    res.status(204).end();
  });

  return router;
}
