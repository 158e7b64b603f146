import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { ScenarioCommandPort } from '@anomaly-lab/domain';
import { toSummary } from '@anomaly-lab/harness';

const scenarioIdSchema = z
  .string()
  .max(64)
  .regex(/^[a-z0-9-]+$/, 'scenario ids are lower-case words joined by dashes');

export function createScenariosRouter(service: ScenarioCommandPort): Router {
  const router = Router();

  /** GET /api/scenarios list the catalog */
  router.get('/', (_req: Request, res: Response) => {
    res.json({ data: service.listScenarios() });
  });

  /** GET /api/scenarios/:scenarioId */
  router.get('/:scenarioId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const def = service.describeScenario(scenarioIdSchema.parse(req.params['scenarioId']));
      res.json({
        ...toSummary(def),
        fixture: def.fixture,
        steps: def.steps,
        observe: def.observe ?? null,
      });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/scenarios/:scenarioId/run run once against a freshly reset fixture */
  router.post('/:scenarioId/run', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const scenarioId = scenarioIdSchema.parse(req.params['scenarioId']);
      const result = await service.runScenario({ scenarioId });
      console.log(
        `[scenarios] ${scenarioId} run ${result.runId}: ${result.verdict.pass ? 'PASS' : 'FAIL'}`,
      );
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
