import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { ScenarioCommandPort, TransactionalStorePort } from '@anomaly-lab/domain';

import { createScenariosRouter } from './controllers/scenarios.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface AppDeps {
  service: ScenarioCommandPort;
  store: TransactionalStorePort;
  /** Access log through morgan; on unless disabled. */
  accessLog?: boolean;
}

export function buildApp(deps: AppDeps): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: process.env['CORS_ORIGIN'] ?? '*' }));
  if (deps.accessLog ?? true) app.use(morgan('combined'));
  app.use(express.json({ limit: '100kb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/scenarios', createScenariosRouter(deps.service));

  app.get('/healthz', async (_req, res) => {
    const ts = new Date().toISOString();
    try {
      await deps.store.ping();
      res.json({ status: 'ok', ts, store: deps.store.driver });
    } catch (err) {
      console.warn('[api] store ping failed', err);
      res.status(503).json({ status: 'degraded', ts, store: deps.store.driver });
    }
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
