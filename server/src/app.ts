import express from 'express';
import cors from 'cors';

import simulationRouter from './routes/simulation';
import { getMetricsSnapshot, metricsContentType } from './observability/metrics';
import { errorMessage } from './observability/logger';
import { applyRequestTracing } from './observability/requestTracing';

export function createApp(): express.Express {
  const app = express();

  app.use(applyRequestTracing());
  app.use(cors());
  app.use(express.json());

  app.use('/api/nbody', simulationRouter);

  app.get('/', (_req, res) => {
    res.send('N-Body Outer Planets – API de simulation');
  });

  app.get('/metrics', async (_req, res) => {
    try {
      const metrics = await getMetricsSnapshot();
      res.setHeader('Content-Type', metricsContentType);
      res.send(metrics);
    } catch (err: unknown) {
      res.status(500).send(`# Metrics error: ${errorMessage(err)}`);
    }
  });

  return app;
}
