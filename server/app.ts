import cors from 'cors';
import express, { type Express } from 'express';
import type { ServerConfig } from './config.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createHealthRouter } from './routes/health.js';
import { createMetricsRouter } from './routes/metrics.js';
import { createRunsRouter } from './routes/runs.js';
import { PrometheusSnapshotStore } from './services/prometheusState.js';
import { RunStateStore } from './services/runState.js';

export function createApp(config: ServerConfig): Express {
  const app = express();
  const runState = new RunStateStore(config.runHistoryLimit);
  const prometheusStore = new PrometheusSnapshotStore();
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  app.use(
    '/runs',
    createRunsRouter({
      defaults: config.simulation,
      maxWorkPerRun: config.maxWorkPerRun,
      runState,
      prometheus: config.prometheus,
      prometheusStore
    })
  );
  app.use('/metrics', createMetricsRouter({ prometheus: config.prometheus, prometheusStore }));
  app.use('/health', createHealthRouter({ prometheus: config.prometheus, runState }));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
