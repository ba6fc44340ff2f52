import { Router } from 'express';
import type { PrometheusSnapshotStore } from '../services/prometheusState.js';
import { type PrometheusConfig, shouldExposeScrape } from '../services/prometheus.js';

interface MetricsDeps {
  prometheus: PrometheusConfig;
  prometheusStore: PrometheusSnapshotStore;
}

export function createMetricsRouter(deps: MetricsDeps): Router {
  const router = Router();

  router.get('/prometheus', (_req, res) => {
    if (!shouldExposeScrape(deps.prometheus)) {
      res.status(404).json({ error: 'Prometheus scrape mode is disabled' });
      return;
    }

    res
      .status(200)
      .set('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
      .send(deps.prometheusStore.getText());
  });

  return router;
}
