import { Router } from 'express';
import { formatTextReport } from '../../simulation/report/textReport.js';
import { executeRun } from '../services/comparison.js';
import type { PrometheusSnapshotStore } from '../services/prometheusState.js';
import { type PrometheusConfig, pushRunToPushgateway, shouldExposeScrape, shouldPushToGateway } from '../services/prometheus.js';
import type { RunStateStore } from '../services/runState.js';
import { HttpError, parseRunRequest, type SimulationConfig, toRunPayload } from '../types.js';

interface RunsDeps {
  defaults: SimulationConfig;
  maxWorkPerRun: number;
  runState: RunStateStore;
  prometheus: PrometheusConfig;
  prometheusStore: PrometheusSnapshotStore;
}

export function createRunsRouter(deps: RunsDeps): Router {
  const router = Router();

  router.post('/', (req, res, next) => {
    try {
      const config = parseRunRequest(req.body, deps.defaults, deps.maxWorkPerRun);
      const run = executeRun(config);
      deps.runState.save(run);
      console.log(
        `[runs] completed runId=${run.runId} algorithms=${config.algorithms.join(',')} devices=${config.numDevices} slots=${config.numSlots}`
      );

      if (shouldExposeScrape(deps.prometheus)) {
        deps.prometheusStore.setLatest(run);
      }

      if (shouldPushToGateway(deps.prometheus) && deps.prometheus.pushgatewayUrl) {
        void pushRunToPushgateway(run, deps.prometheus.pushgatewayUrl, deps.prometheus.jobName).catch((err) => {
          console.error('[runs] pushgateway error:', err);
        });
      }

      res.status(201).json(toRunPayload(run));
    } catch (err) {
      next(err);
    }
  });

  router.get('/', (_req, res) => {
    res.status(200).json({ runs: deps.runState.list() });
  });

  router.get('/:runId', (req, res, next) => {
    const run = deps.runState.get(req.params.runId);
    if (!run) {
      next(new HttpError(404, `Run not found: ${req.params.runId}`));
      return;
    }
    res.status(200).json(toRunPayload(run));
  });

  router.get('/:runId/report', (req, res, next) => {
    const run = deps.runState.get(req.params.runId);
    if (!run) {
      next(new HttpError(404, `Run not found: ${req.params.runId}`));
      return;
    }
    res.status(200).set('Content-Type', 'text/plain; charset=utf-8').send(formatTextReport(run.comparison));
  });

  return router;
}
