import type { Router } from 'express';
import express from 'express';
import { z } from 'zod';
import type { LocationGate } from '../../core/location/LocationGate.js';
import type { ForecastController } from '../../core/forecast/ForecastController.js';
import type { PresenterOptions } from '../../core/view/ForecastPresenter.js';
import { buildForecastScreen } from '../../core/view/ForecastPresenter.js';
import { renderForecastText } from '../../core/view/textRenderer.js';
import type { PushLocationAdapter } from '../location/PushLocationAdapter.js';
import { createLogger } from '../../utils/logger.js';

const coordinateSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

const locationReportSchema = z.union([
  z.object({ positions: z.array(coordinateSchema) }),
  z.object({ error: z.enum(['permission_denied', 'position_unavailable']) }),
]);

export interface ForecastRouterDeps {
  gate: LocationGate;
  controller: ForecastController;
  presenter: PresenterOptions;
  /** Present only when fixes are pushed by clients. */
  pushLocation?: PushLocationAdapter;
  now?: () => Date;
}

export function createForecastRouter(deps: ForecastRouterDeps): Router {
  const logger = createLogger({ component: 'forecastRouter' });
  const router = express.Router();
  const now = deps.now ?? (() => new Date());

  router.get('/forecast', (req, res) => {
    const weather = deps.controller.weather;
    const asText = req.query.format === 'text';

    if (!weather) {
      if (asText) {
        res.status(200).type('text/plain').send('');
      } else {
        res.status(200).json({ status: 'pending' });
      }
      return;
    }

    const screen = buildForecastScreen(weather, now(), deps.presenter);
    if (asText) {
      res.status(200).type('text/plain').send(renderForecastText(screen));
    } else {
      res.status(200).json({ status: 'ready', screen });
    }
  });

  router.get('/location', (_req, res) => {
    res.status(200).json(deps.gate.state);
  });

  router.post('/location', express.json(), (req, res) => {
    const pushLocation = deps.pushLocation;
    if (!pushLocation) {
      res.status(404).json({ error: 'Location is not accepted from clients' });
      return;
    }

    const parsed = locationReportSchema.safeParse(req.body);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues }, 'Rejected location report');
      res.status(400).json({ error: 'Invalid location report' });
      return;
    }

    const report = parsed.data;
    if ('positions' in report) {
      pushLocation.pushPositions(report.positions);
    } else {
      pushLocation.pushError(report.error);
    }
    res.status(202).json({ accepted: true });
  });

  return router;
}
