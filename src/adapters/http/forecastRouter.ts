import type { Router } from 'express';
import express from 'express';
import type { ForecastResolver } from '../../core/forecast/ForecastResolver.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';

export type ForecastService = Pick<ForecastResolver, 'resolve'>;

export const MISSING_LOCATION_MESSAGE = 'Please provide a location (city or state name)';

function readLocation(value: unknown): string {
  // Repeated query parameters arrive as an array; the first one wins
  const first: unknown = Array.isArray(value) ? value[0] : value;
  return typeof first === 'string' ? first.trim() : '';
}

export function createForecastRouter(service: ForecastService): Router {
  const logger = createLogger({ component: 'forecastRouter' });
  const router = express.Router();

  router.get('/forecast', async (req, res, next) => {
    const requestLogger = logger.child({ correlationId: generateCorrelationId() });
    const location = readLocation(req.query.location);

    if (!location) {
      requestLogger.info('Rejected forecast request without location');
      res.status(400).json({ success: false, error: MISSING_LOCATION_MESSAGE });
      return;
    }

    try {
      requestLogger.info({ location }, 'Received forecast request');
      const result = await service.resolve(location);
      res.status(200).json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
