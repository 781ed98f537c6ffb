import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { getCalendar } from '../domain/availability.js';
import { metricsStore } from '../store/metrics.js';
import { errorHandler } from '../middleware/error-handler.js';

const calendarQuerySchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
});

const spaceParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

/**
 * Operational HTTP surface: liveness, counters and a read-only calendar view.
 * Bookings themselves only travel over the frame protocol.
 */
export function createOpsApp(options: { timeZone: string }) {
  const app = express();

  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  app.get('/metrics', (req: Request, res: Response) => {
    res.status(200).json(metricsStore.getMetrics());
  });

  app.get('/spaces/:id/calendar', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = spaceParamsSchema.parse(req.params);
      const { date } = calendarQuerySchema.parse(req.query);
      const calendar = await getCalendar(id, date, options.timeZone);
      res.status(200).json(calendar);
    } catch (err) {
      next(err);
    }
  });

  app.use(errorHandler);

  return app;
}
