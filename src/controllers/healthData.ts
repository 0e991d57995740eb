import { buildDashboard, countUnreadableDates, DEFAULT_VIEW } from '../aggregation';
import { HttpStatus } from '../config';
import { toErrorResponse } from '../middleware/errorHandler';
import { toHealthRecordDto } from '../models/HealthRecord';
import { getTodayKey } from '../utils/dateUtilities';
import { debugCoercion } from '../utils/debugLogger';
import { parseHealthDataQuery, parseSummaryQuery } from '../validation/schemas';

import type { HealthRecordStore } from '../storage';
import type { DateRange, HealthDataResponse } from '../types';
import type { HealthDataQuery } from '../validation/schemas';
import type { Request, RequestHandler, Response } from 'express';

export interface ReadContext {
  store: HealthRecordStore;
  timeZone: string;
  now?: () => Date;
}

const todayIn = (context: ReadContext): string =>
  getTodayKey(context.timeZone, (context.now ?? (() => new Date()))());

/**
 * `date` is a shortcut for a single day and wins over explicit bounds.
 */
export const resolveDateRange = (query: HealthDataQuery, today: string): DateRange => {
  if (query.date) {
    const day = query.date.toLowerCase() === 'today' ? today : query.date;
    return { from: day, to: day };
  }
  return { from: query.date_start, to: query.date_end };
};

/**
 * GET /api/health-data: stored records, newest first.
 */
export const createHealthDataHandler =
  (context: ReadContext): RequestHandler =>
  (req: Request, res: Response) => {
    const { log } = req;

    try {
      const query = parseHealthDataQuery(req.query);
      const range = resolveDateRange(query, todayIn(context));
      const records = context.store.findAll(range);

      log.debug('Fetched health records', { count: records.length, range });
      res.status(HttpStatus.OK).json({ data: records.map(toHealthRecordDto) } satisfies HealthDataResponse);
    } catch (error) {
      const { body, status } = toErrorResponse(error);
      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        log.error('Failed to fetch health records', error);
      }
      res.status(status).json(body);
    }
  };

/**
 * GET /api/health-data/summary: chart series, statistics and table rows
 * for one dashboard view.
 */
export const createSummaryHandler =
  (context: ReadContext): RequestHandler =>
  (req: Request, res: Response) => {
    const { log } = req;
    const timer = log.startTimer('buildDashboard');

    try {
      const requested = parseSummaryQuery(req.query);
      const records = context.store.findAll().map(toHealthRecordDto);

      debugCoercion(log, { inputRecords: records.length, unreadableDates: countUnreadableDates(records) });

      const summary = buildDashboard(
        records,
        { ...requested, groupBy: requested.groupBy ?? DEFAULT_VIEW.groupBy },
        todayIn(context),
      );

      timer.end('debug', 'Dashboard built', {
        buckets: summary.series.keys.length,
        daysTracked: summary.daysTracked,
        records: records.length,
      });
      res.status(HttpStatus.OK).json(summary);
    } catch (error) {
      const { body, status } = toErrorResponse(error);
      timer.end(status >= HttpStatus.INTERNAL_SERVER_ERROR ? 'error' : 'warn', 'Dashboard request failed', {
        status,
      });
      res.status(status).json(body);
    }
  };
