import { HttpStatus } from '../config';
import { toErrorResponse } from '../middleware/errorHandler';
import { toHealthRecordDto } from '../models/HealthRecord';
import { debugRequest, debugResponse } from '../utils/debugLogger';
import { submitDailyMetrics } from './submissions';

import type { DumpSuccessResponse } from '../types';
import type { SubmitContext } from './submissions';
import type { Request, RequestHandler, Response } from 'express';

/**
 * POST /dump: today's metrics from the mobile shortcut.
 */
export const createDumpHandler =
  (context: Omit<SubmitContext, 'log'>): RequestHandler =>
  (req: Request, res: Response) => {
    const { log } = req;
    debugRequest(log, req.body, { path: req.path });

    try {
      const result = submitDailyMetrics(req.body, { ...context, log });

      const body: DumpSuccessResponse = {
        data: toHealthRecordDto(result.record),
        row_count: result.rowCount,
        status: 'success',
      };

      log.info('Saved health submission', {
        created: result.created,
        date: result.record.date,
        rowCount: result.rowCount,
      });
      debugResponse(log, HttpStatus.OK, body);
      res.status(HttpStatus.OK).json(body);
    } catch (error) {
      const { body, status } = toErrorResponse(error);
      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        log.error('Failed to save health submission', error);
      }
      res.status(status).json(body);
    }
  };
