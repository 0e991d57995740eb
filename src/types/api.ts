/**
 * HTTP response bodies.
 */

import type { ZodIssue } from 'zod';

import type { HealthRecordDto } from './health';

export interface DumpSuccessResponse {
  status: 'success';
  data: HealthRecordDto;
  row_count: number;
}

export interface ErrorResponse {
  status: 'error';
  message: string;
  details?: ZodIssue[];
}

export interface HealthDataResponse {
  data: HealthRecordDto[];
}
