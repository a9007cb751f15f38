import { format } from 'date-fns';
import { randomBytes } from 'crypto';

export const formatJobTimestamp = (date: Date = new Date()): string =>
  format(date, 'yyyyMMdd_HHmmss');

/**
 * Identificador de trabajo: marca de tiempo y sufijo aleatorio, para que dos
 * trabajos en el mismo segundo no compartan nombres de archivo.
 */
export const createJobId = (date: Date = new Date()): string =>
  `${formatJobTimestamp(date)}_${randomBytes(4).toString('hex')}`;

export const OUTPUT_NAME_PATTERN = /^merged_\d{8}_\d{6}_[0-9a-f]{8}\.pdf$/;

export const outputNameFor = (jobId: string): string => `merged_${jobId}.pdf`;
