import { HttpException, HttpStatus } from '@nestjs/common';
import {
  describeCause,
  MergeJobError,
  MergeJobErrorCode,
} from '../../shared/errors/merge-job.errors';

export const HTTP_STATUS_BY_CODE: Readonly<Record<MergeJobErrorCode, HttpStatus>> = {
  NO_FILES: HttpStatus.BAD_REQUEST,
  UNSUPPORTED_FORMAT: HttpStatus.UNSUPPORTED_MEDIA_TYPE,
  DECODE_ERROR: HttpStatus.UNPROCESSABLE_ENTITY,
  INVALID_IMAGE: HttpStatus.UNPROCESSABLE_ENTITY,
  MERGE_ERROR: HttpStatus.UNPROCESSABLE_ENTITY,
  IO_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
  CANCELLED: HttpStatus.BAD_REQUEST,
  TIMEOUT: HttpStatus.REQUEST_TIMEOUT,
  INTERNAL: HttpStatus.INTERNAL_SERVER_ERROR,
};

/** Respuesta `{ statusCode, error, message }` con el código del trabajo en `error`. */
export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) return error;

  if (error instanceof MergeJobError) {
    const statusCode = HTTP_STATUS_BY_CODE[error.code];
    return new HttpException({ statusCode, error: error.code, message: error.message }, statusCode, {
      cause: error,
    });
  }

  const statusCode = HttpStatus.INTERNAL_SERVER_ERROR;
  return new HttpException(
    { statusCode, error: 'INTERNAL', message: `Error inesperado: ${describeCause(error)}` },
    statusCode,
    { cause: error },
  );
}
