import { fileExtension, classifySource } from '../domain/source-file.entity';
import { UnsupportedFormatError } from '../../shared/errors/merge-job.errors';
import { toHttpException } from './merge-error.mapper';

/**
 * `fileFilter` de multer: corta la subida con 415 en cuanto llega un archivo
 * que no es pdf, png, jpg o jpeg.
 */
export const mergeUploadFileFilter = (
  _req: unknown,
  file: { originalname: string },
  callback: (error: Error | null, acceptFile: boolean) => void,
): void => {
  if (classifySource(file.originalname)) {
    callback(null, true);
    return;
  }

  const error = new UnsupportedFormatError(file.originalname, fileExtension(file.originalname));
  callback(toHttpException(error), false);
};
