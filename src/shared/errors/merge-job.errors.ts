export type MergeJobErrorCode =
  | 'NO_FILES'
  | 'UNSUPPORTED_FORMAT'
  | 'DECODE_ERROR'
  | 'INVALID_IMAGE'
  | 'MERGE_ERROR'
  | 'IO_ERROR'
  | 'CANCELLED'
  | 'TIMEOUT'
  | 'INTERNAL';

/**
 * Error terminal de un trabajo de unión. Todo fallo del pipeline se expone como
 * una subclase con su `code`, que la capa HTTP traduce a un estado.
 */
export class MergeJobError extends Error {
  readonly code: MergeJobErrorCode;

  constructor(code: MergeJobErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NoFilesError extends MergeJobError {
  constructor() {
    super('NO_FILES', 'No se recibieron archivos para unir');
  }
}

export class UnsupportedFormatError extends MergeJobError {
  readonly fileName: string;

  constructor(fileName: string, extension: string) {
    super(
      'UNSUPPORTED_FORMAT',
      `Formato de archivo no soportado "${extension || 'sin extensión'}" en "${fileName}"`,
    );
    this.fileName = fileName;
  }
}

export class DecodeError extends MergeJobError {
  constructor(fileName: string, cause?: unknown) {
    super('DECODE_ERROR', `No fue posible decodificar la imagen "${fileName}": ${describeCause(cause)}`, {
      cause,
    });
  }
}

export class InvalidImageError extends MergeJobError {
  constructor(width: number, height: number) {
    super('INVALID_IMAGE', `Dimensiones de imagen inválidas (${width}x${height})`);
  }
}

export class MergeError extends MergeJobError {
  /** Posición (base 0) del documento que falló, si aplica. */
  readonly documentIndex?: number;

  constructor(message: string, options?: { documentIndex?: number; cause?: unknown }) {
    super('MERGE_ERROR', message, { cause: options?.cause });
    this.documentIndex = options?.documentIndex;
  }
}

export class ArtifactIOError extends MergeJobError {
  readonly key: string;

  constructor(operation: string, key: string, cause?: unknown) {
    super('IO_ERROR', `Problemas al ${operation} el artefacto "${key}": ${describeCause(cause)}`, {
      cause,
    });
    this.key = key;
  }
}

export class ArtifactNotFoundError extends ArtifactIOError {
  constructor(key: string) {
    super('leer', key, 'no existe');
  }
}

export class JobCancelledError extends MergeJobError {
  constructor(jobId: string) {
    super('CANCELLED', `El trabajo ${jobId} fue cancelado`);
  }
}

export class JobTimeoutError extends MergeJobError {
  constructor(jobId: string, timeoutMs: number) {
    super('TIMEOUT', `El trabajo ${jobId} excedió el tiempo máximo de ${timeoutMs} ms`);
  }
}

export class InternalJobError extends MergeJobError {
  constructor(jobId: string, cause: unknown) {
    super('INTERNAL', `Error inesperado en el trabajo ${jobId}: ${describeCause(cause)}`, { cause });
  }
}

export function describeCause(cause: unknown): string {
  if (cause === undefined) return 'error desconocido';
  return cause instanceof Error ? cause.message : String(cause);
}
