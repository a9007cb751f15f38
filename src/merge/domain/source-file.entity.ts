import { extname } from 'path';
import {
  DecodeError,
  MergeError,
  UnsupportedFormatError,
} from '../../shared/errors/merge-job.errors';

export type SourceKind = 'document' | 'raster-image';

const KIND_BY_EXTENSION: Readonly<Record<string, SourceKind>> = {
  '.pdf': 'document',
  '.png': 'raster-image',
  '.jpg': 'raster-image',
  '.jpeg': 'raster-image',
};

/** Extensión en minúsculas, con punto; cadena vacía si no tiene. */
export const fileExtension = (fileName: string): string => extname(fileName).toLowerCase();

export function classifySource(fileName: string): SourceKind | null {
  return KIND_BY_EXTENSION[fileExtension(fileName)] ?? null;
}

/** Archivo tal como llega de la capa de subida, en el orden enviado. */
export interface UploadedSource {
  name: string;
  content: Buffer;
}

export class SourceFile {
  readonly name: string;
  readonly kind: SourceKind;
  readonly content: Buffer;

  private constructor(name: string, kind: SourceKind, content: Buffer) {
    this.name = name;
    this.kind = kind;
    this.content = content;
  }

  /**
   * @throws UnsupportedFormatError si la extensión no es pdf, png, jpg o jpeg.
   * @throws DecodeError o MergeError si el archivo llega vacío.
   */
  static from(upload: UploadedSource): SourceFile {
    const kind = classifySource(upload.name);
    if (!kind) {
      throw new UnsupportedFormatError(upload.name, fileExtension(upload.name));
    }
    if (upload.content.length === 0) {
      throw kind === 'raster-image'
        ? new DecodeError(upload.name, 'el archivo está vacío')
        : new MergeError(`El documento "${upload.name}" está vacío`);
    }
    return new SourceFile(upload.name, kind, upload.content);
  }

  /** Nombre apto para usar dentro de una clave de almacenamiento. */
  get safeName(): string {
    return this.name.replace(/[^\w.-]+/g, '_').replace(/^\.+/, '_');
  }
}
