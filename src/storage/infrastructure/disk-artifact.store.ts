import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { access, mkdir, readFile, rename, rm, unlink, writeFile } from 'fs/promises';
import { dirname, resolve, sep } from 'path';
import {
  ArtifactIOError,
  ArtifactNotFoundError,
} from '../../shared/errors/merge-job.errors';
import { ArtifactStore, StoredArtifact } from '../domain/artifact-store';

const isErrno = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

/**
 * Almacén en disco local. Cada escritura va a un archivo temporal hermano y
 * se renombra al destino, de modo que un artefacto nunca se ve a medias.
 */
export class DiskArtifactStore implements ArtifactStore {
  readonly name: string;
  private readonly logger = new Logger(DiskArtifactStore.name);
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);
    this.name = `disk:${this.baseDir}`;
  }

  async save(key: string, content: Buffer): Promise<StoredArtifact> {
    const fullPath = this.getFullPath(key);
    const tempPath = `${fullPath}.${randomUUID()}.tmp`;

    try {
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(tempPath, content);
      await rename(tempPath, fullPath);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) =>
        this.logger.warn(`No se pudo eliminar el temporal ${tempPath}: ${cleanupError}`),
      );
      throw new ArtifactIOError('guardar', key, error);
    }

    return { key, size: content.length };
  }

  async load(key: string): Promise<Buffer> {
    const fullPath = this.getFullPath(key);

    try {
      return await readFile(fullPath);
    } catch (error) {
      if (isErrno(error, 'ENOENT')) throw new ArtifactNotFoundError(key);
      throw new ArtifactIOError('leer', key, error);
    }
  }

  async delete(key: string): Promise<void> {
    const fullPath = this.getFullPath(key);

    try {
      await unlink(fullPath);
    } catch (error) {
      // No existe = ya eliminado
      if (isErrno(error, 'ENOENT')) return;
      throw new ArtifactIOError('eliminar', key, error);
    }
  }

  async exists(key: string): Promise<boolean> {
    const fullPath = this.getFullPath(key);

    try {
      await access(fullPath);
      return true;
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return false;
      throw new ArtifactIOError('consultar', key, error);
    }
  }

  private getFullPath(key: string): string {
    const fullPath = resolve(this.baseDir, key);
    if (!fullPath.startsWith(this.baseDir + sep)) {
      throw new ArtifactIOError('resolver', key, 'la clave sale del directorio base');
    }
    return fullPath;
  }
}
