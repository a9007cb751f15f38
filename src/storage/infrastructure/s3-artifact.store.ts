import {
  DeleteObjectCommand,
  GetObjectCommand,
  GetObjectCommandOutput,
  HeadObjectCommand,
  NoSuchKey,
  NotFound,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { Logger } from '@nestjs/common';
import { Readable } from 'stream';
import {
  ArtifactIOError,
  ArtifactNotFoundError,
} from '../../shared/errors/merge-job.errors';
import { ArtifactStore, StoredArtifact } from '../domain/artifact-store';

export interface S3ArtifactStoreOptions {
  bucket: string;
  /** Prefijo de las claves dentro del bucket, sin barra final. */
  keyPrefix: string;
}

const isMissingObject = (error: unknown): boolean =>
  error instanceof NoSuchKey ||
  error instanceof NotFound ||
  (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404);

export class S3ArtifactStore implements ArtifactStore {
  readonly name: string;
  private readonly logger: Logger = new Logger(S3ArtifactStore.name);

  constructor(
    private readonly s3Client: S3Client,
    private readonly options: S3ArtifactStoreOptions,
  ) {
    this.name = `s3:${options.bucket}/${options.keyPrefix}`;
  }

  /**
   * Sube el artefacto al bucket. PutObject es atómico: el objeto no es
   * visible hasta que la subida termina.
   */
  async save(key: string, content: Buffer): Promise<StoredArtifact> {
    const fileKey = this.toObjectKey(key);

    try {
      await this.s3Client.send(
        new PutObjectCommand({
          Bucket: this.options.bucket,
          Key: fileKey,
          Body: content,
          ContentType: key.toLowerCase().endsWith('.pdf') ? 'application/pdf' : undefined,
        }),
      );
    } catch (error) {
      this.logger.error(`Problemas al subir "${fileKey}" al bucket. Error: ${error}`);
      throw new ArtifactIOError('guardar', key, error);
    }

    this.logger.log(`File key: ${fileKey}`);
    return { key, size: content.length };
  }

  async load(key: string): Promise<Buffer> {
    const fileKey = this.toObjectKey(key);

    try {
      const response = await this.s3Client.send(
        new GetObjectCommand({
          Bucket: this.options.bucket,
          Key: fileKey,
        }),
      );
      return await this.readBody(response.Body);
    } catch (error) {
      if (isMissingObject(error)) throw new ArtifactNotFoundError(key);
      throw new ArtifactIOError('leer', key, error);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.s3Client.send(
        new DeleteObjectCommand({
          Bucket: this.options.bucket,
          Key: this.toObjectKey(key),
        }),
      );
    } catch (error) {
      if (isMissingObject(error)) return;
      throw new ArtifactIOError('eliminar', key, error);
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.s3Client.send(
        new HeadObjectCommand({
          Bucket: this.options.bucket,
          Key: this.toObjectKey(key),
        }),
      );
      return true;
    } catch (error) {
      if (isMissingObject(error)) return false;
      throw new ArtifactIOError('consultar', key, error);
    }
  }

  private toObjectKey(key: string): string {
    return this.options.keyPrefix ? `${this.options.keyPrefix}/${key}` : key;
  }

  private async readBody(body: GetObjectCommandOutput['Body']): Promise<Buffer> {
    if (body instanceof Readable) {
      const chunks: Buffer[] = [];
      for await (const chunk of body) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
      return Buffer.concat(chunks);
    }
    if (body && typeof body.transformToByteArray === 'function') {
      return Buffer.from(await body.transformToByteArray());
    }
    throw new Error('No se pudo procesar el stream del archivo S3');
  }
}
