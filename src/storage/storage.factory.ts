import { S3Client } from '@aws-sdk/client-s3';
import { Envs } from '../config/envs';
import { ArtifactStore } from './domain/artifact-store';
import { DiskArtifactStore } from './infrastructure/disk-artifact.store';
import { S3ArtifactStore } from './infrastructure/s3-artifact.store';

export type StorageArea = 'uploads' | 'output';

export type StorageConfig = Pick<
  Envs,
  | 'storageDriver'
  | 'uploadsDir'
  | 'outputDir'
  | 'bucketRegion'
  | 'bucketName'
  | 'bucketPrefix'
  | 'bucketAccessKeyID'
  | 'bucketSecretKey'
>;

/**
 * Crea el almacén de un área (temporales de subida o salida final) según el
 * driver configurado. En disco cada área es un directorio; en S3, un prefijo.
 */
export function createArtifactStore(area: StorageArea, config: StorageConfig): ArtifactStore {
  if (config.storageDriver === 'disk') {
    return new DiskArtifactStore(area === 'uploads' ? config.uploadsDir : config.outputDir);
  }

  const { bucketRegion, bucketName, bucketAccessKeyID, bucketSecretKey } = config;
  if (!bucketRegion || !bucketName || !bucketAccessKeyID || !bucketSecretKey) {
    throw new Error('El driver s3 requiere región, bucket y credenciales configuradas');
  }

  const s3Client = new S3Client({
    region: bucketRegion,
    credentials: {
      accessKeyId: bucketAccessKeyID,
      secretAccessKey: bucketSecretKey,
    },
  });

  return new S3ArtifactStore(s3Client, {
    bucket: bucketName,
    keyPrefix: config.bucketPrefix ? `${config.bucketPrefix.replace(/\/+$/, '')}/${area}` : area,
  });
}
