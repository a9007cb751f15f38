import 'dotenv/config';
import * as joi from 'joi';

export type StorageDriver = 'disk' | 's3';

interface EnvVars {
  PORT: number;
  API_PREFIX: string;
  CORS_ORIGIN: string;
  NODE_ENV: string;
  STORAGE_DRIVER: StorageDriver;
  UPLOADS_DIR: string;
  OUTPUT_DIR: string;
  MAX_FILE_SIZE_MB: number;
  MAX_FILES: number;
  JOB_TIMEOUT_MS: number;
  CONVERSION_CONCURRENCY: number;
  S3_BUCKET_REGION?: string;
  S3_BUCKET_NAME?: string;
  S3_BUCKET_PREFIX?: string;
  S3_BUCKET_ACCESS_KEY_ID?: string;
  S3_BUCKET_SECRET_KEY?: string;
}

const envsSchema = joi
  .object<EnvVars>({
    PORT: joi.number().default(3200),
    API_PREFIX: joi.string().default('/api/v1'),
    CORS_ORIGIN: joi.string().default('http://localhost:9002'),
    NODE_ENV: joi.string().default('development'),

    STORAGE_DRIVER: joi.string().valid('disk', 's3').default('disk'),
    UPLOADS_DIR: joi.string().default('uploads'),
    OUTPUT_DIR: joi.string().default('output'),

    MAX_FILE_SIZE_MB: joi.number().positive().default(32),
    MAX_FILES: joi.number().integer().min(1).default(50),
    JOB_TIMEOUT_MS: joi.number().integer().min(1).default(120_000),
    CONVERSION_CONCURRENCY: joi.number().integer().min(1).default(2),

    S3_BUCKET_REGION: joi
      .string()
      .when('STORAGE_DRIVER', { is: 's3', then: joi.required(), otherwise: joi.optional().allow('') }),
    S3_BUCKET_NAME: joi
      .string()
      .when('STORAGE_DRIVER', { is: 's3', then: joi.required(), otherwise: joi.optional().allow('') }),
    S3_BUCKET_PREFIX: joi.string().optional().allow(''),
    S3_BUCKET_ACCESS_KEY_ID: joi
      .string()
      .when('STORAGE_DRIVER', { is: 's3', then: joi.required(), otherwise: joi.optional().allow('') }),
    S3_BUCKET_SECRET_KEY: joi
      .string()
      .when('STORAGE_DRIVER', { is: 's3', then: joi.required(), otherwise: joi.optional().allow('') }),
  })
  .unknown(true);

export function validateEnvs(env: NodeJS.ProcessEnv) {
  const { error, value: vars } = envsSchema.validate(env, {
    abortEarly: false,
  });
  if (error) throw new Error(`Config validation error: ${error.message}`);

  return {
    port: vars.PORT,
    apiPrefix: vars.API_PREFIX,
    corsOrigin: String(vars.CORS_ORIGIN)
      .split(',')
      .map((o: string) => o.trim()),
    nodeEnv: vars.NODE_ENV,

    storageDriver: vars.STORAGE_DRIVER,
    uploadsDir: vars.UPLOADS_DIR,
    outputDir: vars.OUTPUT_DIR,

    maxFileSizeBytes: Math.floor(vars.MAX_FILE_SIZE_MB * 1024 * 1024),
    maxFiles: vars.MAX_FILES,
    jobTimeoutMs: vars.JOB_TIMEOUT_MS,
    conversionConcurrency: vars.CONVERSION_CONCURRENCY,

    bucketRegion: vars.S3_BUCKET_REGION || undefined,
    bucketName: vars.S3_BUCKET_NAME || undefined,
    bucketPrefix: vars.S3_BUCKET_PREFIX ?? '',
    bucketAccessKeyID: vars.S3_BUCKET_ACCESS_KEY_ID || undefined,
    bucketSecretKey: vars.S3_BUCKET_SECRET_KEY || undefined,
  };
}

export type Envs = ReturnType<typeof validateEnvs>;

export const envs: Envs = validateEnvs(process.env);
