import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { envs } from '../config/envs';
import { ArtifactNotFoundError } from '../shared/errors/merge-job.errors';
import { ArtifactStore, OUTPUT_STORE } from '../storage/domain/artifact-store';
import { MergeResponseDto } from './dto/merge-response.dto';
import { ConversionPipeline } from './pipeline/conversion-pipeline';
import { toHttpException } from './utils/merge-error.mapper';

/** Archivo subido, con los campos de multer que usa el servicio. */
export type MergeUpload = Pick<Express.Multer.File, 'originalname' | 'buffer'>;

@Injectable()
export class MergeService {
  private readonly logger = new Logger(MergeService.name);

  constructor(
    private readonly pipeline: ConversionPipeline,
    @Inject(OUTPUT_STORE)
    private readonly outputStore: ArtifactStore,
  ) {}

  /**
   * Une los archivos en el orden recibido y devuelve la ubicación del PDF.
   * Los fallos del trabajo se traducen a `HttpException` con el código en `error`.
   */
  async mergeUploads(files: MergeUpload[] | undefined, signal?: AbortSignal): Promise<MergeResponseDto> {
    const uploads = (files ?? []).map((file) => ({ name: file.originalname, content: file.buffer }));

    try {
      const output = await this.pipeline.run(uploads, { signal });
      return {
        status: 'success',
        jobId: output.jobId,
        filename: output.name,
        downloadUrl: this.downloadUrlFor(output.name),
        size: output.size,
      };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  async getOutput(filename: string): Promise<Buffer> {
    try {
      return await this.outputStore.load(filename);
    } catch (error) {
      if (error instanceof ArtifactNotFoundError) {
        this.logger.warn(`[download] no existe ${filename}`);
        throw new NotFoundException(`No existe el archivo ${filename}`);
      }
      throw toHttpException(error);
    }
  }

  private downloadUrlFor(filename: string): string {
    const prefix = envs.apiPrefix.replace(/^\/+|\/+$/g, '');
    return `${prefix ? `/${prefix}` : ''}/merge/download/${filename}`;
  }
}
