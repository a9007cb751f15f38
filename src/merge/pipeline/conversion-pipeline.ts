import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJobId, outputNameFor } from '../../helpers/formatDate';
import { DocumentAssembler } from '../../pdf/services/document-assembler';
import { ImageToDocumentConverter } from '../../pdf/services/image-to-document.converter';
import {
  InternalJobError,
  MergeJobError,
  NoFilesError,
} from '../../shared/errors/merge-job.errors';
import { ArtifactStore, OUTPUT_STORE, UPLOAD_STORE } from '../../storage/domain/artifact-store';
import { CleanupStack } from '../domain/cleanup-stack';
import { JobState, JobStateListener, MergeJob } from '../domain/merge-job';
import { SourceFile, UploadedSource } from '../domain/source-file.entity';
import { JobAbortScope } from './job-abort-scope';
import { MERGE_PIPELINE_CONFIG, MergePipelineConfig } from './pipeline.config';

export interface OutputDocument {
  jobId: string;
  /** Nombre público, `merged_<jobId>.pdf`. */
  name: string;
  key: string;
  size: number;
}

export interface RunOptions {
  /** Cancela el trabajo (por ejemplo, cuando el cliente se desconecta). */
  signal?: AbortSignal;
  onStateChange?: JobStateListener;
}

/**
 * Orquesta un trabajo de unión: guarda los archivos recibidos, convierte las
 * imágenes a PDF con concurrencia acotada, une los documentos en el orden de
 * envío y publica el resultado en el almacén de salida.
 *
 * Todo artefacto intermedio se registra en una pila de limpieza al crearse y
 * se elimina al terminar el trabajo, con éxito o sin él.
 */
@Injectable()
export class ConversionPipeline {
  private readonly logger = new Logger(ConversionPipeline.name);

  constructor(
    private readonly converter: ImageToDocumentConverter,
    private readonly assembler: DocumentAssembler,
    @Inject(UPLOAD_STORE)
    private readonly uploadStore: ArtifactStore,
    @Inject(OUTPUT_STORE)
    private readonly outputStore: ArtifactStore,
    @Inject(MERGE_PIPELINE_CONFIG)
    private readonly config: MergePipelineConfig,
  ) {}

  /**
   * @throws MergeJobError con el código del primer fallo del trabajo.
   */
  async run(uploads: UploadedSource[], options: RunOptions = {}): Promise<OutputDocument> {
    const jobId = createJobId();
    const job = new MergeJob(jobId, uploads.length, (id, state) => {
      this.logState(id, state);
      options.onStateChange?.(id, state);
    });
    const cleanup = new CleanupStack(this.logger);
    const abort = new JobAbortScope(jobId, this.config.jobTimeoutMs, options.signal);

    try {
      if (uploads.length === 0) throw new NoFilesError();

      // Se clasifica todo antes de escribir nada
      const sources = uploads.map((upload) => SourceFile.from(upload));

      await this.convertAll(job, sources, cleanup, abort);
      abort.throwIfAborted();

      const documentKeys = job.orderedDocuments();
      job.transition({ stage: 'assembling', documents: documentKeys.length });

      const documents: Buffer[] = [];
      for (const key of documentKeys) {
        documents.push(await this.uploadStore.load(key));
      }
      const merged = await this.assembler.assemble(documents);
      abort.throwIfAborted();

      const name = outputNameFor(jobId);
      const stored = await this.outputStore.save(name, merged);
      job.transition({ stage: 'done', output: name });

      return { jobId, name, key: stored.key, size: stored.size };
    } catch (error) {
      const jobError = this.toJobError(jobId, error, abort);
      if (!job.isFinished) job.transition({ stage: 'failed', error: jobError });
      throw jobError;
    } finally {
      abort.dispose();
      await cleanup.dispose();
    }
  }

  /**
   * Convierte con a lo sumo `conversionConcurrency` tareas en vuelo. El primer
   * error detiene el reparto de nuevas tareas; se espera a las que ya están en
   * curso antes de propagarlo.
   */
  private async convertAll(
    job: MergeJob,
    sources: SourceFile[],
    cleanup: CleanupStack,
    abort: JobAbortScope,
  ): Promise<void> {
    const failures: unknown[] = [];
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (failures.length === 0 && cursor < sources.length) {
        const index = cursor++;
        try {
          abort.throwIfAborted();
          await this.convertOne(job, index, sources[index], cleanup);
        } catch (error) {
          failures.push(error);
        }
      }
    };

    const workers = Math.max(1, Math.min(this.config.conversionConcurrency, sources.length));
    await Promise.all(Array.from({ length: workers }, () => worker()));

    if (failures.length) throw failures[0];
  }

  private async convertOne(
    job: MergeJob,
    index: number,
    source: SourceFile,
    cleanup: CleanupStack,
  ): Promise<void> {
    job.transition({ stage: 'converting', index, name: source.name });

    const originalKey = `${job.jobId}_${index}_${source.safeName}`;
    await this.uploadStore.save(originalKey, source.content);
    const releaseOriginal = cleanup.defer(originalKey, () => this.uploadStore.delete(originalKey));

    if (source.kind === 'document') {
      job.setDocument(index, originalKey);
      return;
    }

    const pdf = await this.converter.convert({ name: source.name, content: source.content });
    const pdfKey = `${job.jobId}_${index}_${source.safeName}.pdf`;
    await this.uploadStore.save(pdfKey, pdf);
    cleanup.defer(pdfKey, () => this.uploadStore.delete(pdfKey));
    job.setDocument(index, pdfKey);

    // El original ya no hace falta; si falla, se reintenta en la limpieza final
    await releaseOriginal().catch((error: unknown) =>
      this.logger.warn(`[job ${job.jobId}] no se pudo liberar ${originalKey}: ${error}`),
    );
  }

  private toJobError(jobId: string, error: unknown, abort: JobAbortScope): MergeJobError {
    if (error instanceof MergeJobError) return error;
    if (abort.aborted) return abort.reason;
    return new InternalJobError(jobId, error);
  }

  private logState(jobId: string, state: JobState): void {
    switch (state.stage) {
      case 'received':
        this.logger.log(`[job ${jobId}] recibido con ${state.files} archivo(s)`);
        break;
      case 'converting':
        this.logger.log(`[job ${jobId}] procesando #${state.index + 1} ${state.name}`);
        break;
      case 'assembling':
        this.logger.log(`[job ${jobId}] uniendo ${state.documents} documento(s)`);
        break;
      case 'done':
        this.logger.log(`[job ${jobId}] listo: ${state.output}`);
        break;
      case 'failed':
        this.logger.error(`[job ${jobId}] falló (${state.error.code}): ${state.error.message}`);
        break;
    }
  }
}
