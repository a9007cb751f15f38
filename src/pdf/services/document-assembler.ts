import { Inject, Injectable, Logger } from '@nestjs/common';
import { MergeError, MergeJobError } from '../../shared/errors/merge-job.errors';
import { PDF_REPOSITORY, PdfRepository } from '../domain/repositories/pdf.repository';

@Injectable()
export class DocumentAssembler {
  private readonly logger = new Logger(DocumentAssembler.name);

  constructor(
    @Inject(PDF_REPOSITORY)
    private readonly pdfRepository: PdfRepository,
  ) {}

  /**
   * Une los documentos en el orden recibido.
   *
   * Con un solo documento se devuelve una copia exacta de sus bytes, sin pasar
   * por el motor de unión. Todo o nada: si un documento no se puede leer no se
   * produce salida parcial.
   */
  async assemble(documents: Buffer[]): Promise<Buffer> {
    if (documents.length === 0) {
      throw new MergeError('No hay documentos para unir');
    }

    if (documents.length === 1) {
      this.logger.log('[assemble] un solo documento, se copia sin unir');
      return Buffer.from(documents[0]);
    }

    try {
      return await this.pdfRepository.mergePDFs(documents);
    } catch (error) {
      if (error instanceof MergeJobError) throw error;
      throw new MergeError(`No se pudieron unir los PDFs: ${error}`, { cause: error });
    }
  }
}
