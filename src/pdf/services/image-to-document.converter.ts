import { Inject, Injectable, Logger } from '@nestjs/common';
import { DecodeError, MergeJobError } from '../../shared/errors/merge-job.errors';
import {
  IMAGE_DECODER_REPOSITORY,
  ImageDecoderRepository,
} from '../domain/repositories/image-decoder.repository';
import { PDF_REPOSITORY, PdfRepository } from '../domain/repositories/pdf.repository';
import { fitImageToPage } from '../domain/services/page-fitter';
import { A4_PAGE_GEOMETRY } from '../domain/value-objects/page-geometry.vo';

export interface RasterImageInput {
  name: string;
  content: Buffer;
}

@Injectable()
export class ImageToDocumentConverter {
  private readonly logger = new Logger(ImageToDocumentConverter.name);

  constructor(
    @Inject(IMAGE_DECODER_REPOSITORY)
    private readonly imageDecoder: ImageDecoderRepository,
    @Inject(PDF_REPOSITORY)
    private readonly pdfRepository: PdfRepository,
  ) {}

  /**
   * Convierte una imagen PNG/JPEG en un PDF A4 de una página con la imagen
   * centrada y reducida, si hace falta, para respetar los márgenes.
   *
   * @returns Buffer del PDF de una página
   * @throws DecodeError si la imagen no se puede decodificar o incrustar.
   * @throws InvalidImageError si la imagen tiene dimensiones degeneradas.
   */
  async convert(image: RasterImageInput): Promise<Buffer> {
    const decoded = await this.imageDecoder.decode(image.name, image.content);
    const placement = fitImageToPage(decoded.width, decoded.height, A4_PAGE_GEOMETRY);

    try {
      const pdf = await this.pdfRepository.createImagePage(decoded, placement, A4_PAGE_GEOMETRY);
      this.logger.log(`[convert] ${image.name} convertido a PDF (${pdf.length} bytes)`);
      return pdf;
    } catch (error) {
      if (error instanceof MergeJobError) throw error;
      throw new DecodeError(image.name, error);
    }
  }
}
