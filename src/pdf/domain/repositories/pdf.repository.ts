import { FitResult } from '../services/page-fitter';
import { PageGeometry } from '../value-objects/page-geometry.vo';
import { DecodedImage } from './image-decoder.repository';

export const PDF_REPOSITORY = Symbol('PDF_REPOSITORY');

export interface PdfRepository {
  /**
   * Crea un PDF de una sola página con la imagen dibujada según la ubicación
   * calculada. Las medidas de `geometry` y `placement` están en milímetros.
   * @returns Buffer del PDF generado
   */
  createImagePage(
    image: DecodedImage,
    placement: FitResult,
    geometry: PageGeometry,
  ): Promise<Buffer>;

  /**
   * Une varios PDFs copiando todas sus páginas en el orden recibido.
   * @throws MergeError si alguno de los documentos no se puede leer.
   */
  mergePDFs(pdfBuffers: Buffer[]): Promise<Buffer>;
}
