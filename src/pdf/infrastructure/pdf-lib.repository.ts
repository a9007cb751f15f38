import { Injectable, Logger } from '@nestjs/common';
import { EncryptedPDFError, PDFDocument, PDFImage } from 'pdf-lib';
import { MergeError, describeCause } from '../../shared/errors/merge-job.errors';
import { DecodedImage } from '../domain/repositories/image-decoder.repository';
import { PdfRepository } from '../domain/repositories/pdf.repository';
import { FitResult } from '../domain/services/page-fitter';
import { PageGeometry } from '../domain/value-objects/page-geometry.vo';
import { mmToPoints } from '../helpers/units';

// ? Basado en la doc: https://pdf-lib.js.org/ - Ejemplos Embed Images y Copy Pages
@Injectable()
export class PdfLibRepository implements PdfRepository {
  logger = new Logger('PdfLibRepository');

  async createImagePage(
    image: DecodedImage,
    placement: FitResult,
    geometry: PageGeometry,
  ): Promise<Buffer> {
    const pdfDoc = await PDFDocument.create();

    // pdf-lib espera Uint8Array plano, no el Buffer compartido del pool
    const imageData = new Uint8Array(image.data);
    const embedded: PDFImage =
      image.format === 'jpeg' ? await pdfDoc.embedJpg(imageData) : await pdfDoc.embedPng(imageData);

    const page = pdfDoc.addPage([mmToPoints(geometry.pageWidth), mmToPoints(geometry.pageHeight)]);

    // El origen de pdf-lib es la esquina inferior izquierda; al estar centrada
    // la imagen, el offset vertical es el mismo medido desde abajo.
    const x = mmToPoints(placement.offsetX);
    const y = mmToPoints(placement.offsetY);
    const width = mmToPoints(placement.renderWidth);
    const height = mmToPoints(placement.renderHeight);

    page.drawImage(embedded, { x, y, width, height });

    this.logger.log(
      `[createImagePage] imagen ${image.width}x${image.height}px escala=${placement.scale.toFixed(
        4,
      )} coords=(${x.toFixed(2)}, ${y.toFixed(2)}) tamaño=${width.toFixed(2)}x${height.toFixed(2)}pt`,
    );

    return Buffer.from(await pdfDoc.save());
  }

  async mergePDFs(pdfBuffers: Buffer[]): Promise<Buffer> {
    const merged = await PDFDocument.create();

    for (let index = 0; index < pdfBuffers.length; index++) {
      try {
        const source = await this.loadLenient(pdfBuffers[index]);
        const pages = await merged.copyPages(source, source.getPageIndices());
        pages.forEach((page) => merged.addPage(page));
      } catch (error) {
        const reason =
          error instanceof EncryptedPDFError ? 'el documento está cifrado' : describeCause(error);
        throw new MergeError(`No fue posible leer el documento #${index + 1}: ${reason}`, {
          documentIndex: index,
          cause: error,
        });
      }
    }

    this.logger.log(
      `[mergePDFs] ${pdfBuffers.length} documentos unidos, ${merged.getPageCount()} páginas`,
    );

    return Buffer.from(await merged.save());
  }

  // Validación relajada: objetos inválidos se toleran en lugar de rechazar el archivo.
  private loadLenient(pdfBuffer: Buffer): Promise<PDFDocument> {
    return PDFDocument.load(new Uint8Array(pdfBuffer), {
      throwOnInvalidObject: false,
      updateMetadata: false,
    });
  }
}
