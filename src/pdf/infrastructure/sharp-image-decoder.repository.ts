import { Injectable, Logger } from '@nestjs/common';
import sharp from 'sharp';
import { DecodeError } from '../../shared/errors/merge-job.errors';
import {
  DecodedImage,
  EmbeddableImageFormat,
  ImageDecoderRepository,
} from '../domain/repositories/image-decoder.repository';

@Injectable()
export class SharpImageDecoderRepository implements ImageDecoderRepository {
  private readonly logger = new Logger(SharpImageDecoderRepository.name);

  async decode(fileName: string, content: Buffer): Promise<DecodedImage> {
    if (!content?.length) {
      throw new DecodeError(fileName, 'el archivo está vacío');
    }

    let format: EmbeddableImageFormat;
    let width: number;
    let height: number;
    let data: Buffer;

    try {
      const image = sharp(content);
      const metadata = await image.metadata();

      if (metadata.format !== 'png' && metadata.format !== 'jpeg') {
        throw new Error(`formato de imagen "${metadata.format ?? 'desconocido'}" no soportado`);
      }
      format = metadata.format;

      // El formato se detecta por contenido; la extensión solo decide si es imagen.
      const encoded =
        format === 'png'
          ? await image.png().toBuffer({ resolveWithObject: true })
          : await image.jpeg({ quality: 90 }).toBuffer({ resolveWithObject: true });

      width = encoded.info.width;
      height = encoded.info.height;
      data = encoded.data;
    } catch (error) {
      throw new DecodeError(fileName, error);
    }

    this.logger.log(
      `[decode] ${fileName} -> ${format} ${width}x${height}px (${content.length} -> ${data.length} bytes)`,
    );

    return { width, height, format, data };
  }
}
