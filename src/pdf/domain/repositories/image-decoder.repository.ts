export const IMAGE_DECODER_REPOSITORY = Symbol('IMAGE_DECODER_REPOSITORY');

export type EmbeddableImageFormat = 'png' | 'jpeg';

/**
 * Imagen ya decodificada y recodificada en un formato que el motor PDF puede
 * incrustar directamente.
 */
export interface DecodedImage {
  width: number;
  height: number;
  format: EmbeddableImageFormat;
  data: Buffer;
}

export interface ImageDecoderRepository {
  /**
   * Decodifica una imagen PNG/JPEG y devuelve sus dimensiones en píxeles junto
   * con una representación recodificada lista para incrustar.
   * @throws DecodeError si los datos no son una imagen válida.
   */
  decode(fileName: string, content: Buffer): Promise<DecodedImage>;
}
