import { InvalidImageError } from '../../../shared/errors/merge-job.errors';
import { PageGeometry } from '../value-objects/page-geometry.vo';

// Un píxel se interpreta como un milímetro en todo el sistema.
export const MM_PER_PIXEL = 1;

export interface FitResult {
  scale: number;
  renderWidth: number;
  renderHeight: number;
  offsetX: number;
  offsetY: number;
}

/**
 * Calcula la escala y la posición de una imagen dentro de la página.
 *
 * Si la imagen cabe en el área imprimible se dibuja a tamaño real; si no, se
 * reduce con la escala de la dimensión más restrictiva. En ambos casos queda
 * centrada sobre la página completa.
 *
 * @throws InvalidImageError si alguna dimensión no es un número positivo.
 */
export function fitImageToPage(
  imageWidthPx: number,
  imageHeightPx: number,
  geometry: PageGeometry,
): FitResult {
  if (
    !Number.isFinite(imageWidthPx) ||
    !Number.isFinite(imageHeightPx) ||
    imageWidthPx <= 0 ||
    imageHeightPx <= 0
  ) {
    throw new InvalidImageError(imageWidthPx, imageHeightPx);
  }

  const width = imageWidthPx * MM_PER_PIXEL;
  const height = imageHeightPx * MM_PER_PIXEL;

  let scale = 1;
  if (width > geometry.marginedWidth || height > geometry.marginedHeight) {
    const scaleX = geometry.marginedWidth / width;
    const scaleY = geometry.marginedHeight / height;
    scale = Math.min(scaleX, scaleY);
  }

  const renderWidth = width * scale;
  const renderHeight = height * scale;

  return {
    scale,
    renderWidth,
    renderHeight,
    offsetX: (geometry.pageWidth - renderWidth) / 2,
    offsetY: (geometry.pageHeight - renderHeight) / 2,
  };
}
