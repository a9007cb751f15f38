/**
 * Tamaño físico de la página (en milímetros) y del área imprimible dentro de
 * los márgenes. Los márgenes son simétricos: el área imprimible queda centrada.
 */
export class PageGeometry {
  readonly pageWidth: number;
  readonly pageHeight: number;
  readonly marginedWidth: number;
  readonly marginedHeight: number;

  constructor(params: {
    pageWidth: number;
    pageHeight: number;
    marginedWidth: number;
    marginedHeight: number;
  }) {
    for (const [key, value] of Object.entries(params)) {
      if (!Number.isFinite(value) || value <= 0) throw new Error(`${key} debe ser mayor que 0`);
    }
    if (params.marginedWidth > params.pageWidth) throw new Error('marginedWidth no puede superar a pageWidth');
    if (params.marginedHeight > params.pageHeight) throw new Error('marginedHeight no puede superar a pageHeight');

    this.pageWidth = params.pageWidth;
    this.pageHeight = params.pageHeight;
    this.marginedWidth = params.marginedWidth;
    this.marginedHeight = params.marginedHeight;
    Object.freeze(this);
  }

  get marginX(): number {
    return (this.pageWidth - this.marginedWidth) / 2;
  }

  get marginY(): number {
    return (this.pageHeight - this.marginedHeight) / 2;
  }
}

// A4 vertical con 10 mm de margen por lado. Constante del proceso.
export const A4_PAGE_GEOMETRY = new PageGeometry({
  pageWidth: 210,
  pageHeight: 297,
  marginedWidth: 190,
  marginedHeight: 277,
});
