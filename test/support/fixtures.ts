import { decodePDFRawStream, PDFArray, PDFDocument, PDFRawStream } from 'pdf-lib';
import sharp from 'sharp';

export type PageSize = [number, number];

// A4 en puntos, redondeado a 2 decimales
export const A4_POINTS: PageSize = [595.28, 841.89];

export async function createPdf(pageSizes: PageSize[]): Promise<Buffer> {
  const pdfDoc = await PDFDocument.create();
  pageSizes.forEach((size) => pdfDoc.addPage(size));
  return Buffer.from(await pdfDoc.save());
}

export function createPng(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 30, b: 30 } },
  })
    .png()
    .toBuffer();
}

export function createJpeg(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 30, g: 30, b: 200 } },
  })
    .jpeg()
    .toBuffer();
}

export async function readPageSizes(pdf: Buffer): Promise<PageSize[]> {
  const pdfDoc = await PDFDocument.load(new Uint8Array(pdf));
  return pdfDoc.getPages().map((page) => {
    const { width, height } = page.getSize();
    return [round(width), round(height)];
  });
}

// `+ 0` convierte -0 en 0
const round = (value: number): number => Math.round(value * 100) / 100 + 0;

export type Matrix = [number, number, number, number, number, number];

/**
 * Matriz de transformación acumulada por los operadores `cm` de la página.
 * Las páginas de imagen solo tienen los `cm` del dibujo de la imagen.
 */
export async function readPageTransform(pdf: Buffer, pageIndex = 0): Promise<Matrix> {
  const pdfDoc = await PDFDocument.load(new Uint8Array(pdf));
  const contents = pdfDoc.getPage(pageIndex).node.Contents();

  const streams: PDFRawStream[] = [];
  if (contents instanceof PDFRawStream) streams.push(contents);
  if (contents instanceof PDFArray) {
    for (let index = 0; index < contents.size(); index++) {
      const stream = contents.lookup(index);
      if (stream instanceof PDFRawStream) streams.push(stream);
    }
  }

  const tokens = streams
    .map((stream) => Buffer.from(decodePDFRawStream(stream).decode()).toString('latin1'))
    .join('\n')
    .split(/\s+/);

  let transform: Matrix = [1, 0, 0, 1, 0, 0];
  tokens.forEach((token, index) => {
    if (token !== 'cm') return;
    const [a, b, c, d, e, f] = tokens.slice(index - 6, index).map(Number);
    transform = multiply([a, b, c, d, e, f], transform);
  });

  const [a, b, c, d, e, f] = transform;
  return [round(a), round(b), round(c), round(d), round(e), round(f)];
}

// `next` se concatena antes de `current`, como hace `cm` sobre la CTM
const multiply = (next: Matrix, current: Matrix): Matrix => {
  const [a1, b1, c1, d1, e1, f1] = current;
  const [a2, b2, c2, d2, e2, f2] = next;
  return [
    a2 * a1 + b2 * c1,
    a2 * b1 + b2 * d1,
    c2 * a1 + d2 * c1,
    c2 * b1 + d2 * d1,
    e2 * a1 + f2 * c1 + e1,
    e2 * b1 + f2 * d1 + f1,
  ];
};
