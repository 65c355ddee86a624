import { logger } from '../../utils/logger.js';
import type { PageImage } from '../../types/extraction.types.js';

export interface RasterizeOptions {
  dpi: number;
  maxPages: number;
}

export interface PageRasterizer {
  rasterize(pdf: Buffer, options: RasterizeOptions): Promise<PageImage[]>;
}

let canvasModule: typeof import('@napi-rs/canvas') | null = null;
async function getCanvas(): Promise<typeof import('@napi-rs/canvas')> {
  if (!canvasModule) {
    canvasModule = await import('@napi-rs/canvas');
  }
  return canvasModule;
}

/**
 * Renders PDF pages to PNG with pdfjs-dist onto @napi-rs/canvas surfaces.
 * PDF.js lays pages out at 72 DPI, so scale = dpi / 72.
 */
export class PdfJsRasterizer implements PageRasterizer {
  async rasterize(pdf: Buffer, options: RasterizeOptions): Promise<PageImage[]> {
    const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
    const { createCanvas } = await getCanvas();

    const loadingTask = pdfjs.getDocument({ data: new Uint8Array(pdf), verbosity: 0 });
    const document = await loadingTask.promise;

    try {
      const pageCount = Math.min(document.numPages, options.maxPages);
      if (document.numPages > options.maxPages) {
        logger.warn({ numPages: document.numPages, maxPages: options.maxPages }, 'PDF truncated to page limit');
      }

      const scale = options.dpi / 72;
      const pages: PageImage[] = [];

      for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
        const page = await document.getPage(pageNumber);
        const viewport = page.getViewport({ scale });
        const width = Math.ceil(viewport.width);
        const height = Math.ceil(viewport.height);
        const canvas = createCanvas(width, height);
        const canvasContext = canvas.getContext('2d');

        await page.render({ canvasContext, viewport }).promise;

        pages.push({
          page: pageNumber,
          image: canvas.toBuffer('image/png'),
          mediaType: 'image/png',
          width,
          height,
        });
        page.cleanup();
      }

      logger.debug({ pageCount: pages.length, dpi: options.dpi }, 'PDF rasterized');
      return pages;
    } finally {
      await document.destroy();
    }
  }
}
