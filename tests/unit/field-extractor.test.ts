import { describe, expect, it } from 'vitest';
import { FieldExtractor } from '../../src/services/extraction/FieldExtractor.js';
import { ExtractionError, ModelUnavailableError, UnsupportedMediaError } from '../../src/utils/errors.js';
import { FakeLayoutModel, FakeRasterizer, pdfDocument, pngDocument, span } from '../helpers/fakes.js';

const options = { callTimeoutMs: 50, minConfidence: 0.3, maxPages: 10, rasterDpi: 150, retryDelayMs: 0 };

describe('FieldExtractor', () => {
  it('rejects unsupported media before calling the layout model', async () => {
    const layout = new FakeLayoutModel([[span('landlord', 'Ramesh Sharma')]]);
    const extractor = new FieldExtractor(layout, new FakeRasterizer(1), options);

    await expect(
      extractor.extract({ content: Buffer.from('hello'), mediaType: 'text/plain' }, 'rent_agreement')
    ).rejects.toBeInstanceOf(UnsupportedMediaError);
    expect(layout.calls).toHaveLength(0);
  });

  it('rejects an empty document', async () => {
    const layout = new FakeLayoutModel([]);
    const extractor = new FieldExtractor(layout, new FakeRasterizer(1), options);

    await expect(
      extractor.extract({ content: Buffer.alloc(0), mediaType: 'image/png' }, 'rent_agreement')
    ).rejects.toBeInstanceOf(ExtractionError);
    expect(layout.calls).toHaveLength(0);
  });

  it('keeps relevant confident spans and canonicalizes their roles', async () => {
    const layout = new FakeLayoutModel([
      [
        span('Landlord', 'Ramesh Sharma', 0.92, { x0: 10, y0: 20, x1: 200, y1: 40 }),
        span('tenant', 'Anita Rao', 0.1),
        span('page_number', '1 of 3', 0.99),
        span('rent_amount', '   ', 0.9),
      ],
    ]);
    const extractor = new FieldExtractor(layout, new FakeRasterizer(1), options);

    const result = await extractor.extract(pngDocument(), 'rent_agreement');

    expect(result.fields).toEqual([
      {
        name: 'landlord',
        text: 'Ramesh Sharma',
        confidence: 0.92,
        location: { page: 1, box: { x0: 10, y0: 20, x1: 200, y1: 40 } },
      },
    ]);
    expect(result.pageIssues).toEqual([]);
    expect(result.pageCount).toBe(1);
  });

  it('sends the schema roles for the document type', async () => {
    const layout = new FakeLayoutModel([[]]);
    const extractor = new FieldExtractor(layout, new FakeRasterizer(1), options);

    await extractor.extract(pngDocument(), 'noc');

    expect(layout.calls[0].roles.map(r => r.role)).toContain('issuing_authority');
    expect(layout.calls[0].page.mediaType).toBe('image/png');
  });

  it('retries a transient failure once', async () => {
    const layout = new FakeLayoutModel([
      new ModelUnavailableError('busy'),
      [span('owner', 'Meera Iyer')],
    ]);
    const extractor = new FieldExtractor(layout, new FakeRasterizer(1), options);

    const result = await extractor.extract(pngDocument(), 'title_deed');

    expect(layout.calls).toHaveLength(2);
    expect(result.fields.map(f => f.text)).toEqual(['Meera Iyer']);
  });

  it('fails with ExtractionError after two call timeouts', async () => {
    const layout = new FakeLayoutModel(['hang', 'hang']);
    const extractor = new FieldExtractor(layout, new FakeRasterizer(1), { ...options, callTimeoutMs: 20 });

    await expect(extractor.extract(pngDocument(), 'title_deed')).rejects.toBeInstanceOf(ExtractionError);
    expect(layout.calls).toHaveLength(2);
  });

  it('does not retry a malformed response', async () => {
    const layout = new FakeLayoutModel([new ExtractionError('Malformed layout response from fake-layout')]);
    const extractor = new FieldExtractor(layout, new FakeRasterizer(1), options);

    await expect(extractor.extract(pngDocument(), 'noc')).rejects.toThrow('Malformed layout response from fake-layout');
    expect(layout.calls).toHaveLength(1);
  });

  it('rasterizes PDFs and keeps page indexes', async () => {
    const layout = new FakeLayoutModel(request => {
      if (request.page.page === 2) {
        return new ExtractionError('Malformed layout response from fake-layout');
      }
      return [span('tenant', `Tenant on page ${request.page.page}`)];
    });
    const rasterizer = new FakeRasterizer(3);
    const extractor = new FieldExtractor(layout, rasterizer, options);

    const result = await extractor.extract(pdfDocument(), 'rent_agreement');

    expect(rasterizer.calls).toEqual([{ dpi: 150, maxPages: 10 }]);
    expect(result.pageCount).toBe(3);
    expect(result.fields.map(f => [f.text, f.location.page])).toEqual([
      ['Tenant on page 1', 1],
      ['Tenant on page 3', 3],
    ]);
    expect(result.pageIssues).toEqual([
      { kind: 'page', page: 2, reason: 'Malformed layout response from fake-layout' },
    ]);
  });

  it('reports a rasterizer failure as ExtractionError', async () => {
    const layout = new FakeLayoutModel([]);
    const extractor = new FieldExtractor(layout, new FakeRasterizer(new Error('Invalid PDF structure')), options);

    await expect(extractor.extract(pdfDocument(), 'rent_agreement')).rejects.toThrow(
      'Failed to rasterize PDF: Invalid PDF structure'
    );
    expect(layout.calls).toHaveLength(0);
  });
});
