import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';
import { PdfProcessingError } from '../../errors';
import { FakeRasterizer, makePdf, pageCountOf, solidPng } from '../../__tests__/support/fakes';
import { PdfService, compressionRatio, resolvePageRange } from '../pdfService';

const service = (rasterizer = new FakeRasterizer()) => new PdfService(rasterizer);

const processingError = (message: string | RegExp) => (error: unknown) =>
  error instanceof PdfProcessingError &&
  (typeof message === 'string' ? error.message === message : message.test(error.message));

describe('page helpers', () => {
  it('resolves page ranges', () => {
    assert.deepEqual(resolvePageRange(undefined, 3), [1, 2, 3]);
    assert.deepEqual(resolvePageRange({ start: 2 }, 4), [2, 3, 4]);
    assert.deepEqual(resolvePageRange({ end: 10 }, 2), [1, 2]);
    assert.throws(() => resolvePageRange({ start: 4 }, 3), processingError('Page range starts after the last page (3)'));
  });

  it('computes compression ratios as percentages', () => {
    assert.equal(compressionRatio(1000, 750), 25);
    assert.equal(compressionRatio(3, 2), 33.33);
    assert.equal(compressionRatio(100, 120), -20);
    assert.equal(compressionRatio(0, 10), 0);
  });
});

describe('PdfService', () => {
  it('inspects page count and encryption', async () => {
    assert.deepEqual(await service().inspect(await makePdf(3)), { pageCount: 3, encrypted: false });
    assert.deepEqual(await service().inspect(await makePdf(1, { encrypted: true })), { pageCount: 1, encrypted: true });
  });

  it('merges documents in order', async () => {
    const first = await makePdf(2);
    const second = await makePdf(3);

    const merged = await service().merge([
      { name: 'first.pdf', bytes: first },
      { name: 'second.pdf', bytes: second },
    ]);

    assert.equal(await pageCountOf(merged), 5);
  });

  it('splits a page range into single-page documents', async () => {
    const pages = await service().split({ name: 'doc.pdf', bytes: await makePdf(3) }, { start: 2, end: 10 });

    assert.deepEqual(
      pages.map((page) => page.pageNumber),
      [2, 3],
    );
    for (const page of pages) {
      assert.equal(await pageCountOf(page.bytes), 1);
    }
  });

  it('refuses a range past the end of the document', async () => {
    await assert.rejects(
      service().split({ name: 'doc.pdf', bytes: await makePdf(3) }, { start: 5 }),
      processingError('Page range starts after the last page (3)'),
    );
  });

  it('converts rendered pages to the requested format', async () => {
    const rasterizer = new FakeRasterizer();
    const images = await service(rasterizer).convertToImages(
      { name: 'doc.pdf', bytes: await makePdf(2) },
      { format: 'JPEG', dpi: 150 },
    );

    assert.deepEqual(rasterizer.calls, [150]);
    assert.deepEqual(
      images.map((image) => image.pageNumber),
      [1, 2],
    );
    const metadata = await sharp(images[0].bytes).metadata();
    assert.equal(metadata.format, 'jpeg');
    assert.equal(metadata.density, 150);
  });

  it('skips pages that fail to encode', async () => {
    const rasterizer = new FakeRasterizer([await solidPng(), Buffer.from('not an image')]);
    const images = await service(rasterizer).convertToImages(
      { name: 'doc.pdf', bytes: await makePdf(2) },
      { format: 'PNG', dpi: 72 },
    );

    assert.deepEqual(
      images.map((image) => image.pageNumber),
      [1],
    );
  });

  it('fails when no page converts', async () => {
    const rasterizer = new FakeRasterizer([Buffer.from('not an image')]);

    await assert.rejects(
      service(rasterizer).convertToImages({ name: 'doc.pdf', bytes: await makePdf(1) }, { format: 'TIFF', dpi: 72 }),
      processingError('No pages could be converted to images'),
    );
  });

  it('extracts document metadata', async () => {
    const bytes = await makePdf(2, { title: 'Quarterly', author: 'Finance' });
    const metadata = await service().extractMetadata({ name: 'doc.pdf', bytes });

    assert.equal(metadata.pages, 2);
    assert.equal(metadata.file_size, bytes.length);
    assert.equal(metadata.title, 'Quarterly');
    assert.equal(metadata.author, 'Finance');
    assert.equal(metadata.subject, 'N/A');
    assert.equal(metadata.encrypted, false);
    assert.equal(metadata.page_width, 612);
    assert.equal(metadata.page_height, 792);
    assert.match(metadata.creation_date, /^\d{4}-\d{2}-\d{2}T/);
  });

  it('keeps document info only at high quality', async () => {
    const file = { name: 'doc.pdf', bytes: await makePdf(2, { title: 'Quarterly', pad: true }) };

    const high = await service().compress(file, 'high');
    const medium = await service().compress(file, 'medium');

    assert.equal((await PDFDocument.load(high.bytes)).getTitle(), 'Quarterly');
    assert.equal((await PDFDocument.load(medium.bytes)).getTitle(), undefined);
    assert.equal(await pageCountOf(medium.bytes), 2);
    assert.equal(medium.compressionRatio, compressionRatio(file.bytes.length, medium.bytes.length));
    assert.ok(medium.compressionRatio > 0);
  });

  it('reports unreadable and encrypted input', async () => {
    await assert.rejects(
      service().merge([{ name: 'bad.pdf', bytes: Buffer.from('not a pdf at all') }]),
      processingError(/^Could not read bad\.pdf: /),
    );
    await assert.rejects(
      service().compress({ name: 'locked.pdf', bytes: await makePdf(1, { encrypted: true }) }, 'low'),
      processingError('Encrypted PDFs are not supported: locked.pdf'),
    );
  });
});
