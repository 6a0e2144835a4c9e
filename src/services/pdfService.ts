import { execFile } from 'child_process';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { promisify } from 'util';
import { PDFDocument, PDFName } from 'pdf-lib';
import sharp from 'sharp';
import { PdfProcessingError, errorMessage } from '../errors';
import { CompressionQuality, ImageFormat, PageRange, PdfMetadata } from '../types';

const execFileAsync = promisify(execFile);

export interface NamedPdf {
  name: string;
  bytes: Buffer;
}

export interface RenderedPage {
  pageNumber: number;
  bytes: Buffer;
}

export interface PdfInspection {
  pageCount: number;
  encrypted: boolean;
}

export interface CompressionOutput {
  bytes: Buffer;
  compressionRatio: number;
}

/**
 * Renders every page of a PDF to a PNG at the given resolution.
 */
export interface PdfRasterizer {
  render(pdf: Buffer, dpi: number): Promise<Buffer[]>;
}

/**
 * Rasterizer backed by poppler's `pdftoppm`.
 */
export class PdftoppmRasterizer implements PdfRasterizer {
  constructor(
    private readonly binary: string = 'pdftoppm',
    private readonly tmpDir: string = os.tmpdir(),
  ) {}

  async render(pdf: Buffer, dpi: number): Promise<Buffer[]> {
    await fs.mkdir(this.tmpDir, { recursive: true });
    const workDir = await fs.mkdtemp(path.join(this.tmpDir, 'render-'));

    try {
      const inputPath = path.join(workDir, 'input.pdf');
      await fs.writeFile(inputPath, pdf);

      const { stderr } = await execFileAsync(this.binary, ['-png', '-r', String(dpi), inputPath, path.join(workDir, 'page')]);
      if (stderr) {
        console.warn('[pdf] pdftoppm stderr:', stderr);
      }

      // pdftoppm zero-pads page numbers, so a plain sort keeps page order
      const pngFiles = (await fs.readdir(workDir))
        .filter((f) => f.startsWith('page') && f.endsWith('.png'))
        .sort();

      const pages: Buffer[] = [];
      for (const file of pngFiles) {
        pages.push(await fs.readFile(path.join(workDir, file)));
      }
      return pages;
    } catch (error) {
      throw new PdfProcessingError(`Page rendering failed: ${errorMessage(error)}`);
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }
}

/**
 * Page numbers (1-based) selected by `range` in a document of `total` pages.
 * `end` is clamped to the last page.
 */
export function resolvePageRange(range: PageRange | undefined, total: number): number[] {
  const start = range?.start ?? 1;
  const end = Math.min(range?.end ?? total, total);
  if (start > total) {
    throw new PdfProcessingError(`Page range starts after the last page (${total})`);
  }
  const pages: number[] = [];
  for (let page = start; page <= end; page++) {
    pages.push(page);
  }
  return pages;
}

export function compressionRatio(originalSize: number, compressedSize: number): number {
  if (originalSize === 0) {
    return 0;
  }
  return Math.round(((originalSize - compressedSize) / originalSize) * 100 * 100) / 100;
}

async function encodeImage(png: Buffer, format: ImageFormat, dpi: number): Promise<Buffer> {
  const image = sharp(png).withMetadata({ density: dpi });
  switch (format) {
    case 'PNG':
      return image.png().toBuffer();
    case 'JPEG':
      return image.jpeg({ quality: 90 }).toBuffer();
    case 'TIFF':
      return image.tiff().toBuffer();
  }
}

const formatDate = (date: Date | undefined) => (date ? date.toISOString() : 'N/A');

/**
 * Boundary to the PDF and image libraries. Works on bytes only; reading and
 * writing stored files is the caller's job.
 */
export class PdfService {
  constructor(private readonly rasterizer: PdfRasterizer) {}

  /**
   * Parse a document far enough to count pages. Lets library errors through
   * unchanged so upload validation can report them.
   */
  async inspect(bytes: Buffer): Promise<PdfInspection> {
    const doc = await PDFDocument.load(bytes, { ignoreEncryption: true, updateMetadata: false });
    return { pageCount: doc.getPageCount(), encrypted: doc.isEncrypted };
  }

  async merge(files: NamedPdf[]): Promise<Buffer> {
    const merged = await PDFDocument.create();

    for (const file of files) {
      const source = await this.load(file);
      const pages = await merged.copyPages(source, source.getPageIndices());
      pages.forEach((page) => merged.addPage(page));
    }

    const bytes = Buffer.from(await merged.save());
    console.log(`[pdf] Merged ${files.length} PDFs (${merged.getPageCount()} pages)`);
    return bytes;
  }

  async split(file: NamedPdf, range?: PageRange): Promise<RenderedPage[]> {
    const source = await this.load(file);
    const pageNumbers = resolvePageRange(range, source.getPageCount());
    const output: RenderedPage[] = [];

    for (const pageNumber of pageNumbers) {
      const single = await PDFDocument.create();
      const [page] = await single.copyPages(source, [pageNumber - 1]);
      single.addPage(page);
      output.push({ pageNumber, bytes: Buffer.from(await single.save()) });
    }

    console.log(`[pdf] Split ${file.name} into ${output.length} files`);
    return output;
  }

  async convertToImages(file: NamedPdf, options: { format: ImageFormat; dpi: number }): Promise<RenderedPage[]> {
    await this.load(file);
    const rendered = await this.rasterizer.render(file.bytes, options.dpi);
    const output: RenderedPage[] = [];

    for (const [index, png] of rendered.entries()) {
      try {
        output.push({ pageNumber: index + 1, bytes: await encodeImage(png, options.format, options.dpi) });
      } catch (error) {
        console.warn(`[pdf] Error converting page ${index + 1} of ${file.name}: ${errorMessage(error)}`);
      }
    }

    if (output.length === 0) {
      throw new PdfProcessingError('No pages could be converted to images');
    }

    console.log(`[pdf] Converted ${file.name} to ${output.length} ${options.format} images`);
    return output;
  }

  async extractMetadata(file: NamedPdf): Promise<PdfMetadata> {
    const doc = await this.parse(file);
    const firstPage = doc.getPageCount() > 0 ? doc.getPage(0).getSize() : null;

    return {
      pages: doc.getPageCount(),
      file_size: file.bytes.length,
      title: doc.getTitle() ?? 'N/A',
      author: doc.getAuthor() ?? 'N/A',
      subject: doc.getSubject() ?? 'N/A',
      creator: doc.getCreator() ?? 'N/A',
      producer: doc.getProducer() ?? 'N/A',
      creation_date: formatDate(doc.getCreationDate()),
      modification_date: formatDate(doc.getModificationDate()),
      encrypted: doc.isEncrypted,
      page_width: firstPage ? firstPage.width : null,
      page_height: firstPage ? firstPage.height : null,
    };
  }

  /**
   * high: pages re-packed with object streams, document info kept.
   * medium: document info and XMP metadata dropped as well.
   * low: page annotations and thumbnails dropped as well.
   */
  async compress(file: NamedPdf, quality: CompressionQuality): Promise<CompressionOutput> {
    const source = await this.load(file);
    const target = await PDFDocument.create({ updateMetadata: false });

    const pages = await target.copyPages(source, source.getPageIndices());
    for (const page of pages) {
      if (quality === 'low') {
        page.node.delete(PDFName.of('Annots'));
        page.node.delete(PDFName.of('Thumb'));
      }
      target.addPage(page);
    }

    if (quality === 'high') {
      copyDocumentInfo(source, target);
    }

    const bytes = Buffer.from(await target.save({ useObjectStreams: true }));
    const ratio = compressionRatio(file.bytes.length, bytes.length);
    console.log(`[pdf] Compressed ${file.name} (${quality}): ${ratio.toFixed(1)}% reduction`);
    return { bytes, compressionRatio: ratio };
  }

  private async parse(file: NamedPdf): Promise<PDFDocument> {
    try {
      return await PDFDocument.load(file.bytes, { ignoreEncryption: true, updateMetadata: false });
    } catch (error) {
      throw new PdfProcessingError(`Could not read ${file.name}: ${errorMessage(error)}`);
    }
  }

  /** Parse and refuse encrypted input; pdf-lib cannot decrypt */
  private async load(file: NamedPdf): Promise<PDFDocument> {
    const doc = await this.parse(file);
    if (doc.isEncrypted) {
      throw new PdfProcessingError(`Encrypted PDFs are not supported: ${file.name}`);
    }
    return doc;
  }
}

function copyDocumentInfo(source: PDFDocument, target: PDFDocument): void {
  const title = source.getTitle();
  const author = source.getAuthor();
  const subject = source.getSubject();
  const keywords = source.getKeywords();
  const creator = source.getCreator();
  const producer = source.getProducer();
  const created = source.getCreationDate();
  const modified = source.getModificationDate();

  if (title !== undefined) target.setTitle(title);
  if (author !== undefined) target.setAuthor(author);
  if (subject !== undefined) target.setSubject(subject);
  if (keywords !== undefined) target.setKeywords(keywords.split(/\s+/).filter(Boolean));
  if (creator !== undefined) target.setCreator(creator);
  if (producer !== undefined) target.setProducer(producer);
  if (created !== undefined) target.setCreationDate(created);
  if (modified !== undefined) target.setModificationDate(modified);
}
