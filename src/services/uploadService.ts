import fs from 'fs/promises';
import path from 'path';
import { UploadStore } from '../db/uploadRepository';
import { errorMessage, errors } from '../errors';
import { Upload, User } from '../types';
import { uploadFilename } from '../utils/fileNames';
import { PdfInspection, PdfService } from './pdfService';
import { FileStore } from './storageService';

export interface UploadLimits {
  maxFileSize: number;
  minFileSize: number;
}

export interface IncomingFile {
  path: string;
  originalName: string;
  size: number;
}

export function formatMegabytes(bytes: number): string {
  return `${Math.floor(bytes / (1024 * 1024))}MB`;
}

/**
 * Turns a received temp file into a stored, owned upload.
 */
export class UploadService {
  constructor(
    private readonly uploads: UploadStore,
    private readonly storage: FileStore,
    private readonly pdf: PdfService,
    private readonly limits: UploadLimits,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Validate a received file and store it under a fresh name. The temp file
   * stays where it is; removing it is the caller's job.
   */
  async store(user: User, file: IncomingFile): Promise<Upload> {
    if (!file.originalName) {
      throw errors.badRequest('No file selected');
    }
    if (path.extname(file.originalName).toLowerCase() !== '.pdf') {
      throw errors.badRequest('File must be a PDF');
    }
    if (file.size > this.limits.maxFileSize) {
      throw errors.badRequest(`File too large. Maximum size: ${formatMegabytes(this.limits.maxFileSize)}`);
    }
    if (file.size < this.limits.minFileSize) {
      throw errors.badRequest(`File too small. Minimum size: ${this.limits.minFileSize}B`);
    }

    let inspection: PdfInspection;
    try {
      inspection = await this.pdf.inspect(await fs.readFile(file.path));
    } catch (error) {
      throw errors.badRequest(`Invalid PDF file: ${errorMessage(error)}`);
    }
    if (inspection.pageCount === 0) {
      throw errors.badRequest('PDF file contains no pages');
    }
    if (inspection.encrypted) {
      console.warn(`[upload] Uploaded PDF is encrypted: ${file.originalName}`);
    }

    const filename = uploadFilename(file.originalName, this.clock());
    await this.storage.uploadFile('uploads', filename, file.path);

    try {
      const upload = await this.uploads.create({
        userId: user.id,
        filename,
        originalName: file.originalName,
        sizeBytes: file.size,
        pageCount: inspection.pageCount,
        encrypted: inspection.encrypted,
      });
      console.log(`[upload] File saved: ${filename} (${file.size} bytes, ${inspection.pageCount} pages)`);
      return upload;
    } catch (error) {
      await this.storage.deleteFile('uploads', filename);
      throw error;
    }
  }
}
