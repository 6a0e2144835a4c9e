import * as Minio from 'minio';
import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { AppConfig } from '../config';
import { FileNotFoundError, errors, hasErrorCode } from '../errors';
import { StorageArea, StoredFileInfo } from '../types';
import { isSafeStoredName } from '../utils/fileNames';

const STORAGE_AREAS: StorageArea[] = ['uploads', 'processed'];

/**
 * Flat file storage split into two areas: client uploads and processed
 * outputs. Names are flat (see `isSafeStoredName`).
 */
export interface FileStore {
  initialize(): Promise<void>;
  checkHealth(): Promise<boolean>;
  writeFile(area: StorageArea, name: string, data: Buffer): Promise<void>;
  /** Copy a local file (e.g. a multer temp file) into storage */
  uploadFile(area: StorageArea, name: string, localPath: string): Promise<void>;
  readFile(area: StorageArea, name: string): Promise<Buffer>;
  downloadFile(area: StorageArea, name: string): Promise<Readable>;
  stat(area: StorageArea, name: string): Promise<StoredFileInfo | null>;
  listFiles(area: StorageArea): Promise<StoredFileInfo[]>;
  deleteFile(area: StorageArea, name: string): Promise<void>;
}

function assertSafeName(name: string): void {
  if (!isSafeStoredName(name)) {
    throw errors.badRequest(`Invalid file name: ${name}`);
  }
}

function isListedName(name: string): boolean {
  return !name.startsWith('.') && name !== '.gitkeep';
}

/**
 * Local-directory storage. Writes land in a hidden temp file in the target
 * directory and are renamed into place, so a reader sees either nothing or
 * the complete file.
 */
export class LocalFileStore implements FileStore {
  constructor(private readonly folders: Record<StorageArea, string>) {}

  async initialize(): Promise<void> {
    for (const area of STORAGE_AREAS) {
      await fs.promises.mkdir(this.folders[area], { recursive: true });
    }
    console.log(`[storage] Local storage ready (${this.folders.uploads}, ${this.folders.processed})`);
  }

  async checkHealth(): Promise<boolean> {
    try {
      for (const area of STORAGE_AREAS) {
        await fs.promises.access(this.folders[area], fs.constants.W_OK);
      }
      return true;
    } catch (error) {
      console.error('[storage] Health check failed:', error);
      return false;
    }
  }

  async writeFile(area: StorageArea, name: string, data: Buffer): Promise<void> {
    const target = this.resolve(area, name);
    const temp = path.join(path.dirname(target), `.${name}.${uuidv4()}.tmp`);
    try {
      await fs.promises.writeFile(temp, data);
      await fs.promises.rename(temp, target);
    } catch (error) {
      await fs.promises.rm(temp, { force: true });
      throw error;
    }
  }

  async uploadFile(area: StorageArea, name: string, localPath: string): Promise<void> {
    const target = this.resolve(area, name);
    const temp = path.join(path.dirname(target), `.${name}.${uuidv4()}.tmp`);
    try {
      await fs.promises.copyFile(localPath, temp);
      await fs.promises.rename(temp, target);
    } catch (error) {
      await fs.promises.rm(temp, { force: true });
      if (hasErrorCode(error, 'ENOENT')) {
        throw new FileNotFoundError(path.basename(localPath));
      }
      throw error;
    }
  }

  async readFile(area: StorageArea, name: string): Promise<Buffer> {
    try {
      return await fs.promises.readFile(this.resolve(area, name));
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new FileNotFoundError(name);
      }
      throw error;
    }
  }

  async downloadFile(area: StorageArea, name: string): Promise<Readable> {
    const filePath = this.resolve(area, name);
    if (!(await this.stat(area, name))) {
      throw new FileNotFoundError(name);
    }
    return fs.createReadStream(filePath);
  }

  async stat(area: StorageArea, name: string): Promise<StoredFileInfo | null> {
    try {
      const stats = await fs.promises.stat(this.resolve(area, name));
      return stats.isFile() ? { name, size: stats.size, modifiedAt: stats.mtime } : null;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }

  async listFiles(area: StorageArea): Promise<StoredFileInfo[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.folders[area], { withFileTypes: true });
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return [];
      }
      throw error;
    }

    const files: StoredFileInfo[] = [];
    for (const entry of entries) {
      if (!entry.isFile() || !isListedName(entry.name)) {
        continue;
      }
      const info = await this.stat(area, entry.name);
      if (info) {
        files.push(info);
      }
    }
    return files;
  }

  async deleteFile(area: StorageArea, name: string): Promise<void> {
    await fs.promises.rm(this.resolve(area, name), { force: true });
  }

  private resolve(area: StorageArea, name: string): string {
    assertSafeName(name);
    return path.join(this.folders[area], name);
  }
}

export interface MinioStoreOptions {
  endPoint: string;
  port: number;
  useSSL: boolean;
  accessKey: string;
  secretKey: string;
  bucket: string;
}

const MINIO_MISSING_CODES = ['NoSuchKey', 'NotFound'];

/**
 * MinIO storage. Objects are keyed `<area>/<name>`; a put is atomic per object.
 */
export class MinioFileStore implements FileStore {
  private minioClient: Minio.Client | null = null;
  private readonly bucketName: string;

  constructor(private readonly options: MinioStoreOptions) {
    this.bucketName = options.bucket;
  }

  /**
   * Initialize MinIO client and ensure bucket exists
   */
  async initialize(): Promise<void> {
    try {
      this.minioClient = new Minio.Client({
        endPoint: this.options.endPoint,
        port: this.options.port,
        useSSL: this.options.useSSL,
        accessKey: this.options.accessKey,
        secretKey: this.options.secretKey,
      });

      const bucketExists = await this.minioClient.bucketExists(this.bucketName);
      if (!bucketExists) {
        await this.minioClient.makeBucket(this.bucketName, 'us-east-1');
        console.log(`[storage] Created bucket: ${this.bucketName}`);
      }

      console.log(`[storage] MinIO storage ready (bucket ${this.bucketName})`);
    } catch (error) {
      console.error('[storage] Failed to initialize MinIO:', error);
      throw error;
    }
  }

  async checkHealth(): Promise<boolean> {
    try {
      await this.client().bucketExists(this.bucketName);
      return true;
    } catch (error) {
      console.error('[storage] MinIO health check failed:', error);
      return false;
    }
  }

  async writeFile(area: StorageArea, name: string, data: Buffer): Promise<void> {
    await this.client().putObject(this.bucketName, this.key(area, name), data, data.length);
  }

  async uploadFile(area: StorageArea, name: string, localPath: string): Promise<void> {
    await this.client().fPutObject(this.bucketName, this.key(area, name), localPath);
    console.log(`[storage] Uploaded ${localPath} to ${this.bucketName}/${this.key(area, name)}`);
  }

  async readFile(area: StorageArea, name: string): Promise<Buffer> {
    const stream = await this.downloadFile(area, name);
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }

  async downloadFile(area: StorageArea, name: string): Promise<Readable> {
    try {
      return await this.client().getObject(this.bucketName, this.key(area, name));
    } catch (error) {
      if (hasErrorCode(error, ...MINIO_MISSING_CODES)) {
        throw new FileNotFoundError(name);
      }
      throw error;
    }
  }

  async stat(area: StorageArea, name: string): Promise<StoredFileInfo | null> {
    try {
      const stats = await this.client().statObject(this.bucketName, this.key(area, name));
      return { name, size: stats.size, modifiedAt: stats.lastModified };
    } catch (error) {
      if (hasErrorCode(error, ...MINIO_MISSING_CODES)) {
        return null;
      }
      throw error;
    }
  }

  async listFiles(area: StorageArea): Promise<StoredFileInfo[]> {
    const client = this.client();
    const prefix = `${area}/`;

    return new Promise((resolve, reject) => {
      const files: StoredFileInfo[] = [];
      const stream = client.listObjects(this.bucketName, prefix, true);

      stream.on('data', (obj: Minio.BucketItem) => {
        if (!obj.name) {
          return;
        }
        const name = obj.name.slice(prefix.length);
        if (isSafeStoredName(name) && isListedName(name)) {
          files.push({ name, size: obj.size, modifiedAt: obj.lastModified ?? new Date(0) });
        }
      });

      stream.on('end', () => {
        resolve(files);
      });

      stream.on('error', (err: Error) => {
        reject(err);
      });
    });
  }

  async deleteFile(area: StorageArea, name: string): Promise<void> {
    await this.client().removeObject(this.bucketName, this.key(area, name));
  }

  private client(): Minio.Client {
    if (!this.minioClient) {
      throw new Error('MinIO client not initialized');
    }
    return this.minioClient;
  }

  private key(area: StorageArea, name: string): string {
    assertSafeName(name);
    return `${area}/${name}`;
  }
}

export function createFileStore(config: AppConfig): FileStore {
  if (config.storage.driver === 'minio') {
    return new MinioFileStore(config.storage);
  }
  return new LocalFileStore({ uploads: config.uploadFolder, processed: config.processedFolder });
}
