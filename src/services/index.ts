import { Pool } from 'pg';
import { AppConfig } from '../config';
import { JobRepository } from '../db/jobRepository';
import { checkHealth, createPool } from '../db/pool';
import { UploadRepository } from '../db/uploadRepository';
import { UserRepository } from '../db/userRepository';
import { CleanupService } from './cleanupService';
import { HealthService } from './healthService';
import { JobService } from './jobService';
import { PdfService, PdftoppmRasterizer } from './pdfService';
import { QueueService } from './queueService';
import { FileStore, createFileStore } from './storageService';
import { UploadService } from './uploadService';
import { UserService } from './userService';

export interface Services {
  pool: Pool;
  storage: FileStore;
  queue: QueueService;
  users: UserService;
  uploads: UploadService;
  jobs: JobService;
  cleanup: CleanupService;
  health: HealthService;
}

/**
 * Wire the production services from configuration. Nothing connects until
 * `storage.initialize()` and `queue.initialize()` are called.
 */
export function createServices(config: AppConfig): Services {
  const pool = createPool(config.databaseUrl);
  const jobStore = new JobRepository(pool);
  const uploadStore = new UploadRepository(pool);
  const storage = createFileStore(config);
  const queue = new QueueService(config.queue.redis, config.queue.enabled);
  const pdf = new PdfService(new PdftoppmRasterizer(config.pdftoppmPath, config.tmpDir));

  return {
    pool,
    storage,
    queue,
    users: new UserService(new UserRepository(pool), {
      secret: config.jwt.secret,
      expiresInSeconds: config.jwt.expiresInSeconds,
    }),
    uploads: new UploadService(uploadStore, storage, pdf, {
      maxFileSize: config.maxFileSize,
      minFileSize: config.minFileSize,
    }),
    jobs: new JobService({
      jobs: jobStore,
      uploads: uploadStore,
      storage,
      pdf,
      queue,
      retentionHours: config.retentionHours,
    }),
    cleanup: new CleanupService(jobStore, uploadStore, storage),
    health: new HealthService({ checkHealth: () => checkHealth(pool) }, storage, queue),
  };
}
