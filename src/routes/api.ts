import { Request, Response, Router } from 'express';
import fs from 'fs/promises';
import multer from 'multer';
import path from 'path';
import { pipeline } from 'stream/promises';
import { v4 as uuidv4 } from 'uuid';
import { errors } from '../errors';
import { apiKeyAuth } from '../middleware/apiKeyAuth';
import { asyncHandler } from '../middleware/asyncHandler';
import { CleanupService } from '../services/cleanupService';
import { HealthService } from '../services/healthService';
import { JobService, toJobResponse } from '../services/jobService';
import { UploadService } from '../services/uploadService';
import { UserService } from '../services/userService';
import { JobOperation, ProcessingJob, Upload, User } from '../types';
import {
  parseCleanupRequest,
  parseJobId,
  parseJobListQuery,
  parseMetadataRequest,
  parseOperationRequest,
} from '../utils/validators';

export interface ApiRouterDeps {
  users: UserService;
  jobs: JobService;
  uploads: UploadService;
  cleanup: CleanupService;
  health: HealthService;
  tmpDir: string;
  maxFileSize: number;
  retentionHours: number;
}

function currentUser(req: Request): User {
  if (!req.user) {
    throw errors.unauthorized('API key required');
  }
  return req.user;
}

export function createApiRouter(deps: ApiRouterDeps): Router {
  const router = Router();
  const requireApiKey = apiKeyAuth(deps.users);

  // Temp files land in tmpDir under uuid names and are removed after each request
  const storage = multer.diskStorage({
    destination: async (_req, _file, cb) => {
      try {
        await fs.mkdir(deps.tmpDir, { recursive: true });
        cb(null, deps.tmpDir);
      } catch (error) {
        cb(error instanceof Error ? error : new Error(String(error)), deps.tmpDir);
      }
    },
    filename: (_req, file, cb) => {
      cb(null, `${uuidv4()}${path.extname(file.originalname).toLowerCase()}`);
    },
  });

  const upload = multer({
    storage,
    limits: {
      fileSize: deps.maxFileSize,
      files: 1,
    },
    fileFilter: (_req, file, cb) => {
      if (!file.originalname) {
        cb(errors.badRequest('No file selected'));
      } else if (path.extname(file.originalname).toLowerCase() !== '.pdf') {
        cb(errors.badRequest('File must be a PDF'));
      } else {
        cb(null, true);
      }
    },
  });

  router.get(
    '/health',
    asyncHandler(async (_req, res) => {
      const status = await deps.health.check();
      res.status(status.status === 'healthy' ? 200 : 503).json(status);
    }),
  );

  router.post(
    '/upload',
    requireApiKey,
    upload.single('file'),
    asyncHandler(async (req, res) => {
      const tempPath = req.file ? req.file.path : null;
      let stored: Upload;
      try {
        if (!req.file) {
          throw errors.badRequest('No file provided');
        }
        stored = await deps.uploads.store(currentUser(req), {
          path: req.file.path,
          originalName: req.file.originalname,
          size: req.file.size,
        });
      } finally {
        if (tempPath) {
          await fs.unlink(tempPath).catch((err) => console.error('[api] Error deleting temp file:', err));
        }
      }

      res.json({
        message: 'File uploaded successfully',
        filename: stored.filename,
        size: stored.sizeBytes,
        pages: stored.pageCount,
      });
    }),
  );

  const runOperation = (
    operation: JobOperation,
    message: string,
    describe: (job: ProcessingJob) => Record<string, unknown>,
  ) =>
    asyncHandler(async (req: Request, res: Response) => {
      const input = parseOperationRequest(operation, req.body);
      const job = await deps.jobs.submit(currentUser(req), input.request, { async: input.async });

      if (job.status === 'pending') {
        res.status(202).json({ job_id: job.id, status: job.status, message: 'Job queued' });
        return;
      }
      res.json({ job_id: job.id, message, ...describe(job) });
    });

  router.post(
    '/merge',
    requireApiKey,
    runOperation('merge', 'PDFs merged successfully', (job) => ({ output_file: job.outputFiles[0] })),
  );

  router.post(
    '/split',
    requireApiKey,
    runOperation('split', 'PDF split successfully', (job) => ({ output_files: job.outputFiles })),
  );

  router.post(
    '/convert-to-images',
    requireApiKey,
    runOperation('convert_to_images', 'PDF converted to images successfully', (job) => ({
      output_files: job.outputFiles,
    })),
  );

  router.post(
    '/compress',
    requireApiKey,
    runOperation('compress', 'PDF compressed successfully', (job) => ({
      output_file: job.outputFiles[0],
      compression_ratio: job.result?.compression_ratio ?? 0,
    })),
  );

  router.post(
    '/metadata',
    requireApiKey,
    asyncHandler(async (req, res) => {
      const { file } = parseMetadataRequest(req.body);
      const metadata = await deps.jobs.extractMetadata(currentUser(req), file);
      res.json({ message: 'Metadata extracted successfully', metadata });
    }),
  );

  router.get(
    '/status/:jobId',
    requireApiKey,
    asyncHandler(async (req, res) => {
      const job = await deps.jobs.getJob(currentUser(req), parseJobId(req.params.jobId));
      res.json(toJobResponse(job));
    }),
  );

  router.get(
    '/jobs',
    requireApiKey,
    asyncHandler(async (req, res) => {
      const query = parseJobListQuery(req.query);
      const jobs = await deps.jobs.listJobs(currentUser(req), query);
      res.json({ jobs: jobs.map(toJobResponse), count: jobs.length });
    }),
  );

  router.get(
    '/jobs/:jobId/archive',
    requireApiKey,
    asyncHandler(async (req, res) => {
      const { filename, archive } = await deps.jobs.openArchive(currentUser(req), parseJobId(req.params.jobId));
      archive.on('warning', (err) => console.warn('[api] Archive warning:', err));
      res.attachment(filename);
      await Promise.all([pipeline(archive, res), archive.finalize()]);
    }),
  );

  router.get(
    '/download/:filename',
    requireApiKey,
    asyncHandler(async (req, res) => {
      const download = await deps.jobs.openDownload(currentUser(req), req.params.filename);
      res.attachment(download.filename);
      res.setHeader('Content-Length', download.size.toString());
      await pipeline(download.stream, res);
    }),
  );

  router.post(
    '/cleanup',
    requireApiKey,
    asyncHandler(async (req, res) => {
      if (!currentUser(req).isAdmin) {
        throw errors.forbidden('Unauthorized');
      }
      const { hours } = parseCleanupRequest(req.body);
      const report = await deps.cleanup.cleanup(hours ?? deps.retentionHours);
      res.json({
        message: 'Cleanup completed successfully',
        files_cleaned: report.filesCleaned,
        jobs_expired: report.jobsExpired,
      });
    }),
  );

  return router;
}
