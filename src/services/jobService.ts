import archiver from 'archiver';
import { Readable } from 'stream';
import { JobListOptions, JobStore } from '../db/jobRepository';
import { UploadStore } from '../db/uploadRepository';
import {
  ApiError,
  FileNotFoundError,
  JobStateError,
  errorMessage,
  errors,
} from '../errors';
import { JobRequest, JobResult, JobStatus, PdfMetadata, ProcessingJob, User } from '../types';
import { OutputNamer, isSafeStoredName } from '../utils/fileNames';
import { jobInputs, jobParams, requestFromJob } from './jobLifecycle';
import { NamedPdf, PdfService } from './pdfService';
import { JobQueue } from './queueService';
import { FileStore } from './storageService';

export interface JobServiceDeps {
  jobs: JobStore;
  uploads: UploadStore;
  storage: FileStore;
  pdf: PdfService;
  queue: JobQueue;
  retentionHours: number;
  clock?: () => Date;
}

interface Outcome {
  outputFiles: string[];
  result: JobResult | null;
}

export interface DownloadHandle {
  filename: string;
  size: number;
  stream: Readable;
}

export interface JobResponse {
  job_id: number;
  operation: string;
  status: JobStatus;
  created_at: string;
  started_at?: string;
  completed_at?: string;
  expires_at?: string;
  error?: string;
  output_files?: string[];
  result?: JobResult;
}

export function toJobResponse(job: ProcessingJob): JobResponse {
  const response: JobResponse = {
    job_id: job.id,
    operation: job.operation,
    status: job.status,
    created_at: job.createdAt.toISOString(),
  };
  if (job.startedAt) response.started_at = job.startedAt.toISOString();
  if (job.completedAt) response.completed_at = job.completedAt.toISOString();
  if (job.expiresAt) response.expires_at = job.expiresAt.toISOString();
  if (job.errorMessage) response.error = job.errorMessage;
  if (job.status === 'completed') {
    response.output_files = job.outputFiles;
    if (job.result) response.result = job.result;
  }
  return response;
}

/**
 * Tag an error with the job it failed, for the error response body.
 */
function withJobId(error: unknown, jobId: number): ApiError {
  if (error instanceof ApiError) {
    error.details = { ...error.details, job_id: jobId };
    return error;
  }
  const wrapped = new ApiError(errorMessage(error), 500, 'INTERNAL_ERROR', { job_id: jobId });
  wrapped.cause = error;
  return wrapped;
}

/**
 * Coordinates job rows with the files they read and write.
 *
 * Inputs are uploads owned by the requesting user. Outputs are written to
 * the processed area under fresh names before the row moves to completed;
 * on any failure the outputs written so far are removed and the row moves
 * to failed.
 */
export class JobService {
  private readonly jobs: JobStore;
  private readonly uploads: UploadStore;
  private readonly storage: FileStore;
  private readonly pdf: PdfService;
  private readonly queue: JobQueue;
  private readonly retentionMs: number;
  private readonly now: () => Date;

  constructor(deps: JobServiceDeps) {
    this.jobs = deps.jobs;
    this.uploads = deps.uploads;
    this.storage = deps.storage;
    this.pdf = deps.pdf;
    this.queue = deps.queue;
    this.retentionMs = deps.retentionHours * 60 * 60 * 1000;
    this.now = deps.clock ?? (() => new Date());
  }

  /**
   * Record a job for `request` and either run it now (returning the
   * completed job) or queue it (returning the pending job).
   */
  async submit(user: User, request: JobRequest, options: { async: boolean }): Promise<ProcessingJob> {
    const inputFiles = jobInputs(request);
    await this.assertOwnsInputs(user, inputFiles);

    if (options.async) {
      if (!this.queue.enabled) {
        throw errors.badRequest('Asynchronous processing is not enabled');
      }
      const job = await this.jobs.create({
        userId: user.id,
        operation: request.operation,
        status: 'pending',
        inputFiles,
        params: jobParams(request),
        startedAt: null,
      });
      try {
        await this.queue.enqueueOperation(job.id);
      } catch (error) {
        console.error(`[jobs] Could not queue job ${job.id}:`, error);
        await this.markFailed(job.id, 'pending', error);
        throw withJobId(error, job.id);
      }
      return job;
    }

    const job = await this.jobs.create({
      userId: user.id,
      operation: request.operation,
      status: 'processing',
      inputFiles,
      params: jobParams(request),
      startedAt: this.now(),
    });
    return this.execute(job);
  }

  /**
   * Claim a pending job and run it. Used by the queue worker.
   */
  async processQueued(jobId: number): Promise<ProcessingJob> {
    const job = await this.jobs.findById(jobId);
    if (!job) {
      throw errors.notFound(`Job ${jobId} not found`);
    }
    const claimed = await this.jobs.transition(jobId, 'pending', 'processing', { startedAt: this.now() });
    if (!claimed) {
      throw new JobStateError(jobId, job.status, 'processing');
    }
    return this.execute(claimed);
  }

  /**
   * Fail a job whose queue job failed without the job settling, such as a
   * run lost with a crashed worker. Jobs that already settled are left
   * alone and `null` is returned.
   */
  async failAbandoned(jobId: number, reason: string): Promise<ProcessingJob | null> {
    for (const from of ['processing', 'pending'] as const) {
      const failed = await this.jobs.transition(jobId, from, 'failed', {
        errorMessage: reason,
        completedAt: this.now(),
      });
      if (failed) {
        console.warn(`[jobs] Job ${jobId} abandoned while ${from}: ${reason}`);
        return failed;
      }
    }
    return null;
  }

  async getJob(user: User, jobId: number): Promise<ProcessingJob> {
    const job = await this.jobs.findById(jobId);
    if (!job) {
      throw errors.notFound('Job not found');
    }
    if (job.userId !== user.id && !user.isAdmin) {
      throw errors.forbidden('Unauthorized');
    }
    return job;
  }

  listJobs(user: User, options: JobListOptions): Promise<ProcessingJob[]> {
    return this.jobs.listByUser(user.id, options);
  }

  async extractMetadata(user: User, file: string): Promise<PdfMetadata> {
    await this.assertOwnsInputs(user, [file]);
    return this.pdf.extractMetadata(await this.readInput(file));
  }

  async openDownload(user: User, filename: string): Promise<DownloadHandle> {
    if (!isSafeStoredName(filename)) {
      throw errors.badRequest('Invalid filename');
    }
    const job = await this.jobs.findByOutputFile(filename);
    if (!job || (job.userId !== user.id && !user.isAdmin)) {
      throw errors.notFound('File not found');
    }
    if (job.status === 'expired') {
      throw errors.gone('File has expired');
    }
    const info = await this.storage.stat('processed', filename);
    if (!info) {
      throw errors.notFound('File not found');
    }
    return { filename, size: info.size, stream: await this.storage.downloadFile('processed', filename) };
  }

  /**
   * ZIP of every output of a completed job. Entries are appended; the
   * caller pipes the archive and finalizes it.
   */
  async openArchive(user: User, jobId: number): Promise<{ filename: string; archive: archiver.Archiver }> {
    const job = await this.getJob(user, jobId);
    if (job.status === 'expired') {
      throw errors.gone('File has expired');
    }
    if (job.status !== 'completed') {
      throw errors.conflict(`Job ${job.id} is ${job.status}`);
    }

    const streams: Array<{ name: string; stream: Readable }> = [];
    try {
      for (const name of job.outputFiles) {
        streams.push({ name, stream: await this.storage.downloadFile('processed', name) });
      }
    } catch (error) {
      streams.forEach(({ stream }) => stream.destroy());
      throw error;
    }

    const archive = archiver('zip', { zlib: { level: 9 } });
    for (const { name, stream } of streams) {
      archive.append(stream, { name });
    }
    return { filename: `job_${job.id}.zip`, archive };
  }

  private async execute(job: ProcessingJob): Promise<ProcessingJob> {
    const written: string[] = [];
    try {
      const outcome = await this.perform(requestFromJob(job), written);
      const completedAt = this.now();
      const completed = await this.jobs.transition(job.id, 'processing', 'completed', {
        outputFiles: outcome.outputFiles,
        result: outcome.result,
        completedAt,
        expiresAt: new Date(completedAt.getTime() + this.retentionMs),
      });
      if (!completed) {
        throw new JobStateError(job.id, 'processing', 'completed');
      }
      console.log(`[jobs] Job ${job.id} (${job.operation}) completed with ${outcome.outputFiles.length} output files`);
      return completed;
    } catch (error) {
      console.error(`[jobs] Job ${job.id} (${job.operation}) failed:`, errorMessage(error));
      await this.discardOutputs(written);
      await this.markFailed(job.id, 'processing', error);
      throw withJobId(error, job.id);
    }
  }

  private async perform(request: JobRequest, written: string[]): Promise<Outcome> {
    const namer = new OutputNamer(this.now());
    const save = async (name: string, bytes: Buffer): Promise<string> => {
      await this.storage.writeFile('processed', name, bytes);
      written.push(name);
      return name;
    };

    switch (request.operation) {
      case 'merge': {
        const inputs: NamedPdf[] = [];
        for (const file of request.files) {
          inputs.push(await this.readInput(file));
        }
        const merged = await this.pdf.merge(inputs);
        return { outputFiles: [await save(namer.merged(), merged)], result: null };
      }
      case 'split': {
        const input = await this.readInput(request.file);
        const outputFiles: string[] = [];
        for (const page of await this.pdf.split(input, request.pages)) {
          outputFiles.push(await save(namer.page(input.name, page.pageNumber), page.bytes));
        }
        return { outputFiles, result: null };
      }
      case 'convert_to_images': {
        const input = await this.readInput(request.file);
        const extension = request.format.toLowerCase();
        const outputFiles: string[] = [];
        const images = await this.pdf.convertToImages(input, { format: request.format, dpi: request.dpi });
        for (const image of images) {
          outputFiles.push(await save(namer.page(input.name, image.pageNumber, extension), image.bytes));
        }
        return { outputFiles, result: null };
      }
      case 'compress': {
        const input = await this.readInput(request.file);
        const compressed = await this.pdf.compress(input, request.quality);
        return {
          outputFiles: [await save(namer.compressed(input.name), compressed.bytes)],
          result: { compression_ratio: compressed.compressionRatio },
        };
      }
    }
  }

  private async assertOwnsInputs(user: User, files: string[]): Promise<void> {
    for (const file of new Set(files)) {
      const upload = isSafeStoredName(file) ? await this.uploads.findByFilename(file) : null;
      if (!upload || upload.userId !== user.id) {
        throw new FileNotFoundError(file);
      }
    }
  }

  private async readInput(name: string): Promise<NamedPdf> {
    return { name, bytes: await this.storage.readFile('uploads', name) };
  }

  private async discardOutputs(names: string[]): Promise<void> {
    for (const name of names) {
      try {
        await this.storage.deleteFile('processed', name);
      } catch (error) {
        console.error(`[jobs] Could not remove output ${name}:`, errorMessage(error));
      }
    }
  }

  private async markFailed(jobId: number, from: JobStatus, cause: unknown): Promise<void> {
    try {
      const failed = await this.jobs.transition(jobId, from, 'failed', {
        errorMessage: errorMessage(cause),
        completedAt: this.now(),
      });
      if (!failed) {
        console.warn(`[jobs] Job ${jobId} was no longer ${from}; failure not recorded`);
      }
    } catch (error) {
      console.error(`[jobs] Could not record failure of job ${jobId}:`, error);
    }
  }
}
