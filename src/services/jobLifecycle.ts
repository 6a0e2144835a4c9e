import { z } from 'zod';
import { COMPRESSION_QUALITIES, IMAGE_FORMATS, JobRequest, ProcessingJob } from '../types';

export function jobInputs(request: JobRequest): string[] {
  return request.operation === 'merge' ? [...request.files] : [request.file];
}

/**
 * Operation parameters as stored on the job row. `requestFromJob` reverses it.
 */
export function jobParams(request: JobRequest): Record<string, unknown> {
  switch (request.operation) {
    case 'merge':
      return {};
    case 'split':
      return request.pages ? { pages: request.pages } : {};
    case 'convert_to_images':
      return { format: request.format, dpi: request.dpi };
    case 'compress':
      return { quality: request.quality };
  }
}

const positiveInt = z.number().int().positive();

const storedParams = {
  split: z.object({
    pages: z.object({ start: positiveInt.optional(), end: positiveInt.optional() }).optional(),
  }),
  convert_to_images: z.object({ format: z.enum(IMAGE_FORMATS), dpi: positiveInt }),
  compress: z.object({ quality: z.enum(COMPRESSION_QUALITIES) }),
};

function singleInput(job: ProcessingJob): string {
  if (job.inputFiles.length !== 1) {
    throw new Error(`Job ${job.id} (${job.operation}) needs exactly one input file, has ${job.inputFiles.length}`);
  }
  return job.inputFiles[0];
}

function parseParams<T extends z.ZodTypeAny>(schema: T, job: ProcessingJob): z.output<T> {
  const parsed = schema.safeParse(job.params);
  if (!parsed.success) {
    throw new Error(`Job ${job.id} has invalid ${job.operation} parameters: ${parsed.error.issues[0]?.message}`);
  }
  return parsed.data;
}

/**
 * Rebuild the operation request recorded on a job row.
 */
export function requestFromJob(job: ProcessingJob): JobRequest {
  switch (job.operation) {
    case 'merge':
      if (job.inputFiles.length === 0) {
        throw new Error(`Job ${job.id} (merge) has no input files`);
      }
      return { operation: 'merge', files: [...job.inputFiles] };
    case 'split': {
      const params = parseParams(storedParams.split, job);
      return { operation: 'split', file: singleInput(job), pages: params.pages };
    }
    case 'convert_to_images': {
      const params = parseParams(storedParams.convert_to_images, job);
      return { operation: 'convert_to_images', file: singleInput(job), format: params.format, dpi: params.dpi };
    }
    case 'compress': {
      const params = parseParams(storedParams.compress, job);
      return { operation: 'compress', file: singleInput(job), quality: params.quality };
    }
  }
}
