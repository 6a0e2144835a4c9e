import { z } from 'zod';
import { errors } from '../errors';
import {
  COMPRESSION_QUALITIES,
  IMAGE_FORMATS,
  JOB_STATUSES,
  JobOperation,
  JobRequest,
} from '../types';

const isNonBlank = (value: string) => value.trim().length > 0;

const FORMAT_MESSAGE = `Invalid format. Supported: ${IMAGE_FORMATS.join(', ')}`;
const QUALITY_MESSAGE = `Invalid quality. Supported: ${COMPRESSION_QUALITIES.join(', ')}`;
const DPI_MESSAGE = 'DPI must be an integer between 72 and 600';

const filesSchema = z
  .array(
    z
      .string({ invalid_type_error: 'Invalid filename in files list' })
      .refine(isNonBlank, 'Invalid filename in files list'),
    { invalid_type_error: 'Files parameter must be a list' },
  )
  .min(1, 'Files list cannot be empty');

const fileSchema = z
  .string({ invalid_type_error: 'File parameter must be a valid filename' })
  .refine(isNonBlank, 'File parameter must be a valid filename');

const pageNumber = (label: string) => {
  const message = `${label} page must be a positive integer`;
  return z.number({ invalid_type_error: message }).int(message).min(1, message);
};

export const pageRangeSchema = z
  .object(
    { start: pageNumber('Start').optional(), end: pageNumber('End').optional() },
    { invalid_type_error: 'Pages parameter must be an object' },
  )
  .refine((range) => range.start === undefined || range.end === undefined || range.start <= range.end, {
    message: 'Start page cannot be greater than end page',
  });

const formatSchema = z
  .string({ invalid_type_error: FORMAT_MESSAGE })
  .transform((value) => value.toUpperCase())
  .pipe(z.enum(IMAGE_FORMATS, { errorMap: () => ({ message: FORMAT_MESSAGE }) }));

const qualitySchema = z
  .string({ invalid_type_error: QUALITY_MESSAGE })
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(COMPRESSION_QUALITIES, { errorMap: () => ({ message: QUALITY_MESSAGE }) }));

const dpiSchema = z
  .number({ invalid_type_error: DPI_MESSAGE })
  .int(DPI_MESSAGE)
  .min(72, DPI_MESSAGE)
  .max(600, DPI_MESSAGE);

const asyncSchema = z.boolean({ invalid_type_error: 'Async parameter must be a boolean' }).default(false);

const operationSchemas = {
  merge: z.object({ files: filesSchema, async: asyncSchema }),
  split: z.object({ file: fileSchema, pages: pageRangeSchema.optional(), async: asyncSchema }),
  convert_to_images: z.object({
    file: fileSchema,
    format: formatSchema.default('PNG'),
    dpi: dpiSchema.default(300),
    async: asyncSchema,
  }),
  compress: z.object({ file: fileSchema, quality: qualitySchema.default('medium'), async: asyncSchema }),
};

const metadataSchema = z.object({ file: fileSchema });

export interface OperationInput {
  request: JobRequest;
  async: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireParameters(body: unknown, required: string[]): Record<string, unknown> {
  if (!isRecord(body) || Object.keys(body).length === 0) {
    throw errors.badRequest('No data provided');
  }
  const missing = required.filter((name) => !(name in body));
  if (missing.length > 0) {
    throw errors.badRequest(`Missing required parameters: ${missing.join(', ')}`);
  }
  return body;
}

function parseWith<T extends z.ZodTypeAny>(schema: T, body: Record<string, unknown>): z.output<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw errors.badRequest(parsed.error.issues[0]?.message ?? 'Invalid parameters');
  }
  return parsed.data;
}

/**
 * Validate the JSON body of a job-creating operation.
 */
export function parseOperationRequest(operation: JobOperation, body: unknown): OperationInput {
  switch (operation) {
    case 'merge': {
      const data = parseWith(operationSchemas.merge, requireParameters(body, ['files']));
      return { request: { operation, files: data.files }, async: data.async };
    }
    case 'split': {
      const data = parseWith(operationSchemas.split, requireParameters(body, ['file']));
      return { request: { operation, file: data.file, pages: data.pages }, async: data.async };
    }
    case 'convert_to_images': {
      const data = parseWith(operationSchemas.convert_to_images, requireParameters(body, ['file']));
      return {
        request: { operation, file: data.file, format: data.format, dpi: data.dpi },
        async: data.async,
      };
    }
    case 'compress': {
      const data = parseWith(operationSchemas.compress, requireParameters(body, ['file']));
      return { request: { operation, file: data.file, quality: data.quality }, async: data.async };
    }
  }
}

export function parseMetadataRequest(body: unknown): { file: string } {
  return parseWith(metadataSchema, requireParameters(body, ['file']));
}

const cleanupSchema = z.object({
  hours: z
    .number({ invalid_type_error: 'Hours must be a positive number' })
    .positive('Hours must be a positive number')
    .optional(),
});

export function parseCleanupRequest(body: unknown): { hours?: number } {
  return parseWith(cleanupSchema, isRecord(body) ? body : {});
}

const jobListSchema = z.object({
  status: z.enum(JOB_STATUSES, { errorMap: () => ({ message: `Invalid status. Supported: ${JOB_STATUSES.join(', ')}` }) }).optional(),
  limit: z.coerce
    .number({ invalid_type_error: 'Limit must be a positive integer' })
    .int('Limit must be a positive integer')
    .min(1, 'Limit must be a positive integer')
    .default(20)
    .transform((limit) => Math.min(limit, 100)),
});

export type JobListQuery = z.output<typeof jobListSchema>;

export function parseJobListQuery(query: unknown): JobListQuery {
  return parseWith(jobListSchema, isRecord(query) ? query : {});
}

export function parseJobId(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw errors.notFound('Job not found');
  }
  return Number(raw);
}

const USERNAME_PATTERN = /^[a-zA-Z0-9_]+$/;
const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export const signupSchema = z
  .object({
    username: z
      .string({ required_error: 'Username is required.' })
      .trim()
      .min(1, 'Username is required.')
      .pipe(
        z
          .string()
          .min(3, 'Username must be 3-50 characters and contain only letters, numbers, and underscores.')
          .max(50, 'Username must be 3-50 characters and contain only letters, numbers, and underscores.')
          .regex(USERNAME_PATTERN, 'Username must be 3-50 characters and contain only letters, numbers, and underscores.'),
      ),
    email: z
      .string({ required_error: 'Email is required.' })
      .trim()
      .toLowerCase()
      .min(1, 'Email is required.')
      .pipe(z.string().regex(EMAIL_PATTERN, 'Please enter a valid email address.')),
    password: z
      .string({ required_error: 'Password is required.' })
      .min(1, 'Password is required.')
      .pipe(z.string().min(8, 'Password must be at least 8 characters long.')),
    confirm_password: z.string({ required_error: 'Please confirm your password.' }),
  })
  .refine((data) => data.password === data.confirm_password, {
    message: 'Passwords do not match.',
    path: ['confirm_password'],
  });

export type SignupInput = z.output<typeof signupSchema>;

/**
 * Unlike the operation validators, signup reports every failing field at once.
 */
export function parseSignupRequest(body: unknown): SignupInput {
  const parsed = signupSchema.safeParse(isRecord(body) ? body : {});
  if (!parsed.success) {
    const seen = new Set<string>();
    const details: string[] = [];
    for (const issue of parsed.error.issues) {
      const field = issue.path.join('.');
      if (!seen.has(field)) {
        seen.add(field);
        details.push(issue.message);
      }
    }
    throw errors.badRequest('Validation failed', { details });
  }
  return parsed.data;
}

const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

export function parseLoginRequest(body: unknown): { username: string; password: string } {
  const parsed = loginSchema.safeParse(isRecord(body) ? body : {});
  if (!parsed.success) {
    throw errors.badRequest('Please enter both username and password.');
  }
  return parsed.data;
}
