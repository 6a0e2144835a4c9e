export const JOB_OPERATIONS = ['merge', 'split', 'convert_to_images', 'compress'] as const;
export type JobOperation = (typeof JOB_OPERATIONS)[number];

export const JOB_STATUSES = ['pending', 'processing', 'completed', 'failed', 'expired'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

const JOB_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['processing', 'failed'],
  processing: ['completed', 'failed'],
  completed: ['expired'],
  failed: [],
  expired: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return JOB_TRANSITIONS[from].includes(to);
}

/** Jobs whose files must not be touched by cleanup */
export function isActive(status: JobStatus): boolean {
  return status === 'pending' || status === 'processing';
}

export const IMAGE_FORMATS = ['PNG', 'JPEG', 'TIFF'] as const;
export type ImageFormat = (typeof IMAGE_FORMATS)[number];

export const COMPRESSION_QUALITIES = ['low', 'medium', 'high'] as const;
export type CompressionQuality = (typeof COMPRESSION_QUALITIES)[number];

export type StorageArea = 'uploads' | 'processed';

export interface PageRange {
  start?: number;
  end?: number;
}

export type JobRequest =
  | { operation: 'merge'; files: string[] }
  | { operation: 'split'; file: string; pages?: PageRange }
  | { operation: 'convert_to_images'; file: string; format: ImageFormat; dpi: number }
  | { operation: 'compress'; file: string; quality: CompressionQuality };

export interface JobResult {
  compression_ratio?: number;
}

export interface ProcessingJob {
  id: number;
  userId: number;
  operation: JobOperation;
  status: JobStatus;
  inputFiles: string[];
  outputFiles: string[];
  params: Record<string, unknown>;
  result: JobResult | null;
  errorMessage: string | null;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  expiresAt: Date | null;
}

export interface NewJob {
  userId: number;
  operation: JobOperation;
  status: 'pending' | 'processing';
  inputFiles: string[];
  params: Record<string, unknown>;
  startedAt: Date | null;
}

export interface JobTransitionChanges {
  outputFiles?: string[];
  result?: JobResult | null;
  errorMessage?: string;
  startedAt?: Date;
  completedAt?: Date;
  expiresAt?: Date;
}

export interface User {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
  apiKey: string;
  isActive: boolean;
  isAdmin: boolean;
  createdAt: Date;
}

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  apiKey: string;
  isAdmin: boolean;
}

export interface Upload {
  id: number;
  userId: number;
  filename: string;
  originalName: string;
  sizeBytes: number;
  pageCount: number;
  encrypted: boolean;
  createdAt: Date;
}

export type NewUpload = Omit<Upload, 'id' | 'createdAt'>;

export interface StoredFileInfo {
  name: string;
  size: number;
  modifiedAt: Date;
}

export interface PdfMetadata {
  pages: number;
  file_size: number;
  title: string;
  author: string;
  subject: string;
  creator: string;
  producer: string;
  creation_date: string;
  modification_date: string;
  encrypted: boolean;
  page_width: number | null;
  page_height: number | null;
}

export type QueueJobData =
  | { kind: 'operation'; jobId: number }
  | { kind: 'cleanup'; hours?: number };

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  version: string;
  services: {
    database: 'up' | 'down';
    storage: 'up' | 'down';
    queue: 'up' | 'down' | 'disabled';
  };
}

export interface CleanupReport {
  filesCleaned: number;
  jobsExpired: number;
}
