import { z } from 'zod';
import {
  JOB_OPERATIONS,
  JOB_STATUSES,
  JobResult,
  JobStatus,
  JobTransitionChanges,
  NewJob,
  ProcessingJob,
  canTransition,
  isActive,
} from '../types';
import { JobStateError } from '../errors';
import { Database, Queryable, withTransaction } from './pool';

// Advisory lock key serialising job creation against cleanup
const JOB_FILES_LOCK = 4815162342;

export interface JobListOptions {
  status?: JobStatus;
  limit: number;
}

/**
 * Persistence for processing jobs. `transition` is the only way a job's
 * status changes and it is conditional on the current status, so two
 * writers racing on the same job cannot both succeed. Moves the state machine
 * does not allow throw `JobStateError` without touching the row.
 */
export interface JobStore {
  create(job: NewJob): Promise<ProcessingJob>;
  findById(id: number): Promise<ProcessingJob | null>;
  listByUser(userId: number, options: JobListOptions): Promise<ProcessingJob[]>;
  findByOutputFile(filename: string): Promise<ProcessingJob | null>;
  transition(
    id: number,
    from: JobStatus,
    to: JobStatus,
    changes?: JobTransitionChanges,
  ): Promise<ProcessingJob | null>;
  /**
   * Run `work` while no job can be created, passing the input and output
   * filenames of every pending or processing job at that moment.
   */
  withActiveFilesLocked<T>(work: (activeFiles: ReadonlySet<string>) => Promise<T>): Promise<T>;
  /** Status of the job listing each filename as an output; unlisted names are absent */
  findOutputStatuses(filenames: string[]): Promise<Map<string, JobStatus>>;
  /** Move completed jobs finished before `cutoff` to expired; returns how many moved */
  expireCompletedBefore(cutoff: Date): Promise<number>;
}

export interface JobRow {
  id: number;
  user_id: number;
  operation: string;
  status: string;
  input_files: unknown;
  output_files: unknown;
  params: unknown;
  result: unknown;
  error_message: string | null;
  created_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
  expires_at: Date | null;
}

const statusSchema = z.enum(JOB_STATUSES);

const rowSchema = z.object({
  operation: z.enum(JOB_OPERATIONS),
  status: statusSchema,
  input_files: z.array(z.string()),
  output_files: z.array(z.string()),
  params: z.record(z.unknown()),
  result: z.object({ compression_ratio: z.number().optional() }).nullable(),
});

export function mapJobRow(row: JobRow): ProcessingJob {
  const checked = rowSchema.safeParse(row);
  if (!checked.success) {
    throw new Error(`Malformed processing_jobs row ${row.id}: ${checked.error.issues[0]?.message}`);
  }
  const result: JobResult | null = checked.data.result;
  return {
    id: row.id,
    userId: row.user_id,
    operation: checked.data.operation,
    status: checked.data.status,
    inputFiles: checked.data.input_files,
    outputFiles: checked.data.output_files,
    params: checked.data.params,
    result,
    errorMessage: row.error_message,
    createdAt: row.created_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    expiresAt: row.expires_at,
  };
}

export class JobRepository implements JobStore {
  constructor(private readonly db: Database) {}

  create(job: NewJob): Promise<ProcessingJob> {
    return withTransaction(this.db, async (client) => {
      await client.query('SELECT pg_advisory_xact_lock($1)', [JOB_FILES_LOCK]);
      const { rows } = await client.query<JobRow>(
        `INSERT INTO processing_jobs (user_id, operation, status, input_files, params, started_at)
         VALUES ($1, $2, $3, $4::jsonb, $5::jsonb, $6)
         RETURNING *`,
        [job.userId, job.operation, job.status, JSON.stringify(job.inputFiles), JSON.stringify(job.params), job.startedAt],
      );
      return mapJobRow(rows[0]);
    });
  }

  async findById(id: number): Promise<ProcessingJob | null> {
    const { rows } = await this.db.query<JobRow>('SELECT * FROM processing_jobs WHERE id = $1', [id]);
    return rows.length ? mapJobRow(rows[0]) : null;
  }

  async listByUser(userId: number, options: JobListOptions): Promise<ProcessingJob[]> {
    const { rows } = await this.db.query<JobRow>(
      `SELECT * FROM processing_jobs
        WHERE user_id = $1
          AND ($2::text IS NULL OR status = $2)
        ORDER BY created_at DESC, id DESC
        LIMIT $3`,
      [userId, options.status ?? null, options.limit],
    );
    return rows.map(mapJobRow);
  }

  async findByOutputFile(filename: string): Promise<ProcessingJob | null> {
    const { rows } = await this.db.query<JobRow>(
      `SELECT * FROM processing_jobs
        WHERE output_files @> jsonb_build_array($1::text)
        LIMIT 1`,
      [filename],
    );
    return rows.length ? mapJobRow(rows[0]) : null;
  }

  async transition(
    id: number,
    from: JobStatus,
    to: JobStatus,
    changes: JobTransitionChanges = {},
  ): Promise<ProcessingJob | null> {
    if (!canTransition(from, to)) {
      throw new JobStateError(id, from, to);
    }
    const values: unknown[] = [id, from, to];
    const assignments = ['status = $3'];
    const assign = (column: string, value: unknown, cast = '') => {
      values.push(value);
      assignments.push(`${column} = $${values.length}${cast}`);
    };

    if (changes.outputFiles !== undefined) assign('output_files', JSON.stringify(changes.outputFiles), '::jsonb');
    if (changes.result !== undefined) assign('result', changes.result === null ? null : JSON.stringify(changes.result), '::jsonb');
    if (changes.errorMessage !== undefined) assign('error_message', changes.errorMessage);
    if (changes.startedAt !== undefined) assign('started_at', changes.startedAt);
    if (changes.completedAt !== undefined) assign('completed_at', changes.completedAt);
    if (changes.expiresAt !== undefined) assign('expires_at', changes.expiresAt);

    const { rows } = await this.db.query<JobRow>(
      `UPDATE processing_jobs
          SET ${assignments.join(', ')}
        WHERE id = $1 AND status = $2
        RETURNING *`,
      values,
    );
    return rows.length ? mapJobRow(rows[0]) : null;
  }

  withActiveFilesLocked<T>(work: (activeFiles: ReadonlySet<string>) => Promise<T>): Promise<T> {
    return withTransaction(this.db, async (client) => {
      await client.query('SELECT pg_advisory_xact_lock($1)', [JOB_FILES_LOCK]);
      return work(new Set(await this.findActiveFileReferences(client)));
    });
  }

  async findOutputStatuses(filenames: string[]): Promise<Map<string, JobStatus>> {
    const statuses = new Map<string, JobStatus>();
    if (filenames.length === 0) {
      return statuses;
    }
    const { rows } = await this.db.query<{ filename: string; status: string }>(
      `SELECT refs.filename, processing_jobs.status
         FROM processing_jobs
        CROSS JOIN LATERAL jsonb_array_elements_text(output_files) AS refs(filename)
        WHERE refs.filename = ANY($1::text[])`,
      [filenames],
    );
    for (const row of rows) {
      statuses.set(row.filename, statusSchema.parse(row.status));
    }
    return statuses;
  }

  private async findActiveFileReferences(client: Queryable): Promise<string[]> {
    const { rows } = await client.query<{ filename: string }>(
      `SELECT DISTINCT refs.filename
         FROM processing_jobs
        CROSS JOIN LATERAL (
          SELECT jsonb_array_elements_text(input_files) AS filename
          UNION ALL
          SELECT jsonb_array_elements_text(output_files)
        ) AS refs
        WHERE status = ANY($1::text[])`,
      [JOB_STATUSES.filter(isActive)],
    );
    return rows.map((row) => row.filename);
  }

  async expireCompletedBefore(cutoff: Date): Promise<number> {
    const result = await this.db.query(
      `UPDATE processing_jobs
          SET status = 'expired'
        WHERE status = 'completed' AND completed_at < $1`,
      [cutoff],
    );
    return result.rowCount ?? 0;
  }
}
