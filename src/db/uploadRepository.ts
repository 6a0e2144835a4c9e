import { NewUpload, Upload } from '../types';
import { Queryable } from './pool';

export interface UploadStore {
  create(upload: NewUpload): Promise<Upload>;
  findByFilename(filename: string): Promise<Upload | null>;
  deleteByFilenames(filenames: string[]): Promise<number>;
}

interface UploadRow {
  id: number;
  user_id: number;
  filename: string;
  original_name: string;
  size_bytes: number;
  page_count: number;
  encrypted: boolean;
  created_at: Date;
}

function mapUploadRow(row: UploadRow): Upload {
  return {
    id: row.id,
    userId: row.user_id,
    filename: row.filename,
    originalName: row.original_name,
    sizeBytes: row.size_bytes,
    pageCount: row.page_count,
    encrypted: row.encrypted,
    createdAt: row.created_at,
  };
}

export class UploadRepository implements UploadStore {
  constructor(private readonly db: Queryable) {}

  async create(upload: NewUpload): Promise<Upload> {
    const { rows } = await this.db.query<UploadRow>(
      `INSERT INTO uploads (user_id, filename, original_name, size_bytes, page_count, encrypted)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING *`,
      [upload.userId, upload.filename, upload.originalName, upload.sizeBytes, upload.pageCount, upload.encrypted],
    );
    return mapUploadRow(rows[0]);
  }

  async findByFilename(filename: string): Promise<Upload | null> {
    const { rows } = await this.db.query<UploadRow>('SELECT * FROM uploads WHERE filename = $1', [filename]);
    return rows.length ? mapUploadRow(rows[0]) : null;
  }

  async deleteByFilenames(filenames: string[]): Promise<number> {
    if (filenames.length === 0) {
      return 0;
    }
    const result = await this.db.query('DELETE FROM uploads WHERE filename = ANY($1::text[])', [filenames]);
    return result.rowCount ?? 0;
  }
}
