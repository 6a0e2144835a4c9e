import path from 'path';
import { v4 as uuidv4 } from 'uuid';

const PDF_EXTENSION = '.pdf';

/**
 * Reduce a client-supplied filename to a flat ASCII name that is safe to use
 * as a storage key: path separators become word breaks, whitespace runs
 * become `_`, anything outside `[A-Za-z0-9_.-]` is dropped, runs of dots
 * collapse to one, and leading or trailing dots and underscores go.
 */
export function secureFilename(filename: string): string {
  const ascii = filename.normalize('NFKD').replace(/[^\x20-\x7e]/g, '');
  const flattened = ascii.replace(/[/\\]/g, ' ').trim().split(/\s+/).join('_');
  const cleaned = flattened
    .replace(/[^A-Za-z0-9_.-]/g, '')
    .replace(/\.{2,}/g, '.')
    .replace(/^[._]+|[._]+$/g, '');
  return cleaned || 'file';
}

/** `YYYYMMDD_HHMMSS` in UTC */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function createNameToken(): string {
  return uuidv4().replace(/-/g, '').slice(0, 8);
}

export function stripExtension(filename: string): string {
  return path.parse(filename).name;
}

/**
 * Stored names are flat: no separators, no `..`, no hidden files.
 */
export function isSafeStoredName(name: string): boolean {
  return (
    name.length > 0 &&
    name.length <= 255 &&
    !name.startsWith('.') &&
    !name.includes('..') &&
    !name.includes('/') &&
    !name.includes('\\') &&
    !name.includes('\0')
  );
}

export function uploadFilename(originalName: string, now: Date, token: string = createNameToken()): string {
  const name = stripExtension(secureFilename(originalName)) || 'file';
  return `${name}_${formatTimestamp(now)}_${token}${PDF_EXTENSION}`;
}

/**
 * Names every output file of a single job run. All names of one run share a
 * timestamp and a random token.
 */
export class OutputNamer {
  private readonly suffix: string;

  constructor(now: Date, token: string = createNameToken()) {
    this.suffix = `${formatTimestamp(now)}_${token}`;
  }

  merged(): string {
    return `merged_${this.suffix}${PDF_EXTENSION}`;
  }

  page(inputName: string, pageNumber: number, extension: string = 'pdf'): string {
    return `${stripExtension(inputName)}_page_${pageNumber}_${this.suffix}.${extension}`;
  }

  compressed(inputName: string): string {
    return `${stripExtension(inputName)}_compressed_${this.suffix}${PDF_EXTENSION}`;
  }
}
