import { JobStore } from '../db/jobRepository';
import { UploadStore } from '../db/uploadRepository';
import { errorMessage } from '../errors';
import { CleanupReport, JobStatus, StorageArea, StoredFileInfo } from '../types';
import { FileStore } from './storageService';

/** Outputs of jobs in these states are no longer served */
const RETIRED: readonly JobStatus[] = ['expired', 'failed'];

export class CleanupService {
  constructor(
    private readonly jobs: JobStore,
    private readonly uploads: UploadStore,
    private readonly storage: FileStore,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Expire completed jobs finished more than `hours` ago, then remove their
   * outputs and any stored file older than the cutoff that no live job
   * needs. Uploads referenced by pending or processing jobs are kept
   * whatever their age; job creation waits while they are being removed.
   */
  async cleanup(hours: number): Promise<CleanupReport> {
    const cutoff = new Date(this.clock().getTime() - hours * 60 * 60 * 1000);

    const jobsExpired = await this.jobs.expireCompletedBefore(cutoff);
    const removedUploads = await this.sweepUploads(cutoff);
    const removedOutputs = await this.sweepOutputs(cutoff);
    await this.uploads.deleteByFilenames(removedUploads);

    const filesCleaned = removedUploads.length + removedOutputs;
    console.log(`[cleanup] Cleanup completed: ${filesCleaned} files removed, ${jobsExpired} jobs expired`);
    return { filesCleaned, jobsExpired };
  }

  private async sweepUploads(cutoff: Date): Promise<string[]> {
    const candidates = (await this.storage.listFiles('uploads')).filter((file) => file.modifiedAt < cutoff);
    if (candidates.length === 0) {
      return [];
    }
    return this.jobs.withActiveFilesLocked(async (activeFiles) => {
      const removed: string[] = [];
      for (const file of candidates) {
        if (!activeFiles.has(file.name) && (await this.remove('uploads', file))) {
          removed.push(file.name);
        }
      }
      return removed;
    });
  }

  /**
   * Outputs are removed once their job is retired. Files no job lists are
   * removed by age, which also covers outputs of a run still in progress.
   */
  private async sweepOutputs(cutoff: Date): Promise<number> {
    const files = await this.storage.listFiles('processed');
    const owners = await this.jobs.findOutputStatuses(files.map((file) => file.name));
    let removed = 0;
    for (const file of files) {
      const status = owners.get(file.name);
      const removable = status === undefined ? file.modifiedAt < cutoff : RETIRED.includes(status);
      if (removable && (await this.remove('processed', file))) {
        removed++;
      }
    }
    return removed;
  }

  private async remove(area: StorageArea, file: StoredFileInfo): Promise<boolean> {
    try {
      await this.storage.deleteFile(area, file.name);
      return true;
    } catch (error) {
      console.warn(`[cleanup] Could not remove ${area}/${file.name}: ${errorMessage(error)}`);
      return false;
    }
  }
}
