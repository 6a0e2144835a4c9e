import assert from 'node:assert/strict';
import fs from 'fs/promises';
import { Readable } from 'stream';
import { afterEach, beforeEach, describe, it } from 'node:test';
import {
  FakeQueue,
  FakeRasterizer,
  InMemoryJobStore,
  InMemoryUploadStore,
  TempStorage,
  apiError,
  createTempStorage,
  makePdf,
  makeUser,
  pageCountOf,
  removeDir,
  streamToBuffer,
} from '../../__tests__/support/fakes';
import { ApiError, FileNotFoundError, JobStateError } from '../../errors';
import { LocalFileStore } from '../storageService';
import { JobService, toJobResponse } from '../jobService';
import { PdfService } from '../pdfService';
import { StorageArea, User } from '../../types';

const NOW = new Date('2026-10-19T17:52:03Z');
const SUFFIX = '20261019_175203_[0-9a-f]{8}';

/** Fails writes of one output name, after the earlier outputs are written */
class FailingStore extends LocalFileStore {
  constructor(
    folders: Record<StorageArea, string>,
    private readonly failOn: RegExp,
  ) {
    super(folders);
  }

  async writeFile(area: StorageArea, name: string, data: Buffer): Promise<void> {
    if (this.failOn.test(name)) {
      throw new Error('disk full');
    }
    await super.writeFile(area, name, data);
  }
}

/** Keeps every stream it hands out */
class TrackingStore extends LocalFileStore {
  readonly opened: Readable[] = [];

  async downloadFile(area: StorageArea, name: string): Promise<Readable> {
    const stream = await super.downloadFile(area, name);
    this.opened.push(stream);
    return stream;
  }
}

describe('JobService', () => {
  let storage: TempStorage;
  let jobs: InMemoryJobStore;
  let uploads: InMemoryUploadStore;
  let queue: FakeQueue;
  const alice = makeUser({ id: 1, username: 'alice' });
  const bob = makeUser({ id: 2, username: 'bob', apiKey: 'test-key-bob' });
  const admin = makeUser({ id: 3, username: 'root', apiKey: 'test-key-root', isAdmin: true });

  const createService = (store = storage.store) =>
    new JobService({
      jobs,
      uploads,
      storage: store,
      pdf: new PdfService(new FakeRasterizer()),
      queue,
      retentionHours: 24,
      clock: () => NOW,
    });

  async function seedUpload(owner: User, filename: string, pages: number): Promise<Buffer> {
    const bytes = await makePdf(pages);
    await storage.store.writeFile('uploads', filename, bytes);
    await uploads.create({
      userId: owner.id,
      filename,
      originalName: filename,
      sizeBytes: bytes.length,
      pageCount: pages,
      encrypted: false,
    });
    return bytes;
  }

  beforeEach(async () => {
    storage = await createTempStorage();
    jobs = new InMemoryJobStore(() => NOW);
    uploads = new InMemoryUploadStore();
    queue = new FakeQueue(false);
  });

  afterEach(async () => {
    await removeDir(storage.root);
  });

  describe('synchronous jobs', () => {
    it('merges uploads into one completed job', async () => {
      await seedUpload(alice, 'one.pdf', 2);
      await seedUpload(alice, 'two.pdf', 1);

      const job = await createService().submit(alice, { operation: 'merge', files: ['one.pdf', 'two.pdf'] }, { async: false });

      assert.equal(job.status, 'completed');
      assert.deepEqual(job.inputFiles, ['one.pdf', 'two.pdf']);
      assert.equal(job.outputFiles.length, 1);
      assert.match(job.outputFiles[0], new RegExp(`^merged_${SUFFIX}\\.pdf$`));
      assert.equal(await pageCountOf(await storage.store.readFile('processed', job.outputFiles[0])), 3);
      assert.deepEqual(job.startedAt, NOW);
      assert.deepEqual(job.completedAt, NOW);
      assert.deepEqual(job.expiresAt, new Date('2026-10-20T17:52:03Z'));
    });

    it('names split pages after the input', async () => {
      await seedUpload(alice, 'report.pdf', 3);

      const job = await createService().submit(
        alice,
        { operation: 'split', file: 'report.pdf', pages: { start: 2 } },
        { async: false },
      );

      assert.equal(job.outputFiles.length, 2);
      assert.match(job.outputFiles[0], new RegExp(`^report_page_2_${SUFFIX}\\.pdf$`));
      assert.match(job.outputFiles[1], new RegExp(`^report_page_3_${SUFFIX}\\.pdf$`));
      assert.deepEqual(job.params, { pages: { start: 2 } });
    });

    it('writes images with the format extension', async () => {
      await seedUpload(alice, 'report.pdf', 2);

      const job = await createService().submit(
        alice,
        { operation: 'convert_to_images', file: 'report.pdf', format: 'TIFF', dpi: 96 },
        { async: false },
      );

      assert.equal(job.outputFiles.length, 2);
      assert.match(job.outputFiles[1], new RegExp(`^report_page_2_${SUFFIX}\\.tiff$`));
    });

    it('records the compression ratio', async () => {
      await seedUpload(alice, 'report.pdf', 1);

      const job = await createService().submit(alice, { operation: 'compress', file: 'report.pdf', quality: 'low' }, { async: false });

      assert.match(job.outputFiles[0], new RegExp(`^report_compressed_${SUFFIX}\\.pdf$`));
      assert.equal(typeof job.result?.compression_ratio, 'number');
      assert.deepEqual(toJobResponse(job).result, job.result);
    });

    it('only reads the requesting user\'s uploads', async () => {
      await seedUpload(bob, 'bob.pdf', 1);

      await assert.rejects(
        createService().submit(alice, { operation: 'compress', file: 'bob.pdf', quality: 'low' }, { async: false }),
        (error: unknown) => error instanceof FileNotFoundError && error.message === 'File not found: bob.pdf',
      );
      await assert.rejects(
        createService().submit(alice, { operation: 'merge', files: ['../bob.pdf'] }, { async: false }),
        FileNotFoundError,
      );
      assert.equal(jobs.jobs.size, 0);
    });

    it('fails the job and removes partial outputs', async () => {
      await seedUpload(alice, 'report.pdf', 3);
      const service = createService(new FailingStore(storage.folders, /_page_2_/));

      await assert.rejects(
        service.submit(alice, { operation: 'split', file: 'report.pdf' }, { async: false }),
        (error: unknown) =>
          error instanceof ApiError &&
          error.statusCode === 500 &&
          error.message === 'disk full' &&
          error.details?.job_id === 1,
      );

      const failed = await jobs.findById(1);
      assert.equal(failed?.status, 'failed');
      assert.equal(failed?.errorMessage, 'disk full');
      assert.deepEqual(failed?.outputFiles, []);
      assert.deepEqual(await storage.store.listFiles('processed'), []);
    });

    it('gives concurrent runs in the same second distinct output names', async () => {
      await seedUpload(alice, 'report.pdf', 2);
      const service = createService();

      const [first, second] = await Promise.all([
        service.submit(alice, { operation: 'split', file: 'report.pdf' }, { async: false }),
        service.submit(alice, { operation: 'split', file: 'report.pdf' }, { async: false }),
      ]);

      const names = [...first.outputFiles, ...second.outputFiles];
      assert.equal(new Set(names).size, 4);
      assert.equal((await storage.store.listFiles('processed')).length, 4);
    });

    it('keeps the status code of processing errors', async () => {
      await seedUpload(alice, 'report.pdf', 2);

      await assert.rejects(
        createService().submit(alice, { operation: 'split', file: 'report.pdf', pages: { start: 5 } }, { async: false }),
        apiError(422, 'Page range starts after the last page (2)'),
      );
      assert.equal((await jobs.findById(1))?.status, 'failed');
    });
  });

  describe('queued jobs', () => {
    it('refuses async work when the queue is off', async () => {
      await seedUpload(alice, 'report.pdf', 1);

      await assert.rejects(
        createService().submit(alice, { operation: 'compress', file: 'report.pdf', quality: 'low' }, { async: true }),
        apiError(400, 'Asynchronous processing is not enabled'),
      );
      assert.equal(jobs.jobs.size, 0);
    });

    it('queues a pending job and runs it once', async () => {
      queue = new FakeQueue(true);
      await seedUpload(alice, 'report.pdf', 2);
      const service = createService();

      const pending = await service.submit(alice, { operation: 'split', file: 'report.pdf' }, { async: true });
      assert.equal(pending.status, 'pending');
      assert.equal(pending.startedAt, null);
      assert.deepEqual(queue.enqueued, [pending.id]);
      assert.deepEqual(toJobResponse(pending), {
        job_id: pending.id,
        operation: 'split',
        status: 'pending',
        created_at: '2026-10-19T17:52:03.000Z',
      });

      const completed = await service.processQueued(pending.id);
      assert.equal(completed.status, 'completed');
      assert.equal(completed.outputFiles.length, 2);

      await assert.rejects(
        service.processQueued(pending.id),
        (error: unknown) =>
          error instanceof JobStateError && error.message === `Job ${pending.id} cannot move from completed to processing`,
      );
    });

    it('lets only one of two concurrent claims run the job', async () => {
      queue = new FakeQueue(true);
      await seedUpload(alice, 'report.pdf', 2);
      const service = createService();
      const pending = await service.submit(alice, { operation: 'split', file: 'report.pdf' }, { async: true });

      const outcomes = await Promise.allSettled([service.processQueued(pending.id), service.processQueued(pending.id)]);

      const completed = outcomes.filter((outcome) => outcome.status === 'fulfilled');
      const refused = outcomes.flatMap((outcome) => (outcome.status === 'rejected' ? [outcome.reason] : []));
      assert.equal(completed.length, 1);
      assert.equal(refused.length, 1);
      assert.ok(refused[0] instanceof JobStateError);
      assert.equal((await jobs.findById(pending.id))?.status, 'completed');
      assert.equal((await storage.store.listFiles('processed')).length, 2);
    });

    it('fails jobs whose run was lost, leaving settled jobs alone', async () => {
      const running = jobs.seed({ userId: alice.id, status: 'processing', inputFiles: ['report.pdf'] });
      const queued = jobs.seed({ userId: alice.id, status: 'pending' });
      const done = jobs.seed({ userId: alice.id, status: 'completed', outputFiles: ['out.pdf'] });
      const service = createService();

      const failed = await service.failAbandoned(running.id, 'worker stalled');
      assert.equal(failed?.status, 'failed');
      assert.equal(failed?.errorMessage, 'worker stalled');
      assert.deepEqual(failed?.completedAt, NOW);
      assert.equal((await service.failAbandoned(queued.id, 'worker stalled'))?.status, 'failed');
      assert.equal(await service.failAbandoned(done.id, 'worker stalled'), null);
      assert.equal((await jobs.findById(done.id))?.status, 'completed');
    });

    it('fails the job when it cannot be queued', async () => {
      queue = new FakeQueue(true);
      queue.failure = new Error('redis unavailable');
      await seedUpload(alice, 'report.pdf', 1);

      await assert.rejects(
        createService().submit(alice, { operation: 'compress', file: 'report.pdf', quality: 'high' }, { async: true }),
        (error: unknown) => error instanceof ApiError && error.details?.job_id === 1,
      );
      const failed = await jobs.findById(1);
      assert.equal(failed?.status, 'failed');
      assert.equal(failed?.errorMessage, 'redis unavailable');
    });
  });

  describe('reading jobs', () => {
    it('limits job access to the owner and admins', async () => {
      const job = jobs.seed({ userId: alice.id });
      const service = createService();

      assert.equal((await service.getJob(alice, job.id)).id, job.id);
      assert.equal((await service.getJob(admin, job.id)).id, job.id);
      await assert.rejects(service.getJob(bob, job.id), apiError(403, 'Unauthorized'));
      await assert.rejects(service.getJob(alice, 99), apiError(404, 'Job not found'));
    });

    it('lists the user\'s jobs by status', async () => {
      jobs.seed({ userId: alice.id, status: 'failed' });
      jobs.seed({ userId: alice.id, status: 'completed' });
      jobs.seed({ userId: bob.id, status: 'failed' });

      const failed = await createService().listJobs(alice, { status: 'failed', limit: 20 });

      assert.deepEqual(
        failed.map((job) => [job.userId, job.status]),
        [[alice.id, 'failed']],
      );
    });

    it('extracts metadata from owned uploads', async () => {
      await seedUpload(alice, 'report.pdf', 2);

      assert.equal((await createService().extractMetadata(alice, 'report.pdf')).pages, 2);
      await assert.rejects(createService().extractMetadata(bob, 'report.pdf'), FileNotFoundError);
    });
  });

  describe('downloads', () => {
    it('streams outputs of the owner\'s jobs', async () => {
      await storage.store.writeFile('processed', 'out.pdf', Buffer.from('output bytes'));
      jobs.seed({ userId: alice.id, status: 'completed', outputFiles: ['out.pdf'] });

      const download = await createService().openDownload(alice, 'out.pdf');

      assert.equal(download.filename, 'out.pdf');
      assert.equal(download.size, 'output bytes'.length);
      assert.equal((await streamToBuffer(download.stream)).toString(), 'output bytes');
    });

    it('refuses unsafe, foreign, expired and missing files', async () => {
      await storage.store.writeFile('processed', 'old.pdf', Buffer.from('x'));
      jobs.seed({ userId: alice.id, status: 'completed', outputFiles: ['out.pdf'] });
      jobs.seed({ userId: alice.id, status: 'expired', outputFiles: ['old.pdf'] });
      const service = createService();

      await assert.rejects(service.openDownload(alice, '../etc/passwd'), apiError(400, 'Invalid filename'));
      await assert.rejects(service.openDownload(bob, 'out.pdf'), apiError(404, 'File not found'));
      await assert.rejects(service.openDownload(alice, 'old.pdf'), apiError(410, 'File has expired'));
      await assert.rejects(service.openDownload(alice, 'out.pdf'), apiError(404, 'File not found'));
      await assert.rejects(service.openDownload(alice, 'unknown.pdf'), apiError(404, 'File not found'));
    });

    it('archives every output of a completed job', async () => {
      await storage.store.writeFile('processed', 'p1.pdf', Buffer.from('first'));
      await storage.store.writeFile('processed', 'p2.pdf', Buffer.from('second'));
      const job = jobs.seed({ userId: alice.id, status: 'completed', outputFiles: ['p1.pdf', 'p2.pdf'] });

      const { filename, archive } = await createService().openArchive(alice, job.id);
      const [zip] = await Promise.all([streamToBuffer(archive), archive.finalize()]);

      assert.equal(filename, `job_${job.id}.zip`);
      assert.equal(zip.subarray(0, 2).toString(), 'PK');
      assert.ok(zip.includes(Buffer.from('p1.pdf')));
      assert.ok(zip.includes(Buffer.from('p2.pdf')));
    });

    it('closes opened outputs when a later one is missing', async () => {
      const store = new TrackingStore(storage.folders);
      await store.writeFile('processed', 'p1.pdf', Buffer.from('first'));
      const job = jobs.seed({ userId: alice.id, status: 'completed', outputFiles: ['p1.pdf', 'p2.pdf'] });

      await assert.rejects(
        createService(store).openArchive(alice, job.id),
        (error: unknown) => error instanceof FileNotFoundError && error.filename === 'p2.pdf',
      );
      assert.equal(store.opened.length, 1);
      assert.equal(store.opened[0].destroyed, true);
    });

    it('only archives completed jobs', async () => {
      const pending = jobs.seed({ userId: alice.id, status: 'pending' });
      const expired = jobs.seed({ userId: alice.id, status: 'expired', outputFiles: ['gone.pdf'] });
      const service = createService();

      await assert.rejects(service.openArchive(alice, pending.id), apiError(409, `Job ${pending.id} is pending`));
      await assert.rejects(service.openArchive(alice, expired.id), apiError(410, 'File has expired'));
    });
  });

  it('leaves no stray files behind', async () => {
    await seedUpload(alice, 'report.pdf', 1);
    await createService().submit(alice, { operation: 'compress', file: 'report.pdf', quality: 'medium' }, { async: false });

    assert.deepEqual((await fs.readdir(storage.folders.processed)).length, 1);
  });
});
