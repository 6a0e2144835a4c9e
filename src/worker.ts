import { Job } from 'bull';
import { loadConfig } from './config';
import { errorMessage } from './errors';
import { createServices } from './services';
import { CleanupReport, ProcessingJob, QueueJobData } from './types';

async function startWorker(): Promise<void> {
  const config = loadConfig();
  if (!config.queue.enabled) {
    throw new Error('QUEUE_ENABLED must be true to run the worker');
  }

  const services = createServices(config);

  async function shutdown(): Promise<void> {
    console.log('\nShutting down worker...');
    try {
      await services.queue.close();
      await services.pool.end();
      console.log('Worker shutdown complete');
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  }
  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());

  console.log('='.repeat(60));
  console.log('PDF Processing Worker Starting...');
  console.log('='.repeat(60));

  await services.storage.initialize();
  await services.queue.initialize();
  const queue = services.queue.requireQueue();

  // One operation at a time per worker process; run more workers to scale
  const processorStopped = (name: string) => (error: unknown) => {
    console.error(`[Worker] ${name} processor stopped:`, error);
    process.exitCode = 1;
  };

  queue
    .process('operation', 1, async (job: Job<QueueJobData>): Promise<ProcessingJob> => {
      if (job.data.kind !== 'operation') {
        throw new Error(`Unexpected payload for operation job ${job.id}`);
      }
      console.log(`[Worker] Processing job ${job.data.jobId}`);
      return services.jobs.processQueued(job.data.jobId);
    })
    .catch(processorStopped('operation'));

  queue
    .process('cleanup', 1, async (job: Job<QueueJobData>): Promise<CleanupReport> => {
      const hours = job.data.kind === 'cleanup' && job.data.hours ? job.data.hours : config.retentionHours;
      return services.cleanup.cleanup(hours);
    })
    .catch(processorStopped('cleanup'));

  queue.on('completed', (job: Job<QueueJobData>) => {
    console.log(`[Queue] ${job.name} job ${job.id} completed`);
  });

  // A job still pending or processing here lost its run (stalled worker,
  // failed claim lookup); fail it so its files are released to cleanup
  queue.on('failed', (job: Job<QueueJobData>, err: Error) => {
    console.error(`[Queue] ${job.name} job ${job.id} failed:`, errorMessage(err));
    if (job.data.kind === 'operation') {
      const { jobId } = job.data;
      services.jobs
        .failAbandoned(jobId, `Processing was interrupted: ${errorMessage(err)}`)
        .catch((error: unknown) => console.error(`[Queue] Could not fail job ${jobId}:`, error));
    }
  });

  queue.on('stalled', (job: Job<QueueJobData>) => {
    console.warn(`[Queue] ${job.name} job ${job.id} stalled`);
  });

  if (config.cleanupIntervalMinutes > 0) {
    await services.queue.scheduleCleanup(config.cleanupIntervalMinutes);
  }

  console.log('Worker is ready and listening for jobs...');
  console.log('='.repeat(60));
}

startWorker().catch((error) => {
  console.error('Failed to start worker:', error);
  process.exit(1);
});
