import Queue from 'bull';
import { QueueJobData } from '../types';

export const QUEUE_NAME = 'pdf-operations';

/**
 * What the job service needs from a queue.
 */
export interface JobQueue {
  readonly enabled: boolean;
  enqueueOperation(jobId: number): Promise<void>;
}

export interface RedisOptions {
  host: string;
  port: number;
}

export class QueueService implements JobQueue {
  public queue: Queue.Queue<QueueJobData> | null = null;

  constructor(
    private readonly redis: RedisOptions,
    readonly enabled: boolean,
  ) {}

  /**
   * Initialize queue service
   */
  async initialize(): Promise<void> {
    if (!this.enabled) {
      console.log('[queue] Asynchronous processing disabled');
      return;
    }

    try {
      this.queue = new Queue<QueueJobData>(QUEUE_NAME, { redis: this.redis });
      await this.queue.isReady();
      console.log(`[queue] Connected to Redis at ${this.redis.host}:${this.redis.port}`);
    } catch (error) {
      console.error('[queue] Failed to initialize queue service:', error);
      throw error;
    }
  }

  async checkHealth(): Promise<boolean> {
    try {
      if (!this.queue) {
        return false;
      }
      await this.queue.client.ping();
      return true;
    } catch (error) {
      console.error('[queue] Redis health check failed:', error);
      return false;
    }
  }

  /**
   * Add an operation job. The row is already `pending`; the worker claims it.
   * One attempt only: once claimed, a job can never be claimed again.
   */
  async enqueueOperation(jobId: number): Promise<void> {
    const queue = this.requireQueue();
    await queue.add(
      'operation',
      { kind: 'operation', jobId },
      { jobId: `operation-${jobId}`, attempts: 1, removeOnComplete: true, removeOnFail: 100 },
    );
    console.log(`[queue] Job ${jobId} queued`);
  }

  async scheduleCleanup(intervalMinutes: number): Promise<void> {
    const queue = this.requireQueue();
    await queue.add(
      'cleanup',
      { kind: 'cleanup' },
      { jobId: 'cleanup', repeat: { every: intervalMinutes * 60 * 1000 }, removeOnComplete: true, removeOnFail: 10 },
    );
    console.log(`[queue] Cleanup scheduled every ${intervalMinutes} minutes`);
  }

  requireQueue(): Queue.Queue<QueueJobData> {
    if (!this.queue) {
      throw new Error('Queue not initialized');
    }
    return this.queue;
  }

  /**
   * Close connections
   */
  async close(): Promise<void> {
    try {
      if (this.queue) {
        await this.queue.close();
        this.queue = null;
      }
      console.log('[queue] Queue service closed');
    } catch (error) {
      console.error('[queue] Error closing queue service:', error);
    }
  }
}
