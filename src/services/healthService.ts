import { HealthStatus } from '../types';

export const SERVICE_VERSION = '1.0.0';

interface HealthProbe {
  checkHealth(): Promise<boolean>;
}

export class HealthService {
  constructor(
    private readonly database: HealthProbe,
    private readonly storage: HealthProbe,
    private readonly queue: (HealthProbe & { readonly enabled: boolean }) | null,
  ) {}

  async check(): Promise<HealthStatus> {
    const [database, storage, queue] = await Promise.all([
      this.database.checkHealth(),
      this.storage.checkHealth(),
      this.queue && this.queue.enabled ? this.queue.checkHealth() : Promise.resolve(null),
    ]);

    return {
      status: database ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      version: SERVICE_VERSION,
      services: {
        database: database ? 'up' : 'down',
        storage: storage ? 'up' : 'down',
        queue: queue === null ? 'disabled' : queue ? 'up' : 'down',
      },
    };
  }
}
