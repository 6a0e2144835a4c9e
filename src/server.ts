import { Server } from 'http';
import { createApp } from './app';
import { loadConfig } from './config';
import { migrate } from './db/pool';
import { createServices } from './services';

async function startServer(): Promise<void> {
  const config = loadConfig();
  const services = createServices(config);
  let server: Server | null = null;

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    console.log(`${signal} received, shutting down gracefully...`);
    try {
      if (server) {
        const listening = server;
        await new Promise<void>((resolve) => listening.close(() => resolve()));
      }
      await services.queue.close();
      await services.pool.end();
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    await migrate(services.pool);
    await services.storage.initialize();
    await services.queue.initialize();
    await services.users.ensureDefaultAdmin(config.adminPassword);

    const app = createApp({ config, ...services });
    server = app.listen(config.port, '0.0.0.0', () => {
      console.log(`PDF Processing API Server running on port ${config.port}`);
      console.log(`Environment: ${config.env}`);
      console.log(`Health check: http://localhost:${config.port}/api/health`);
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    await services.queue.close();
    await services.pool.end();
    process.exit(1);
  }
}

startServer().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
