import cors from 'cors';
import express, { Express } from 'express';
import rateLimit from 'express-rate-limit';
import { AppConfig } from './config';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler';
import { createApiRouter } from './routes/api';
import { createAuthRouter } from './routes/auth';
import { CleanupService } from './services/cleanupService';
import { HealthService } from './services/healthService';
import { JobService } from './services/jobService';
import { UploadService } from './services/uploadService';
import { UserService } from './services/userService';

export interface AppDependencies {
  config: AppConfig;
  users: UserService;
  jobs: JobService;
  uploads: UploadService;
  cleanup: CleanupService;
  health: HealthService;
}

export function createApp(deps: AppDependencies): Express {
  const { config } = deps;
  const app = express();

  // Runs behind a reverse proxy; rate limiting keys on the client address
  app.set('trust proxy', 1);

  app.use(cors());
  app.use(express.json());

  app.use(
    rateLimit({
      windowMs: config.rateLimit.windowMs,
      limit: config.rateLimit.max,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many requests from this IP, please try again later.', code: 'RATE_LIMITED' },
    }),
  );

  app.use(
    '/api',
    createApiRouter({
      users: deps.users,
      jobs: deps.jobs,
      uploads: deps.uploads,
      cleanup: deps.cleanup,
      health: deps.health,
      tmpDir: config.tmpDir,
      maxFileSize: config.maxFileSize,
      retentionHours: config.retentionHours,
    }),
  );
  app.use('/auth', createAuthRouter({ users: deps.users, sessionTtlSeconds: config.jwt.expiresInSeconds }));

  app.use(notFoundHandler);
  app.use(createErrorHandler({ production: config.env === 'production', maxFileSize: config.maxFileSize }));

  return app;
}
