import cors from 'cors';
import express, { Express, Request, Response } from 'express';
import helmet from 'helmet';
import { defaultScoringConfig, ScoringConfig } from './config/scoring';
import { createNotificationController } from './controllers/notificationController';
import { createReportController } from './controllers/reportController';
import { createRewardController } from './controllers/rewardController';
import { createTaskController } from './controllers/taskController';
import { createAuthMiddleware } from './middleware/auth';
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler';
import { CounterStore, rateLimiter, REPORT_CREATION_LIMIT } from './middleware/rateLimiter';
import { WasteRepository } from './repositories/types';
import { createNotificationRoutes } from './routes/notificationRoutes';
import { createReportRoutes } from './routes/reportRoutes';
import { createRewardRoutes } from './routes/rewardRoutes';
import { createTaskRoutes } from './routes/taskRoutes';
import { NotificationService } from './services/notificationService';
import { PhotoStorage } from './services/photoStorage';
import { ReportLifecycle } from './services/reportLifecycle';
import { RewardService } from './services/rewardService';
import { Clock } from './utils/clock';
import { CodeGenerator } from './utils/confirmationCode';
import { JobLock } from './utils/jobLock';
import { TokenService } from './utils/jwt';
import { httpLogger } from './utils/logger';
import { ConfirmationSweeper } from './workers/confirmationSweeper';

export type HealthCheck = () => Promise<unknown>;

export interface AppDependencies {
  repo: WasteRepository;
  photos: PhotoStorage;
  clock: Clock;
  tokens: TokenService;
  jobLock: JobLock;
  rateLimitStore: CounterStore;
  scoring?: ScoringConfig;
  generateCode?: CodeGenerator;
  sweepIntervalMs?: number;
  // Served under /static when set (local photo storage)
  staticDir?: string;
  healthChecks?: Record<string, HealthCheck>;
  isDevelopment?: boolean;
}

export interface AppServices {
  lifecycle: ReportLifecycle;
  rewards: RewardService;
  notifications: NotificationService;
  sweeper: ConfirmationSweeper;
}

export const createServices = (deps: AppDependencies): AppServices => {
  const scoring = deps.scoring ?? defaultScoringConfig;
  const notifications = new NotificationService(deps.repo, deps.clock);
  const lifecycle = new ReportLifecycle({
    repo: deps.repo,
    photos: deps.photos,
    clock: deps.clock,
    notifications,
    scoring,
    generateCode: deps.generateCode,
  });
  const rewards = new RewardService(deps.repo, deps.clock, notifications, scoring);
  const sweeper = new ConfirmationSweeper(lifecycle, deps.jobLock, {
    intervalMs: deps.sweepIntervalMs ?? 15 * 60 * 1000,
  });

  return { lifecycle, rewards, notifications, sweeper };
};

export const createApp = (deps: AppDependencies): { app: Express; services: AppServices } => {
  const services = createServices(deps);
  const auth = createAuthMiddleware(deps.tokens, deps.repo);

  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '25mb' }));

  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      httpLogger.info(
        { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - startedAt },
        'request'
      );
    });
    next();
  });

  if (deps.staticDir) {
    app.use('/static', express.static(deps.staticDir));
  }

  // API Routes
  app.use(
    '/api/v1/reports',
    createReportRoutes(
      createReportController(services.lifecycle),
      auth,
      rateLimiter(deps.rateLimitStore, REPORT_CREATION_LIMIT)
    )
  );
  app.use('/api/v1/rewards', createRewardRoutes(createRewardController(services.rewards), auth));
  app.use('/api/v1/notifications', createNotificationRoutes(createNotificationController(deps.repo), auth));
  app.use('/api/v1/tasks', createTaskRoutes(createTaskController(services.sweeper, services.rewards), auth));

  // Base API index
  app.get('/api/v1', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      service: 'waste-report-api',
      version: 'v1',
      routes: ['/api/v1/reports', '/api/v1/rewards', '/api/v1/notifications', '/api/v1/tasks'],
    });
  });

  // Health check
  app.get('/health', async (_req: Request, res: Response) => {
    const checks = Object.entries(deps.healthChecks ?? {});
    const results: Record<string, string> = {};
    let healthy = true;

    for (const [name, check] of checks) {
      try {
        await check();
        results[name] = 'connected';
      } catch (error) {
        healthy = false;
        results[name] = 'unavailable';
        httpLogger.warn({ err: error, check: name }, 'Health check failed');
      }
    }

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'error',
      service: 'waste-report-api',
      ...results,
    });
  });

  app.use(notFoundHandler);
  app.use(createErrorHandler(deps.isDevelopment ?? false));

  return { app, services };
};
