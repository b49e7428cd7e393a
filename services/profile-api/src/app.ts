import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { AppConfig } from './config/environment';
import type { FactClient } from './clients/cat-fact-client';
import { CatFactClient } from './clients/cat-fact-client';
import { ProfileService, Clock, systemClock } from './services/profile-service';
import type { Logger } from './utils/logger';
import { requestLogger } from './middleware/request-logger';
import { notFoundHandler, errorHandler } from './middleware/error-handler';
import rootRoutes from './routes/root-routes';
import { createHealthRoutes } from './routes/health-routes';
import { createProfileRoutes } from './routes/profile-routes';

export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  factClient?: FactClient;
  clock?: Clock;
}

export function createApp(deps: AppDeps): Express {
  const { config, logger } = deps;
  const clock = deps.clock ?? systemClock;
  const factClient = deps.factClient ?? new CatFactClient(config.catFact);
  const profileService = new ProfileService({ config, factClient, logger, clock });

  const app = express();
  app.disable('x-powered-by');

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(requestLogger(logger));

  // Routes
  app.use('/me', createProfileRoutes(profileService));
  app.use('/health', createHealthRoutes(clock));
  app.use('/', rootRoutes);

  app.use(notFoundHandler);
  app.use(errorHandler(logger, config.nodeEnv !== 'production'));

  return app;
}
