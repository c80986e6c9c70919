import 'dotenv/config';
import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { RegistryConfig, loadConfig } from '../config';
import { RecordStore } from '../store/record-store';
import { createRecordStore } from '../store/create-record-store';
import { RegistrationService } from '../application/registration-service';
import { LookupService } from '../application/lookup-service';
import { IntegrityService } from '../application/integrity-service';
import { StatisticsService } from '../application/statistics-service';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { requestLogger } from './middleware/request-logger';
import { createDocumentRoutes } from './routes/document-routes';

export interface AppDependencies {
  config: RegistryConfig;
  store: RecordStore;
}

export function createApp({ config, store }: AppDependencies): Express {
  const lookup = new LookupService(store);
  const services = {
    registration: new RegistrationService(store),
    lookup,
    integrity: new IntegrityService(lookup),
    statistics: new StatisticsService(store),
  };

  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({
    origin: config.corsOrigin,
  }));

  const limiter = rateLimit({
    windowMs: config.rateLimit.windowMs,
    max: config.rateLimit.max,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  // Request logging
  app.use(requestLogger);

  // Health check
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Body parsers are attached per route: integrity checks take raw bytes
  app.use('/api', createDocumentRoutes({ ...services, maxUploadBytes: config.maxUploadBytes }));

  // Error handlers (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

// Start server
if (require.main === module) {
  const config = loadConfig();
  const handle = createRecordStore(config);
  const app = createApp({ config, store: handle.store });

  const server = app.listen(config.port, () => {
    console.log(`[API Server] Listening on port ${config.port}`);
    console.log(`[API Server] Environment: ${config.nodeEnv}`);
    console.log(`[API Server] Store: ${handle.description}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[API Server] ${signal} received, shutting down`);
    server.close(() => {
      handle.close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('[API Server] Failed to close store', error);
          process.exit(1);
        });
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
