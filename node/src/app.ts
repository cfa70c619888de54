import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';

import type { Engine } from '@/services/engine';
import { logger } from '@/services/logger';
import { attachCorrelationId, CORRELATION_HEADER } from '@/middleware/correlation';
import { errorHandler } from '@/middleware/errorHandler';
import { notFoundHandler } from '@/middleware/notFoundHandler';
import createSearchRouter from '@/routes/search';
import createDocumentsRouter from '@/routes/documents';
import { healthRoute } from '@/routes/health';

export interface AppOptions {
  nodeEnv: string;
  corsOrigins?: string[];
}

morgan.token('cid', (_req, res) => {
  const id = res.getHeader(CORRELATION_HEADER);
  return typeof id === 'string' ? id : '-';
});

export function createApp(engine: Engine, options: AppOptions): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(
    cors({
      origin: options.corsOrigins ?? ['http://localhost:3000'],
      credentials: true,
    }),
  );

  // Rate limiting in production only
  if (options.nodeEnv === 'production') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        max: 100,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  app.use(attachCorrelationId);
  app.use(express.json({ limit: '10mb' }));
  app.use(compression());

  // Request logging through the app logger
  app.use(
    morgan(options.nodeEnv === 'development' ? ':method :url :status :response-time ms cid=:cid' : 'combined', {
      stream: { write: (line: string) => logger.info(line.trim()) },
      skip: () => options.nodeEnv === 'test',
    }),
  );

  app.get('/health', healthRoute(engine));
  app.use('/api', createSearchRouter(engine));
  app.use('/api/documents', createDocumentsRouter(engine));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
