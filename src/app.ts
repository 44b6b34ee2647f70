import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import type { AppConfig } from './config/env';
import { createAuthMiddleware } from './middleware/auth.middleware';
import { createErrorHandler, notFoundHandler } from './middleware/error.middleware';
import { requestLogger, apiLogger } from './middleware/logger.middleware';
import { createRateLimiters } from './middleware/rateLimit.middleware';
import { metricsMiddleware, metrics } from './utils/metrics';
import { createAuthRouter } from './routes/auth.routes';
import { createChatRouter } from './routes/chat.routes';
import { createNoteRouter } from './routes/note.routes';
import { createTagRouter } from './routes/tag.routes';
import type { AuthService } from './services/auth.service';
import type { ChatService } from './services/chat.service';
import type { NoteService } from './services/note.service';
import type { TagService } from './services/tag.service';

export interface AppServices {
  auth: AuthService;
  notes: NoteService;
  tags: TagService;
  chats: ChatService;
}

export const createApp = (config: AppConfig, services: AppServices): Express => {
  const app = express();
  const limiters = createRateLimiters(config.rateLimit.enabled);
  const authMiddleware = createAuthMiddleware(services.auth);

  app.use(helmet());
  app.use(compression());
  app.use(cors({
    origin: config.server.corsOrigin,
    credentials: true,
  }));

  app.use(express.json({ limit: '1mb' }));

  if (config.logging.requestLog) {
    app.use(requestLogger);
  }
  app.use(apiLogger);
  app.use(metricsMiddleware);
  app.use(limiters.general);

  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      message: 'SmartNotes API is running',
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/metrics', (req, res) => {
    res.json(metrics.getMetrics());
  });

  app.use('/api/auth', limiters.auth, createAuthRouter(services.auth, authMiddleware));
  app.use('/api/notes', limiters.api, authMiddleware, createNoteRouter(services.notes));
  app.use('/api/tags', limiters.api, authMiddleware, createTagRouter(services.tags));
  app.use('/api/chats', limiters.api, authMiddleware, createChatRouter(services.chats));

  app.use(notFoundHandler);
  app.use(createErrorHandler({ verbose: config.server.nodeEnv === 'development' }));

  return app;
};
