// =============================================================================
// GAZETTE - Express Application
//
// Route architecture:
//
//   /api/auth/*           - Registration, login, session, password reset
//   /api/articles/*       - Catalogue and the draft → pending → decided workflow
//   /api/newsletters/*    - Newsletter feeds and authoring
//   /api/subscriptions/*  - Reader subscriptions
//   /api/publishers/*     - Houses, dashboards, team membership
//   /api/categories       - Category list
//   /api/health           - Health check (unauthenticated)
//   /media/*              - Uploaded hero and cover images
//
// The app is built around injected collaborators so the same wiring serves
// the pg-backed server and the in-process test harness.
// =============================================================================

import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { config } from './config';
import { errorHandler, notFoundHandler, requestId, requestSanitization } from './middleware/security';
import { articleRoutes } from './routes/articles';
import { authRoutes } from './routes/auth';
import { categoryRoutes } from './routes/categories';
import { newsletterRoutes } from './routes/newsletters';
import { publisherRoutes } from './routes/publishers';
import { subscriptionRoutes } from './routes/subscriptions';
import { AppDependencies } from './types/app';

const SERVICE_VERSION = '1.0.0';

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // ── Security Middleware ──────────────────────────────────────────────

  app.use(helmet());
  app.use(cors({
    origin: config.nodeEnv === 'development' ? '*' : undefined,
  }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestId());
  app.use(requestSanitization());

  // Brute-force protection on credential endpoints
  const authLimiter = rateLimit({
    windowMs: config.rateLimit.authWindowMs,
    limit: config.rateLimit.authMax,
    message: { error: 'Too many authentication attempts. Try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const apiLimiter = rateLimit({
    windowMs: config.rateLimit.apiWindowMs,
    limit: config.rateLimit.apiMax,
    standardHeaders: true,
    legacyHeaders: false,
  });

  // ── Health ───────────────────────────────────────────────────────────

  const startTime = Date.now();

  app.get('/api/health', (_req, res, next) => {
    const dbStart = Date.now();
    deps.checkDatabase()
      .then(() => ({ status: 'healthy', latencyMs: Date.now() - dbStart }))
      .catch(() => ({ status: 'unhealthy', latencyMs: Date.now() - dbStart }))
      .then((database) => {
        const healthy = database.status === 'healthy';
        res.status(healthy ? 200 : 503).json({
          status: healthy ? 'healthy' : 'degraded',
          service: 'gazette',
          version: SERVICE_VERSION,
          uptime: Math.floor((Date.now() - startTime) / 1000),
          checks: { database },
          timestamp: new Date().toISOString(),
        });
      })
      .catch(next);
  });

  // ── Routes ───────────────────────────────────────────────────────────

  app.use('/api/auth', authLimiter, authRoutes(deps));
  app.use('/api/articles', apiLimiter, articleRoutes(deps));
  app.use('/api/newsletters', apiLimiter, newsletterRoutes(deps));
  app.use('/api/subscriptions', apiLimiter, subscriptionRoutes(deps));
  app.use('/api/publishers', apiLimiter, publisherRoutes(deps));
  app.use('/api/categories', apiLimiter, categoryRoutes(deps));
  app.use('/media', express.static(config.uploads.dir, { index: false }));

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}
