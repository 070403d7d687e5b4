import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { logger } from 'hono/logger';
import type { RangeTransport } from './adapters/http/fetch-transport';
import { isInspectorError, type InspectorErrorCode } from './errors';
import { createHealthRoutes } from './routes/health';
import { createInspectRoutes } from './routes/inspect';
import { createReportRoutes } from './routes/reports';
import { SessionStore } from './services/zip/session-store';
import { loadConfig, type InspectorConfig } from './utils/config';
import { createLogger } from './utils/logger';

const log = createLogger('app');
const httpLog = createLogger('http');

export interface AppDependencies {
  config?: InspectorConfig;
  transport?: RangeTransport;
  sessions?: SessionStore;
}

type ErrorStatus = 400 | 404 | 422 | 500 | 502;

export function statusForError(code: InspectorErrorCode): ErrorStatus {
  switch (code) {
    case 'ENTRY_NOT_FOUND':
    case 'FOLDER_NOT_FOUND':
      return 404;
    case 'INVALID_FORMAT':
      return 422;
    case 'TRANSPORT':
    case 'CENTRAL_DIRECTORY_NOT_FOUND':
    case 'DECODE':
      return 502;
    case 'CONFIG':
      return 400;
    default:
      return 500;
  }
}

export function createApp(deps: AppDependencies = {}) {
  const config = deps.config ?? loadConfig();
  const sessions =
    deps.sessions ??
    new SessionStore({
      transport: deps.transport,
      step: config.probe.step,
      maxAttempts: config.probe.maxAttempts,
      leadingBytes: config.probe.leadingBytes,
    });

  const app = new Hono();

  // Global middleware
  app.use('*', logger((message, ...rest) => httpLog.info(message, ...rest)));

  app.use(
    '*',
    cors({
      origin: config.allowedOrigins.length > 0 ? config.allowedOrigins : '*',
      allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      maxAge: 86400,
    })
  );

  // Health check routes
  app.route('/health', createHealthRoutes(config));

  app.route('/inspect', createInspectRoutes(sessions));
  app.route('/reports', createReportRoutes(sessions, config));

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not Found' }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status);
    }

    if (isInspectorError(err)) {
      const status = statusForError(err.code);
      if (status >= 500) {
        log.error(`Inspection failed: ${err.message}`);
      }
      return c.json({ error: err.message, code: err.code }, status);
    }

    log.error('Application error:', err);
    return c.json({ error: 'Internal Server Error' }, 500);
  });

  return app;
}
