import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { toErrorResponse } from './analytics-errors';
import { log } from './log';
import { registerRoutes, type RouteServices } from './routes';

const MAX_LOG_LINE = 80;

/**
 * Build the Express application around already-constructed services. No
 * connections are opened here; index.ts owns resource lifecycle.
 */
export function createApp(services: RouteServices): Express {
  const app = express();

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Cached analytics are served by this layer; HTTP caches must not add another
  app.use('/api', (_req, res, next) => {
    res.set({
      'Cache-Control': 'no-cache, no-store, must-revalidate',
      Pragma: 'no-cache',
      Expires: '0',
    });
    next();
  });
  app.set('etag', false);

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown;

    const originalResJson = res.json.bind(res);
    res.json = (body: unknown) => {
      capturedJsonResponse = body;
      return originalResJson(body);
    };

    res.on('finish', () => {
      if (!path.startsWith('/api')) return;
      const duration = Date.now() - start;
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }
      if (logLine.length > MAX_LOG_LINE) {
        logLine = logLine.slice(0, MAX_LOG_LINE - 1) + '…';
      }
      log(logLine);
    });

    next();
  });

  registerRoutes(app, services);

  // Malformed JSON bodies and anything a route did not handle
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = httpStatusOf(err);
    if (status !== null && status < 500) {
      res.status(status).json({ error: err instanceof Error ? err.message : 'Bad request' });
      return;
    }
    console.error('[express] Unhandled error:', err);
    const response = toErrorResponse(err);
    res.status(response.status).json(response.body);
  });

  return app;
}

/** body-parser and http-errors attach `status` to the errors they raise. */
function httpStatusOf(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  return typeof err.status === 'number' ? err.status : null;
}
