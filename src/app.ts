import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import logger from './utils/logger';
import { requestTracking, trackException } from './utils/apm';
import type { AppConfig } from './utils/config';
import { ObsServiceError, ValidationError } from './utils/errors';
import { createObservationsRouter } from './routes/observations.routes';
import type ObsService from './services/obs.service';
import type { PrivilegeChecker } from './services/privilege.service';

export interface AppDeps {
  config: AppConfig;
  service: ObsService;
  privileges: PrivilegeChecker;
  /** Reports whether the backing store is reachable; omitted for the in-memory store. */
  checkStore?: () => Promise<boolean>;
}

const LOOPBACK = new Set(['::1', '127.0.0.1', '::ffff:127.0.0.1']);

// Body-parser and similar middleware attach an HTTP status to their errors.
const statusOf = (err: unknown): number | undefined => {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
};

export const createApp = ({ config, service, privileges, checkStore }: AppDeps) => {
  const app = express();

  // Security headers with helmet
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"]
      }
    },
    crossOriginEmbedderPolicy: false,
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true,
      preload: true
    }
  }));

  // Global rate limiter - 100 requests per 15 minutes per IP
  app.use(rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: 100,
    standardHeaders: true,
    legacyHeaders: false,
    message: 'Too many requests from this IP, please try again later.',
    skip: (req) => !config.isProduction && req.ip !== undefined && LOOPBACK.has(req.ip)
  }));

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Allow requests with no origin (server-to-server, curl, etc.)
      if (!origin) return callback(null, true);

      if (config.corsOrigins.includes(origin)) {
        callback(null, true);
      } else {
        logger.warn('CORS request blocked', { origin, allowedOrigins: config.corsOrigins });
        callback(null, false);
      }
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Correlation-ID'],
    optionsSuccessStatus: 204
  };

  app.use(cors(corsOptions));
  app.options(/.*/, cors(corsOptions));
  app.use(express.json({ limit: '1mb' }));

  app.use(requestTracking);

  app.use('/api/observations', createObservationsRouter({ service, privileges, jwtSecret: config.jwtSecret }));

  // Health check endpoints for load balancers and monitoring
  app.get('/healthz', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });
  app.get('/health', async (_req, res) => {
    const storeReachable = checkStore ? await checkStore() : true;
    res.status(storeReachable ? 200 : 503).json({
      status: storeReachable ? 'healthy' : 'unhealthy',
      store: config.store,
      timestamp: new Date().toISOString()
    });
  });

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({ message: 'Not Found', path: req.path });
  });

  // Error handler
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof ValidationError) {
      logger.warn('Request validation failed', { path: req.path, method: req.method, errors: err.issues });
      res.status(err.status).json({ message: 'Validation error', errors: err.issues });
      return;
    }

    if (err instanceof ObsServiceError && err.status < 500) {
      res.status(err.status).json({ message: err.message });
      return;
    }

    const status = statusOf(err) ?? 500;
    if (status < 500) {
      res.status(status).json({ message: err instanceof Error ? err.message : 'Bad request' });
      return;
    }

    const errorId = Math.random().toString(36).substring(7);
    const error = err instanceof Error ? err : new Error(String(err));
    trackException(error, { errorId, path: req.path, method: req.method, correlationId: req.correlationId });

    // In production, send generic error messages to avoid information leakage
    if (config.isProduction) {
      res.status(status).json({ message: 'Internal server error', errorId });
    } else {
      res.status(status).json({ message: error.message, errorId, stack: error.stack });
    }
  });

  return app;
};

export default createApp;
