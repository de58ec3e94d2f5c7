/**
 * Application Performance Monitoring (APM) Utility
 *
 * Request tracking with correlation IDs, custom metrics, exception tracking
 * and query timing. Metrics go to the logger at debug level until an APM
 * provider is wired in `initializeAPM`.
 */

import type { Request, Response, NextFunction } from 'express';
import logger from './logger';

type Tags = Record<string, string | number | boolean>;

// Generate correlation ID for request tracking
export const generateCorrelationId = (): string => {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
};

/**
 * Request tracking middleware
 * Adds correlation ID and tracks request timing
 */
export const requestTracking = (req: Request, res: Response, next: NextFunction): void => {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && header.length > 0 ? header : generateCorrelationId();
  const startTime = Date.now();

  req.correlationId = correlationId;
  res.setHeader('X-Correlation-ID', correlationId);

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const { method, originalUrl, ip } = req;
    const { statusCode } = res;

    logger.info('Request completed', {
      correlationId,
      method,
      url: originalUrl,
      statusCode,
      duration,
      ip,
      userAgent: req.headers['user-agent']
    });

    // Track slow requests (> 1 second)
    if (duration > 1000) {
      logger.warn('Slow request detected', {
        correlationId,
        method,
        url: originalUrl,
        duration,
        threshold: 1000
      });

      trackMetric('slow_requests', 1, { endpoint: originalUrl });
    }

    if (statusCode >= 500) {
      trackMetric('server_errors', 1, { endpoint: originalUrl, status: statusCode });
    } else if (statusCode >= 400) {
      trackMetric('client_errors', 1, { endpoint: originalUrl, status: statusCode });
    }
  });

  next();
};

/**
 * Custom metric tracking
 * @param name Metric name
 * @param value Metric value
 * @param tags Additional tags/dimensions
 */
export const trackMetric = (name: string, value: number, tags: Tags = {}): void => {
  logger.debug('Custom metric', { metric: name, value, tags });
};

/**
 * Track exceptions/errors
 * @param error Error object
 * @param context Additional context
 */
export const trackException = (error: Error, context: Record<string, unknown> = {}): void => {
  logger.error('Exception tracked', {
    error: error.message,
    stack: error.stack,
    context
  });
};

/**
 * Database query performance tracking
 */
export class QueryPerformanceTracker {
  private startTime: number;
  private queryName: string;

  constructor(queryName: string) {
    this.queryName = queryName;
    this.startTime = Date.now();
  }

  end(): void {
    const duration = Date.now() - this.startTime;

    logger.debug('Database query completed', {
      query: this.queryName,
      duration
    });

    trackMetric('db_query_duration', duration, { query: this.queryName });

    // Track slow queries (> 100ms)
    if (duration > 100) {
      logger.warn('Slow database query', {
        query: this.queryName,
        duration,
        threshold: 100
      });

      trackMetric('slow_db_queries', 1, { query: this.queryName });
    }
  }
}

/**
 * Times an async store call, recording the duration even when it rejects.
 */
export const timed = async <T>(queryName: string, run: () => Promise<T>): Promise<T> => {
  const tracker = new QueryPerformanceTracker(queryName);
  try {
    return await run();
  } finally {
    tracker.end();
  }
};

/**
 * Initialize APM (call this in index.ts before the app is built)
 */
export const initializeAPM = (): void => {
  const apmProvider = process.env.APM_PROVIDER;

  if (!apmProvider || apmProvider === 'none') {
    logger.info('APM disabled');
    return;
  }

  // No provider SDK is bundled; metrics stay in the log stream.
  logger.warn(`Unknown APM provider: ${apmProvider}, metrics will only be logged`);
};
