import winston from 'winston';

const isTest = process.env.NODE_ENV === 'test';

// Check if running in serverless environment (Vercel, AWS Lambda, etc.)
const isServerless = Boolean(process.env.VERCEL || process.env.AWS_LAMBDA_FUNCTION_NAME || process.env.NETLIFY);

const writeFiles = !isServerless && !isTest;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * One-line summary of an audit event, e.g. `OBS_VOID obs=[4] person=2 actor=doc-1 reason="duplicate"`.
 * Returns undefined when `audit` is not an audit payload.
 */
export const summarizeAudit = (audit: unknown): string | undefined => {
  if (!isRecord(audit) || typeof audit.action !== 'string') {
    return undefined;
  }
  const parts = [audit.action];
  if (Array.isArray(audit.obsIds)) parts.push(`obs=[${audit.obsIds.join(',')}]`);
  if (typeof audit.personId === 'number') parts.push(`person=${audit.personId}`);
  if (isRecord(audit.actor) && typeof audit.actor.id === 'string') parts.push(`actor=${audit.actor.id}`);
  if (typeof audit.reason === 'string') parts.push(`reason=${JSON.stringify(audit.reason)}`);
  return parts.join(' ');
};

/**
 * Console line: timestamp, level, the emitting module, the message, then an
 * audit summary or the remaining metadata as JSON.
 */
export const formatConsoleLine = (info: Record<string, unknown>): string => {
  const { timestamp, level, message, module, audit, service, ...meta } = info;
  let line = `${String(timestamp)} [${String(level)}]`;
  if (typeof module === 'string') line += ` (${module})`;
  line += `: ${String(message)}`;

  const summary = summarizeAudit(audit);
  if (summary) {
    line += ` ${summary}`;
  } else if (audit !== undefined) {
    meta.audit = audit;
  }
  if (Object.keys(meta).length > 0) {
    line += ` ${JSON.stringify(meta)}`;
  }
  return line;
};

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf((info) => formatConsoleLine(info))
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: process.env.NODE_ENV === 'production' ? logFormat : consoleFormat,
    silent: isTest
  })
];

if (writeFiles) {
  transports.push(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5
    }),
    // Audit trail kept apart so it can be retained longer than the general log
    new winston.transports.File({
      filename: 'logs/audit.log',
      format: winston.format.combine(
        winston.format((info) => (info.audit === undefined ? false : info))(),
        logFormat
      ),
      maxsize: 5242880,
      maxFiles: 20
    }),
    new winston.transports.File({
      filename: 'logs/combined.log',
      maxsize: 5242880, // 5MB
      maxFiles: 5
    })
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  format: logFormat,
  defaultMeta: { service: 'clinobs-backend' },
  transports,
  ...(writeFiles
    ? {
        exceptionHandlers: [new winston.transports.File({ filename: 'logs/exceptions.log' })],
        rejectionHandlers: [new winston.transports.File({ filename: 'logs/rejections.log' })]
      }
    : {})
});

/**
 * Logger tagged with the emitting module, shown in console lines and kept as
 * `module` in JSON output.
 */
export const moduleLogger = (module: string): winston.Logger => logger.child({ module });

export default logger;
