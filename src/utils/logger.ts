import winston from 'winston';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

// Human-readable format for development
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${String(timestamp)} [${level}]: ${String(message)}`;

  const cleanMetadata: Record<string, unknown> = {};
  for (const key of Object.keys(metadata)) {
    if (!key.startsWith('Symbol')) {
      cleanMetadata[key] = metadata[key];
    }
  }
  if (Object.keys(cleanMetadata).length > 0) {
    msg += ` ${JSON.stringify(cleanMetadata)}`;
  }

  return msg;
});

const getLogLevel = (): string => {
  const envLevel = process.env['LOG_LEVEL'];
  if (envLevel) {
    return envLevel.toLowerCase();
  }
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
};

const getLogFormat = (): winston.Logform.Format => {
  const format = process.env['LOG_FORMAT'];
  const isDev = process.env['NODE_ENV'] !== 'production';

  if (format === 'json' || !isDev) {
    return combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), errors({ stack: true }), json());
  }

  return combine(
    colorize({ all: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    errors({ stack: true }),
    devFormat
  );
};

const getTransports = (): winston.transport[] => {
  const transports: winston.transport[] = [new winston.transports.Console()];

  if (process.env['LOG_FILE_ENABLED'] === 'true') {
    const logFilePath = process.env['LOG_FILE_PATH'] ?? './logs/gateway.log';

    transports.push(
      new winston.transports.File({
        filename: logFilePath,
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true,
      })
    );

    transports.push(
      new winston.transports.File({
        filename: logFilePath.replace('.log', '.error.log'),
        level: 'error',
        maxsize: 10 * 1024 * 1024,
        maxFiles: 5,
        tailable: true,
      })
    );
  }

  return transports;
};

const logger = winston.createLogger({
  level: getLogLevel(),
  format: getLogFormat(),
  transports: getTransports(),
  silent: process.env['NODE_ENV'] === 'test',
  exitOnError: false,
});

// =============================================================================
// Request logging
// =============================================================================

export interface RequestLogData {
  requestId: string;
  method: string;
  path: string;
  statusCode?: number;
  responseTimeMs?: number;
  userId?: string;
  ipAddress?: string;
  userAgent?: string;
  error?: string;
}

export const logRequest = (data: RequestLogData): void => {
  const level = data.statusCode
    ? data.statusCode >= 500
      ? 'error'
      : data.statusCode >= 400
        ? 'warn'
        : 'info'
    : 'info';

  logger.log(level, `${data.method} ${data.path}`, {
    type: 'request',
    ...data,
  });
};

// =============================================================================
// Upstream provider calls
// =============================================================================

export interface UpstreamLogData {
  event: 'upstream_start' | 'upstream_complete' | 'upstream_retry' | 'upstream_error';
  agent: string;
  model?: string;
  attempt?: number;
  durationMs?: number;
  delayMs?: number;
  status?: number;
  error?: string;
}

export const logUpstream = (data: UpstreamLogData): void => {
  const level =
    data.event === 'upstream_error' || data.event === 'upstream_retry' ? 'warn' : 'debug';

  logger.log(level, `Upstream ${data.event}: ${data.agent}`, {
    type: 'upstream',
    ...data,
  });
};

// =============================================================================
// Rate limiting
// =============================================================================

export interface RateLimitLogData {
  key: string;
  path: string;
  strategy?: string;
  limit: number;
  remaining: number;
  retryAfter: number | null;
  blocked: boolean;
}

export const logRateLimit = (data: RateLimitLogData): void => {
  const level = data.blocked ? 'warn' : 'debug';

  logger.log(level, data.blocked ? 'Rate limit exceeded' : 'Rate limit check passed', {
    type: 'rate_limit',
    ...data,
  });
};

export const logConfig = (message: string, data?: Record<string, unknown>): void => {
  logger.info(message, {
    type: 'config',
    ...data,
  });
};

export const logLifecycle = (
  event: 'startup' | 'shutdown' | 'ready' | 'error',
  message: string,
  data?: Record<string, unknown>
): void => {
  const level = event === 'error' ? 'error' : 'info';

  logger.log(level, `[${event.toUpperCase()}] ${message}`, {
    type: 'lifecycle',
    event,
    ...data,
  });
};

export const createChildLogger = (context: Record<string, unknown>): winston.Logger => {
  return logger.child(context);
};

export default logger;
