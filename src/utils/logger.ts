import winston, { Logger, format } from 'winston';
import path from 'path';
import fs from 'fs';
import DailyRotateFile from 'winston-daily-rotate-file';

/**
 * Logger Configuration Interface
 */
interface LoggerConfig {
  logDir: string;
  logLevel: string;
  appName: string;
  environment: string;
  maxSize: number;
  maxFiles: number;
  enableConsole: boolean;
  enableFile: boolean;
  silent: boolean;
}

/**
 * Ensure log directory exists
 */
const ensureLogDir = (logDir: string): void => {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
};

/**
 * Custom filter to match specific log level only
 */
const createLevelFilter = (targetLevel: string) => {
  return format((info) => {
    return info.level === targetLevel ? info : false;
  })();
};

/**
 * Get default configuration with environment overrides
 */
const getConfig = (): LoggerConfig => ({
  logDir: process.env.LOG_FILE_PATH || './logs',
  logLevel: process.env.LOG_LEVEL || 'info',
  appName: process.env.APP_NAME || 'plate-sync',
  environment: process.env.NODE_ENV || 'development',
  maxSize: parseInt(process.env.LOG_MAX_SIZE || '5242880', 10), // 5MB
  maxFiles: parseInt(process.env.LOG_MAX_FILES || '5', 10),
  enableConsole: process.env.LOG_CONSOLE !== 'false',
  enableFile: process.env.LOG_FILE !== 'false',
  silent: process.env.LOG_SILENT === 'true',
});

const getConsoleFormat = () => {
  return format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.colorize({ all: true }),
    format.printf(({ timestamp, level, message, service, requestId, ...meta }) => {
      const metaStr = Object.keys(meta).length ? `\n${JSON.stringify(meta, null, 2)}` : '';
      const scope = requestId ? `${service}:${requestId}` : service;
      return `${timestamp} [${scope}] ${level}: ${message}${metaStr}`;
    })
  );
};

const getFileFormat = () => {
  return format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.errors({ stack: true }),
    format.splat(),
    format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service', 'requestId'] }),
    format.json()
  );
};

const rotatingFile = (config: LoggerConfig, name: string, level?: string) =>
  new DailyRotateFile({
    filename: path.join(config.logDir, `${name}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    level,
    format:
      name === 'debug'
        ? format.combine(createLevelFilter('debug'), getFileFormat())
        : getFileFormat(),
    maxSize: config.maxSize,
    maxFiles: `${config.maxFiles}d`, // e.g., '5d' = 5 days
    auditFile: path.join(config.logDir, `.${name}-audit.json`),
    zippedArchive: false,
  });

/**
 * Create Winston Logger instance
 */
const createLogger = (customConfig?: Partial<LoggerConfig>): Logger => {
  const config = { ...getConfig(), ...customConfig };

  const transports: winston.transport[] = [];

  if (config.enableConsole) {
    // In production, only log info and above; in development, use configured level
    const consoleLevel = config.environment === 'production' ? 'info' : config.logLevel;

    transports.push(
      new winston.transports.Console({
        level: consoleLevel,
        format:
          config.environment === 'production'
            ? format.combine(format.timestamp(), format.json())
            : getConsoleFormat(),
      })
    );
  }

  if (config.enableFile) {
    ensureLogDir(config.logDir);

    transports.push(rotatingFile(config, 'combined', 'info'));
    transports.push(rotatingFile(config, 'error', 'error'));

    // Skip debug logs in production
    if (config.environment !== 'production') {
      transports.push(rotatingFile(config, 'debug'));
    }
  }

  // winston warns on every write when it has nowhere to write
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level: config.logLevel,
    silent: config.silent,
    format: getFileFormat(),
    defaultMeta: {
      service: config.appName,
      environment: config.environment,
    },
    transports,
  });
};

/**
 * Child logger that stamps every line with the request id
 */
const forRequest = (parent: Logger, requestId: string | undefined): Logger =>
  requestId ? parent.child({ requestId }) : parent;

const logger = createLogger();

export default logger;
export { createLogger, forRequest, LoggerConfig };
