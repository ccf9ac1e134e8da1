import winston from 'winston';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const loggers = new Map<string, winston.Logger>();
let levelOverride: LogLevel | undefined;

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function resolveLevel(): LogLevel {
  if (levelOverride) return levelOverride;

  const fromEnv = process.env.LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;

  return process.env.NODE_ENV === 'test' ? 'warn' : 'info';
}

const lineFormat = winston.format.printf(info => {
  const { level, message, timestamp, module, ...meta } = info;
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level} [${String(module)}] ${String(message)}${extra}`;
});

export function createLogger(moduleName: string): winston.Logger {
  return winston.createLogger({
    level: resolveLevel(),
    defaultMeta: { module: moduleName },
    format: winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss' }),
      lineFormat
    ),
    // stdout is reserved for command output (JSON mode)
    transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })]
  });
}

export function getLogger(moduleName: string): winston.Logger {
  let logger = loggers.get(moduleName);
  if (!logger) {
    logger = createLogger(moduleName);
    loggers.set(moduleName, logger);
  }
  return logger;
}

export function setLogLevel(level: LogLevel): void {
  levelOverride = level;
  for (const logger of loggers.values()) {
    logger.level = level;
  }
}

export type Logger = winston.Logger;
