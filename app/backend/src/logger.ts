import winston from 'winston';

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'error' : 'info'),
  transports: [new winston.transports.Console()],
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ level, message, timestamp, stack }) =>
      typeof stack === 'string'
        ? `[${String(timestamp)}] ${level}: ${String(message)}\n${stack}`
        : `[${String(timestamp)}] ${level}: ${String(message)}`
    )
  ),
});
