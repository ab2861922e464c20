import winston from 'winston';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

const devFormat = combine(
  colorize(),
  timestamp({ format: 'HH:mm:ss' }),
  printf(({ level, message, timestamp, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    return `${timestamp} ${level}: ${message} ${metaStr}`;
  })
);

const prodFormat = combine(
  errors({ stack: true }),
  timestamp(),
  json()
);

const env = process.env.NODE_ENV;

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (env === 'production' ? 'info' : 'debug'),
  format: env === 'production' ? prodFormat : devFormat,
  defaultMeta: { service: 'traffic-insights' },
  // Vitest sets NODE_ENV=test; keep test output clean
  silent: env === 'test',
  transports: [
    new winston.transports.Console(),
  ],
});

export default logger;
