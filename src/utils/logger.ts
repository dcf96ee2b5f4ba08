import winston from 'winston';

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      // stdout is reserved for CLI output
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.align(),
        winston.format.printf(info => {
          const tag = typeof info.tag === 'string' ? `[${info.tag}] ` : '';
          return `${info.timestamp} ${info.level}: ${tag}${info.message}`;
        })
      ),
    }),
  ],
});

export default logger;
