import winston from 'winston';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const LOG_FILE = process.env.LOG_FILE;

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

if (LOG_FILE) {
  transports.push(new winston.transports.File({ filename: LOG_FILE }));
  transports.push(new winston.transports.File({ filename: `${LOG_FILE}.error`, level: 'error' }));
}

const logger = winston.createLogger({
  level: LOG_LEVEL,
  // Jest sets NODE_ENV=test; keep suites quiet unless LOG_LEVEL is forced
  silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports,
});

export default logger;
