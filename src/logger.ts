import winston from 'winston';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

// One line per entry: "2024-05-01 12:00:00 [info] Translation job started | {"jobId":...}"
const logFormat = printf(({ level, message, timestamp, stack, ...metadata }) => {
  let msg = `${timestamp} [${level}] ${message}`;

  if (stack) {
    msg += `\n${stack}`;
  }

  const metaKeys = Object.keys(metadata);
  if (metaKeys.length > 0) {
    msg += ` | ${JSON.stringify(metadata)}`;
  }

  return msg;
});

const transports: Array<winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance> = [
  new winston.transports.Console({
    format: combine(
      colorize({ all: true }),
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      logFormat
    )
  })
];

// Machine-readable copy of every entry, e.g. for reviewing failed cells after a sweep
if (process.env.LOG_FILE) {
  transports.push(
    new winston.transports.File({
      filename: process.env.LOG_FILE,
      format: combine(timestamp(), json()),
    })
  );
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    logFormat
  ),
  transports,
});

/**
 * Logger whose entries all carry the job id
 */
export function jobLogger(jobId: string): winston.Logger {
  return logger.child({ jobId });
}

export default logger;
